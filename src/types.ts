export type MovieRecord = {
  id: number;
  title: string;
  release_date: string;
  vote_average?: number;
  overview: string;
  ai_summary?: string;
};

export type PageResult = {
  results: MovieRecord[];
  total_pages: number;
};

export function emptyPage(): PageResult {
  return { results: [], total_pages: 0 };
}

export const UNKNOWN_DATE = "Unknown";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function optString(v: unknown): string | undefined {
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  return s ? s : undefined;
}

/**
 * Normalize one movie object (TMDB payload or a stored watchlist entry).
 * Returns undefined when there is no usable positive integer id or title.
 */
export function toMovieRecord(raw: unknown): MovieRecord | undefined {
  if (!isRecord(raw)) return undefined;

  const rawId = raw.id;
  const id = typeof rawId === "number" ? rawId : Number(rawId);
  if (!Number.isInteger(id) || id <= 0) return undefined;

  const title = optString(raw.title);
  if (!title) return undefined;

  const movie: MovieRecord = {
    id,
    title,
    release_date: optString(raw.release_date) ?? UNKNOWN_DATE,
    overview: typeof raw.overview === "string" ? String(raw.overview) : "",
  };

  const rating = raw.vote_average;
  if (typeof rating === "number" && Number.isFinite(rating)) movie.vote_average = rating;
  const summary = optString(raw.ai_summary);
  if (summary) movie.ai_summary = summary;

  return movie;
}
