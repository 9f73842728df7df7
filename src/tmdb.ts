import type { AppConfig } from "./env.js";
import { errorMessage, type Logger } from "./logger.js";
import { fallback, ok, type Outcome } from "./outcome.js";
import { emptyPage, isRecord, toMovieRecord, type MovieRecord, type PageResult } from "./types.js";

export type FetchLike = (input: string, init?: { headers?: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
  text(): Promise<string>;
}>;

export type CatalogClientOptions = {
  config: Pick<AppConfig, "tmdbToken" | "tmdbBaseUrl" | "language">;
  logger: Logger;
  fetch?: FetchLike;
};

export class TmdbRequestError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = "TmdbRequestError";
  }
}

/**
 * TMDB movie endpoints. Never throws: failures come back as a `fallback`
 * outcome carrying an empty page or an absent movie.
 */
export class CatalogClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: CatalogClientOptions) {
    this.fetchImpl = opts.fetch ?? fetch;
  }

  private buildUrl(path: string, params: Record<string, string | number | undefined>) {
    const url = new URL(`${this.opts.config.tmdbBaseUrl}${path}`);
    Object.entries(params).forEach(([k, v]) => {
      if (v === undefined) return;
      url.searchParams.set(k, String(v));
    });
    return url.toString();
  }

  private async tmdbGet(path: string, params: Record<string, string | number | undefined>): Promise<unknown> {
    const url = this.buildUrl(path, params);
    const res = await this.fetchImpl(url, {
      headers: {
        accept: "application/json",
        Authorization: `Bearer ${this.opts.config.tmdbToken}`,
      },
    });
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new TmdbRequestError(`TMDb request failed (${res.status}): ${text || res.statusText}`, res.status);
    }
    return res.json();
  }

  async list(category: string, page = 1, language = this.opts.config.language): Promise<Outcome<PageResult>> {
    const path = `/movie/${encodeURIComponent(category.trim())}`;
    try {
      const data = await this.tmdbGet(path, { language, page });
      const rows: unknown = isRecord(data) ? data.results : undefined;
      if (!isRecord(data) || !Array.isArray(rows)) {
        throw new TmdbRequestError("TMDb list response has no results array");
      }

      const results: MovieRecord[] = [];
      for (const raw of rows) {
        const movie = toMovieRecord(raw);
        if (movie) results.push(movie);
      }
      const total = Number(data.total_pages);
      return ok({ results, total_pages: Number.isInteger(total) && total > 0 ? total : 0 });
    } catch (e) {
      const reason = errorMessage(e);
      this.opts.logger.error(`API Request Error: ${reason}`, { category, page });
      return fallback(emptyPage(), reason);
    }
  }

  async detail(id: number, language = this.opts.config.language): Promise<Outcome<MovieRecord | undefined>> {
    try {
      const data = await this.tmdbGet(`/movie/${id}`, { language });
      const movie = toMovieRecord(data);
      if (!movie) throw new TmdbRequestError("TMDb detail response is not a movie");
      return ok(movie);
    } catch (e) {
      const reason = errorMessage(e);
      this.opts.logger.error(`Movie Detail Error: ${reason}`, { id });
      return fallback(undefined, reason);
    }
  }
}
