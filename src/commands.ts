import { runBrowseLoop } from "./browse.js";
import type { AppContext } from "./context.js";
import { expandHome } from "./env.js";
import { renderMovieTable } from "./table.js";
import type { MovieRecord } from "./types.js";

export const INVALID_ID_MESSAGE = "Invalid movie ID. Please enter a number.";
export const DEFAULT_CATEGORY = "popular";
const OVERVIEW_PREVIEW = 200;

/** Accepts a plain positive decimal integer, surrounding spaces allowed. */
export function parseMovieId(raw: string): number | undefined {
  const s = String(raw || "").trim();
  if (!/^\d+$/.test(s)) return undefined;
  const id = Number(s);
  return Number.isSafeInteger(id) && id > 0 ? id : undefined;
}

export function formatDetails(movie: MovieRecord): string {
  const rating = movie.vote_average === undefined ? "N/A" : String(movie.vote_average);
  return [
    `🎬 ${movie.title} (${movie.release_date})`,
    `Rating: ${rating}/10`,
    `Overview: ${movie.overview}`,
    "",
    `🤖 AI Insights: ${movie.ai_summary ?? "No AI summary available"}`,
  ].join("\n");
}

async function fetchAugmented(ctx: AppContext, raw: string): Promise<MovieRecord | undefined> {
  const id = parseMovieId(raw);
  if (id === undefined) {
    ctx.terminal.print(INVALID_ID_MESSAGE);
    return undefined;
  }

  const found = await ctx.catalog.detail(id, ctx.language);
  if (!found.value) {
    ctx.terminal.print(`Movie ${id} not found.`);
    return undefined;
  }

  const augmented = await ctx.augmenter.augment(found.value);
  return augmented.value;
}

export async function showDetails(ctx: AppContext, rawId: string): Promise<boolean> {
  const movie = await fetchAugmented(ctx, rawId);
  if (!movie) return false;
  ctx.terminal.print(formatDetails(movie));
  return true;
}

export async function addToWatchlist(ctx: AppContext, rawId: string): Promise<boolean> {
  const movie = await fetchAugmented(ctx, rawId);
  if (!movie) return false;

  const added = await ctx.watchlist.add(movie);
  ctx.terminal.print(added ? `Added ${movie.title} to watchlist` : `${movie.title} is already in your watchlist`);
  return true;
}

export function listWatchlist(ctx: AppContext): boolean {
  const items = ctx.watchlist.list();
  ctx.terminal.print(items.length ? renderMovieTable(items) : "Your watchlist is empty.");
  return true;
}

export async function exportWatchlist(ctx: AppContext, target?: string): Promise<boolean> {
  const dest = target && target.trim() ? expandHome(target.trim()) : undefined;
  const written = await ctx.watchlist.export(dest);
  ctx.terminal.print(written ? `Watchlist exported to ${written}` : "Export failed.");
  return written !== undefined;
}

export async function browse(ctx: AppContext, category: string, startPage = 1): Promise<boolean> {
  await runBrowseLoop({
    catalog: ctx.catalog,
    terminal: ctx.terminal,
    category: category.trim() || DEFAULT_CATEGORY,
    language: ctx.language,
    startPage,
    onSeeMore: async () => {
      const raw = await ctx.terminal.ask("Enter movie ID: ");
      if (raw !== null) await showDetails(ctx, raw);
    },
  });
  return true;
}

/** Prints one page without prompting. */
export async function browseOnce(ctx: AppContext, category: string, page = 1): Promise<boolean> {
  const { value } = await ctx.catalog.list(category.trim() || DEFAULT_CATEGORY, page, ctx.language);
  if (!value.results.length) {
    ctx.terminal.print("No results.");
    return true;
  }
  for (const movie of value.results) {
    ctx.terminal.print(`${movie.id} - ${movie.title} (Released: ${movie.release_date})`);
    ctx.terminal.print(`Overview: ${movie.overview.slice(0, OVERVIEW_PREVIEW)}...\n`);
  }
  return true;
}
