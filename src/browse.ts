import type { CatalogClient } from "./tmdb.js";
import { renderMovieTable } from "./table.js";
import type { Terminal } from "./terminal.js";

export type BrowseAction = "next" | "previous" | "menu" | "quit" | "see" | "invalid";

export const BROWSE_PROMPT = "Options: (n)ext, (p)revious, (s)ee more, (m)enu, (q)uit: ";

const ACTIONS = new Map<string, BrowseAction>([
  ["n", "next"],
  ["next", "next"],
  ["p", "previous"],
  ["prev", "previous"],
  ["previous", "previous"],
  ["m", "menu"],
  ["menu", "menu"],
  ["q", "quit"],
  ["quit", "quit"],
  ["s", "see"],
  ["see", "see"],
]);

export function parseBrowseAction(input: string): BrowseAction {
  return ACTIONS.get(input.trim().toLowerCase()) ?? "invalid";
}

/**
 * Page transition for a navigation action. Returns null when the loop ends.
 * `totalPages` is whatever the latest fetch reported, so a shrinking catalog
 * is handled by the guards alone.
 */
export function step(page: number, totalPages: number, action: BrowseAction): number | null {
  switch (action) {
    case "next":
      return page < totalPages ? page + 1 : page;
    case "previous":
      return page > 1 ? page - 1 : page;
    case "menu":
    case "quit":
      return null;
    default:
      return page;
  }
}

export type BrowseOptions = {
  catalog: Pick<CatalogClient, "list">;
  terminal: Terminal;
  category: string;
  language?: string;
  startPage?: number;
  /** Handles the "see more" action; the page stays put afterwards. */
  onSeeMore?: () => Promise<unknown>;
};

/** Runs until menu/quit or end of input. Resolves with the last viewed page. */
export async function runBrowseLoop(opts: BrowseOptions): Promise<number> {
  const { catalog, terminal, category } = opts;
  let page = opts.startPage && opts.startPage > 0 ? Math.floor(opts.startPage) : 1;

  for (;;) {
    const { value } = await catalog.list(category, page, opts.language);
    const totalPages = value.total_pages;

    terminal.print(`\nPage ${page} of ${totalPages}`);
    terminal.print(value.results.length ? renderMovieTable(value.results) : "No results.");

    const input = await terminal.ask(BROWSE_PROMPT);
    if (input === null) return page;

    const action = parseBrowseAction(input);
    if (action === "invalid") {
      terminal.print("Invalid option. Try again.");
      continue;
    }
    if (action === "see") {
      if (opts.onSeeMore) await opts.onSeeMore();
      else terminal.print("Details are not available here.");
      continue;
    }
    if (action === "quit") terminal.print("Exiting browsing.");

    const next = step(page, totalPages, action);
    if (next === null) return page;
    page = next;
  }
}
