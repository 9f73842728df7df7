import { Command, InvalidArgumentError } from "commander";

import {
  addToWatchlist,
  browse,
  browseOnce,
  DEFAULT_CATEGORY,
  exportWatchlist,
  listWatchlist,
  showDetails,
} from "./commands.js";
import { createAppContext, type AppContext } from "./context.js";
import { loadConfig, type AppConfig } from "./env.js";
import { runMenu } from "./menu.js";

export type CliDeps = {
  loadConfig: () => AppConfig;
  createContext: (config: AppConfig, overrides: { language?: string }) => Promise<AppContext>;
};

type GlobalOptions = { language?: string };
type BrowseOptions = { page: number; once?: boolean };

const defaultDeps: CliDeps = {
  loadConfig: () => loadConfig(),
  createContext: createAppContext,
};

function parsePage(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Page must be a positive integer.");
  return n;
}

export function buildProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command();

  // Config errors propagate to the entry point, which exits nonzero.
  async function run(fn: (ctx: AppContext) => Promise<unknown>) {
    const config = deps.loadConfig();
    const ctx = await deps.createContext(config, { language: program.opts<GlobalOptions>().language });
    try {
      const ok = await fn(ctx);
      if (ok === false) process.exitCode = 1;
    } finally {
      ctx.terminal.close();
    }
  }

  program
    .name("movie-cli")
    .description("Movie CLI: your personal movie companion")
    .version("0.1.0")
    .option("-l, --language <lang>", "Catalog language, e.g. en-US")
    // a mistyped subcommand is an error, not a menu session
    .allowExcessArguments(false)
    .action(() => run((ctx) => runMenu(ctx)));

  program
    .command("browse")
    .description("Browse movies by category (popular, top_rated, upcoming, now_playing)")
    .argument("[category]", "Catalog category", DEFAULT_CATEGORY)
    .option("-p, --page <n>", "Page to start on", parsePage, 1)
    .option("--once", "Print a single page and exit")
    .action((category: string, opts: BrowseOptions) =>
      run((ctx) => (opts.once ? browseOnce(ctx, category, opts.page) : browse(ctx, category, opts.page)))
    );

  program
    .command("details")
    .description("Get detailed movie information")
    .argument("<movie_id>", "TMDB movie id")
    .action((movieId: string) => run((ctx) => showDetails(ctx, movieId)));

  program
    .command("watchlist")
    .description("Add a movie to your watchlist")
    .argument("<movie_id>", "TMDB movie id")
    .action((movieId: string) => run((ctx) => addToWatchlist(ctx, movieId)));

  program
    .command("list-watchlist")
    .description("Display your watchlist")
    .action(() => run(async (ctx) => listWatchlist(ctx)));

  program
    .command("export-watchlist")
    .description("Export your watchlist to a JSON file")
    .argument("[path]", "Destination file (defaults to WATCHLIST_EXPORT_PATH)")
    .action((target: string | undefined) => run((ctx) => exportWatchlist(ctx, target)));

  return program;
}
