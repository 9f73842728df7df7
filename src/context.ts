import { createOpenAiGenerator, SummaryAugmenter } from "./augmenter.js";
import type { AppConfig } from "./env.js";
import { createLogger, type Logger } from "./logger.js";
import { WatchlistStore } from "./store/watchlistStore.js";
import { createTerminal, type Terminal } from "./terminal.js";
import { CatalogClient } from "./tmdb.js";

export type AppContext = {
  catalog: Pick<CatalogClient, "list" | "detail">;
  augmenter: Pick<SummaryAugmenter, "augment">;
  watchlist: WatchlistStore;
  terminal: Terminal;
  logger: Logger;
  language: string;
};

/** Wires every component from one config object. Loads the watchlist. */
export async function createAppContext(config: AppConfig, overrides: { language?: string } = {}): Promise<AppContext> {
  const logger = createLogger({ scope: "movie-cli", level: config.logLevel, file: config.logFile });

  const watchlist = new WatchlistStore({
    filePath: config.watchlistPath,
    exportPath: config.exportPath,
    logger,
  });
  await watchlist.load();

  return {
    catalog: new CatalogClient({ config, logger }),
    augmenter: new SummaryAugmenter(createOpenAiGenerator(config), logger),
    watchlist,
    terminal: createTerminal(),
    logger,
    language: overrides.language || config.language,
  };
}
