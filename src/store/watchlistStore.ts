import fs from "fs/promises";
import path from "path";

import { errorMessage, type Logger } from "../logger.js";
import { isRecord, toMovieRecord, type MovieRecord } from "../types.js";

export type WatchlistStoreOptions = {
  filePath: string;
  exportPath: string;
  logger: Logger;
};

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === "ENOENT";
}

/** Normalized copies of the usable entries, first of each id kept. */
function normalizeEntries(entries: unknown[]): { items: MovieRecord[]; dropped: number } {
  const seen = new Set<number>();
  const items: MovieRecord[] = [];
  let dropped = 0;
  for (const entry of entries) {
    const movie = toMovieRecord(entry);
    if (!movie || seen.has(movie.id)) {
      dropped++;
      continue;
    }
    seen.add(movie.id);
    items.push(movie);
  }
  return { items, dropped };
}

async function writeJsonAtomic(filePath: string, data: unknown) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tmp, JSON.stringify(data, null, 2) + "\n", "utf8");
    await fs.rename(tmp, filePath);
  } catch (e) {
    await fs.rm(tmp, { force: true }).catch(() => undefined);
    throw e;
  }
}

/**
 * Local watchlist persisted as a JSON array.
 *
 * The in-memory list is the source of truth for the session: a failed save is
 * logged and the session keeps going with what it has. No cross-process
 * locking; two processes writing the same file race and the last one wins.
 */
export class WatchlistStore {
  private items: MovieRecord[] = [];
  private lock: Promise<void> = Promise.resolve();

  constructor(private readonly opts: WatchlistStoreOptions) {}

  get filePath(): string {
    return this.opts.filePath;
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.lock;
    let release: (() => void) | undefined;
    this.lock = new Promise<void>((r) => (release = r));
    await prev;
    try {
      return await fn();
    } finally {
      if (release) release();
    }
  }

  list(): MovieRecord[] {
    return this.items.map((m) => ({ ...m }));
  }

  has(id: number): boolean {
    return this.items.some((m) => m.id === id);
  }

  async load(): Promise<MovieRecord[]> {
    const { filePath, logger } = this.opts;

    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (e) {
      if (isMissingFile(e)) {
        logger.debug("No watchlist file yet", { path: filePath });
      } else {
        logger.warn(`Could not read watchlist: ${errorMessage(e)}`, { path: filePath });
      }
      this.items = [];
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (e) {
      logger.warn(`Watchlist file is not valid JSON: ${errorMessage(e)}`, { path: filePath });
      this.items = [];
      return [];
    }

    if (!Array.isArray(data)) {
      logger.warn("Watchlist file does not hold a JSON array", { path: filePath });
      this.items = [];
      return [];
    }

    const { items, dropped } = normalizeEntries(data);
    if (dropped) logger.warn(`Skipped ${dropped} unusable watchlist entries`, { path: filePath });

    this.items = items;
    return this.list();
  }

  /**
   * Writes the watchlist. A given list replaces the in-memory one first, so a
   * later `add` builds on it. Records are stored the way `load` reads them.
   */
  async save(list?: MovieRecord[]): Promise<boolean> {
    if (list) {
      const { items, dropped } = normalizeEntries(list);
      if (dropped) this.opts.logger.warn(`Skipped ${dropped} unusable watchlist records`, { path: this.opts.filePath });
      this.items = items;
    }
    const snapshot = this.list();
    return this.withLock(async () => {
      try {
        await writeJsonAtomic(this.opts.filePath, snapshot);
        return true;
      } catch (e) {
        this.opts.logger.error(`Error saving watchlist: ${errorMessage(e)}`, { path: this.opts.filePath });
        return false;
      }
    });
  }

  /** Appends unless the id is already present; the first stored copy wins. */
  async add(movie: MovieRecord): Promise<boolean> {
    const record = toMovieRecord(movie);
    if (!record) {
      this.opts.logger.warn("Refused an unusable watchlist record", { id: movie.id });
      return false;
    }
    if (this.has(record.id)) return false;
    this.items.push(record);
    await this.save();
    return true;
  }

  async export(target?: string): Promise<string | undefined> {
    const dest = target && target.trim() ? target.trim() : this.opts.exportPath;
    return this.withLock(async () => {
      const snapshot = this.list();
      try {
        await writeJsonAtomic(dest, snapshot);
        this.opts.logger.debug("Watchlist exported", { path: dest, count: snapshot.length });
        return dest;
      } catch (e) {
        this.opts.logger.error(`Export failed: ${errorMessage(e)}`, { path: dest });
        return undefined;
      }
    });
  }
}
