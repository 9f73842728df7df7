import fs from "fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export type LoggerOptions = {
  scope: string;
  level?: LogLevel;
  file?: string;
  now?: () => Date;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

export function formatLine(scope: string, level: LogLevel, at: Date, message: string, meta?: LogMeta): string {
  const head = `[${scope}] ${at.toISOString()} ${level.toUpperCase()} ${message}`;
  if (!meta || Object.keys(meta).length === 0) return head;
  return `${head} ${JSON.stringify(meta)}`;
}

export function createLogger(opts: LoggerOptions): Logger {
  const min = LEVEL_ORDER[opts.level ?? "info"];
  const now = opts.now ?? (() => new Date());
  let file = opts.file || "";

  function appendToFile(line: string) {
    if (!file) return;
    try {
      fs.appendFileSync(file, line + "\n", "utf8");
    } catch (e) {
      // eslint-disable-next-line no-console
      console.error(`[${opts.scope}] log file ${file} is not writable (${errorMessage(e)}); file logging disabled`);
      file = "";
    }
  }

  function write(level: LogLevel, message: string, meta?: LogMeta) {
    if (LEVEL_ORDER[level] < min) return;
    const line = formatLine(opts.scope, level, now(), message, meta);
    // stdout belongs to command output; every level goes to stderr
    // eslint-disable-next-line no-console
    if (level === "warn") console.warn(line);
    // eslint-disable-next-line no-console
    else console.error(line);
    appendToFile(line);
  }

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
