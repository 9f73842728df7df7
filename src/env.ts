import dotenv from "dotenv";
import os from "os";
import path from "path";

import type { LogLevel } from "./logger.js";

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string, public readonly missing: string[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

export type AppConfig = {
  tmdbToken: string;
  tmdbBaseUrl: string;
  language: string;

  openAiKey: string;
  openAiModel: string;
  openAiTimeoutMs: number;

  watchlistPath: string;
  exportPath: string;

  logLevel: LogLevel;
  // Empty disables file logging
  logFile: string;
};

type EnvSource = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function opt(source: EnvSource, name: string, fallback: string): string {
  const v = source[name];
  return v === undefined ? fallback : v.trim();
}

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

function parseLogLevel(raw: string): LogLevel {
  const lvl = raw.toLowerCase();
  const found = LOG_LEVELS.find((l) => l === lvl);
  if (!found) throw new ConfigError(`Invalid LOG_LEVEL: ${raw} (expected ${LOG_LEVELS.join(", ")})`);
  return found;
}

function parseTimeout(raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new ConfigError(`Invalid OPENAI_TIMEOUT_MS: ${raw}`);
  return n;
}

export function loadConfig(source: EnvSource = process.env): AppConfig {
  const tmdbToken = String(source.TMDB_API_TOKEN || "").trim();
  const openAiKey = String(source.OPENAI_API_KEY || source.GENAI_KEY || "").trim();

  const missing: string[] = [];
  if (!tmdbToken) missing.push("TMDB_API_TOKEN");
  if (!openAiKey) missing.push("OPENAI_API_KEY");
  if (missing.length) {
    throw new ConfigError(`Missing env: ${missing.join(", ")}. Set them in your shell or a .env file.`, missing);
  }

  return {
    tmdbToken,
    tmdbBaseUrl: opt(source, "TMDB_BASE_URL", "https://api.themoviedb.org/3").replace(/\/+$/g, ""),
    language: opt(source, "TMDB_LANGUAGE", "en-US") || "en-US",

    openAiKey,
    openAiModel: opt(source, "OPENAI_MODEL", "gpt-4o-mini") || "gpt-4o-mini",
    openAiTimeoutMs: parseTimeout(opt(source, "OPENAI_TIMEOUT_MS", "20000")),

    watchlistPath: expandHome(opt(source, "WATCHLIST_PATH", "~/.movie_cli_watchlist.json")),
    exportPath: expandHome(opt(source, "WATCHLIST_EXPORT_PATH", "~/movie_watchlist.json")),

    logLevel: parseLogLevel(opt(source, "LOG_LEVEL", "info")),
    logFile: opt(source, "LOG_FILE", "movie_cli.log"),
  };
}
