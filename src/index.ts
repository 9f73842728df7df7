#!/usr/bin/env node
import { buildProgram } from "./cli.js";
import { ConfigError } from "./env.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    if (err instanceof ConfigError) console.error(`[movie-cli] ${err.message}`);
    // eslint-disable-next-line no-console
    else console.error("[movie-cli] Unexpected error:", err);
    process.exit(1);
  });
