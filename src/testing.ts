import type { Logger, LogLevel } from "./logger.js";
import type { Terminal } from "./terminal.js";
import type { FetchLike } from "./tmdb.js";

export type ScriptedTerminal = Terminal & {
  output: string[];
  questions: string[];
  closed: boolean;
};

/** Answers prompts from a fixed script, then reports end of input. */
export function scriptedTerminal(answers: string[]): ScriptedTerminal {
  const queue = [...answers];
  const term: ScriptedTerminal = {
    output: [],
    questions: [],
    closed: false,
    async ask(question) {
      term.questions.push(question);
      const next = queue.shift();
      return next === undefined ? null : next;
    },
    print(text) {
      term.output.push(text);
    },
    close() {
      term.closed = true;
    },
  };
  return term;
}

export type RecordingLogger = Logger & {
  entries: Array<{ level: LogLevel; message: string }>;
};

export function recordingLogger(): RecordingLogger {
  const entries: RecordingLogger["entries"] = [];
  const push = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    debug: push("debug"),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
  };
}

export type FakeRoute = { status: number; body: unknown } | Error;

/** In-process stand-in for TMDB: maps a URL pathname to a canned reply. */
export function fakeFetch(routes: Record<string, FakeRoute>): FetchLike & { calls: string[] } {
  const calls: string[] = [];
  const impl = async (input: string) => {
    calls.push(input);
    const route = routes[new URL(input).pathname];
    if (route === undefined) return reply(404, { status_message: "The resource you requested could not be found." });
    if (route instanceof Error) throw route;
    return reply(route.status, route.body);
  };
  return Object.assign(impl, { calls });
}

function reply(status: number, body: unknown) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 404 ? "Not Found" : "",
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}
