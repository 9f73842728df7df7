import readline from "readline";

export interface Terminal {
  /** Resolves with the next input line, or null once input has ended. */
  ask(question: string): Promise<string | null>;
  print(text: string): void;
  close(): void;
}

/**
 * Lines typed (or piped) ahead of a prompt are queued, so `printf '4\n6\n' |`
 * answers two prompts. `ask` yields null only when the queue is drained and
 * input has closed.
 */
export function createTerminal(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Terminal {
  const isTTY = "isTTY" in input && input.isTTY === true;
  const rl = readline.createInterface({ input, output, terminal: isTTY });

  const pending: string[] = [];
  let waiting: ((line: string | null) => void) | undefined;
  let closed = false;

  function deliver(line: string | null) {
    const resolve = waiting;
    waiting = undefined;
    if (resolve) resolve(line);
  }

  rl.on("line", (line) => {
    if (waiting) deliver(line);
    else pending.push(line);
  });
  rl.once("close", () => {
    closed = true;
    deliver(null);
  });
  // Ctrl-C ends input instead of pausing the stream
  rl.on("SIGINT", () => rl.close());

  return {
    ask(question) {
      if (closed) {
        output.write(question);
      } else {
        rl.setPrompt(question);
        rl.prompt();
      }
      const next = pending.shift();
      if (next !== undefined) return Promise.resolve(next);
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => {
        waiting = resolve;
      });
    },
    print(text) {
      output.write(text + "\n");
    },
    close() {
      if (!closed) rl.close();
    },
  };
}
