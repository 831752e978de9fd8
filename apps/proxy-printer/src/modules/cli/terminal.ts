import { createInterface } from "node:readline";

import { InputClosedError } from "../../lib/errors.js";
import type { MenuIO } from "./menu.js";

export interface TerminalIO extends MenuIO {
  close(): void;
}

/**
 * Line-buffered stdin reader. Pasted decklists arrive faster than prompts are
 * asked, so lines are queued instead of being answered by `question()`.
 */
export function createTerminalIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): TerminalIO {
  const rl = createInterface({ input, terminal: false });
  const buffered: string[] = [];
  const waiting: Array<{ resolve: (line: string) => void; reject: (error: Error) => void }> = [];
  let closed = false;

  rl.on("line", (line) => {
    const next = waiting.shift();
    if (next) {
      next.resolve(line);
    } else {
      buffered.push(line);
    }
  });

  rl.on("close", () => {
    closed = true;
    for (const pending of waiting.splice(0)) {
      pending.reject(new InputClosedError("Input closed"));
    }
  });

  return {
    ask(question: string): Promise<string> {
      if (question) {
        output.write(question);
      }

      const line = buffered.shift();
      if (line !== undefined) {
        return Promise.resolve(line);
      }
      if (closed) {
        return Promise.reject(new InputClosedError("Input closed"));
      }

      return new Promise((resolve, reject) => {
        waiting.push({ resolve, reject });
      });
    },

    print(line: string): void {
      output.write(`${line}\n`);
    },

    close(): void {
      rl.close();
    },
  };
}
