import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

/** Where the gate gets the operator's answer from. */
export interface ConfirmationSource {
  /**
   * Ask a question and resolve with the raw answer.
   * Resolves null when no answer can come (end of input, abort).
   */
  ask(question: string, signal?: AbortSignal): Promise<string | null>;
}

export interface ReadlineSourceOptions {
  input?: Readable;
  output?: Writable;
  /** Default: whether output is a TTY */
  terminal?: boolean;
  /**
   * Called on Ctrl+C at the prompt. A terminal in raw mode delivers it to
   * readline instead of raising SIGINT on the process.
   */
  onInterrupt?: () => void;
}

/** Reads one line from the terminal. Waits indefinitely unless aborted. */
export function createReadlineConfirmationSource(
  options?: ReadlineSourceOptions,
): ConfirmationSource {
  const input = options?.input ?? process.stdin;
  const output = options?.output ?? process.stdout;

  return {
    ask(question, signal) {
      return new Promise((resolve) => {
        if (signal?.aborted) {
          resolve(null);
          return;
        }

        const rl = createInterface({ input, output, terminal: options?.terminal });
        let settled = false;
        const finish = (answer: string | null): void => {
          if (settled) return;
          settled = true;
          signal?.removeEventListener("abort", onAbort);
          rl.close();
          resolve(answer);
        };
        const onAbort = (): void => finish(null);

        signal?.addEventListener("abort", onAbort, { once: true });
        rl.once("SIGINT", () => {
          options?.onInterrupt?.();
          finish(null);
        });
        rl.once("close", () => finish(null));
        rl.question(question, (answer) => finish(answer));
      });
    },
  };
}

/** Fixed answer for unattended runs (`--yes`) and tests. */
export function createStaticConfirmationSource(
  answer: string | null,
): ConfirmationSource {
  return {
    async ask() {
      return answer;
    },
  };
}
