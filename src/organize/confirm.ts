import readline from "node:readline";
import type { ConfirmDeletions, FileEntry } from "./types.js";

export type PromptStreams = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
};

/**
 * Line-oriented question/answer channel. `ask` resolves null once the input
 * is closed or interrupted, so callers never wait on a dead terminal.
 */
export type Prompter = {
  ask(question: string): Promise<string | null>;
  close(): void;
};

export function createPrompter(streams: PromptStreams): Prompter {
  const rl = readline.createInterface({ input: streams.input, output: streams.output });
  // Lines that arrive before the next question are kept, so piped answers are not lost.
  const queued: string[] = [];
  const waiting: Array<(answer: string | null) => void> = [];
  let closed = false;

  rl.on("line", (line) => {
    const next = waiting.shift();
    if (next) {
      next(line);
    } else {
      queued.push(line);
    }
  });
  rl.on("close", () => {
    closed = true;
    for (const next of waiting.splice(0)) {
      next(null);
    }
  });
  rl.on("SIGINT", () => {
    streams.output.write("\n");
    rl.close();
  });

  return {
    ask(question) {
      streams.output.write(question);
      const line = queued.shift();
      if (line !== undefined) {
        return Promise.resolve(line);
      }
      if (closed) {
        return Promise.resolve(null);
      }
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    close() {
      rl.close();
    },
  };
}

export function isAffirmative(answer: string | null): boolean {
  return answer !== null && answer.trim().toLowerCase() === "yes";
}

export function formatDeletionPrompt(pending: FileEntry[]): string {
  const lines = [`The following ${pending.length} file(s) will be permanently deleted:`];
  for (const file of pending) {
    lines.push(` - ${file.name}`);
  }
  lines.push("Proceed? Type 'yes' to confirm: ");
  return lines.join("\n");
}

/**
 * Batch deletion gate backed by a prompter: one question for every pending
 * deletion. Anything but "yes" (any case), including closed input, declines.
 */
export function createPromptConfirm(prompter: Prompter): ConfirmDeletions {
  return async (pending) => {
    const answer = await prompter.ask(formatDeletionPrompt(pending));
    return isAffirmative(answer);
  };
}
