import * as readline from "node:readline";

/**
 * Operator I/O. `ask` resolves null once input has ended (Ctrl-D, closed pipe).
 */
export type Prompter = {
  ask(question: string): Promise<string | null>;
  print(line: string): void;
  close(): void;
};

/**
 * Line-queue prompter over readline. Lines that arrive before a question is
 * asked (piped input) are buffered, not dropped.
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });

  const pending: string[] = [];
  const waiters: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on("line", (line) => {
    const w = waiters.shift();
    if (w) w(line);
    else pending.push(line);
  });

  rl.on("close", () => {
    closed = true;
    for (const w of waiters.splice(0)) w(null);
  });

  return {
    ask(question) {
      output.write(question);
      const line = pending.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => waiters.push(resolve));
    },
    print(line) {
      output.write(line + "\n");
    },
    close() {
      rl.close();
    },
  };
}
