import readline from 'readline';

/** Line-oriented terminal access used by the menu. `ask` resolves null once input has ended. */
export interface PromptIO {
  ask(question: string): Promise<string | null>;
  print(line?: string): void;
  close(): void;
}

export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

/**
 * Reads through the interface's line iterator rather than `question()`, so piped input
 * that arrives before a prompt is buffered instead of dropped.
 */
export function createReadlineIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): PromptIO {
  const rl = readline.createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question) {
      output.write(question);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    print(line = '') {
      output.write(`${line}\n`);
    },
    close() {
      rl.close();
    },
  };
}

/** Like `ask`, but ends the menu when input is gone. */
export async function askLine(io: PromptIO, question: string): Promise<string> {
  const answer = await io.ask(question);
  if (answer === null) {
    throw new InputClosedError();
  }
  return answer;
}
