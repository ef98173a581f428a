import readline from 'node:readline';
import type { SessionIO } from './session.js';

/**
 * SessionIO over stdin/stdout
 *
 * Lines are pulled from the readline async iterator, which buffers input,
 * so piped scripts work as well as an interactive terminal.
 */
export class TerminalIO implements SessionIO {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;
  private readonly output: NodeJS.WritableStream;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.output = output;
    this.rl = readline.createInterface({ input, output, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async ask(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  print(text = ''): void {
    this.output.write(`${text}\n`);
  }

  close(): void {
    this.rl.close();
  }
}
