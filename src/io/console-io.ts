import { createInterface, type Interface } from "node:readline";
import { formatGrid, type Cell } from "./grid.js";
import type { Io } from "./types.js";

function asLines(lines: string | string[]): string[] {
  return Array.isArray(lines) ? lines : [lines];
}

function block(tag: string, lines: string | string[]): string[] {
  const body = asLines(lines);
  return ["", ...body.map((l, i) => (i === 0 ? `[${tag}] ${l}` : `${" ".repeat(tag.length + 3)}${l}`)), ""];
}

export class ConsoleIo implements Io {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private rl: Interface | null = null;
  // lines typed ahead of the prompt, oldest first
  private readonly pending: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private ended = false;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.input = input;
    this.output = output;
  }

  section(title: string): void {
    this.write(["", title, "=".repeat(title.length), ""]);
  }

  text(lines: string | string[]): void {
    this.write(asLines(lines).map((l) => ` ${l}`));
  }

  note(lines: string | string[]): void {
    this.write(block("NOTE", lines));
  }

  warning(lines: string | string[]): void {
    this.write(block("WARNING", lines));
  }

  success(lines: string | string[]): void {
    this.write(block("OK", lines));
  }

  table(header: string[], rows: Cell[][]): void {
    this.write(formatGrid(header, rows));
  }

  async ask(question: string, defaultAnswer: string): Promise<string | null> {
    this.listen();
    this.output.write(` ${question} [${defaultAnswer}]: `);
    const line = await this.nextLine();
    if (line === null) return null;
    const trimmed = line.trim();
    return trimmed.length > 0 ? trimmed : defaultAnswer;
  }

  close(): void {
    this.rl?.close();
    this.finish();
  }

  private nextLine(): Promise<string | null> {
    const queued = this.pending.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  // Input is read lazily so nothing is consumed before the first prompt.
  private listen(): void {
    if (this.rl || this.ended) return;
    const rl = createInterface({ input: this.input, crlfDelay: Infinity, terminal: false });
    rl.on("line", (line) => {
      const waiting = this.waiting;
      this.waiting = null;
      if (waiting) waiting(line);
      else this.pending.push(line);
    });
    rl.once("close", () => this.finish());
    this.rl = rl;
  }

  private finish(): void {
    this.ended = true;
    this.rl = null;
    const waiting = this.waiting;
    this.waiting = null;
    waiting?.(null);
  }

  private write(lines: string[]): void {
    this.output.write(`${lines.join("\n")}\n`);
  }
}
