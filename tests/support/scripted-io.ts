import type { Io } from "../../src/io/types.js";

export type IoCall =
  | { kind: "section" | "ask"; text: string }
  | { kind: "text" | "note" | "warning" | "success"; lines: string[] }
  | { kind: "table"; header: string[]; rows: (string | number)[][] };

// A function answer runs when the prompt is reached, e.g. to change data between scans.
export type Answer = string | (() => string);

function asLines(lines: string | string[]): string[] {
  return Array.isArray(lines) ? lines : [lines];
}

/** Records everything printed and answers prompts from a fixed script; null once the script is used up. */
export class ScriptedIo implements Io {
  readonly calls: IoCall[] = [];
  private readonly answers: Answer[];

  constructor(answers: Answer[] = []) {
    this.answers = [...answers];
  }

  section(title: string): void {
    this.calls.push({ kind: "section", text: title });
  }

  text(lines: string | string[]): void {
    this.calls.push({ kind: "text", lines: asLines(lines) });
  }

  note(lines: string | string[]): void {
    this.calls.push({ kind: "note", lines: asLines(lines) });
  }

  warning(lines: string | string[]): void {
    this.calls.push({ kind: "warning", lines: asLines(lines) });
  }

  success(lines: string | string[]): void {
    this.calls.push({ kind: "success", lines: asLines(lines) });
  }

  table(header: string[], rows: (string | number)[][]): void {
    this.calls.push({ kind: "table", header, rows });
  }

  async ask(question: string): Promise<string | null> {
    this.calls.push({ kind: "ask", text: question });
    const next = this.answers.shift();
    if (next === undefined) return null;
    return typeof next === "function" ? next() : next;
  }

  close(): void {}

  of<K extends IoCall["kind"]>(kind: K): (IoCall & { kind: K })[] {
    return this.calls.filter((c): c is IoCall & { kind: K } => c.kind === kind);
  }
}
