export type Io = {
  section(title: string): void;
  text(lines: string | string[]): void;
  note(lines: string | string[]): void;
  warning(lines: string | string[]): void;
  success(lines: string | string[]): void;
  table(header: string[], rows: (string | number)[][]): void;
  // null once input is closed
  ask(question: string, defaultAnswer: string): Promise<string | null>;
  close(): void;
};
