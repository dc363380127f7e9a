export type Cell = string | number;

function border(widths: number[]): string {
  return `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
}

function line(cells: string[], widths: number[]): string {
  return `| ${cells.map((c, i) => c.padEnd(widths[i] ?? 0)).join(" | ")} |`;
}

/** Draws a bordered text grid; short rows are padded with empty cells. */
export function formatGrid(header: string[], rows: Cell[][]): string[] {
  const cols = Math.max(header.length, ...rows.map((r) => r.length));
  const norm = (r: Cell[]) => Array.from({ length: cols }, (_, i) => String(r[i] ?? ""));
  const head = norm(header);
  const body = rows.map(norm);
  const widths = head.map((h, i) => Math.max(h.length, ...body.map((r) => (r[i] ?? "").length)));
  const sep = border(widths);
  return [sep, line(head, widths), sep, ...body.map((r) => line(r, widths)), sep];
}
