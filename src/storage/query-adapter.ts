export type Scalar = string | number | boolean | null;

export type Row = Record<string, Scalar>;

export type ComparisonOp = "eq" | "neq" | "lt" | "lte" | "gt" | "gte";

export type Predicate =
  | { op: ComparisonOp; field: string; value: Scalar }
  | { op: "in" | "notIn"; field: string; values: Scalar[] };

export type SelectQuery = {
  table: string;
  columns: string[];
  // ANDed together. There is no implicit soft-delete restriction.
  where?: Predicate[];
  batchSize?: number;
};

/** Rows are always streamed ordered by `uid`. */
export type QueryAdapter = {
  select(query: SelectQuery): AsyncIterable<Row>;
  deleteByUids(table: string, uids: number[]): Promise<number>;
  updateByUids(table: string, uids: number[], values: Row): Promise<number>;
};

export class StorageUnavailableError extends Error {
  code: "storage_unavailable";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageUnavailableError";
    this.code = "storage_unavailable";
  }
}

export const PRIMARY_KEY = "uid";
export const PAGE_ID = "pid";

export async function collectRows(rows: AsyncIterable<Row>): Promise<Row[]> {
  const out: Row[] = [];
  for await (const row of rows) out.push(row);
  return out;
}

export function chunked<T>(items: T[], batchSize: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) out.push(items.slice(i, i + batchSize));
  return out;
}

export function toInt(v: Scalar | undefined): number {
  const n = Number(v ?? 0);
  return Number.isFinite(n) ? Math.trunc(n) : 0;
}
