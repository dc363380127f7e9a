import { withTx, type Db } from "../db.js";
import { formatError } from "../util/error-format.js";
import {
  PRIMARY_KEY,
  StorageUnavailableError,
  chunked,
  toInt,
  type Predicate,
  type QueryAdapter,
  type Row,
  type Scalar,
  type SelectQuery,
} from "./query-adapter.js";

export type SqlStatement = {
  text: string;
  values: Scalar[];
};

export type PgQueryAdapterOptions = {
  batchSize: number;
  chunkSize: number;
};

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function qualifiedTable(schema: string, table: string): string {
  return `${quoteIdent(schema)}.${quoteIdent(table)}`;
}

const COMPARISON_SQL = {
  eq: "=",
  neq: "<>",
  lt: "<",
  lte: "<=",
  gt: ">",
  gte: ">=",
} as const;

class Params {
  readonly values: Scalar[] = [];

  add(v: Scalar): string {
    this.values.push(v);
    return `$${this.values.length}`;
  }

  list(vs: Scalar[]): string {
    return vs.map((v) => this.add(v)).join(", ");
  }
}

function predicateSql(p: Predicate, params: Params): string {
  const col = quoteIdent(p.field);
  switch (p.op) {
    case "in":
      return p.values.length === 0 ? "FALSE" : `${col} IN (${params.list(p.values)})`;
    case "notIn":
      return p.values.length === 0 ? "TRUE" : `${col} NOT IN (${params.list(p.values)})`;
    case "eq":
      return p.value === null ? `${col} IS NULL` : `${col} = ${params.add(p.value)}`;
    case "neq":
      return p.value === null ? `${col} IS NOT NULL` : `${col} <> ${params.add(p.value)}`;
    default:
      return `${col} ${COMPARISON_SQL[p.op]} ${params.add(p.value)}`;
  }
}

/** One keyset page: rows with uid greater than `afterUid`, at most `limit` of them. */
export function buildSelectSql(schema: string, query: SelectQuery, afterUid: number | null, limit: number): SqlStatement {
  const params = new Params();
  const columns = query.columns.includes(PRIMARY_KEY) ? query.columns : [PRIMARY_KEY, ...query.columns];
  const conditions = (query.where ?? []).map((p) => predicateSql(p, params));
  if (afterUid !== null) conditions.push(`${quoteIdent(PRIMARY_KEY)} > ${params.add(afterUid)}`);
  const where = conditions.length > 0 ? ` WHERE ${conditions.join(" AND ")}` : "";
  const text =
    `SELECT ${columns.map(quoteIdent).join(", ")} FROM ${qualifiedTable(schema, query.table)}${where}` +
    ` ORDER BY ${quoteIdent(PRIMARY_KEY)} LIMIT ${params.add(limit)}`;
  return { text, values: params.values };
}

export function buildDeleteSql(schema: string, table: string, uids: number[]): SqlStatement {
  const params = new Params();
  const text = `DELETE FROM ${qualifiedTable(schema, table)} WHERE ${quoteIdent(PRIMARY_KEY)} IN (${params.list(uids)})`;
  return { text, values: params.values };
}

export function buildUpdateSql(schema: string, table: string, uids: number[], values: Row): SqlStatement {
  const params = new Params();
  const assignments = Object.entries(values).map(([field, v]) => `${quoteIdent(field)} = ${params.add(v)}`);
  if (assignments.length === 0) throw new Error(`update of "${table}" needs at least one column`);
  const text =
    `UPDATE ${qualifiedTable(schema, table)} SET ${assignments.join(", ")}` +
    ` WHERE ${quoteIdent(PRIMARY_KEY)} IN (${params.list(uids)})`;
  return { text, values: params.values };
}

function normalizeValue(v: unknown): Scalar {
  if (v === null || v === undefined) return null;
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") return v;
  if (typeof v === "bigint") return Number(v);
  if (v instanceof Date) return v.toISOString();
  if (Buffer.isBuffer(v)) return `[${v.length} bytes]`;
  return JSON.stringify(v);
}

function normalizeRow(raw: Record<string, unknown>): Row {
  const out: Row = {};
  for (const [k, v] of Object.entries(raw)) out[k] = normalizeValue(v);
  return out;
}

export class PgQueryAdapter implements QueryAdapter {
  private readonly db: Db;
  private readonly opts: PgQueryAdapterOptions;

  constructor(db: Db, opts: PgQueryAdapterOptions) {
    this.db = db;
    this.opts = opts;
  }

  async *select(query: SelectQuery): AsyncGenerator<Row> {
    const limit = query.batchSize ?? this.opts.batchSize;
    let afterUid: number | null = null;
    for (;;) {
      const stmt = buildSelectSql(this.db.schema, query, afterUid, limit);
      const rows = await this.read(stmt, query.table);
      for (const raw of rows.rows) yield normalizeRow(raw);
      if (rows.rows.length < limit) return;
      afterUid = toInt(normalizeValue(rows.rows[rows.rows.length - 1]?.[PRIMARY_KEY]));
    }
  }

  async deleteByUids(table: string, uids: number[]): Promise<number> {
    if (uids.length === 0) return 0;
    return this.mutate(table, uids, (chunk) => buildDeleteSql(this.db.schema, table, chunk));
  }

  async updateByUids(table: string, uids: number[], values: Row): Promise<number> {
    if (uids.length === 0) return 0;
    return this.mutate(table, uids, (chunk) => buildUpdateSql(this.db.schema, table, chunk, values));
  }

  // All chunks of one table commit together; tables are independent of each other.
  private async mutate(table: string, uids: number[], build: (chunk: number[]) => SqlStatement): Promise<number> {
    try {
      return await withTx(this.db, async (client) => {
        let affected = 0;
        for (const chunk of chunked(uids, this.opts.chunkSize)) {
          const stmt = build(chunk);
          const r = await client.query(stmt.text, stmt.values);
          affected += r.rowCount ?? 0;
        }
        return affected;
      });
    } catch (err) {
      if (err instanceof StorageUnavailableError) throw err;
      throw new StorageUnavailableError(`write to "${table}" failed: ${formatError(err)}`, { cause: err });
    }
  }

  private async read(stmt: SqlStatement, table: string): Promise<{ rows: Record<string, unknown>[] }> {
    try {
      return await this.db.pool.query<Record<string, unknown>>(stmt.text, stmt.values);
    } catch (err) {
      throw new StorageUnavailableError(`read from "${table}" failed: ${formatError(err)}`, { cause: err });
    }
  }
}
