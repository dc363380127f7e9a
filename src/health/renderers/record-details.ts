import type { TableSchema } from "../../schema/metadata.js";
import { PAGE_ID, PRIMARY_KEY, chunked, collectRows, type QueryAdapter, type Row, type Scalar } from "../../storage/query-adapter.js";
import type { InconsistentRecord } from "../types.js";

export function detailColumns(schema: TableSchema): string[] {
  const candidates = [
    PRIMARY_KEY,
    PAGE_ID,
    schema.softDeleteField,
    schema.timestampField,
    schema.creatorField,
    schema.typeField,
    ...(schema.labelFields ?? []),
    schema.languageField,
    schema.translationParentField,
    schema.translationSourceField,
    schema.workspaceField,
  ];
  const out: string[] = [];
  for (const c of candidates) {
    if (c && !out.includes(c)) out.push(c);
  }
  return out;
}

export function formatCell(value: Scalar | undefined, isTimestamp: boolean): string {
  if (value === null || value === undefined) return "NULL";
  if (isTimestamp && typeof value === "number" && value > 0) {
    return `${value} (${new Date(value * 1000).toISOString()})`;
  }
  return String(value);
}

export function detailRows(schema: TableSchema, columns: string[], rows: Row[]): string[][] {
  return rows.map((row) => columns.map((c) => formatCell(row[c], c === schema.timestampField)));
}

/** Re-reads the current state of the given records; rows gone meanwhile are left out. */
export async function loadRecordDetails(
  store: QueryAdapter,
  schema: TableSchema,
  records: InconsistentRecord[],
  chunkSize: number,
): Promise<{ header: string[]; rows: string[][] }> {
  const columns = detailColumns(schema);
  const rows: Row[] = [];
  for (const chunk of chunked(records.map((r) => r.uid), chunkSize)) {
    rows.push(
      ...(await collectRows(store.select({ table: schema.name, columns, where: [{ op: "in", field: PRIMARY_KEY, values: chunk }] }))),
    );
  }
  return { header: columns, rows: detailRows(schema, columns, rows) };
}
