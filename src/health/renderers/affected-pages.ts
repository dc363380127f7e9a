import type { SchemaMetadata } from "../../schema/metadata.js";
import { PRIMARY_KEY, chunked, collectRows, toInt, type QueryAdapter, type Row } from "../../storage/query-adapter.js";
import type { FindingSet } from "../types.js";

const PAGES_TABLE = "pages";

export type PageTitles = Map<number, string | null>;

export function affectedPageIds(findings: FindingSet): number[] {
  const ids = new Set<number>();
  for (const records of findings.values()) {
    for (const r of records) ids.add(r.pid);
  }
  return [...ids].sort((a, b) => a - b);
}

function pageTitle(row: Row, labelFields: string[]): string {
  for (const field of labelFields) {
    const v = row[field];
    if (v !== null && v !== undefined && String(v).trim().length > 0) return String(v);
  }
  return "";
}

export async function loadPageTitles(
  schema: SchemaMetadata,
  store: QueryAdapter,
  pageIds: number[],
  chunkSize: number,
): Promise<PageTitles> {
  const titles: PageTitles = new Map();
  const labelFields = schema.labelFields(PAGES_TABLE) ?? [];
  const wanted = pageIds.filter((id) => id > 0);
  for (const chunk of chunked(wanted, chunkSize)) {
    const rows = await collectRows(
      store.select({ table: PAGES_TABLE, columns: [PRIMARY_KEY, ...labelFields], where: [{ op: "in", field: PRIMARY_KEY, values: chunk }] }),
    );
    for (const row of rows) titles.set(toInt(row[PRIMARY_KEY]), pageTitle(row, labelFields));
  }
  return titles;
}

export function affectedPagesHeader(findings: FindingSet): string[] {
  return ["Page", "Title", ...findings.keys()];
}

/** One row per owning page, ascending page id, one count column per table. */
export function affectedPagesRows(findings: FindingSet, titles: PageTitles): (string | number)[][] {
  const tables = [...findings.keys()];
  return affectedPageIds(findings).map((pid) => {
    const title = pid === 0 ? "[root]" : titles.has(pid) ? titles.get(pid) ?? "" : "[missing]";
    const counts = tables.map((t) => (findings.get(t) ?? []).filter((r) => r.pid === pid).length);
    return [pid, title, ...counts];
  });
}
