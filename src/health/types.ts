import { PAGE_ID, PRIMARY_KEY, toInt, type Row } from "../storage/query-adapter.js";

export type CheckMode = "interactive" | "execute";

export type CheckResult = "ok" | "aborted";

export type InconsistentRecord = {
  table: string;
  uid: number;
  // owning page, 0 for root level
  pid: number;
  values: Readonly<Row>;
};

/** One scan snapshot: table -> offending rows ordered by uid. Only non-empty tables are present. */
export type FindingSet = Map<string, InconsistentRecord[]>;

export type RepairOutcome = Map<string, number>;

export function isCheckMode(v: string): v is CheckMode {
  return v === "interactive" || v === "execute";
}

export function toInconsistentRecord(table: string, row: Row): InconsistentRecord {
  return { table, uid: toInt(row[PRIMARY_KEY]), pid: toInt(row[PAGE_ID]), values: { ...row } };
}

export function countRecords(findings: FindingSet): number {
  let n = 0;
  for (const records of findings.values()) n += records.length;
  return n;
}

export function uidsOf(records: InconsistentRecord[]): number[] {
  return records.map((r) => r.uid);
}
