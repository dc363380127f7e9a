import { PAGE_ID, PRIMARY_KEY, toInt } from "../../storage/query-adapter.js";
import { HealthCheck, addFindings, type RepairKind } from "../health-check.js";
import type { FindingSet, RepairOutcome } from "../types.js";

const REFERENCE_TABLE = "sys_file_reference";
const PAGES_TABLE = "pages";

export class SysFileReferenceInvalidPid extends HealthCheck {
  readonly name = "sys-file-reference-invalid-pid";
  protected readonly title = "Scan for file references on non-existing pages";
  protected readonly description = [
    "File references (table \"sys_file_reference\") are stored on the page of the record",
    "they are attached to. When a reference points to a page id that does not exist at",
    "all (not even as deleted page), it is a leftover of a page removal that missed the",
    "reference. This health check finds those references and allows removal.",
  ];
  protected readonly findingLabel = "file references on non-existing pages";
  protected readonly repairKind: RepairKind = "delete";

  async detect(): Promise<FindingSet> {
    const findings: FindingSet = new Map();
    if (!(await this.probe.exists(REFERENCE_TABLE))) return findings;

    const pageIds = new Set<number>();
    if (await this.probe.exists(PAGES_TABLE)) {
      for await (const row of this.store.select({ table: PAGES_TABLE, columns: [PRIMARY_KEY] })) {
        pageIds.add(toInt(row[PRIMARY_KEY]));
      }
    }

    const references = await this.collect(REFERENCE_TABLE, [], [{ op: "neq", field: PAGE_ID, value: 0 }]);
    addFindings(
      findings,
      REFERENCE_TABLE,
      references.filter((r) => !pageIds.has(r.pid)),
    );
    return findings;
  }

  repair(findings: FindingSet): Promise<RepairOutcome> {
    return this.deleteRecords(findings);
  }
}
