import { PRIMARY_KEY, chunked, toInt } from "../../storage/query-adapter.js";
import { HealthCheck, addFindings, type RepairKind } from "../health-check.js";
import type { FindingSet, RepairOutcome } from "../types.js";

export class LanguageParentMissing extends HealthCheck {
  readonly name = "language-parent-missing";
  protected readonly title = "Scan for localized records with a missing default language record";
  protected readonly description = [
    "Localized records (language id greater than zero) point to the record they translate",
    "via their translation parent field. When that parent record does not exist anymore",
    "in the same table, the localization is an orphan that can not be edited in a sane way.",
    "This health check finds those records and allows removal.",
  ];
  protected readonly findingLabel = "localized records with missing translation parent";
  protected readonly repairKind: RepairKind = "delete";

  async detect(): Promise<FindingSet> {
    const findings: FindingSet = new Map();
    for (const table of this.schema.languageAwareTables()) {
      const languageField = this.schema.requireField(table, "language");
      const parentField = this.schema.requireField(table, "translationParent");
      const candidates = await this.collect(
        table,
        [languageField, parentField],
        [
          { op: "gt", field: languageField, value: 0 },
          { op: "gt", field: parentField, value: 0 },
        ],
      );
      if (candidates.length === 0) continue;

      const parentIds = [...new Set(candidates.map((r) => toInt(r.values[parentField])))];
      const existing = new Set<number>();
      for (const chunk of chunked(parentIds, this.chunkSize)) {
        const where = [{ op: "in" as const, field: PRIMARY_KEY, values: chunk }];
        for await (const row of this.store.select({ table, columns: [PRIMARY_KEY], where })) {
          existing.add(toInt(row[PRIMARY_KEY]));
        }
      }
      addFindings(
        findings,
        table,
        candidates.filter((r) => !existing.has(toInt(r.values[parentField]))),
      );
    }
    return findings;
  }

  repair(findings: FindingSet): Promise<RepairOutcome> {
    return this.deleteRecords(findings);
  }
}
