import type { SchemaRole } from "../../schema/metadata.js";
import { HealthCheck, addFindings, type RepairKind } from "../health-check.js";
import type { FindingSet, RepairOutcome } from "../types.js";

// Records in the default language (0) or in "all languages" (-1) translate nothing,
// so any pointer to a translation origin on them is stale.
abstract class LanguageLessThanOneHasZeroPointer extends HealthCheck {
  protected abstract readonly pointerRole: SchemaRole;
  protected readonly repairKind: RepairKind = "reset";

  async detect(): Promise<FindingSet> {
    const findings: FindingSet = new Map();
    for (const table of this.schema.languageAwareTables()) {
      const pointerField = this.schema.field(table, this.pointerRole);
      if (pointerField === null) continue;
      const languageField = this.schema.requireField(table, "language");
      addFindings(
        findings,
        table,
        await this.collect(
          table,
          [languageField, pointerField],
          [
            { op: "lt", field: languageField, value: 1 },
            { op: "neq", field: pointerField, value: 0 },
          ],
        ),
      );
    }
    return findings;
  }

  repair(findings: FindingSet): Promise<RepairOutcome> {
    return this.resetField(findings, this.pointerRole);
  }
}

export class LanguageLessThanOneHasZeroLanguageParent extends LanguageLessThanOneHasZeroPointer {
  readonly name = "language-less-than-one-has-zero-language-parent";
  protected readonly pointerRole: SchemaRole = "translationParent";
  protected readonly title = "Scan for default language records with a translation parent";
  protected readonly description = [
    "Records in the default language (language id 0) or in \"all languages\" (-1) are no",
    "translations, their translation parent field must be 0. Otherwise they may show up as",
    "localization of some other record. This health check finds those records and sets",
    "their translation parent field to 0.",
  ];
  protected readonly findingLabel = "records with language less than 1 having a translation parent";
}

export class LanguageLessThanOneHasZeroLanguageSource extends LanguageLessThanOneHasZeroPointer {
  readonly name = "language-less-than-one-has-zero-language-source";
  protected readonly pointerRole: SchemaRole = "translationSource";
  protected readonly title = "Scan for default language records with a translation source";
  protected readonly description = [
    "The translation source field names the record a localization was copied from. Records",
    "in the default language (language id 0) or in \"all languages\" (-1) have no such origin",
    "and must have 0 in this field. This health check finds violating records and sets the",
    "field to 0.",
  ];
  protected readonly findingLabel = "records with language less than 1 having a translation source";
}
