import type { Io } from "../io/types.js";
import type { SchemaMetadata, SchemaRole } from "../schema/metadata.js";
import { PAGE_ID, PRIMARY_KEY, type Predicate, type QueryAdapter } from "../storage/query-adapter.js";
import type { TableProbe } from "../storage/table-probe.js";
import type { Logger } from "../util/logger.js";
import { COMMAND_KEYS, runDecisionLoop } from "./decision-loop.js";
import { affectedPageIds, affectedPagesHeader, affectedPagesRows, loadPageTitles } from "./renderers/affected-pages.js";
import { loadRecordDetails } from "./renderers/record-details.js";
import {
  countRecords,
  toInconsistentRecord,
  uidsOf,
  type CheckMode,
  type CheckResult,
  type FindingSet,
  type InconsistentRecord,
  type RepairOutcome,
} from "./types.js";

export type HealthCheckDeps = {
  schema: SchemaMetadata;
  store: QueryAdapter;
  probe: TableProbe;
  io: Io;
  logger: Logger;
  // uids per lookup or repair statement
  chunkSize: number;
};

export type RepairKind = "delete" | "reset";

const REPAIR_WORDING: Record<RepairKind, { prompt: string; help: string; done: string }> = {
  delete: { prompt: "Remove", help: "remove (DELETE, no soft-delete!) records", done: "deleted" },
  reset: { prompt: "Update", help: "update records (reset the offending field, rows are kept)", done: "updated" },
};

/**
 * One class of inconsistency. Subclasses provide detection and the fixed repair;
 * the scan/summary/decision cycle is shared.
 */
export abstract class HealthCheck {
  /** Stable id, also used as resume marker. */
  abstract readonly name: string;
  protected abstract readonly title: string;
  protected abstract readonly description: string[];
  // completes "Found ... in N tables" and "No ..."
  protected abstract readonly findingLabel: string;
  protected abstract readonly repairKind: RepairKind;

  protected readonly schema: SchemaMetadata;
  protected readonly store: QueryAdapter;
  protected readonly probe: TableProbe;
  protected readonly io: Io;
  protected readonly chunkSize: number;
  private readonly logger: Logger;
  private childLogger: Logger | null = null;

  constructor(deps: HealthCheckDeps) {
    this.schema = deps.schema;
    this.store = deps.store;
    this.probe = deps.probe;
    this.io = deps.io;
    this.chunkSize = deps.chunkSize;
    this.logger = deps.logger;
  }

  abstract detect(): Promise<FindingSet>;

  abstract repair(findings: FindingSet): Promise<RepairOutcome>;

  header(): void {
    this.io.section(this.title);
    this.io.text(this.description);
  }

  async handle(mode: CheckMode, resumeToken = ""): Promise<CheckResult> {
    if (resumeToken !== "" && resumeToken !== this.name) {
      this.log.debug({ resume_token: resumeToken }, "skipped before resume marker");
      return "ok";
    }

    this.header();
    let findings = await this.scan();
    if (findings.size === 0) return "ok";

    if (mode === "execute") {
      await this.repairAndReport(findings);
      return "ok";
    }

    const wording = REPAIR_WORDING[this.repairKind];
    const result = await runDecisionLoop({
      ask: () => this.io.ask(`${wording.prompt} records [${COMMAND_KEYS}]?`, "?"),
      repair: async () => {
        await this.repairAndReport(findings);
        findings = await this.scan();
        return countRecords(findings);
      },
      reload: async () => {
        findings = await this.scan();
        return countRecords(findings);
      },
      showPages: () => this.outputAffectedPages(findings),
      showDetails: () => this.outputRecordDetails(findings),
      showHelp: () => this.outputHelp(),
    });
    this.log.info({ result }, "decision loop finished");
    return result;
  }

  protected get log(): Logger {
    if (!this.childLogger) this.childLogger = this.logger.child({ check: this.name });
    return this.childLogger;
  }

  /** Reads `uid`, `pid` and the given columns of every row matching `where`. */
  protected async collect(table: string, columns: string[], where: Predicate[]): Promise<InconsistentRecord[]> {
    const wanted = [PRIMARY_KEY, PAGE_ID, ...columns.filter((c) => c !== PRIMARY_KEY && c !== PAGE_ID)];
    const out: InconsistentRecord[] = [];
    for await (const row of this.store.select({ table, columns: wanted, where })) {
      out.push(toInconsistentRecord(table, row));
    }
    return out;
  }

  protected async deleteRecords(findings: FindingSet): Promise<RepairOutcome> {
    const outcome: RepairOutcome = new Map();
    for (const [table, records] of findings) {
      outcome.set(table, await this.store.deleteByUids(table, uidsOf(records)));
    }
    return outcome;
  }

  /** Sets the column playing `role` to 0, table by table. */
  protected async resetField(findings: FindingSet, role: SchemaRole): Promise<RepairOutcome> {
    const outcome: RepairOutcome = new Map();
    for (const [table, records] of findings) {
      const field = this.schema.requireField(table, role);
      outcome.set(table, await this.store.updateByUids(table, uidsOf(records), { [field]: 0 }));
    }
    return outcome;
  }

  private async scan(): Promise<FindingSet> {
    const findings = await this.detect();
    this.log.info({ tables: findings.size, records: countRecords(findings) }, "scan finished");
    this.outputMainSummary(findings);
    return findings;
  }

  private async repairAndReport(findings: FindingSet): Promise<void> {
    const outcome = await this.repair(findings);
    const done = REPAIR_WORDING[this.repairKind].done;
    const lines = [...outcome].map(([table, n]) => `"${table}": ${n} records ${done}`);
    this.log.info({ outcome: Object.fromEntries(outcome) }, "repair finished");
    if (lines.length > 0) this.io.success(lines);
  }

  private outputMainSummary(findings: FindingSet): void {
    if (findings.size === 0) {
      this.io.success(`No ${this.findingLabel}`);
      return;
    }
    const lines = [`Found ${this.findingLabel} in ${findings.size} tables:`];
    for (const [table, records] of findings) lines.push(`"${table}": ${records.length} records`);
    this.io.warning(lines);
  }

  private async outputAffectedPages(findings: FindingSet): Promise<void> {
    this.io.note("Found records per page:");
    const titles = await loadPageTitles(this.schema, this.store, affectedPageIds(findings), this.chunkSize);
    this.io.table(affectedPagesHeader(findings), affectedPagesRows(findings, titles));
  }

  private async outputRecordDetails(findings: FindingSet): Promise<void> {
    for (const [table, records] of findings) {
      this.io.note(`Table "${table}":`);
      const details = await loadRecordDetails(this.store, this.schema.tableSchema(table), records, this.chunkSize);
      this.io.table(details.header, details.rows);
    }
  }

  private outputHelp(): void {
    this.io.text([
      `    y - ${REPAIR_WORDING[this.repairKind].help}`,
      "    a - abort now",
      "    r - reload possibly changed data",
      "    p - show records per page",
      "    d - show record details",
      "    ? - print help",
    ]);
  }
}

/** Adds `records` under `table` only when there are any. */
export function addFindings(findings: FindingSet, table: string, records: InconsistentRecord[]): void {
  if (records.length > 0) findings.set(table, records);
}
