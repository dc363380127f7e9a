import { PRIMARY_KEY, toInt, type Predicate } from "../../storage/query-adapter.js";
import { HealthCheck, addFindings, type RepairKind } from "../health-check.js";
import type { FindingSet, RepairOutcome } from "../types.js";

const WORKSPACE_TABLE = "sys_workspace";

/**
 * Discarding a workspace removes all of its overlay records in all tables.
 * This check looks for overlay records that survived their workspace.
 */
export class DanglingWorkspaceRecords extends HealthCheck {
  readonly name = "dangling-workspace-records";
  protected readonly title = "Scan for workspace records of deleted workspaces";
  protected readonly description = [
    "When a workspace (table \"sys_workspace\") is deleted, all existing workspace overlays",
    "in all tables of this workspace are discarded (= removed from DB). When this goes wrong,",
    "or if workspaces are no longer in use, the system ends up with \"dangling\" workspace",
    "records in tables. This health check finds those records and allows removal.",
  ];
  protected readonly findingLabel = "workspace records from deleted workspaces";
  protected readonly repairKind: RepairKind = "delete";

  async detect(): Promise<FindingSet> {
    const allowed = await this.allowedWorkspaceIds();
    const findings: FindingSet = new Map();
    for (const table of this.schema.workspaceEnabledTables()) {
      const wsField = this.schema.requireField(table, "workspace");
      // No soft-delete filter: once a workspace is gone, no row of any visibility may point to it.
      addFindings(findings, table, await this.collect(table, [wsField], [{ op: "notIn", field: wsField, values: allowed }]));
    }
    return findings;
  }

  repair(findings: FindingSet): Promise<RepairOutcome> {
    return this.deleteRecords(findings);
  }

  // Workspace 0 is the live workspace and always valid. Deleted workspaces count as gone.
  private async allowedWorkspaceIds(): Promise<number[]> {
    const ids = [0];
    if (!(await this.probe.exists(WORKSPACE_TABLE))) return ids;
    const deletedField = this.schema.field(WORKSPACE_TABLE, "softDelete");
    const where: Predicate[] = deletedField ? [{ op: "eq", field: deletedField, value: 0 }] : [];
    for await (const row of this.store.select({ table: WORKSPACE_TABLE, columns: [PRIMARY_KEY], where })) {
      const uid = toInt(row[PRIMARY_KEY]);
      if (!ids.includes(uid)) ids.push(uid);
    }
    return ids;
  }
}
