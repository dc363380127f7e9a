import { HealthCheck, addFindings, type RepairKind } from "../health-check.js";
import type { FindingSet, InconsistentRecord, RepairOutcome } from "../types.js";

const PAGES_TABLE = "pages";

/**
 * Marks each page as connected when its pid chain ends at 0. A missing
 * ancestor or a cycle disconnects the page and everything below it.
 */
export function findDisconnectedPages(pages: InconsistentRecord[]): InconsistentRecord[] {
  const parentOf = new Map<number, number>();
  for (const p of pages) parentOf.set(p.uid, p.pid);

  const connected = new Map<number, boolean>();
  for (const page of pages) {
    const path: number[] = [];
    const onPath = new Set<number>();
    let cur = page.uid;
    let status: boolean;
    for (;;) {
      const known = connected.get(cur);
      if (known !== undefined) {
        status = known;
        break;
      }
      if (onPath.has(cur)) {
        status = false;
        break;
      }
      const parent = parentOf.get(cur);
      if (parent === undefined) {
        status = false;
        break;
      }
      path.push(cur);
      onPath.add(cur);
      if (parent === 0) {
        status = true;
        break;
      }
      cur = parent;
    }
    for (const uid of path) connected.set(uid, status);
  }
  return pages.filter((p) => connected.get(p.uid) === false);
}

export class PagesBrokenTree extends HealthCheck {
  readonly name = "pages-broken-tree";
  protected readonly title = "Scan for pages not connected to the page tree";
  protected readonly description = [
    "Every page must reach the tree root (pid 0) through its chain of parent pages.",
    "Pages whose parent does not exist, or that are part of a parent cycle, can never",
    "be reached in the backend. This health check finds those pages (including their",
    "sub pages) and allows removal.",
  ];
  protected readonly findingLabel = "pages not connected to the tree root";
  protected readonly repairKind: RepairKind = "delete";

  async detect(): Promise<FindingSet> {
    const findings: FindingSet = new Map();
    if (!(await this.probe.exists(PAGES_TABLE))) return findings;
    // deleted pages still anchor their sub pages physically, so nothing is filtered
    const pages = await this.collect(PAGES_TABLE, [], []);
    addFindings(findings, PAGES_TABLE, findDisconnectedPages(pages));
    return findings;
  }

  repair(findings: FindingSet): Promise<RepairOutcome> {
    return this.deleteRecords(findings);
  }
}
