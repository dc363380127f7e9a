import { DanglingWorkspaceRecords } from "./checks/dangling-workspace-records.js";
import { LanguageLessThanOneHasZeroLanguageParent, LanguageLessThanOneHasZeroLanguageSource } from "./checks/language-less-than-one.js";
import { LanguageParentMissing } from "./checks/language-parent-missing.js";
import { PagesBrokenTree } from "./checks/pages-broken-tree.js";
import { SysFileReferenceInvalidPid } from "./checks/sys-file-reference-invalid-pid.js";
import type { HealthCheck, HealthCheckDeps } from "./health-check.js";

// Order matters: removing broken pages can orphan file references, and deleting
// dangling overlays can leave localizations without parent.
export function createHealthChecks(deps: HealthCheckDeps): HealthCheck[] {
  return [
    new PagesBrokenTree(deps),
    new SysFileReferenceInvalidPid(deps),
    new DanglingWorkspaceRecords(deps),
    new LanguageParentMissing(deps),
    new LanguageLessThanOneHasZeroLanguageParent(deps),
    new LanguageLessThanOneHasZeroLanguageSource(deps),
  ];
}
