import { describe, expect, it } from "vitest";
import { DanglingWorkspaceRecords } from "../../../../src/health/checks/dangling-workspace-records.js";
import type { Row } from "../../../../src/storage/query-adapter.js";
import { testDeps } from "../../../support/deps.js";

function dataset(workspaces: Row[] | null): Record<string, Row[]> {
  const data: Record<string, Row[]> = {
    pages: [{ uid: 1, pid: 0, title: "Home", nav_title: "", t3ver_wsid: 0 }],
    tt_content: [
      { uid: 1, pid: 1, deleted: 0, t3ver_wsid: 0 },
      { uid: 2, pid: 1, deleted: 0, tstamp: 1700000000, t3ver_wsid: 7 },
    ],
    sys_file_reference: [],
  };
  if (workspaces) data.sys_workspace = workspaces;
  return data;
}

describe("DanglingWorkspaceRecords", () => {
  it("finds the row of a workspace that does not exist", async () => {
    const deps = testDeps(dataset([{ uid: 3, deleted: 0 }]));
    const findings = await new DanglingWorkspaceRecords(deps).detect();
    expect([...findings.keys()]).toEqual(["tt_content"]);
    expect(findings.get("tt_content")).toEqual([
      { table: "tt_content", uid: 2, pid: 1, values: { uid: 2, pid: 1, t3ver_wsid: 7 } },
    ]);
  });

  it("deletes the dangling row in execute mode and is clean afterwards", async () => {
    const deps = testDeps(dataset([{ uid: 3, deleted: 0 }]));
    const subject = new DanglingWorkspaceRecords(deps);

    await expect(subject.handle("execute", "")).resolves.toBe("ok");
    expect(deps.store.uids("tt_content")).toEqual([1]);
    expect(deps.io.of("ask")).toEqual([]);
    expect(deps.io.of("success")[0]?.lines).toEqual(['"tt_content": 1 records deleted']);

    await expect(subject.handle("execute", "")).resolves.toBe("ok");
    expect((await subject.detect()).size).toBe(0);
    expect(deps.io.of("success").at(-1)?.lines).toEqual(["No workspace records from deleted workspaces"]);
  });

  it("treats rows of a deleted workspace as dangling", async () => {
    const data = dataset([
      { uid: 5, deleted: 1 },
      { uid: 7, deleted: 0 },
    ]);
    data.pages?.push({ uid: 2, pid: 1, title: "Drafts", t3ver_wsid: 5 });
    const findings = await new DanglingWorkspaceRecords(testDeps(data)).detect();
    expect([...findings.keys()]).toEqual(["pages"]);
    expect(findings.get("pages")?.map((r) => r.uid)).toEqual([2]);
  });

  it("only accepts workspace 0 without a workspace table", async () => {
    const findings = await new DanglingWorkspaceRecords(testDeps(dataset(null))).detect();
    expect(findings.get("tt_content")?.map((r) => r.uid)).toEqual([2]);
  });

  it("reports nothing and does not prompt for a clean dataset", async () => {
    const data = dataset([{ uid: 7, deleted: 0 }]);
    const deps = testDeps(data, ["y"]);
    await expect(new DanglingWorkspaceRecords(deps).handle("interactive", "")).resolves.toBe("ok");
    expect(deps.io.of("ask")).toEqual([]);
    expect(deps.io.of("warning")).toEqual([]);
  });

  it("shows pages and details, then aborts without touching data", async () => {
    const deps = testDeps(dataset([{ uid: 3, deleted: 0 }]), ["p", "d", "a"]);
    const subject = new DanglingWorkspaceRecords(deps);
    const before = await subject.detect();

    await expect(subject.handle("interactive", "")).resolves.toBe("aborted");

    expect(deps.io.of("warning")[0]?.lines).toEqual(["Found workspace records from deleted workspaces in 1 tables:", '"tt_content": 1 records']);
    expect(deps.io.of("ask").map((c) => c.text)).toEqual([
      "Remove records [y,a,r,p,d,?]?",
      "Remove records [y,a,r,p,d,?]?",
      "Remove records [y,a,r,p,d,?]?",
    ]);
    const [pagesTable, detailsTable] = deps.io.of("table");
    expect(pagesTable).toEqual({ kind: "table", header: ["Page", "Title", "tt_content"], rows: [[1, "Home", 1]] });
    expect(detailsTable?.header).toEqual([
      "uid",
      "pid",
      "deleted",
      "tstamp",
      "CType",
      "header",
      "subheader",
      "bodytext",
      "sys_language_uid",
      "l18n_parent",
      "l10n_source",
      "t3ver_wsid",
    ]);
    expect(detailsTable?.rows).toEqual([
      ["2", "1", "0", "1700000000 (2023-11-14T22:13:20.000Z)", "NULL", "NULL", "NULL", "NULL", "NULL", "NULL", "NULL", "7"],
    ]);
    expect(deps.io.of("note").map((c) => c.lines)).toEqual([["Found records per page:"], ['Table "tt_content":']]);

    expect(deps.store.mutations).toEqual([]);
    expect(await subject.detect()).toEqual(before);
  });

  it("repairs on y and ends once nothing is left", async () => {
    const deps = testDeps(dataset([{ uid: 3, deleted: 0 }]), ["y"]);
    await expect(new DanglingWorkspaceRecords(deps).handle("interactive", "")).resolves.toBe("ok");
    expect(deps.store.mutations).toEqual(["delete tt_content 2"]);
    expect(deps.io.of("success").map((c) => c.lines)).toEqual([
      ['"tt_content": 1 records deleted'],
      ["No workspace records from deleted workspaces"],
    ]);
  });

  it("prints help for unknown input", async () => {
    const deps = testDeps(dataset([{ uid: 3, deleted: 0 }]), ["x", "a"]);
    await expect(new DanglingWorkspaceRecords(deps).handle("interactive", "")).resolves.toBe("aborted");
    const help = deps.io.of("text").at(-1)?.lines;
    expect(help?.[0]).toBe("    y - remove (DELETE, no soft-delete!) records");
    expect(help).toHaveLength(6);
  });

  it("returns ok without any output when another check is the resume marker", async () => {
    const deps = testDeps(dataset([{ uid: 3, deleted: 0 }]));
    await expect(new DanglingWorkspaceRecords(deps).handle("execute", "pages-broken-tree")).resolves.toBe("ok");
    expect(deps.io.calls).toEqual([]);
    expect(deps.store.uids("tt_content")).toEqual([1, 2]);
  });
});
