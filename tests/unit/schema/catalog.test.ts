import { describe, expect, it } from "vitest";
import { ConfigError } from "../../../src/config.js";
import { loadSchemaCatalog, parseSchemaCatalog } from "../../../src/schema/catalog.js";
import { FIXTURE_CATALOG } from "../../support/deps.js";

describe("loadSchemaCatalog", () => {
  it("keeps the declaration order of the file", () => {
    const catalog = loadSchemaCatalog(FIXTURE_CATALOG);
    expect([...catalog.keys()]).toEqual(["pages", "tt_content", "sys_file_reference", "sys_workspace", "sys_category", "be_users"]);
    expect(catalog.get("tt_content")?.ctrl.label_alt).toBe("subheader, bodytext");
  });

  it("fails with ConfigError for a missing file", () => {
    expect(() => loadSchemaCatalog("/nonexistent/catalog.json")).toThrow(ConfigError);
  });
});

describe("parseSchemaCatalog", () => {
  it("defaults a missing ctrl section to an empty one", () => {
    const catalog = parseSchemaCatalog({ tables: { foo: {} } });
    expect(catalog.get("foo")).toEqual({ ctrl: {} });
  });

  it("rejects field names that are not strings", () => {
    expect(() => parseSchemaCatalog({ tables: { foo: { ctrl: { delete: 1 } } } })).toThrow(/Invalid schema catalog:\ntables\.foo\.ctrl\.delete/);
  });
});
