import type { SchemaCatalog, TableCtrl } from "./catalog.js";

export type SchemaRole =
  | "softDelete"
  | "timestamp"
  | "creator"
  | "type"
  | "language"
  | "translationParent"
  | "translationSource"
  | "workspace";

const CTRL_KEY = {
  softDelete: "delete",
  timestamp: "tstamp",
  creator: "cruser_id",
  type: "type",
  language: "languageField",
  translationParent: "transOrigPointerField",
  translationSource: "translationSource",
  workspace: "versioningWS",
} as const satisfies Record<SchemaRole, keyof TableCtrl>;

// Workspace overlays always live in this column; the catalog only flags whether a table has it.
export const WORKSPACE_ID_FIELD = "t3ver_wsid";

export type TableSchema = {
  name: string;
  softDeleteField: string | null;
  timestampField: string | null;
  creatorField: string | null;
  typeField: string | null;
  labelFields: string[] | null;
  languageField: string | null;
  translationParentField: string | null;
  translationSourceField: string | null;
  workspaceField: string | null;
};

export class SchemaIncompleteError extends Error {
  code: "schema_incomplete";
  table: string;
  role: SchemaRole;

  constructor(table: string, role: SchemaRole) {
    super(`Name "${CTRL_KEY[role]}" in schema ctrl of table "${table}" not found`);
    this.name = "SchemaIncompleteError";
    this.code = "schema_incomplete";
    this.table = table;
    this.role = role;
  }
}

function isTruthy(v: boolean | number | string | undefined): boolean {
  if (typeof v === "string") return v !== "" && v !== "0";
  return !!v;
}

function nonEmpty(v: string | null | undefined): string | null {
  return v ? v : null;
}

export class SchemaMetadata {
  private readonly catalog: SchemaCatalog;

  constructor(catalog: SchemaCatalog) {
    this.catalog = catalog;
  }

  field(table: string, role: SchemaRole): string | null {
    const ctrl = this.ctrl(table);
    if (role === "workspace") return isTruthy(ctrl.versioningWS) ? WORKSPACE_ID_FIELD : null;
    return nonEmpty(ctrl[CTRL_KEY[role]]);
  }

  requireField(table: string, role: SchemaRole): string {
    const field = this.field(table, role);
    if (field === null) throw new SchemaIncompleteError(table, role);
    return field;
  }

  *workspaceEnabledTables(): Generator<string> {
    for (const [name, def] of this.catalog) {
      if (isTruthy(def.ctrl.versioningWS)) yield name;
    }
  }

  *languageAwareTables(): Generator<string> {
    for (const [name, def] of this.catalog) {
      if (def.ctrl.languageField && def.ctrl.transOrigPointerField) yield name;
    }
  }

  /**
   * Primary label first, then the comma separated alternates. `null` means no
   * label is configured at all, which differs from a configured but empty one.
   */
  labelFields(table: string): string[] | null {
    const ctrl = this.ctrl(table);
    const label = ctrl.label ?? null;
    const labelAlt = ctrl.label_alt ?? null;
    if (label === null && labelAlt === null) return null;

    const out: string[] = [];
    if (label) out.push(label);
    if (labelAlt) {
      for (const part of labelAlt.split(",")) {
        const trimmed = part.trim();
        if (trimmed.length > 0) out.push(trimmed);
      }
    }
    return out;
  }

  tableSchema(table: string): TableSchema {
    return {
      name: table,
      softDeleteField: this.field(table, "softDelete"),
      timestampField: this.field(table, "timestamp"),
      creatorField: this.field(table, "creator"),
      typeField: this.field(table, "type"),
      labelFields: this.labelFields(table),
      languageField: this.field(table, "language"),
      translationParentField: this.field(table, "translationParent"),
      translationSourceField: this.field(table, "translationSource"),
      workspaceField: this.field(table, "workspace"),
    };
  }

  private ctrl(table: string): TableCtrl {
    return this.catalog.get(table)?.ctrl ?? {};
  }
}
