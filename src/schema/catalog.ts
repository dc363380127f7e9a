import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError } from "../config.js";

// Mirrors the "ctrl" section of a table definition; unknown keys are ignored.
export const TableCtrl = z.object({
  delete: z.string().optional(),
  tstamp: z.string().optional(),
  cruser_id: z.string().optional(),
  type: z.string().optional(),
  label: z.string().nullable().optional(),
  label_alt: z.string().nullable().optional(),
  languageField: z.string().optional(),
  transOrigPointerField: z.string().optional(),
  translationSource: z.string().optional(),
  versioningWS: z.union([z.boolean(), z.number(), z.string()]).optional(),
});

export const TableDefinition = z.object({
  ctrl: TableCtrl.default({}),
});

export const SchemaCatalogFile = z.object({
  tables: z.record(TableDefinition),
});

export type TableCtrl = z.infer<typeof TableCtrl>;
export type TableDefinition = z.infer<typeof TableDefinition>;

/** Read-only table catalog. Iteration order is declaration order. */
export type SchemaCatalog = ReadonlyMap<string, Readonly<TableDefinition>>;

export function parseSchemaCatalog(value: unknown): SchemaCatalog {
  const parsed = SchemaCatalogFile.safeParse(value);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new ConfigError(`Invalid schema catalog:\n${msg}`);
  }
  return new Map(Object.entries(parsed.data.tables));
}

export function loadSchemaCatalog(file: string): SchemaCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf8"));
  } catch (err) {
    throw new ConfigError(`schema catalog ${file} could not be read: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseSchemaCatalog(raw);
}
