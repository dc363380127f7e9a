#!/usr/bin/env node
import "dotenv/config";
import stableStringify from "fast-json-stable-stringify";
import { loadEnv } from "../config.js";
import { closeDb, createDb } from "../db.js";
import { createHealthChecks } from "../health/registry.js";
import { HealthCheckRunner } from "../health/runner.js";
import { isCheckMode } from "../health/types.js";
import { ConsoleIo } from "../io/console-io.js";
import { loadSchemaCatalog } from "../schema/catalog.js";
import { SchemaMetadata } from "../schema/metadata.js";
import { PgQueryAdapter } from "../storage/pg-adapter.js";
import { PgTableProbe } from "../storage/table-probe.js";
import { formatError } from "../util/error-format.js";
import { createLogger } from "../util/logger.js";

const env = loadEnv();
const logger = createLogger(env.LOG_LEVEL);
const db = createDb(env.DATABASE_URL, {
  schema: env.DB_SCHEMA,
  max: env.DB_POOL_MAX,
  idleTimeoutMs: env.DB_POOL_IDLE_TIMEOUT_MS,
  connectionTimeoutMs: env.DB_POOL_CONNECTION_TIMEOUT_MS,
});
const io = new ConsoleIo();

function argValue(flag: string): string | null {
  const i = process.argv.indexOf(flag);
  if (i === -1) return null;
  const v = process.argv[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function hasFlag(flag: string): boolean {
  return process.argv.includes(flag);
}

async function main() {
  const modeRaw = (argValue("--mode") ?? "interactive").toLowerCase();
  if (!isCheckMode(modeRaw)) {
    throw new Error("invalid --mode (expected one of: interactive|execute)");
  }
  const resumeToken = argValue("--check") ?? "";
  const catalogFile = argValue("--schema") ?? env.SCHEMA_CATALOG_FILE;

  const schema = new SchemaMetadata(loadSchemaCatalog(catalogFile));
  const store = new PgQueryAdapter(db, { batchSize: env.QUERY_BATCH_SIZE, chunkSize: env.REPAIR_CHUNK_SIZE });
  const probe = new PgTableProbe(db);
  const runner = new HealthCheckRunner(createHealthChecks({ schema, store, probe, io, logger, chunkSize: env.REPAIR_CHUNK_SIZE }), io, logger);

  if (hasFlag("--list")) {
    // eslint-disable-next-line no-console
    console.log(runner.names().join("\n"));
    return;
  }

  logger.info({ mode: modeRaw, resume_token: resumeToken || null, catalog: catalogFile }, "health check run started");
  const report = await runner.run(modeRaw, resumeToken);

  if (hasFlag("--json")) {
    // eslint-disable-next-line no-console
    console.log(stableStringify(report));
  }
  if (!report.ok) process.exitCode = 1;
}

void main()
  .catch((err) => {
    logger.fatal({ err }, "health check run failed");
    // eslint-disable-next-line no-console
    console.error(formatError(err));
    process.exitCode = 1;
  })
  .finally(async () => {
    io.close();
    await closeDb(db);
  });
