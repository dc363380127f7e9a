import { z } from "zod";

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1),
  // A session runs one query at a time.
  DB_POOL_MAX: z.coerce.number().int().positive().max(20).default(2),
  DB_POOL_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DB_POOL_CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  DB_SCHEMA: z.string().min(1).default("public"),
  SCHEMA_CATALOG_FILE: z.string().min(1).default("schema-catalog.json"),
  QUERY_BATCH_SIZE: z.coerce.number().int().positive().max(50_000).default(1000),
  REPAIR_CHUNK_SIZE: z.coerce.number().int().positive().max(10_000).default(500),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  code: "invalid_config";

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
    this.code = "invalid_config";
  }
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new ConfigError(`Invalid environment:\n${msg}`);
  }
  return parsed.data;
}
