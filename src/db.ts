import pg from "pg";

export type Db = {
  pool: pg.Pool;
  schema: string;
};

export type DbPoolOptions = {
  schema?: string;
  max?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
};

export function createDb(databaseUrl: string, opts: DbPoolOptions = {}): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: opts.max ?? 2,
    idleTimeoutMillis: opts.idleTimeoutMs ?? 30_000,
    connectionTimeoutMillis: opts.connectionTimeoutMs ?? 5_000,
  });
  return { pool, schema: opts.schema ?? "public" };
}

export async function withTx<T>(db: Db, fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
  const client = await db.pool.connect();
  try {
    await client.query("BEGIN");
    const out = await fn(client);
    await client.query("COMMIT");
    return out;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

export async function closeDb(db: Db): Promise<void> {
  await db.pool.end();
}
