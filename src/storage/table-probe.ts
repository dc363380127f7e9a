import { formatError } from "../util/error-format.js";
import type { Db } from "../db.js";
import { StorageUnavailableError } from "./query-adapter.js";

export type TableProbe = {
  exists(table: string): Promise<boolean>;
};

/** Asks the live catalog every time; another check may have changed the schema meanwhile. */
export class PgTableProbe implements TableProbe {
  private readonly db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  async exists(table: string): Promise<boolean> {
    try {
      const r = await this.db.pool.query<{ ok: boolean }>(
        `
        SELECT EXISTS (
          SELECT 1
          FROM information_schema.tables
          WHERE table_schema = $1
            AND table_name = $2
        ) AS ok
        `,
        [this.db.schema, table],
      );
      return !!r.rows[0]?.ok;
    } catch (err) {
      throw new StorageUnavailableError(`table probe for "${table}" failed: ${formatError(err)}`, { cause: err });
    }
  }
}
