import * as pg from "pg";
import { Kysely, PostgresDialect } from "kysely";
import type { DB } from "./types.js";

export function createPgPool(databaseUrl: string, opts: { max?: number } = {}): pg.Pool {
  // Checkpoint writes are serialized by the record store.
  return new pg.Pool({ connectionString: databaseUrl, max: opts.max ?? 4 });
}

export function createDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}
