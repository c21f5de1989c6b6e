import { promises as fs } from "fs";
import path from "path";
import type * as pg from "pg";

export const DEFAULT_SCHEMA_PATH = "db/schema.sql";

/** Runs a schema file. Statements must be idempotent (CREATE ... IF NOT EXISTS). */
export async function applySqlFile(pool: pg.Pool, filePath: string = DEFAULT_SCHEMA_PATH): Promise<void> {
  const resolved = path.resolve(filePath);
  const sql = await fs.readFile(resolved, "utf8");
  if (!sql.trim()) return;
  try {
    await pool.query(sql);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new Error(`failed to apply ${resolved}: ${message}`);
  }
}
