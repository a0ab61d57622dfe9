import { promises as fs } from "fs";
import { fileURLToPath } from "url";
import type * as pg from "pg";

// resolves to <package>/db/schema.sql from both src/db and dist/db
export const SCHEMA_PATH = fileURLToPath(new URL("../../db/schema.sql", import.meta.url));

/** Every statement is IF NOT EXISTS; applying it to an existing database changes nothing. */
export async function applySchema(pool: pg.Pool, schemaPath: string = SCHEMA_PATH): Promise<void> {
  const sql = await fs.readFile(schemaPath, "utf8");
  if (!sql.trim()) throw new Error(`empty schema file: ${schemaPath}`);
  await pool.query(sql);
}
