import * as pg from "pg";
import { newDb } from "pg-mem";
import { Kysely, PostgresDialect } from "kysely";
import type { DB } from "./types.js";

export type StoreMode = "postgres" | "pg-mem";

export interface Database {
  pool: pg.Pool;
  db: Kysely<DB>;
  mode: StoreMode;
}

/**
 * PostgreSQL when a connection string is given, otherwise an in-process pg-mem
 * database. The pg-mem data lives only as long as the pool.
 */
export function openDatabase(databaseUrl: string | undefined): Database {
  if (databaseUrl) {
    const pool = new pg.Pool({ connectionString: databaseUrl });
    return { pool, db: kyselyFor(pool), mode: "postgres" };
  }
  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  const pool = new adapter.Pool() as unknown as pg.Pool;
  return { pool, db: kyselyFor(pool), mode: "pg-mem" };
}

function kyselyFor(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({ dialect: new PostgresDialect({ pool }) });
}
