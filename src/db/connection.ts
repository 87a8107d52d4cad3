import { readFile } from "fs/promises";
import * as pg from "pg";
import { newDb } from "pg-mem";
import { Kysely, PostgresDialect } from "kysely";
import type { DB } from "./types.js";

export function createPgPool(databaseUrl: string): pg.Pool {
  return new pg.Pool({ connectionString: databaseUrl });
}

/** A real pool when a URL is given, otherwise an in-process pg-mem database. */
export function createPool(databaseUrl: string | undefined): pg.Pool {
  if (databaseUrl) return createPgPool(databaseUrl);

  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

export function createDb(pool: pg.Pool): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool })
  });
}

export async function applySchema(pool: pg.Pool, schemaPath: string): Promise<void> {
  const sql = await readFile(schemaPath, "utf8");
  if (!sql.trim()) return;
  try {
    await pool.query(sql);
  } catch (e) {
    throw new Error(`failed to apply schema ${schemaPath}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}
