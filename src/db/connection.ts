/**
 * Clinic Management - Database Connection Layer
 *
 * PostgreSQL connection pool management using Drizzle ORM.
 * Connection settings come from `CLINIC_DB_*` environment variables.
 */

import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import pg from "pg";

import * as schema from "./schema/index.ts";
import { getConnectionConfig } from "../config/clinic-config.ts";

export type ClinicSchema = typeof schema;

/**
 * Any Drizzle PostgreSQL database bound to the clinic schema:
 * node-postgres in production, PGlite in tests.
 */
export type ClinicDatabase = PgDatabase<PgQueryResultHKT, ClinicSchema>;

let pool: pg.Pool | undefined;
let db: ReturnType<typeof drizzle<ClinicSchema>> | undefined;

export function getPool(): pg.Pool {
  if (!pool) {
    pool = new pg.Pool(getConnectionConfig());
    pool.on("error", (err) => {
      console.error("[clinic:db] Unexpected pool error:", err.message);
    });
  }
  return pool;
}

export function getDb() {
  if (!db) {
    db = drizzle(getPool(), { schema });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = undefined;
    db = undefined;
  }
}

export { schema };
