/**
 * Clinic Management - Reset Script
 *
 * Drops the public schema (and drizzle-kit's migration journal), then
 * recreates every type, table and index from the schema definitions.
 * Run: npm run db:reset [-- --seed]
 */

import { getDb, getPool, closeDb } from "./connection.ts";
import { applySchema } from "./ddl.ts";
import { seedClinic } from "./seeder.ts";
import { parseClinicConfig, configFromEnv } from "../config/clinic-config.ts";

async function reset(withSeed: boolean) {
  const config = parseClinicConfig(configFromEnv());
  const pool = getPool();
  console.log(`[reset] Recreating schema in database "${config.database.name}"...`);

  try {
    await pool.query("DROP SCHEMA IF EXISTS drizzle CASCADE");
    await pool.query("DROP SCHEMA IF EXISTS public CASCADE");
    await pool.query("CREATE SCHEMA public");

    const count = await applySchema((statement) => pool.query(statement));
    console.log(`[reset] Applied ${count} statements`);

    if (withSeed) {
      const result = await seedClinic(getDb(), config.seed);
      console.log("[reset] Seeded:", result);
    }
  } finally {
    await closeDb();
  }
}

reset(process.argv.includes("--seed")).catch((err) => {
  console.error("[reset] Reset failed:", err);
  process.exit(1);
});
