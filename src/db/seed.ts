/**
 * Clinic Management - Database Seed Script
 *
 * Seeds sample staff, specialties, doctors, services, a patient and rooms.
 * Run: npm run db:seed
 */

import { getDb, closeDb } from "./connection.ts";
import { seedClinic } from "./seeder.ts";
import { parseClinicConfig, configFromEnv } from "../config/clinic-config.ts";

async function seed() {
  const config = parseClinicConfig(configFromEnv());
  console.log("[seed] Starting clinic database seed...");

  try {
    const result = await seedClinic(getDb(), config.seed);
    console.log("[seed] Seed complete:", result);
    if (result.users > 0 && config.seed.userPassword === "change-me") {
      console.log("[seed] WARNING: seeded users share the default password; set CLINIC_SEED_PASSWORD.");
    }
  } finally {
    await closeDb();
  }
}

seed().catch((err) => {
  console.error("[seed] Seed failed:", err);
  process.exit(1);
});
