/**
 * Clinic Management - DDL Rendering
 *
 * Turns the Drizzle schema into ordered PostgreSQL statements
 * (enum types, tables, foreign keys, indexes) with drizzle-kit's programmatic API.
 * `drizzle-kit generate` writes the same statements to migration files;
 * `IMMUTABLE_UUID_GUARD` has no Drizzle equivalent and goes into a custom migration.
 */

import { createRequire } from "node:module";

import * as schema from "./schema/index.ts";

// drizzle-kit's API bundle is loaded through its CommonJS entry.
const require = createRequire(import.meta.url);
const kit: typeof import("drizzle-kit/api") = require("drizzle-kit/api");

export type StatementExecutor = (statement: string) => Promise<unknown>;

/**
 * Rejects any UPDATE that changes `appointments.appointment_uuid`.
 * Raised as a check violation so `toConstraintViolation` classifies it.
 */
export const IMMUTABLE_UUID_GUARD: readonly string[] = [
  `CREATE OR REPLACE FUNCTION "appointments_keep_uuid"() RETURNS trigger LANGUAGE plpgsql AS $$
BEGIN
  IF NEW.appointment_uuid IS DISTINCT FROM OLD.appointment_uuid THEN
    RAISE EXCEPTION 'appointment_uuid cannot change once assigned'
      USING ERRCODE = 'check_violation',
            CONSTRAINT = 'appointments_appointment_uuid_immutable',
            TABLE = 'appointments',
            COLUMN = 'appointment_uuid';
  END IF;
  RETURN NEW;
END;
$$;`,
  `CREATE TRIGGER "appointments_keep_uuid" BEFORE UPDATE OF "appointment_uuid" ON "appointments"
  FOR EACH ROW EXECUTE FUNCTION "appointments_keep_uuid"();`,
];

/**
 * Render the full schema as DDL, diffed against an empty database,
 * followed by the uuid guard.
 */
export async function renderSchemaDdl(): Promise<string[]> {
  const empty = kit.generateDrizzleJson({});
  const current = kit.generateDrizzleJson({ ...schema });
  const statements = await kit.generateMigration(empty, current);
  return [...statements, ...IMMUTABLE_UUID_GUARD];
}

/**
 * Apply every schema statement in order. Returns the number of statements run.
 */
export async function applySchema(exec: StatementExecutor): Promise<number> {
  const statements = await renderSchemaDdl();
  for (const statement of statements) {
    await exec(statement);
  }
  return statements.length;
}
