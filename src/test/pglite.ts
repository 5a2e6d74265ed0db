/**
 * In-process PostgreSQL for tests: PGlite with the clinic DDL applied.
 */

import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import { getTableName, sql } from "drizzle-orm";

import * as schema from "../db/schema/index.ts";
import { applySchema } from "../db/ddl.ts";

const TABLES = [
  schema.users,
  schema.patients,
  schema.addresses,
  schema.specialties,
  schema.doctors,
  schema.doctorSpecialties,
  schema.clinicRooms,
  schema.services,
  schema.appointments,
  schema.appointmentServices,
  schema.medicalRecords,
  schema.prescriptions,
  schema.prescriptionItems,
  schema.invoices,
  schema.invoiceItems,
  schema.payments,
];

export async function createTestDb() {
  const client = new PGlite();
  await applySchema((statement) => client.exec(statement));
  const db = drizzle(client, { schema });

  return {
    db,
    client,
    /** Empty every table and restart identities so ids start at 1 again. */
    async truncate(): Promise<void> {
      const names = TABLES.map((t) => `"${getTableName(t)}"`).join(", ");
      await db.execute(sql.raw(`TRUNCATE ${names} RESTART IDENTITY CASCADE`));
    },
    close: () => client.close(),
  };
}

export type TestDb = Awaited<ReturnType<typeof createTestDb>>;

/** Expect a promise to reject and hand back the rejection for further assertions. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("Expected promise to reject");
}
