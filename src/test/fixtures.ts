/**
 * Row builders shared by the database tests.
 */

import type { ClinicDatabase } from "../db/connection.ts";
import {
  users,
  patients,
  doctors,
  services,
  clinicRooms,
  appointments,
  type NewUser,
  type NewPatient,
  type NewDoctor,
  type NewService,
  type NewAppointment,
} from "../db/schema/index.ts";

export const START = new Date("2025-01-01T10:00:00Z");
export const END = new Date("2025-01-01T10:30:00Z");

export async function insertUser(db: ClinicDatabase, overrides: Partial<NewUser> = {}) {
  const [row] = await db
    .insert(users)
    .values({
      username: "reception1",
      passwordHash: "test-hash",
      fullName: "Front Desk",
      ...overrides,
    })
    .returning();
  if (!row) throw new Error("user insert returned no row");
  return row;
}

export async function insertPatient(db: ClinicDatabase, overrides: Partial<NewPatient> = {}) {
  const [row] = await db
    .insert(patients)
    .values({ firstName: "Ada", lastName: "Njeri", ...overrides })
    .returning();
  if (!row) throw new Error("patient insert returned no row");
  return row;
}

export async function insertDoctor(db: ClinicDatabase, overrides: Partial<NewDoctor> = {}) {
  const [row] = await db
    .insert(doctors)
    .values({ firstName: "Grace", lastName: "Wanjiku", licenseNumber: "LIC-T001", ...overrides })
    .returning();
  if (!row) throw new Error("doctor insert returned no row");
  return row;
}

export async function insertService(db: ClinicDatabase, overrides: Partial<NewService> = {}) {
  const [row] = await db
    .insert(services)
    .values({ code: "CONS-T", name: "Test Consultation", price: "20.00", ...overrides })
    .returning();
  if (!row) throw new Error("service insert returned no row");
  return row;
}

export async function insertRoom(db: ClinicDatabase, code = "T1") {
  const [row] = await db.insert(clinicRooms).values({ code, name: "Test Room" }).returning();
  if (!row) throw new Error("room insert returned no row");
  return row;
}

export async function insertAppointment(
  db: ClinicDatabase,
  patientId: number,
  overrides: Partial<NewAppointment> = {},
) {
  const [row] = await db
    .insert(appointments)
    .values({ patientId, scheduledStart: START, scheduledEnd: END, ...overrides })
    .returning();
  if (!row) throw new Error("appointment insert returned no row");
  return row;
}
