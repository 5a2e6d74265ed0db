/**
 * Clinic Management - Sample Data
 *
 * Staff accounts, specialties, doctors, the service catalog, one patient and two rooms.
 * Every insert skips rows whose natural key already exists, so seeding twice is harmless.
 * Doctor links are resolved by username, license number and specialty name, never by literal ids.
 */

import { inArray } from "drizzle-orm";

import type { ClinicDatabase } from "./connection.ts";
import {
  users,
  specialties,
  doctors,
  doctorSpecialties,
  services,
  patients,
  clinicRooms,
  type NewUser,
  type NewSpecialty,
  type NewService,
  type NewPatient,
  type NewClinicRoom,
  type NewDoctor,
} from "./schema/index.ts";
import { hashPassword } from "../auth/password.ts";

export type SeedOptions = {
  /** Plain-text password hashed into each seeded user's password_hash */
  userPassword: string;
  includeSamplePatient?: boolean;
};

export type SeedResult = {
  users: number;
  specialties: number;
  doctors: number;
  doctorSpecialties: number;
  services: number;
  patients: number;
  rooms: number;
};

type SeedUser = Omit<NewUser, "passwordHash">;

type SeedDoctor = Omit<NewDoctor, "userId"> & {
  licenseNumber: string;
  /** Username of the linked staff account, if any */
  username?: string;
  specialties: string[];
};

export const SEED_USERS: SeedUser[] = [
  { username: "admin", fullName: "Clinic Admin", role: "admin", email: "admin@clinic.test" },
  { username: "recept", fullName: "Receptionist One", role: "reception", email: "frontdesk@clinic.test" },
];

export const SEED_SPECIALTIES: NewSpecialty[] = [
  { name: "General Practice", description: "Primary care physician" },
  { name: "Pediatrics", description: "Child health" },
  { name: "Dermatology", description: "Skin specialist" },
];

export const SEED_DOCTORS: SeedDoctor[] = [
  {
    licenseNumber: "LIC-0001",
    firstName: "Alice",
    lastName: "Murithi",
    phone: "+254700000001",
    email: "alice@clinic.test",
    username: "admin",
    specialties: ["General Practice", "Pediatrics"],
  },
  {
    licenseNumber: "LIC-0002",
    firstName: "John",
    lastName: "Ouma",
    phone: "+254700000002",
    email: "john@clinic.test",
    specialties: ["General Practice"],
  },
];

export const SEED_SERVICES: NewService[] = [
  { code: "CONS-GP", name: "General Consultation", description: "Routine doctor consultation", standardDurationMinutes: 30, price: "10.00" },
  { code: "CONS-PED", name: "Pediatric Consultation", description: "Consultation for children", standardDurationMinutes: 30, price: "12.00" },
  { code: "SKIN-CRT", name: "Skin Consultation", description: "Skin-related consultation", standardDurationMinutes: 30, price: "15.00" },
];

export const SEED_PATIENTS: NewPatient[] = [
  {
    nationalId: "12345678",
    firstName: "Noel",
    lastName: "Tumbo",
    gender: "male",
    dateOfBirth: "1990-05-17",
    phone: "+254700000003",
    email: "noel@patients.test",
  },
];

export const SEED_ROOMS: NewClinicRoom[] = [
  { code: "R101", name: "Consult Room 1" },
  { code: "R102", name: "Consult Room 2" },
];

/**
 * Insert the sample data. Returns how many rows each table actually received.
 */
export async function seedClinic(db: ClinicDatabase, options: SeedOptions): Promise<SeedResult> {
  // ── Users ──────────────────────────────────────────────────
  const userRows: NewUser[] = [];
  for (const user of SEED_USERS) {
    userRows.push({ ...user, passwordHash: await hashPassword(options.userPassword) });
  }
  const insertedUsers = await db
    .insert(users)
    .values(userRows)
    .onConflictDoNothing({ target: users.username })
    .returning({ id: users.id });
  console.log(`[seed] Seeded ${insertedUsers.length} users`);

  // ── Specialties ────────────────────────────────────────────
  const insertedSpecialties = await db
    .insert(specialties)
    .values(SEED_SPECIALTIES)
    .onConflictDoNothing({ target: specialties.name })
    .returning({ id: specialties.id });
  console.log(`[seed] Seeded ${insertedSpecialties.length} specialties`);

  // ── Doctors ────────────────────────────────────────────────
  const linkedUsernames = SEED_DOCTORS.flatMap((d) => (d.username ? [d.username] : []));
  const accountRows = linkedUsernames.length
    ? await db
        .select({ id: users.id, username: users.username })
        .from(users)
        .where(inArray(users.username, linkedUsernames))
    : [];
  const userIdByName = new Map(accountRows.map((u) => [u.username, u.id]));

  const doctorRows: NewDoctor[] = SEED_DOCTORS.map(
    ({ username, specialties: _specialties, ...doctor }) => ({
      ...doctor,
      userId: username ? (userIdByName.get(username) ?? null) : null,
    }),
  );
  const insertedDoctors = await db
    .insert(doctors)
    .values(doctorRows)
    .onConflictDoNothing({ target: doctors.licenseNumber })
    .returning({ id: doctors.id });
  console.log(`[seed] Seeded ${insertedDoctors.length} doctors`);

  // ── Doctor specialties ─────────────────────────────────────
  const doctorIds = await db
    .select({ id: doctors.id, licenseNumber: doctors.licenseNumber })
    .from(doctors)
    .where(inArray(doctors.licenseNumber, SEED_DOCTORS.map((d) => d.licenseNumber)));
  const specialtyIds = await db
    .select({ id: specialties.id, name: specialties.name })
    .from(specialties)
    .where(inArray(specialties.name, SEED_SPECIALTIES.map((s) => s.name)));

  const doctorIdByLicense = new Map(doctorIds.map((d) => [d.licenseNumber, d.id]));
  const specialtyIdByName = new Map(specialtyIds.map((s) => [s.name, s.id]));

  const links = SEED_DOCTORS.flatMap((doctor) => {
    const doctorId = doctorIdByLicense.get(doctor.licenseNumber);
    if (doctorId === undefined) return [];
    return doctor.specialties.flatMap((name) => {
      const specialtyId = specialtyIdByName.get(name);
      return specialtyId === undefined ? [] : [{ doctorId, specialtyId }];
    });
  });
  const insertedLinks = links.length
    ? await db
        .insert(doctorSpecialties)
        .values(links)
        .onConflictDoNothing()
        .returning({ doctorId: doctorSpecialties.doctorId })
    : [];
  console.log(`[seed] Seeded ${insertedLinks.length} doctor specialties`);

  // ── Services ───────────────────────────────────────────────
  const insertedServices = await db
    .insert(services)
    .values(SEED_SERVICES)
    .onConflictDoNothing({ target: services.code })
    .returning({ id: services.id });
  console.log(`[seed] Seeded ${insertedServices.length} services`);

  // ── Patients ───────────────────────────────────────────────
  const insertedPatients =
    (options.includeSamplePatient ?? true)
      ? await db
          .insert(patients)
          .values(SEED_PATIENTS)
          .onConflictDoNothing({ target: patients.nationalId })
          .returning({ id: patients.id })
      : [];
  console.log(`[seed] Seeded ${insertedPatients.length} patients`);

  // ── Rooms ──────────────────────────────────────────────────
  const insertedRooms = await db
    .insert(clinicRooms)
    .values(SEED_ROOMS)
    .onConflictDoNothing({ target: clinicRooms.code })
    .returning({ id: clinicRooms.id });
  console.log(`[seed] Seeded ${insertedRooms.length} rooms`);

  return {
    users: insertedUsers.length,
    specialties: insertedSpecialties.length,
    doctors: insertedDoctors.length,
    doctorSpecialties: insertedLinks.length,
    services: insertedServices.length,
    patients: insertedPatients.length,
    rooms: insertedRooms.length,
  };
}
