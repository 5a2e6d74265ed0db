import { describe, it, expect, beforeAll, beforeEach, afterAll, vi } from "vitest";
import { asc, eq } from "drizzle-orm";

import { createTestDb, type TestDb } from "../test/pglite.ts";
import { seedClinic } from "./seeder.ts";
import { verifyPassword } from "../auth/password.ts";
import { users, doctors, services, patients, clinicRooms } from "./schema/index.ts";

let t: TestDb;

beforeAll(async () => {
  t = await createTestDb();
  vi.spyOn(console, "log").mockImplementation(() => {});
});

beforeEach(async () => {
  await t.truncate();
});

afterAll(async () => {
  vi.restoreAllMocks();
  await t.close();
});

describe("seedClinic", () => {
  it("inserts the sample data", async () => {
    const result = await seedClinic(t.db, { userPassword: "test-secret" });

    expect(result).toEqual({
      users: 2,
      specialties: 3,
      doctors: 2,
      doctorSpecialties: 3,
      services: 3,
      patients: 1,
      rooms: 2,
    });
  });

  it("is idempotent", async () => {
    await seedClinic(t.db, { userPassword: "test-secret" });
    const second = await seedClinic(t.db, { userPassword: "test-secret" });

    expect(second).toEqual({
      users: 0,
      specialties: 0,
      doctors: 0,
      doctorSpecialties: 0,
      services: 0,
      patients: 0,
      rooms: 0,
    });
    expect(await t.db.select().from(users)).toHaveLength(2);
  });

  it("stores verifiable password hashes with the right roles", async () => {
    await seedClinic(t.db, { userPassword: "test-secret" });

    const rows = await t.db.select().from(users).orderBy(asc(users.username));
    expect(rows.map((u) => [u.username, u.role, u.email])).toEqual([
      ["admin", "admin", "admin@clinic.test"],
      ["recept", "reception", "frontdesk@clinic.test"],
    ]);
    for (const row of rows) {
      expect(await verifyPassword("test-secret", row.passwordHash)).toBe(true);
    }
  });

  it("links doctors to their account and specialties by natural key", async () => {
    await seedClinic(t.db, { userPassword: "test-secret" });

    const alice = await t.db.query.doctors.findFirst({
      where: eq(doctors.licenseNumber, "LIC-0001"),
      with: { user: true, doctorSpecialties: { with: { specialty: true } } },
    });
    const john = await t.db.query.doctors.findFirst({
      where: eq(doctors.licenseNumber, "LIC-0002"),
      with: { doctorSpecialties: { with: { specialty: true } } },
    });

    expect(alice?.user?.username).toBe("admin");
    expect(alice?.doctorSpecialties.map((l) => l.specialty.name).sort()).toEqual([
      "General Practice",
      "Pediatrics",
    ]);
    expect(john?.userId).toBeNull();
    expect(john?.doctorSpecialties.map((l) => l.specialty.name)).toEqual(["General Practice"]);
  });

  it("loads catalog prices, rooms and the sample patient", async () => {
    await seedClinic(t.db, { userPassword: "test-secret" });

    const catalog = await t.db.select().from(services).orderBy(asc(services.code));
    expect(catalog.map((s) => [s.code, s.price, s.standardDurationMinutes])).toEqual([
      ["CONS-GP", "10.00", 30],
      ["CONS-PED", "12.00", 30],
      ["SKIN-CRT", "15.00", 30],
    ]);

    const rooms = await t.db.select().from(clinicRooms).orderBy(asc(clinicRooms.code));
    expect(rooms.map((r) => [r.code, r.capacity])).toEqual([
      ["R101", 1],
      ["R102", 1],
    ]);

    const [patient] = await t.db.select().from(patients);
    expect(patient?.nationalId).toBe("12345678");
    expect(patient?.dateOfBirth).toBe("1990-05-17");
    expect(patient?.gender).toBe("male");
  });

  it("can skip the sample patient", async () => {
    const result = await seedClinic(t.db, {
      userPassword: "test-secret",
      includeSamplePatient: false,
    });

    expect(result.patients).toBe(0);
    expect(await t.db.select().from(patients)).toEqual([]);
  });
});
