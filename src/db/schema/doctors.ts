/**
 * Clinic Management - Doctor Schema
 *
 * Practitioners, the specialty taxonomy, and the many-to-many link between them.
 */

import {
  pgTable,
  serial,
  integer,
  varchar,
  text,
  timestamp,
  index,
  primaryKey,
} from "drizzle-orm/pg-core";

import { users } from "./users.ts";

export const specialties = pgTable("specialties", {
  id: serial("specialty_id").primaryKey(),
  name: varchar("name", { length: 100 }).unique().notNull(),
  description: text("description"),
});

export const doctors = pgTable(
  "doctors",
  {
    id: serial("doctor_id").primaryKey(),
    userId: integer("user_id").references(() => users.id, { onDelete: "set null" }), // optional login account
    licenseNumber: varchar("license_number", { length: 100 }).unique(),
    firstName: varchar("first_name", { length: 100 }).notNull(),
    lastName: varchar("last_name", { length: 100 }).notNull(),
    phone: varchar("phone", { length: 30 }),
    email: varchar("email", { length: 150 }),
    bio: text("bio"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index("idx_doctor_name").on(table.lastName, table.firstName)],
);

/**
 * Doctor-specialty mapping (many-to-many).
 */
export const doctorSpecialties = pgTable(
  "doctor_specialties",
  {
    doctorId: integer("doctor_id")
      .notNull()
      .references(() => doctors.id, { onDelete: "cascade" }),
    specialtyId: integer("specialty_id")
      .notNull()
      .references(() => specialties.id, { onDelete: "cascade" }),
  },
  (table) => [primaryKey({ columns: [table.doctorId, table.specialtyId] })],
);

export type Specialty = typeof specialties.$inferSelect;
export type NewSpecialty = typeof specialties.$inferInsert;
export type Doctor = typeof doctors.$inferSelect;
export type NewDoctor = typeof doctors.$inferInsert;
export type DoctorSpecialty = typeof doctorSpecialties.$inferSelect;
export type NewDoctorSpecialty = typeof doctorSpecialties.$inferInsert;
