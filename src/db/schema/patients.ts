/**
 * Clinic Management - Patient Schema
 *
 * Patient demographics and postal addresses (one patient, many addresses).
 */

import {
  pgTable,
  integer,
  varchar,
  date,
  timestamp,
  index,
} from "drizzle-orm/pg-core";

import { genderEnum, addressTypeEnum } from "./enums.ts";

export const patients = pgTable(
  "patients",
  {
    id: integer("patient_id").primaryKey().generatedAlwaysAsIdentity(),
    nationalId: varchar("national_id", { length: 50 }).unique(), // NULL when not provided
    firstName: varchar("first_name", { length: 100 }).notNull(),
    lastName: varchar("last_name", { length: 100 }).notNull(),
    gender: genderEnum("gender").default("other"),
    dateOfBirth: date("date_of_birth"),
    phone: varchar("phone", { length: 30 }),
    email: varchar("email", { length: 150 }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    emergencyContactName: varchar("emergency_contact_name", { length: 150 }),
    emergencyContactPhone: varchar("emergency_contact_phone", { length: 30 }),
  },
  (table) => [index("idx_patient_name").on(table.lastName, table.firstName)],
);

export const addresses = pgTable("addresses", {
  id: integer("address_id").primaryKey().generatedAlwaysAsIdentity(),
  patientId: integer("patient_id")
    .notNull()
    .references(() => patients.id, { onDelete: "cascade" }),
  type: addressTypeEnum("type").default("home"),
  line1: varchar("line1", { length: 255 }).notNull(),
  line2: varchar("line2", { length: 255 }),
  city: varchar("city", { length: 100 }),
  county: varchar("county", { length: 100 }),
  postalCode: varchar("postal_code", { length: 20 }),
  country: varchar("country", { length: 100 }),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

export type Patient = typeof patients.$inferSelect;
export type NewPatient = typeof patients.$inferInsert;
export type Address = typeof addresses.$inferSelect;
export type NewAddress = typeof addresses.$inferInsert;
