/**
 * Clinic Management - Medical Record Schema
 *
 * Visit records (many per patient), prescriptions issued from a record,
 * and the medication lines of each prescription.
 */

import {
  pgTable,
  serial,
  integer,
  varchar,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

import { fixedDecimal } from "./decimal.ts";
import { users } from "./users.ts";
import { patients } from "./patients.ts";
import { appointments } from "./scheduling.ts";

export const medicalRecords = pgTable("medical_records", {
  id: serial("record_id").primaryKey(),
  patientId: integer("patient_id")
    .notNull()
    .references(() => patients.id, { onDelete: "cascade" }),
  appointmentId: integer("appointment_id").references(() => appointments.id, {
    onDelete: "set null",
  }),
  recordDate: timestamp("record_date", { withTimezone: true }).defaultNow(),
  heightCm: fixedDecimal("height_cm", { precision: 6 }),
  weightKg: fixedDecimal("weight_kg", { precision: 6 }),
  diagnosis: text("diagnosis"),
  notes: text("notes"),
  createdBy: integer("created_by").references(() => users.id, { onDelete: "set null" }),
});

export const prescriptions = pgTable("prescriptions", {
  id: serial("prescription_id").primaryKey(),
  recordId: integer("record_id")
    .notNull()
    .references(() => medicalRecords.id, { onDelete: "cascade" }),
  prescribedOn: timestamp("prescribed_on", { withTimezone: true }).defaultNow(),
  prescribedBy: integer("prescribed_by").references(() => users.id, { onDelete: "set null" }),
  notes: text("notes"),
});

export const prescriptionItems = pgTable("prescription_items", {
  id: serial("prescription_item_id").primaryKey(),
  prescriptionId: integer("prescription_id")
    .notNull()
    .references(() => prescriptions.id, { onDelete: "cascade" }),
  medicationName: varchar("medication_name", { length: 255 }).notNull(),
  dosage: varchar("dosage", { length: 100 }), // "500 mg"
  frequency: varchar("frequency", { length: 100 }), // "twice daily"
  durationDays: integer("duration_days"),
  instructions: text("instructions"),
});

export type MedicalRecord = typeof medicalRecords.$inferSelect;
export type NewMedicalRecord = typeof medicalRecords.$inferInsert;
export type Prescription = typeof prescriptions.$inferSelect;
export type NewPrescription = typeof prescriptions.$inferInsert;
export type PrescriptionItem = typeof prescriptionItems.$inferSelect;
export type NewPrescriptionItem = typeof prescriptionItems.$inferInsert;
