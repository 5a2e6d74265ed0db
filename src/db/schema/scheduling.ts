/**
 * Clinic Management - Scheduling Schema
 *
 * Appointments and the services booked on them.
 * Each appointment has one patient and optionally one doctor and one room.
 */

import {
  pgTable,
  integer,
  uuid,
  text,
  timestamp,
  index,
  check,
  primaryKey,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";

import { fixedDecimal } from "./decimal.ts";
import { appointmentStatusEnum } from "./enums.ts";
import { users } from "./users.ts";
import { patients } from "./patients.ts";
import { doctors } from "./doctors.ts";
import { clinicRooms, services } from "./facilities.ts";

export const appointments = pgTable(
  "appointments",
  {
    id: integer("appointment_id").primaryKey().generatedAlwaysAsIdentity(),
    appointmentUuid: uuid("appointment_uuid").defaultRandom().unique().notNull(), // external reference
    patientId: integer("patient_id")
      .notNull()
      .references(() => patients.id, { onDelete: "cascade" }),
    doctorId: integer("doctor_id").references(() => doctors.id, { onDelete: "set null" }),
    roomId: integer("room_id").references(() => clinicRooms.id, { onDelete: "set null" }),
    scheduledStart: timestamp("scheduled_start", { withTimezone: true }).notNull(),
    scheduledEnd: timestamp("scheduled_end", { withTimezone: true }).notNull(),
    status: appointmentStatusEnum("status").default("scheduled").notNull(),
    createdByUser: integer("created_by_user").references(() => users.id, {
      onDelete: "set null",
    }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    notes: text("notes"),
  },
  (table) => [
    index("idx_appointments_patient").on(table.patientId),
    index("idx_appointments_doctor").on(table.doctorId),
    index("idx_appointments_start").on(table.scheduledStart),
    check("chk_appointment_times", sql`${table.scheduledEnd} > ${table.scheduledStart}`),
  ],
);

/**
 * Appointment-service mapping (many-to-many).
 * `servicePrice` is the catalog price at booking time and is never re-derived.
 * Services stay undeletable while any booking references them.
 */
export const appointmentServices = pgTable(
  "appointment_services",
  {
    appointmentId: integer("appointment_id")
      .notNull()
      .references(() => appointments.id, { onDelete: "cascade" }),
    serviceId: integer("service_id")
      .notNull()
      .references(() => services.id, { onDelete: "restrict" }),
    quantity: integer("quantity").default(1).notNull(),
    servicePrice: fixedDecimal("service_price", { precision: 10 }).notNull(),
  },
  (table) => [primaryKey({ columns: [table.appointmentId, table.serviceId] })],
);

export type Appointment = typeof appointments.$inferSelect;
export type NewAppointment = typeof appointments.$inferInsert;
export type AppointmentService = typeof appointmentServices.$inferSelect;
export type NewAppointmentService = typeof appointmentServices.$inferInsert;
