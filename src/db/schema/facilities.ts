/**
 * Clinic Management - Facilities & Service Catalog Schema
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

export const clinicRooms = pgTable("clinic_rooms", {
  id: serial("room_id").primaryKey(),
  code: varchar("code", { length: 20 }).unique().notNull(),
  name: varchar("name", { length: 100 }),
  locationDescription: varchar("location_description", { length: 255 }),
  capacity: integer("capacity").default(1),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

/** Service catalog — consult and procedure types. `price` is the live list price. */
export const services = pgTable("services", {
  id: serial("service_id").primaryKey(),
  code: varchar("code", { length: 50 }).unique().notNull(),
  name: varchar("name", { length: 150 }).notNull(),
  description: text("description"),
  standardDurationMinutes: integer("standard_duration_minutes").default(30).notNull(),
  price: fixedDecimal("price", { precision: 10 }).default("0.00").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

export type ClinicRoom = typeof clinicRooms.$inferSelect;
export type NewClinicRoom = typeof clinicRooms.$inferInsert;
export type Service = typeof services.$inferSelect;
export type NewService = typeof services.$inferInsert;
