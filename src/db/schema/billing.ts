/**
 * Clinic Management - Billing Schema
 *
 * Invoices, their line items, and payments applied to them.
 */

import {
  pgTable,
  serial,
  integer,
  varchar,
  timestamp,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";

import { fixedDecimal } from "./decimal.ts";
import { invoiceStatusEnum, paymentMethodEnum } from "./enums.ts";
import { users } from "./users.ts";
import { patients } from "./patients.ts";
import { appointments } from "./scheduling.ts";

/** Invoices — per patient, optionally tied to the appointment that produced them. */
export const invoices = pgTable("invoices", {
  id: serial("invoice_id").primaryKey(),
  appointmentId: integer("appointment_id").references(() => appointments.id, {
    onDelete: "set null",
  }),
  patientId: integer("patient_id")
    .notNull()
    .references(() => patients.id, { onDelete: "cascade" }),
  invoiceDate: timestamp("invoice_date", { withTimezone: true }).defaultNow(),
  totalAmount: fixedDecimal("total_amount", { precision: 10 }).default("0.00").notNull(),
  status: invoiceStatusEnum("status").default("unpaid"),
  createdBy: integer("created_by").references(() => users.id, { onDelete: "set null" }),
});

/** Invoice line items. `lineTotal` is computed by the database and cannot be written. */
export const invoiceItems = pgTable("invoice_items", {
  id: serial("invoice_item_id").primaryKey(),
  invoiceId: integer("invoice_id")
    .notNull()
    .references(() => invoices.id, { onDelete: "cascade" }),
  description: varchar("description", { length: 255 }),
  quantity: integer("quantity").default(1).notNull(),
  unitPrice: fixedDecimal("unit_price", { precision: 10 }).default("0.00").notNull(),
  lineTotal: fixedDecimal("line_total", { precision: 10 }).generatedAlwaysAs(
    sql`"quantity" * "unit_price"`,
  ),
});

/** Payments — money received against an invoice. */
export const payments = pgTable("payments", {
  id: serial("payment_id").primaryKey(),
  invoiceId: integer("invoice_id")
    .notNull()
    .references(() => invoices.id, { onDelete: "cascade" }),
  paidOn: timestamp("paid_on", { withTimezone: true }).defaultNow(),
  amount: fixedDecimal("amount", { precision: 10 }).notNull(),
  method: paymentMethodEnum("method").default("cash"),
  reference: varchar("reference", { length: 255 }),
  receivedBy: integer("received_by").references(() => users.id, { onDelete: "set null" }),
});

export type Invoice = typeof invoices.$inferSelect;
export type NewInvoice = typeof invoices.$inferInsert;
export type InvoiceItem = typeof invoiceItems.$inferSelect;
export type NewInvoiceItem = typeof invoiceItems.$inferInsert;
export type Payment = typeof payments.$inferSelect;
export type NewPayment = typeof payments.$inferInsert;
