/**
 * Clinic Management - Enumerated Types
 *
 * Permitted values only. Transitions between statuses belong to the application layer.
 */

import { pgEnum } from "drizzle-orm/pg-core";

export const userRoleEnum = pgEnum("user_role", [
  "admin",
  "reception",
  "doctor",
  "nurse",
  "accountant",
]);

export const genderEnum = pgEnum("gender", ["male", "female", "other"]);

export const addressTypeEnum = pgEnum("address_type", ["home", "work", "other"]);

export const appointmentStatusEnum = pgEnum("appointment_status", [
  "scheduled",
  "confirmed",
  "checked_in",
  "in_progress",
  "completed",
  "cancelled",
  "no_show",
]);

export const invoiceStatusEnum = pgEnum("invoice_status", [
  "unpaid",
  "partially_paid",
  "paid",
  "void",
]);

export const paymentMethodEnum = pgEnum("payment_method", [
  "cash",
  "card",
  "mobile_money",
  "insurance",
]);

export type UserRole = (typeof userRoleEnum.enumValues)[number];
export type Gender = (typeof genderEnum.enumValues)[number];
export type AddressType = (typeof addressTypeEnum.enumValues)[number];
export type AppointmentStatus = (typeof appointmentStatusEnum.enumValues)[number];
export type InvoiceStatus = (typeof invoiceStatusEnum.enumValues)[number];
export type PaymentMethod = (typeof paymentMethodEnum.enumValues)[number];
