/**
 * Clinic Management - Users Schema
 *
 * Staff accounts (admins, reception, doctors, nurses, accountants).
 * Clinical and billing rows keep a nullable link to the user who produced them;
 * deleting a user detaches those links instead of removing history.
 */

import { pgTable, serial, varchar, timestamp } from "drizzle-orm/pg-core";

import { userRoleEnum } from "./enums.ts";

export const users = pgTable("users", {
  id: serial("user_id").primaryKey(),
  username: varchar("username", { length: 50 }).unique().notNull(),
  passwordHash: varchar("password_hash", { length: 255 }).notNull(), // hashed only, never plain text
  fullName: varchar("full_name", { length: 150 }).notNull(),
  role: userRoleEnum("role").default("reception").notNull(),
  email: varchar("email", { length: 150 }).unique(),
  phone: varchar("phone", { length: 30 }),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  lastLogin: timestamp("last_login", { withTimezone: true }),
});

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
