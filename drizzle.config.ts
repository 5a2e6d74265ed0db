/**
 * Clinic Management - Drizzle ORM Configuration
 *
 * Used by `drizzle-kit` for migrations and studio.
 * Run: npm run db:generate
 * Run: npm run db:migrate
 * Run: npm run db:studio
 */

import { defineConfig } from "drizzle-kit";

import { getConnectionConfig } from "./src/config/clinic-config.ts";

const connection = getConnectionConfig();

export default defineConfig({
  schema: "./src/db/schema/index.ts",
  out: "./src/db/migrations",
  dialect: "postgresql",
  dbCredentials: {
    host: connection.host ?? "localhost",
    port: connection.port,
    database: connection.database ?? "clinic_management",
    user: connection.user,
    password: typeof connection.password === "string" ? connection.password : undefined,
    ssl: false,
  },
});
