/**
 * Clinic Management - Print DDL
 *
 * Writes the schema's PostgreSQL DDL to stdout. No database connection needed.
 * Run: npm run db:ddl > clinic.sql
 */

import { renderSchemaDdl } from "./ddl.ts";

renderSchemaDdl()
  .then((statements) => {
    process.stdout.write(`${statements.join("\n\n")}\n`);
  })
  .catch((err) => {
    console.error("[ddl] Rendering failed:", err);
    process.exit(1);
  });
