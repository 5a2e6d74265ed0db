/**
 * Clinic Management - Describe Script
 *
 * Prints a table's columns and indexes, or every index when no table is given.
 * Run: npm run db:inspect [-- services]
 */

import { getDb, closeDb } from "./connection.ts";
import { describeTable, listIndexes } from "./inspect.ts";

async function describe(table: string | undefined) {
  const db = getDb();
  try {
    if (table) {
      const columns = await describeTable(db, table);
      if (columns.length === 0) {
        console.error(`[inspect] No such table: ${table}`);
        process.exitCode = 1;
        return;
      }
      console.table(columns);
    }
    console.table(
      (await listIndexes(db, table)).map((i) => ({ ...i, columns: i.columns.join(", ") })),
    );
  } finally {
    await closeDb();
  }
}

describe(process.argv[2]).catch((err) => {
  console.error("[inspect] Inspection failed:", err);
  process.exit(1);
});
