import { describe, it, expect, beforeAll } from "vitest";
import { PGlite } from "@electric-sql/pglite";

import { renderSchemaDdl, applySchema, IMMUTABLE_UUID_GUARD } from "./ddl.ts";

let statements: string[];

beforeAll(async () => {
  statements = await renderSchemaDdl();
});

const find = (pattern: RegExp) => statements.filter((s) => pattern.test(s));

describe("renderSchemaDdl", () => {
  it("declares every enumerated type before the tables that use it", () => {
    const firstTable = statements.findIndex((s) => /CREATE TABLE/.test(s));
    const enums = statements
      .map((s, i) => [s, i] as const)
      .filter(([s]) => /CREATE TYPE/.test(s));

    expect(enums).toHaveLength(6);
    expect(enums.every(([, i]) => i < firstTable)).toBe(true);
    expect(find(/"user_role" AS ENUM\('admin', 'reception', 'doctor', 'nurse', 'accountant'\)/)).toHaveLength(1);
  });

  it("creates all sixteen tables", () => {
    expect(find(/CREATE TABLE/)).toHaveLength(16);
  });

  it("carries the appointment time check and the generated line total", () => {
    expect(find(/CONSTRAINT "chk_appointment_times" CHECK/)).toHaveLength(1);
    expect(find(/GENERATED ALWAYS AS \("quantity" \* "unit_price"\) STORED/)).toHaveLength(1);
  });

  it("restricts service deletion and cascades from patients", () => {
    expect(find(/FOREIGN KEY \("service_id"\) REFERENCES "public"\."services".*ON DELETE restrict/i)).toHaveLength(1);
    expect(find(/FOREIGN KEY \("patient_id"\) REFERENCES "public"\."patients".*ON DELETE cascade/i)).toHaveLength(4);
  });

  it("keeps patient, address and appointment ids out of the caller's hands", () => {
    for (const column of ["patient_id", "address_id", "appointment_id"]) {
      expect(find(new RegExp(`"${column}" integer PRIMARY KEY[^,]*GENERATED ALWAYS AS IDENTITY`))).toHaveLength(1);
    }
  });

  it("stores money at two decimal places", () => {
    expect(find(/"service_price" numeric\(10, 2\) NOT NULL/)).toHaveLength(1);
    expect(find(/"height_cm" numeric\(6, 2\)/)).toHaveLength(1);
  });

  it("installs the uuid guard after the tables", () => {
    expect(statements.slice(-IMMUTABLE_UUID_GUARD.length)).toEqual([...IMMUTABLE_UUID_GUARD]);
    expect(find(/CREATE TRIGGER "appointments_keep_uuid" BEFORE UPDATE OF "appointment_uuid"/)).toHaveLength(1);
  });
});

describe("applySchema", () => {
  it("builds the schema on an empty database", async () => {
    const client = new PGlite();
    try {
      const count = await applySchema((statement) => client.exec(statement));

      const tables = await client.query<{ n: number }>(
        "SELECT count(*)::int AS n FROM information_schema.tables WHERE table_schema = 'public'",
      );
      expect(count).toBe(statements.length);
      expect(tables.rows[0]?.n).toBe(16);
    } finally {
      await client.close();
    }
  });
});
