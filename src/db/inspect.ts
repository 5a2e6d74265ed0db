/**
 * Clinic Management - Catalog Inspection
 *
 * Reads the live database catalog: a table's columns with their key role,
 * and every index in the public schema. Rows are validated with Zod so the
 * same code runs over node-postgres and PGlite results.
 */

import { sql, type SQL } from "drizzle-orm";
import { z } from "zod";

import type { ClinicDatabase } from "./connection.ts";

export type ColumnKey = "PRI" | "UNI" | "MUL" | "";

export type ColumnDescription = {
  name: string;
  type: string;
  nullable: boolean;
  default: string | null;
  key: ColumnKey;
  /** Generation expression for computed columns */
  generated: string | null;
};

export type IndexDescription = {
  table: string;
  name: string;
  columns: string[];
  unique: boolean;
  primary: boolean;
};

const columnRow = z.object({
  column_name: z.string(),
  data_type: z.string(),
  udt_name: z.string(),
  is_nullable: z.enum(["YES", "NO"]),
  column_default: z.string().nullable(),
  character_maximum_length: z.number().nullable(),
  numeric_precision: z.number().nullable(),
  numeric_scale: z.number().nullable(),
  generation_expression: z.string().nullable(),
});

const indexRow = z.object({
  table_name: z.string(),
  index_name: z.string(),
  columns: z.string(),
  is_unique: z.boolean(),
  is_primary: z.boolean(),
});

const foreignKeyRow = z.object({ column_name: z.string() });

async function query<T extends z.ZodTypeAny>(
  db: ClinicDatabase,
  row: T,
  statement: SQL,
): Promise<z.infer<T>[]> {
  const result = await db.execute(statement);
  return z.object({ rows: z.array(row) }).parse(result).rows;
}

function formatType(row: z.infer<typeof columnRow>): string {
  if (row.data_type === "USER-DEFINED") return row.udt_name;
  if (row.data_type === "character varying" && row.character_maximum_length !== null) {
    return `varchar(${row.character_maximum_length})`;
  }
  if (row.data_type === "numeric" && row.numeric_precision !== null) {
    return `numeric(${row.numeric_precision},${row.numeric_scale ?? 0})`;
  }
  return row.data_type;
}

/**
 * List every index of the public schema, primary keys included.
 */
export async function listIndexes(db: ClinicDatabase, table?: string): Promise<IndexDescription[]> {
  const tableFilter = table ? sql`AND t.relname = ${table}` : sql``;
  const rows = await query(
    db,
    indexRow,
    sql`
      SELECT
        t.relname::text AS table_name,
        i.relname::text AS index_name,
        string_agg(a.attname::text, ',' ORDER BY array_position(ix.indkey, a.attnum)) AS columns,
        ix.indisunique AS is_unique,
        ix.indisprimary AS is_primary
      FROM pg_index ix
      JOIN pg_class t ON t.oid = ix.indrelid
      JOIN pg_class i ON i.oid = ix.indexrelid
      JOIN pg_namespace n ON n.oid = t.relnamespace
      JOIN pg_attribute a ON a.attrelid = t.oid AND a.attnum = ANY(ix.indkey)
      WHERE n.nspname = 'public' ${tableFilter}
      GROUP BY t.relname, i.relname, ix.indisunique, ix.indisprimary
      ORDER BY t.relname, i.relname
    `,
  );

  return rows.map((r) => ({
    table: r.table_name,
    name: r.index_name,
    columns: r.columns.split(","),
    unique: r.is_unique,
    primary: r.is_primary,
  }));
}

/**
 * Describe a table's columns in ordinal order. Unknown tables yield an empty list.
 */
export async function describeTable(
  db: ClinicDatabase,
  table: string,
): Promise<ColumnDescription[]> {
  const columns = await query(
    db,
    columnRow,
    sql`
      SELECT
        column_name::text AS column_name,
        data_type::text AS data_type,
        udt_name::text AS udt_name,
        is_nullable::text AS is_nullable,
        column_default::text AS column_default,
        character_maximum_length::int AS character_maximum_length,
        numeric_precision::int AS numeric_precision,
        numeric_scale::int AS numeric_scale,
        generation_expression::text AS generation_expression
      FROM information_schema.columns
      WHERE table_schema = 'public' AND table_name = ${table}
      ORDER BY ordinal_position
    `,
  );
  if (columns.length === 0) return [];

  const indexes = await listIndexes(db, table);
  const foreignKeys = await query(
    db,
    foreignKeyRow,
    sql`
      SELECT kcu.column_name::text AS column_name
      FROM information_schema.table_constraints tc
      JOIN information_schema.key_column_usage kcu
        ON kcu.constraint_schema = tc.constraint_schema
       AND kcu.constraint_name = tc.constraint_name
      WHERE tc.constraint_type = 'FOREIGN KEY'
        AND tc.table_schema = 'public'
        AND tc.table_name = ${table}
    `,
  );
  const foreignKeyColumns = new Set(foreignKeys.map((f) => f.column_name));

  const keyOf = (column: string): ColumnKey => {
    if (indexes.some((i) => i.primary && i.columns.includes(column))) return "PRI";
    if (indexes.some((i) => i.unique && i.columns.length === 1 && i.columns[0] === column)) {
      return "UNI";
    }
    if (foreignKeyColumns.has(column) || indexes.some((i) => i.columns[0] === column)) {
      return "MUL";
    }
    return "";
  };

  return columns.map((c) => ({
    name: c.column_name,
    type: formatType(c),
    nullable: c.is_nullable === "YES",
    default: c.column_default,
    key: keyOf(c.column_name),
    generated: c.generation_expression,
  }));
}
