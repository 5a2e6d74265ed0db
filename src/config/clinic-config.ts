/**
 * Clinic Management - Configuration Schema
 *
 * Database connection and seed settings, validated with Zod.
 * Every database field can be overridden through `CLINIC_DB_*` environment variables.
 */

import { z } from "zod";
import type { PoolConfig } from "pg";

export const clinicConfigSchema = z
  .object({
    /** Database connection */
    database: z
      .object({
        host: z.string().default("localhost"),
        port: z.coerce.number().int().positive().default(5432),
        name: z.string().default("clinic_management"),
        user: z.string().default("clinic"),
        password: z.string().default("clinic"),
        poolMax: z.coerce.number().int().positive().default(20),
        idleTimeoutMillis: z.number().int().nonnegative().default(30_000),
        connectionTimeoutMillis: z.number().int().nonnegative().default(5_000),
      })
      .default({}),

    /** Sample data loaded by `db:seed` and `db:reset --seed` */
    seed: z
      .object({
        /** Plain-text password hashed into every seeded user's password_hash */
        userPassword: z.string().min(1).default("change-me"),
        includeSamplePatient: z.boolean().default(true),
      })
      .default({}),
  })
  .default({});

export type ClinicConfig = z.infer<typeof clinicConfigSchema>;

/**
 * Load clinic config from a raw object. Invalid input falls back to defaults.
 */
export function loadClinicConfig(rawConfig?: unknown): ClinicConfig {
  const parsed = clinicConfigSchema.safeParse(rawConfig ?? {});
  if (!parsed.success) {
    console.warn(
      "[clinic:config] Invalid clinic config, using defaults:",
      parsed.error.issues,
    );
    return clinicConfigSchema.parse({});
  }
  return parsed.data;
}

/**
 * Build the raw config object from environment variables.
 * Unset variables are omitted so schema defaults apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): unknown {
  const database: Record<string, string> = {};
  const mapping: Array<[string, string]> = [
    ["CLINIC_DB_HOST", "host"],
    ["CLINIC_DB_PORT", "port"],
    ["CLINIC_DB_NAME", "name"],
    ["CLINIC_DB_USER", "user"],
    ["CLINIC_DB_PASSWORD", "password"],
    ["CLINIC_DB_POOL_MAX", "poolMax"],
  ];
  for (const [variable, key] of mapping) {
    const value = env[variable];
    if (value !== undefined && value !== "") database[key] = value;
  }

  const seed: Record<string, string> = {};
  if (env.CLINIC_SEED_PASSWORD) seed.userPassword = env.CLINIC_SEED_PASSWORD;

  return { database, seed };
}

/**
 * Parse config without falling back. Each issue is reported by its path,
 * e.g. `database.poolMax: Number must be greater than 0`.
 */
export function parseClinicConfig(rawConfig?: unknown): ClinicConfig {
  const parsed = clinicConfigSchema.safeParse(rawConfig ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid clinic config: ${issues.join("; ")}`, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Pool settings from `CLINIC_DB_*`. An invalid variable throws rather than
 * pointing the pool at the default database.
 */
export function getConnectionConfig(
  env: NodeJS.ProcessEnv = process.env,
): PoolConfig {
  const { database } = parseClinicConfig(configFromEnv(env));
  return {
    host: database.host,
    port: database.port,
    database: database.name,
    user: database.user,
    password: database.password,
    max: database.poolMax,
    idleTimeoutMillis: database.idleTimeoutMillis,
    connectionTimeoutMillis: database.connectionTimeoutMillis,
  };
}
