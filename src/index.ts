/**
 * Clinic Management - Package entry
 */

export * from "./db/schema/index.ts";
export { getDb, getPool, closeDb, type ClinicDatabase, type ClinicSchema } from "./db/connection.ts";
export * from "./db/errors.ts";
export { renderSchemaDdl, applySchema, IMMUTABLE_UUID_GUARD, type StatementExecutor } from "./db/ddl.ts";
export { describeTable, listIndexes, type ColumnDescription, type IndexDescription } from "./db/inspect.ts";
export { seedClinic, type SeedOptions, type SeedResult } from "./db/seeder.ts";
export { attachServices, ServiceNotFoundError, type ServiceLine } from "./db/appointment-services.ts";
export {
  loadClinicConfig,
  parseClinicConfig,
  configFromEnv,
  getConnectionConfig,
  type ClinicConfig,
} from "./config/clinic-config.ts";
export { hashPassword, verifyPassword } from "./auth/password.ts";
