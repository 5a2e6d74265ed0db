/**
 * Clinic Management - Schema barrel export
 */

export * from "./enums.ts";
export * from "./users.ts";
export * from "./patients.ts";
export * from "./doctors.ts";
export * from "./facilities.ts";
export * from "./scheduling.ts";
export * from "./medical-records.ts";
export * from "./billing.ts";
export * from "./relations.ts";
