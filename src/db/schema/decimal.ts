/**
 * Clinic Management - Fixed-Scale Decimal Column
 *
 * `numeric(p, 2)` read back as a two-decimal string on every path.
 * Plain selects hand over PostgreSQL's text form ("10.00"), but relational
 * queries build rows as JSON and the value arrives as a number (10).
 */

import { customType } from "drizzle-orm/pg-core";

export const DECIMAL_SCALE = 2;

export const fixedDecimal = customType<{
  data: string;
  driverData: string | number;
  config: { precision: number };
}>({
  dataType(config) {
    return `numeric(${config?.precision ?? 10}, ${DECIMAL_SCALE})`;
  },
  fromDriver(value) {
    return typeof value === "number" ? value.toFixed(DECIMAL_SCALE) : value;
  },
});
