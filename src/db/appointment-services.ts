/**
 * Clinic Management - Appointment Services
 *
 * Books catalog services onto an appointment. The live catalog price is copied
 * into `service_price` at this moment; later catalog changes leave it untouched.
 */

import { inArray } from "drizzle-orm";

import type { ClinicDatabase } from "./connection.ts";
import {
  services,
  appointmentServices,
  type AppointmentService,
  type NewAppointmentService,
} from "./schema/index.ts";

export type ServiceLine = {
  serviceId: number;
  quantity?: number;
};

export class ServiceNotFoundError extends Error {
  readonly serviceIds: number[];

  constructor(serviceIds: number[]) {
    super(`Unknown service id(s): ${serviceIds.join(", ")}`);
    this.name = "ServiceNotFoundError";
    this.serviceIds = serviceIds;
  }
}

/**
 * Attach services to an appointment in one transaction, snapshotting each price.
 * A service already on the appointment fails with a unique violation (see `toConstraintViolation`).
 */
export async function attachServices(
  db: ClinicDatabase,
  appointmentId: number,
  lines: ServiceLine[],
): Promise<AppointmentService[]> {
  if (lines.length === 0) return [];

  return db.transaction(async (tx) => {
    const ids = [...new Set(lines.map((l) => l.serviceId))];
    const catalog = await tx
      .select({ id: services.id, price: services.price })
      .from(services)
      .where(inArray(services.id, ids));

    const priceById = new Map(catalog.map((s) => [s.id, s.price]));
    const rows: NewAppointmentService[] = [];
    const missing = new Set<number>();
    for (const line of lines) {
      const price = priceById.get(line.serviceId);
      if (price === undefined) {
        missing.add(line.serviceId);
        continue;
      }
      rows.push({
        appointmentId,
        serviceId: line.serviceId,
        quantity: line.quantity ?? 1,
        servicePrice: price,
      });
    }
    if (missing.size > 0) throw new ServiceNotFoundError([...missing]);

    return tx.insert(appointmentServices).values(rows).returning();
  });
}
