/**
 * Clinic Management - Relations
 *
 * Drives Drizzle relational queries (`db.query.patients.findMany({ with: ... })`).
 * Foreign keys themselves live on the tables.
 */

import { relations } from "drizzle-orm";

import { users } from "./users.ts";
import { patients, addresses } from "./patients.ts";
import { specialties, doctors, doctorSpecialties } from "./doctors.ts";
import { clinicRooms, services } from "./facilities.ts";
import { appointments, appointmentServices } from "./scheduling.ts";
import { medicalRecords, prescriptions, prescriptionItems } from "./medical-records.ts";
import { invoices, invoiceItems, payments } from "./billing.ts";

export const usersRelations = relations(users, ({ many }) => ({
  doctors: many(doctors),
  appointmentsCreated: many(appointments),
  medicalRecordsCreated: many(medicalRecords),
  prescriptionsIssued: many(prescriptions),
  invoicesCreated: many(invoices),
  paymentsReceived: many(payments),
}));

export const patientsRelations = relations(patients, ({ many }) => ({
  addresses: many(addresses),
  appointments: many(appointments),
  medicalRecords: many(medicalRecords),
  invoices: many(invoices),
}));

export const addressesRelations = relations(addresses, ({ one }) => ({
  patient: one(patients, { fields: [addresses.patientId], references: [patients.id] }),
}));

export const specialtiesRelations = relations(specialties, ({ many }) => ({
  doctorSpecialties: many(doctorSpecialties),
}));

export const doctorsRelations = relations(doctors, ({ one, many }) => ({
  user: one(users, { fields: [doctors.userId], references: [users.id] }),
  doctorSpecialties: many(doctorSpecialties),
  appointments: many(appointments),
}));

export const doctorSpecialtiesRelations = relations(doctorSpecialties, ({ one }) => ({
  doctor: one(doctors, { fields: [doctorSpecialties.doctorId], references: [doctors.id] }),
  specialty: one(specialties, {
    fields: [doctorSpecialties.specialtyId],
    references: [specialties.id],
  }),
}));

export const clinicRoomsRelations = relations(clinicRooms, ({ many }) => ({
  appointments: many(appointments),
}));

export const servicesRelations = relations(services, ({ many }) => ({
  appointmentServices: many(appointmentServices),
}));

export const appointmentsRelations = relations(appointments, ({ one, many }) => ({
  patient: one(patients, { fields: [appointments.patientId], references: [patients.id] }),
  doctor: one(doctors, { fields: [appointments.doctorId], references: [doctors.id] }),
  room: one(clinicRooms, { fields: [appointments.roomId], references: [clinicRooms.id] }),
  createdBy: one(users, { fields: [appointments.createdByUser], references: [users.id] }),
  appointmentServices: many(appointmentServices),
  medicalRecords: many(medicalRecords),
  invoices: many(invoices),
}));

export const appointmentServicesRelations = relations(appointmentServices, ({ one }) => ({
  appointment: one(appointments, {
    fields: [appointmentServices.appointmentId],
    references: [appointments.id],
  }),
  service: one(services, { fields: [appointmentServices.serviceId], references: [services.id] }),
}));

export const medicalRecordsRelations = relations(medicalRecords, ({ one, many }) => ({
  patient: one(patients, { fields: [medicalRecords.patientId], references: [patients.id] }),
  appointment: one(appointments, {
    fields: [medicalRecords.appointmentId],
    references: [appointments.id],
  }),
  author: one(users, { fields: [medicalRecords.createdBy], references: [users.id] }),
  prescriptions: many(prescriptions),
}));

export const prescriptionsRelations = relations(prescriptions, ({ one, many }) => ({
  record: one(medicalRecords, {
    fields: [prescriptions.recordId],
    references: [medicalRecords.id],
  }),
  prescriber: one(users, { fields: [prescriptions.prescribedBy], references: [users.id] }),
  items: many(prescriptionItems),
}));

export const prescriptionItemsRelations = relations(prescriptionItems, ({ one }) => ({
  prescription: one(prescriptions, {
    fields: [prescriptionItems.prescriptionId],
    references: [prescriptions.id],
  }),
}));

export const invoicesRelations = relations(invoices, ({ one, many }) => ({
  patient: one(patients, { fields: [invoices.patientId], references: [patients.id] }),
  appointment: one(appointments, {
    fields: [invoices.appointmentId],
    references: [appointments.id],
  }),
  creator: one(users, { fields: [invoices.createdBy], references: [users.id] }),
  items: many(invoiceItems),
  payments: many(payments),
}));

export const invoiceItemsRelations = relations(invoiceItems, ({ one }) => ({
  invoice: one(invoices, { fields: [invoiceItems.invoiceId], references: [invoices.id] }),
}));

export const paymentsRelations = relations(payments, ({ one }) => ({
  invoice: one(invoices, { fields: [payments.invoiceId], references: [invoices.id] }),
  receiver: one(users, { fields: [payments.receivedBy], references: [users.id] }),
}));
