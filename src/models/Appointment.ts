// src/models/Appointment.ts

/**
 * Appointment lifecycle states
 *
 * Valid transitions:
 * - PENDING → SCHEDULED (staff assigns doctor, date, time)
 * - PENDING → CANCELLED (patient withdraws the request)
 * - SCHEDULED → SCHEDULED (reschedule)
 * - SCHEDULED → COMPLETED (doctor marks the visit done)
 * - SCHEDULED → CANCELLED (patient or staff cancels)
 *
 * COMPLETED and CANCELLED are terminal.
 */
export enum AppointmentStatus {
    PENDING = 'PENDING',
    SCHEDULED = 'SCHEDULED',
    COMPLETED = 'COMPLETED',
    CANCELLED = 'CANCELLED'
}

/**
 * Resource assignment of a scheduled appointment
 */
export interface Booking {
    doctorId: string;
    date: string;        // YYYY-MM-DD
    time: string;        // HH:mm
    roomId: string | null;
    assignedBy: string;  // userId of the staff member who assigned it
}

interface AppointmentBase {
    id: string;
    patientId: string;
    reason: string;
    preferredDate: string | null;
    createdAt: Date;
    updatedAt: Date;
}

export interface PendingAppointment extends AppointmentBase {
    status: AppointmentStatus.PENDING;
}

export interface ScheduledAppointment extends AppointmentBase {
    status: AppointmentStatus.SCHEDULED;
    booking: Booking;
}

export interface CompletedAppointment extends AppointmentBase {
    status: AppointmentStatus.COMPLETED;
    booking: Booking;
    notes: string | null;
    completedAt: Date;
}

export interface CancelledAppointment extends AppointmentBase {
    status: AppointmentStatus.CANCELLED;
    booking: Booking | null;  // null when withdrawn before assignment
    cancelledBy: string;
    cancelledAt: Date;
}

/**
 * Appointment model - one variant per lifecycle state, so a scheduled
 * appointment without a doctor/date/time cannot be represented.
 *
 * Data only. State changes happen through the lifecycle handlers in src/events.
 */
export type Appointment =
    | PendingAppointment
    | ScheduledAppointment
    | CompletedAppointment
    | CancelledAppointment;

/**
 * Booking of an appointment that currently holds (or held) a doctor's time
 */
export function bookingOf(appointment: Appointment): Booking | null {
    return appointment.status === AppointmentStatus.PENDING ? null : appointment.booking;
}
