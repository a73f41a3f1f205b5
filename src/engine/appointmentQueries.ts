// src/engine/appointmentQueries.ts

import { Actor, Role, isStaff } from '../models/Actor';
import { Appointment, AppointmentStatus, PendingAppointment, bookingOf } from '../models/Appointment';
import { HospitalStore } from '../store/hospitalStore';

/**
 * Appointments visible to the caller, newest first
 *
 * Patients see their own, doctors those assigned to them, staff everything.
 */
export function listVisibleAppointments(
    store: HospitalStore,
    actor: Actor,
    status?: AppointmentStatus
): Appointment[] {
    let visible: (appointment: Appointment) => boolean;

    if (isStaff(actor)) {
        visible = () => true;
    } else if (actor.role === Role.DOCTOR) {
        const doctor = store.findDoctorByUserId(actor.userId);
        visible = appointment => doctor !== undefined && bookingOf(appointment)?.doctorId === doctor.id;
    } else {
        visible = appointment => appointment.patientId === actor.userId;
    }

    return store
        .listAppointments(appointment => visible(appointment) && (status === undefined || appointment.status === status))
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
}

/**
 * Pending requests awaiting assignment, oldest first
 */
export function listPendingRequests(store: HospitalStore): PendingAppointment[] {
    const pending: PendingAppointment[] = [];
    for (const appointment of store.listAppointments()) {
        if (appointment.status === AppointmentStatus.PENDING) {
            pending.push(appointment);
        }
    }
    return pending.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
}
