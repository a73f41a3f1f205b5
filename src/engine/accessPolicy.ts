// src/engine/accessPolicy.ts

import { Actor, Role, isStaff } from '../models/Actor';
import { Appointment, bookingOf } from '../models/Appointment';
import { HospitalStore } from '../store/hospitalStore';
import { ALLOWED, Decision, forbidden } from './outcome';

export enum AppointmentAction {
    VIEW = 'VIEW',
    ASSIGN = 'ASSIGN',
    RESCHEDULE = 'RESCHEDULE',
    COMPLETE = 'COMPLETE',
    CANCEL = 'CANCEL'
}

/**
 * Ownership check, run before any business rule
 *
 * - VIEW: owning patient, assigned doctor, staff
 * - ASSIGN: staff
 * - RESCHEDULE, CANCEL: owning patient, staff
 * - COMPLETE: assigned doctor
 */
export function authorize(
    store: HospitalStore,
    actor: Actor,
    appointment: Appointment,
    action: AppointmentAction
): Decision {
    const isOwner = actor.role === Role.PATIENT && appointment.patientId === actor.userId;

    let allowed: boolean;
    switch (action) {
        case AppointmentAction.VIEW:
            allowed = isOwner || isStaff(actor) || isAssignedDoctor(store, actor, appointment);
            break;
        case AppointmentAction.ASSIGN:
            allowed = isStaff(actor);
            break;
        case AppointmentAction.RESCHEDULE:
        case AppointmentAction.CANCEL:
            allowed = isOwner || isStaff(actor);
            break;
        case AppointmentAction.COMPLETE:
            allowed = isAssignedDoctor(store, actor, appointment);
            break;
    }

    return allowed
        ? ALLOWED
        : forbidden('You do not have permission to modify this appointment');
}

export function isAssignedDoctor(store: HospitalStore, actor: Actor, appointment: Appointment): boolean {
    if (actor.role !== Role.DOCTOR) {
        return false;
    }
    const booking = bookingOf(appointment);
    const doctor = store.findDoctorByUserId(actor.userId);
    return booking !== null && doctor !== undefined && booking.doctorId === doctor.id;
}
