// src/engine/invariants.ts

import { AppointmentStatus } from '../models/Appointment';
import { HospitalStore } from '../store/hospitalStore';

export interface InvariantViolation {
    rule: 'UNIQUE_BOOKED_SLOT' | 'SCHEDULED_HAS_SLOT' | 'SLOT_HAS_SCHEDULED_OWNER';
    detail: string;
}

/**
 * Audit the booking invariants
 *
 * - at most one booked slot per (doctor, date, start time)
 * - an appointment is SCHEDULED iff a booked slot references it with the
 *   same doctor, date and time
 *
 * @returns Violations found (empty when consistent)
 */
export function checkInvariants(store: HospitalStore): InvariantViolation[] {
    const violations: InvariantViolation[] = [];
    const booked = store.listAllSlots().filter(slot => slot.isBooked);

    const seen = new Set<string>();
    for (const slot of booked) {
        const key = `${slot.doctorId}|${slot.date}|${slot.startTime}`;
        if (seen.has(key)) {
            violations.push({ rule: 'UNIQUE_BOOKED_SLOT', detail: `Duplicate booked slot ${key}` });
        }
        seen.add(key);
    }

    for (const appointment of store.listAppointments()) {
        if (appointment.status !== AppointmentStatus.SCHEDULED) {
            continue;
        }
        const { doctorId, date, time } = appointment.booking;
        const match = booked.find(slot =>
            slot.appointmentId === appointment.id &&
            slot.doctorId === doctorId &&
            slot.date === date &&
            slot.startTime === time
        );
        if (!match) {
            violations.push({
                rule: 'SCHEDULED_HAS_SLOT',
                detail: `Appointment ${appointment.id} is scheduled without a matching booked slot`
            });
        }
    }

    for (const slot of booked) {
        const owner = store.getAppointment(slot.appointmentId);
        if (!owner || owner.status !== AppointmentStatus.SCHEDULED) {
            violations.push({
                rule: 'SLOT_HAS_SCHEDULED_OWNER',
                detail: `Booked slot ${slot.id} belongs to ${owner ? owner.status.toLowerCase() : 'a missing'} appointment`
            });
        }
    }

    return violations;
}
