// src/engine/appointmentStateMachine.ts

import { AppointmentStatus } from '../models/Appointment';

/**
 * Allowed transitions. SCHEDULED → SCHEDULED is a reschedule.
 */
const TRANSITIONS: Record<AppointmentStatus, readonly AppointmentStatus[]> = {
    [AppointmentStatus.PENDING]: [AppointmentStatus.SCHEDULED, AppointmentStatus.CANCELLED],
    [AppointmentStatus.SCHEDULED]: [
        AppointmentStatus.SCHEDULED,
        AppointmentStatus.COMPLETED,
        AppointmentStatus.CANCELLED
    ],
    [AppointmentStatus.COMPLETED]: [],
    [AppointmentStatus.CANCELLED]: []
};

export function canTransition(from: AppointmentStatus, to: AppointmentStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: AppointmentStatus): boolean {
    return TRANSITIONS[status].length === 0;
}
