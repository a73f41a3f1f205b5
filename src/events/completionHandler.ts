// src/events/completionHandler.ts

import { Actor } from '../models/Actor';
import { AppointmentStatus, CompletedAppointment } from '../models/Appointment';
import { AppointmentAction, authorize } from '../engine/accessPolicy';
import { Outcome, RejectionCode, notFound, reject, succeed } from '../engine/outcome';
import { LifecycleContext, runTransition, timestamp, traced } from './lifecycleContext';

export interface CompletionInput {
    notes?: string | null;
}

/**
 * Handle the doctor marking a visit as done
 *
 * State transition: SCHEDULED → COMPLETED
 *
 * Side effects:
 * 1. Time slot kept as history, no longer booked
 * 2. Room released when releaseRoomOnCompletion is set
 */
export function handleCompletion(
    ctx: LifecycleContext,
    actor: Actor,
    appointmentId: string,
    input: CompletionInput = {}
): Outcome<CompletedAppointment> {
    return traced(ctx, 'complete', appointmentId, completeAppointment(ctx, actor, appointmentId, input));
}

function completeAppointment(
    ctx: LifecycleContext,
    actor: Actor,
    appointmentId: string,
    input: CompletionInput
): Outcome<CompletedAppointment> {
    const appointment = ctx.store.getAppointment(appointmentId);
    if (!appointment) {
        return notFound('Appointment not found');
    }

    const access = authorize(ctx.store, actor, appointment, AppointmentAction.COMPLETE);
    if (!access.ok) {
        return access;
    }

    if (appointment.status !== AppointmentStatus.SCHEDULED) {
        return reject(
            RejectionCode.INVALID_TRANSITION,
            `Cannot complete an appointment that is ${appointment.status.toLowerCase()}`
        );
    }

    return runTransition<CompletedAppointment>(ctx, 'complete', tx => {
        ctx.slotEngine.retireSlot(tx, appointment);

        const { roomId } = appointment.booking;
        if (roomId && ctx.config.releaseRoomOnCompletion) {
            ctx.rooms.release(tx, roomId);
        }

        const now = timestamp(ctx);
        const completed: CompletedAppointment = {
            ...appointment,
            status: AppointmentStatus.COMPLETED,
            notes: input.notes?.trim() || null,
            completedAt: now,
            updatedAt: now
        };
        tx.putAppointment(completed);

        return succeed(completed);
    });
}
