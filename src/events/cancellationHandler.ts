// src/events/cancellationHandler.ts

import { Actor } from '../models/Actor';
import { AppointmentStatus, CancelledAppointment, bookingOf } from '../models/Appointment';
import { NotificationKind } from '../models/Notification';
import { AppointmentAction, authorize } from '../engine/accessPolicy';
import { canCancel } from '../engine/cancellationPolicy';
import { Outcome, notFound, succeed } from '../engine/outcome';
import { notifySafely } from '../services/notifier';
import { LifecycleContext, runTransition, timestamp, traced } from './lifecycleContext';

/**
 * Handle cancellation by the patient or staff
 *
 * State transition: PENDING → CANCELLED, SCHEDULED → CANCELLED
 *
 * Side effects (one unit of work):
 * 1. Release the time slot, if any
 * 2. Free the room, if any
 * 3. Record who cancelled and when
 *
 * Rejected without touching state when the appointment is terminal or starts
 * within the cancellation threshold.
 */
export function handleCancellation(
    ctx: LifecycleContext,
    actor: Actor,
    appointmentId: string
): Outcome<CancelledAppointment> {
    return traced(ctx, 'cancel', appointmentId, cancelAppointment(ctx, actor, appointmentId));
}

function cancelAppointment(
    ctx: LifecycleContext,
    actor: Actor,
    appointmentId: string
): Outcome<CancelledAppointment> {
    const appointment = ctx.store.getAppointment(appointmentId);
    if (!appointment) {
        return notFound('Appointment not found');
    }

    const access = authorize(ctx.store, actor, appointment, AppointmentAction.CANCEL);
    if (!access.ok) {
        return access;
    }

    const window = canCancel(appointment, ctx.clock, ctx.config);
    if (!window.ok) {
        return window;
    }

    const booking = bookingOf(appointment);

    const outcome = runTransition<CancelledAppointment>(ctx, 'cancel', tx => {
        ctx.slotEngine.releaseSlot(tx, appointment);

        if (booking && booking.roomId) {
            ctx.rooms.release(tx, booking.roomId);
        }

        const now = timestamp(ctx);
        const cancelled: CancelledAppointment = {
            id: appointment.id,
            status: AppointmentStatus.CANCELLED,
            patientId: appointment.patientId,
            reason: appointment.reason,
            preferredDate: appointment.preferredDate,
            createdAt: appointment.createdAt,
            updatedAt: now,
            booking,
            cancelledBy: actor.userId,
            cancelledAt: now
        };
        tx.putAppointment(cancelled);

        return succeed(cancelled);
    });

    if (!outcome.ok) {
        return outcome;
    }

    if (!booking) {
        notifySafely(
            ctx.notifier,
            ctx.logger,
            appointment.patientId,
            'Your appointment request has been withdrawn',
            NotificationKind.CANCELLATION
        );
        return outcome;
    }

    notifySafely(
        ctx.notifier,
        ctx.logger,
        appointment.patientId,
        `Your appointment on ${booking.date} at ${booking.time} has been cancelled`,
        NotificationKind.CANCELLATION
    );

    const doctor = ctx.store.getDoctor(booking.doctorId);
    if (doctor) {
        notifySafely(
            ctx.notifier,
            ctx.logger,
            doctor.userId,
            `Appointment on ${booking.date} at ${booking.time} has been cancelled`,
            NotificationKind.CANCELLATION
        );
    }

    return outcome;
}
