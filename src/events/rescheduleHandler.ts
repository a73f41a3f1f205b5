// src/events/rescheduleHandler.ts

import { Actor } from '../models/Actor';
import { AppointmentStatus, ScheduledAppointment } from '../models/Appointment';
import { NotificationKind } from '../models/Notification';
import { AppointmentAction, authorize } from '../engine/accessPolicy';
import { canCancel } from '../engine/cancellationPolicy';
import { Outcome, RejectionCode, notFound, reject, succeed } from '../engine/outcome';
import { notifySafely } from '../services/notifier';
import { LifecycleContext, runTransition, timestamp, traced } from './lifecycleContext';

export interface RescheduleInput {
    doctorId?: string;  // defaults to the current doctor
    date: string;
    time: string;
    reason?: string;
}

/**
 * Handle a reschedule of a scheduled appointment
 *
 * State transition: SCHEDULED → SCHEDULED
 *
 * The old slot must still be inside the cancellation window. In one unit of
 * work the new slot is validated, the old slot released and the new one
 * committed. The room stays attached.
 */
export function handleReschedule(
    ctx: LifecycleContext,
    actor: Actor,
    appointmentId: string,
    input: RescheduleInput
): Outcome<ScheduledAppointment> {
    return traced(ctx, 'reschedule', appointmentId, rescheduleAppointment(ctx, actor, appointmentId, input));
}

function rescheduleAppointment(
    ctx: LifecycleContext,
    actor: Actor,
    appointmentId: string,
    input: RescheduleInput
): Outcome<ScheduledAppointment> {
    const appointment = ctx.store.getAppointment(appointmentId);
    if (!appointment) {
        return notFound('Appointment not found');
    }

    const access = authorize(ctx.store, actor, appointment, AppointmentAction.RESCHEDULE);
    if (!access.ok) {
        return access;
    }

    const window = canCancel(appointment, ctx.clock, ctx.config);
    if (!window.ok) {
        return reject(window.code, `Cannot reschedule: ${window.reason}`);
    }

    if (appointment.status !== AppointmentStatus.SCHEDULED) {
        return reject(RejectionCode.INVALID_TRANSITION, 'Only scheduled appointments can be rescheduled');
    }

    const previous = appointment.booking;
    const doctor = ctx.store.getDoctor(input.doctorId ?? previous.doctorId);
    if (!doctor) {
        return notFound('Doctor not found');
    }

    const { date, time } = input;
    const reason = input.reason?.trim() || appointment.reason;
    const exclude = { excludeAppointmentId: appointment.id };

    const outcome = runTransition<ScheduledAppointment>(ctx, 'reschedule', tx => {
        const slotCheck = ctx.slotEngine.validateSlotRequest(doctor.id, date, time, exclude);
        if (!slotCheck.ok) {
            return slotCheck;
        }

        const patientCheck = ctx.slotEngine.validatePatientAvailability(appointment.patientId, date, time, exclude);
        if (!patientCheck.ok) {
            return patientCheck;
        }

        ctx.slotEngine.releaseSlot(tx, appointment);
        ctx.slotEngine.commitSlot(tx, doctor.id, date, time, appointment.id);

        const rescheduled: ScheduledAppointment = {
            ...appointment,
            reason,
            updatedAt: timestamp(ctx),
            booking: { ...previous, doctorId: doctor.id, date, time }
        };
        tx.putAppointment(rescheduled);

        return succeed(rescheduled);
    });

    if (outcome.ok) {
        notifySafely(
            ctx.notifier,
            ctx.logger,
            appointment.patientId,
            `Your appointment has been rescheduled to ${date} at ${time}`,
            NotificationKind.APPOINTMENT
        );
        notifySafely(
            ctx.notifier,
            ctx.logger,
            doctor.userId,
            `Appointment rescheduled to ${date} at ${time}`,
            NotificationKind.APPOINTMENT
        );

        const previousDoctor = previous.doctorId !== doctor.id ? ctx.store.getDoctor(previous.doctorId) : undefined;
        if (previousDoctor) {
            notifySafely(
                ctx.notifier,
                ctx.logger,
                previousDoctor.userId,
                `Appointment on ${previous.date} at ${previous.time} has been moved to another doctor`,
                NotificationKind.CANCELLATION
            );
        }
    }

    return outcome;
}
