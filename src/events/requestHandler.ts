// src/events/requestHandler.ts

import { Actor, Role } from '../models/Actor';
import { AppointmentStatus, PendingAppointment } from '../models/Appointment';
import { NotificationKind } from '../models/Notification';
import { Outcome, RejectionCode, forbidden, reject, succeed } from '../engine/outcome';
import { formatCalendarDate, parseCalendarDate } from '../engine/timeUtils';
import { notifySafely } from '../services/notifier';
import { LifecycleContext, runTransition, timestamp, traced } from './lifecycleContext';

export interface AppointmentRequestInput {
    reason: string;
    preferredDate?: string | null;
}

/**
 * Handle a patient's visit request
 *
 * State transition: (none) → PENDING
 *
 * Doctor, date and time stay unassigned until staff schedule the request.
 */
export function handleAppointmentRequest(
    ctx: LifecycleContext,
    actor: Actor,
    input: AppointmentRequestInput
): Outcome<PendingAppointment> {
    return traced(ctx, 'request', null, requestAppointment(ctx, actor, input));
}

function requestAppointment(
    ctx: LifecycleContext,
    actor: Actor,
    input: AppointmentRequestInput
): Outcome<PendingAppointment> {
    if (actor.role !== Role.PATIENT) {
        return forbidden('Only patients can request appointments');
    }

    const reason = input.reason.trim();
    if (!reason) {
        return reject(RejectionCode.INVALID_REQUEST, 'Reason for visit is required');
    }

    const preferredDate = input.preferredDate ?? null;
    if (preferredDate !== null) {
        const zone = ctx.config.timezone;
        if (!parseCalendarDate(preferredDate, zone)) {
            return reject(RejectionCode.INVALID_REQUEST, 'Invalid preferred date');
        }
        if (preferredDate < formatCalendarDate(ctx.clock.now().setZone(zone))) {
            return reject(RejectionCode.PAST_DATE, 'Preferred date cannot be in the past');
        }
    }

    const now = timestamp(ctx);
    const appointment: PendingAppointment = {
        id: ctx.store.nextId('APT'),
        status: AppointmentStatus.PENDING,
        patientId: actor.userId,
        reason,
        preferredDate,
        createdAt: now,
        updatedAt: now
    };

    const outcome = runTransition<PendingAppointment>(ctx, 'request', tx => {
        tx.putAppointment(appointment);
        return succeed(appointment);
    });

    if (outcome.ok) {
        notifySafely(
            ctx.notifier,
            ctx.logger,
            actor.userId,
            'Your appointment request has been submitted. A receptionist will assign a doctor shortly.',
            NotificationKind.APPOINTMENT
        );
    }

    return outcome;
}
