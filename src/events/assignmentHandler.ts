// src/events/assignmentHandler.ts

import { Actor } from '../models/Actor';
import { AppointmentStatus, ScheduledAppointment } from '../models/Appointment';
import { NotificationKind } from '../models/Notification';
import { RoomType } from '../models/Room';
import { AppointmentAction, authorize } from '../engine/accessPolicy';
import { Outcome, RejectionCode, notFound, reject, succeed } from '../engine/outcome';
import { notifySafely } from '../services/notifier';
import { LifecycleContext, runTransition, timestamp, traced } from './lifecycleContext';

export interface AssignmentInput {
    doctorId: string;
    date: string;
    time: string;
    roomType?: RoomType;
}

/**
 * Handle staff assignment of a pending request
 *
 * State transition: PENDING → SCHEDULED
 *
 * One unit of work:
 * 1. Validate the slot request and the patient's availability
 * 2. Reserve the first free room of the requested type (best effort)
 * 3. Commit the booked time slot
 * 4. Attach doctor, date, time, room and assigning staff to the appointment
 *
 * Patient and doctor are notified after commit.
 */
export function handleAssignment(
    ctx: LifecycleContext,
    actor: Actor,
    appointmentId: string,
    input: AssignmentInput
): Outcome<ScheduledAppointment> {
    return traced(ctx, 'assign', appointmentId, assignAppointment(ctx, actor, appointmentId, input));
}

function assignAppointment(
    ctx: LifecycleContext,
    actor: Actor,
    appointmentId: string,
    input: AssignmentInput
): Outcome<ScheduledAppointment> {
    const appointment = ctx.store.getAppointment(appointmentId);
    if (!appointment) {
        return notFound('Appointment not found');
    }

    const access = authorize(ctx.store, actor, appointment, AppointmentAction.ASSIGN);
    if (!access.ok) {
        return access;
    }

    if (appointment.status !== AppointmentStatus.PENDING) {
        return reject(RejectionCode.INVALID_TRANSITION, 'This appointment has already been processed');
    }

    const doctor = ctx.store.getDoctor(input.doctorId);
    if (!doctor) {
        return notFound('Doctor not found');
    }

    const { date, time } = input;

    const outcome = runTransition<ScheduledAppointment>(ctx, 'assign', tx => {
        const slotCheck = ctx.slotEngine.validateSlotRequest(doctor.id, date, time);
        if (!slotCheck.ok) {
            return slotCheck;
        }

        const patientCheck = ctx.slotEngine.validatePatientAvailability(appointment.patientId, date, time);
        if (!patientCheck.ok) {
            return patientCheck;
        }

        const room = ctx.rooms.assignAvailableRoom(input.roomType ?? ctx.config.defaultRoomType);
        if (room) {
            ctx.rooms.reserve(tx, room.id);
        }

        ctx.slotEngine.commitSlot(tx, doctor.id, date, time, appointment.id);

        const scheduled: ScheduledAppointment = {
            id: appointment.id,
            status: AppointmentStatus.SCHEDULED,
            patientId: appointment.patientId,
            reason: appointment.reason,
            preferredDate: appointment.preferredDate,
            createdAt: appointment.createdAt,
            updatedAt: timestamp(ctx),
            booking: {
                doctorId: doctor.id,
                date,
                time,
                roomId: room ? room.id : null,
                assignedBy: actor.userId
            }
        };
        tx.putAppointment(scheduled);

        return succeed(scheduled);
    });

    if (outcome.ok) {
        notifySafely(
            ctx.notifier,
            ctx.logger,
            appointment.patientId,
            `Your appointment has been confirmed with ${doctor.name} on ${date} at ${time}`,
            NotificationKind.APPOINTMENT
        );
        notifySafely(
            ctx.notifier,
            ctx.logger,
            doctor.userId,
            `New appointment assigned on ${date} at ${time}`,
            NotificationKind.APPOINTMENT
        );
    }

    return outcome;
}
