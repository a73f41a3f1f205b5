// src/engine/cancellationPolicy.ts

import { Appointment, AppointmentStatus } from '../models/Appointment';
import { SchedulingConfig } from '../config';
import { Clock } from './clock';
import { combineDateTime } from './timeUtils';
import { ALLOWED, Decision, RejectionCode, reject } from './outcome';

type CancellationConfig = Pick<SchedulingConfig, 'cancellationHours' | 'timezone'>;

/**
 * Whether an appointment may still be cancelled (or rescheduled)
 *
 * Terminal appointments never can. A pending request has no time yet and can
 * always be withdrawn. A scheduled appointment needs at least
 * cancellationHours of lead time.
 */
export function canCancel(appointment: Appointment, clock: Clock, config: CancellationConfig): Decision {
    switch (appointment.status) {
        case AppointmentStatus.CANCELLED:
            return reject(RejectionCode.INVALID_TRANSITION, 'Appointment is already cancelled');
        case AppointmentStatus.COMPLETED:
            return reject(RejectionCode.INVALID_TRANSITION, 'Cannot cancel a completed appointment');
        case AppointmentStatus.PENDING:
            return ALLOWED;
        case AppointmentStatus.SCHEDULED:
            break;
    }

    const scheduledAt = combineDateTime(appointment.booking.date, appointment.booking.time, config.timezone);
    if (!scheduledAt) {
        throw new Error(`Appointment ${appointment.id} has an unreadable booking time`);
    }

    const hoursUntil = scheduledAt.diff(clock.now(), 'hours').hours;
    if (hoursUntil < config.cancellationHours) {
        return reject(
            RejectionCode.CANCELLATION_WINDOW,
            `Cannot cancel appointment less than ${config.cancellationHours} hours before scheduled time`
        );
    }

    return ALLOWED;
}
