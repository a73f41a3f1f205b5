// src/engine/slotEngine.ts

import { Appointment, bookingOf } from '../models/Appointment';
import { TimeSlot } from '../models/Slot';
import { SchedulingConfig } from '../config';
import { HospitalStore, StoreTransaction } from '../store/hospitalStore';
import { Clock } from './clock';
import { generateSlotTimes, slotEndTime } from './slotGenerator';
import { formatCalendarDate, parseCalendarDate, parseTimeOfDay, weekdayOf } from './timeUtils';
import { ALLOWED, Decision, RejectionCode, reject } from './outcome';

type SlotEngineConfig = Pick<SchedulingConfig, 'advanceBookingDays' | 'slotDurationMinutes' | 'timezone'>;

export interface SlotCheckOptions {
    /** Appointment whose own slot/booking must not count as a conflict (rescheduling) */
    excludeAppointmentId?: string;
}

/**
 * Slot engine - open-slot computation, slot request validation and the only
 * writer of time slot rows
 *
 * Reads availability and booked slots from the store; writes happen through
 * the caller's transaction so they commit together with the appointment change.
 */
export class SlotEngine {
    private readonly store: HospitalStore;
    private readonly config: SlotEngineConfig;
    private readonly clock: Clock;

    constructor(store: HospitalStore, config: SlotEngineConfig, clock: Clock) {
        this.store = store;
        this.config = config;
        this.clock = clock;
    }

    /**
     * Open slot start times of a doctor on a date
     *
     * Recomputed on every call. Empty when the doctor has no active window
     * that weekday. Times held by a slot row (booked, or kept as history of a
     * completed visit) are removed.
     *
     * @returns "HH:mm" values, ascending
     */
    listOpenSlots(doctorId: string, date: string): string[] {
        const day = parseCalendarDate(date, this.config.timezone);
        if (!day) {
            return [];
        }

        const window = this.store.getAvailability(doctorId, weekdayOf(day));
        if (!window || !window.isActive) {
            return [];
        }

        const taken = new Set(this.store.listSlots(doctorId, date).map(slot => slot.startTime));

        return generateSlotTimes(window, this.config.slotDurationMinutes)
            .filter(time => !taken.has(time));
    }

    /**
     * Validate a requested (doctor, date, time)
     *
     * Checks, first failure wins:
     * 1. past date
     * 2. beyond the advance-booking horizon
     * 3. no active window that weekday
     * 4. outside [window start, window end)
     * 5. not a slot start of the window
     * 6. booked time slot exists
     * 7. non-cancelled appointment of the doctor exists at that time
     */
    validateSlotRequest(doctorId: string, date: string, time: string, options: SlotCheckOptions = {}): Decision {
        const zone = this.config.timezone;
        const day = parseCalendarDate(date, zone);
        const minutes = parseTimeOfDay(time);
        if (!day || minutes === null) {
            return reject(RejectionCode.INVALID_REQUEST, 'Invalid date or time format');
        }

        const today = formatCalendarDate(this.clock.now().setZone(zone));
        if (date < today) {
            return reject(RejectionCode.PAST_DATE, 'Cannot book appointments for past dates');
        }

        const horizon = formatCalendarDate(
            this.clock.now().setZone(zone).plus({ days: this.config.advanceBookingDays })
        );
        if (date > horizon) {
            return reject(
                RejectionCode.TOO_FAR_AHEAD,
                `Cannot book appointments more than ${this.config.advanceBookingDays} days in advance`
            );
        }

        const window = this.store.getAvailability(doctorId, weekdayOf(day));
        if (!window || !window.isActive) {
            return reject(RejectionCode.DOCTOR_UNAVAILABLE, 'Doctor is not available on this day');
        }

        const windowStart = parseTimeOfDay(window.startTime);
        const windowEnd = parseTimeOfDay(window.endTime);
        if (windowStart === null || windowEnd === null || minutes < windowStart || minutes >= windowEnd) {
            return reject(RejectionCode.OUTSIDE_WORKING_HOURS, "Selected time is outside doctor's working hours");
        }

        if (!generateSlotTimes(window, this.config.slotDurationMinutes).includes(time)) {
            return reject(RejectionCode.INVALID_SLOT, 'Selected time is not the start of a bookable slot');
        }

        const bookedSlot = this.store.findBookedSlot(doctorId, date, time);
        if (bookedSlot && bookedSlot.appointmentId !== options.excludeAppointmentId) {
            return reject(RejectionCode.SLOT_BOOKED, 'This time slot is already booked');
        }

        const doctorBookings = this.store
            .findActiveDoctorBookings(doctorId, date, time)
            .filter(a => a.id !== options.excludeAppointmentId);
        if (doctorBookings.length > 0) {
            return reject(RejectionCode.DOCTOR_BOOKED, 'Doctor already has an appointment at this time');
        }

        return ALLOWED;
    }

    /**
     * Reject if the patient already holds a non-cancelled appointment at (date, time)
     */
    validatePatientAvailability(patientId: string, date: string, time: string, options: SlotCheckOptions = {}): Decision {
        const conflicts = this.store
            .findActivePatientBookings(patientId, date, time)
            .filter(a => a.id !== options.excludeAppointmentId);
        if (conflicts.length > 0) {
            return reject(RejectionCode.PATIENT_CONFLICT, 'Patient already has an appointment at this time');
        }
        return ALLOWED;
    }

    /**
     * Create the booked time slot of an appointment
     *
     * Performs no validation: the caller runs validateSlotRequest for the same
     * parameters inside the same unit of work.
     *
     * @throws UniqueConstraintError if the slot was booked in the meantime
     */
    commitSlot(tx: StoreTransaction, doctorId: string, date: string, time: string, appointmentId: string): TimeSlot {
        const slot: TimeSlot = {
            id: this.store.nextId('SLOT'),
            doctorId,
            date,
            startTime: time,
            endTime: slotEndTime(time, this.config.slotDurationMinutes),
            isBooked: true,
            appointmentId
        };
        tx.insertTimeSlot(slot);
        return slot;
    }

    /**
     * Delete the time slot of an appointment
     *
     * Idempotent: an appointment without a slot is a no-op.
     *
     * @returns True if a slot was freed, false if none was found
     */
    releaseSlot(tx: StoreTransaction, appointment: Appointment): boolean {
        const slot = this.findSlot(appointment);
        return slot ? tx.deleteTimeSlot(slot.id) : false;
    }

    /**
     * Keep the slot of a completed visit as history, no longer booked
     */
    retireSlot(tx: StoreTransaction, appointment: Appointment): boolean {
        const slot = this.findSlot(appointment);
        if (!slot) {
            return false;
        }
        tx.retireTimeSlot(slot.id);
        return true;
    }

    private findSlot(appointment: Appointment): TimeSlot | undefined {
        const booking = bookingOf(appointment);
        if (!booking) {
            return undefined;
        }
        return this.store.findSlotForAppointment(appointment.id, booking.doctorId, booking.date, booking.time);
    }
}
