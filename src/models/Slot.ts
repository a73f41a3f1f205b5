// src/models/Slot.ts

/**
 * Time slot model - a committed reservation of one doctor for one
 * slot-length interval on a calendar date
 *
 * Data only, no methods. Created and destroyed exclusively by the slot engine.
 *
 * Invariant: at most one slot with isBooked = true per (doctorId, date, startTime)
 * Invariant: appointmentId points at the appointment that created the slot
 */
export interface TimeSlot {
    id: string;
    doctorId: string;
    date: string;          // YYYY-MM-DD
    startTime: string;     // HH:mm
    endTime: string;       // HH:mm
    isBooked: boolean;     // false once the visit is completed (kept as history)
    appointmentId: string;
}
