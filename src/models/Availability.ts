// src/models/Availability.ts

/**
 * Days of the week, Monday first (matches ISO weekday numbering 1..7)
 */
export enum Weekday {
    MONDAY = 'MONDAY',
    TUESDAY = 'TUESDAY',
    WEDNESDAY = 'WEDNESDAY',
    THURSDAY = 'THURSDAY',
    FRIDAY = 'FRIDAY',
    SATURDAY = 'SATURDAY',
    SUNDAY = 'SUNDAY'
}

export const WEEKDAYS: readonly Weekday[] = [
    Weekday.MONDAY,
    Weekday.TUESDAY,
    Weekday.WEDNESDAY,
    Weekday.THURSDAY,
    Weekday.FRIDAY,
    Weekday.SATURDAY,
    Weekday.SUNDAY
];

/**
 * Recurring weekly working window of a doctor
 *
 * Invariant: at most one window per (doctorId, weekday), enforced by the store
 * Invariant: startTime < endTime
 */
export interface AvailabilityWindow {
    doctorId: string;
    weekday: Weekday;
    startTime: string;  // HH:mm
    endTime: string;    // HH:mm
    isActive: boolean;
}
