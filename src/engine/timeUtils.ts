// src/engine/timeUtils.ts

import { DateTime } from 'luxon';
import { Weekday, WEEKDAYS } from '../models/Availability';

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse "HH:mm" into minutes after midnight
 *
 * @returns Minutes, or null if the value is not a valid 24h time
 */
export function parseTimeOfDay(value: string): number | null {
    const match = TIME_PATTERN.exec(value);
    if (!match) {
        return null;
    }
    return Number(match[1]) * 60 + Number(match[2]);
}

export function formatTimeOfDay(minutes: number): string {
    const hours = Math.floor(minutes / 60);
    const mins = minutes % 60;
    return `${String(hours).padStart(2, '0')}:${String(mins).padStart(2, '0')}`;
}

/**
 * Parse a "YYYY-MM-DD" calendar date in the given zone (start of day)
 */
export function parseCalendarDate(value: string, zone: string): DateTime | null {
    if (!DATE_PATTERN.test(value)) {
        return null;
    }
    const parsed = DateTime.fromISO(value, { zone });
    return parsed.isValid ? parsed.startOf('day') : null;
}

export function formatCalendarDate(value: DateTime): string {
    return value.toFormat('yyyy-MM-dd');
}

export function weekdayOf(date: DateTime): Weekday {
    // luxon weekday: 1 = Monday ... 7 = Sunday
    return WEEKDAYS[date.weekday - 1];
}

/**
 * Combine a calendar date and a time of day into an instant in the given zone
 */
export function combineDateTime(date: string, time: string, zone: string): DateTime | null {
    const day = parseCalendarDate(date, zone);
    const minutes = parseTimeOfDay(time);
    if (!day || minutes === null) {
        return null;
    }
    return day.set({ hour: Math.floor(minutes / 60), minute: minutes % 60 });
}
