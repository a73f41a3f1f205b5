// src/engine/slotGenerator.ts

import { AvailabilityWindow } from '../models/Availability';
import { formatTimeOfDay, parseTimeOfDay } from './timeUtils';

/**
 * Generate slot start times for one availability window
 *
 * Pure function - no side effects
 *
 * Slots are back-to-back from the window start. A final slot that would run
 * past the window end is not generated.
 *
 * @param window Availability window (HH:mm bounds)
 * @param slotDurationMinutes Length of one slot
 * @returns Slot start times ("HH:mm"), ascending
 */
export function generateSlotTimes(
    window: Pick<AvailabilityWindow, 'startTime' | 'endTime'>,
    slotDurationMinutes: number
): string[] {
    const start = parseTimeOfDay(window.startTime);
    const end = parseTimeOfDay(window.endTime);
    if (start === null || end === null || slotDurationMinutes <= 0) {
        return [];
    }

    const times: string[] = [];
    let current = start;

    // Generate slots until schedule end
    while (current + slotDurationMinutes <= end) {
        times.push(formatTimeOfDay(current));
        current += slotDurationMinutes;
    }

    return times;
}

/**
 * End time of a slot that starts at the given time
 */
export function slotEndTime(startTime: string, slotDurationMinutes: number): string {
    const start = parseTimeOfDay(startTime);
    if (start === null) {
        throw new Error(`Invalid slot start time: ${startTime}`);
    }
    return formatTimeOfDay(start + slotDurationMinutes);
}
