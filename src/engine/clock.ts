// src/engine/clock.ts

import { DateTime } from 'luxon';

/**
 * Source of "now" for every date-sensitive rule (past date, booking horizon,
 * cancellation threshold). Injected so the rules never read the wall clock.
 */
export interface Clock {
    now(): DateTime;
}

export function systemClock(zone: string): Clock {
    return {
        now: () => DateTime.now().setZone(zone)
    };
}

/**
 * Clock pinned to an instant. The instant can be moved with set().
 */
export class FixedClock implements Clock {
    private current: DateTime;

    constructor(iso: string, zone = 'UTC') {
        const parsed = DateTime.fromISO(iso, { zone });
        if (!parsed.isValid) {
            throw new Error(`Invalid clock instant: ${iso}`);
        }
        this.current = parsed;
    }

    now(): DateTime {
        return this.current;
    }

    set(iso: string): void {
        const parsed = DateTime.fromISO(iso, { zone: this.current.zone });
        if (!parsed.isValid) {
            throw new Error(`Invalid clock instant: ${iso}`);
        }
        this.current = parsed;
    }
}
