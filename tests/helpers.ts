// tests/helpers.ts

import { Actor, Role } from '../src/models/Actor';
import { AvailabilityWindow, Weekday } from '../src/models/Availability';
import { Doctor } from '../src/models/Doctor';
import { RoomType } from '../src/models/Room';
import { SchedulingConfig, buildConfig } from '../src/config';
import { FixedClock } from '../src/engine/clock';
import { Outcome } from '../src/engine/outcome';
import { LifecycleContext, createLifecycleContext } from '../src/events/lifecycleContext';
import { createLogger } from '../src/logger';
import { InAppNotificationSink, NotificationSink } from '../src/services/notifier';
import { HospitalStore } from '../src/store/hospitalStore';

/** Monday 2026-10-19, 08:00 UTC */
export const NOW = '2026-10-19T08:00:00';
export const TODAY = '2026-10-19';
export const NEXT_MONDAY = '2026-10-26';

export const RECEPTIONIST: Actor = { userId: 'reception-1', role: Role.RECEPTIONIST };
export const ADMIN: Actor = { userId: 'admin-1', role: Role.ADMIN };

export function patient(userId = 'patient-1'): Actor {
    return { userId, role: Role.PATIENT };
}

export interface Fixture {
    store: HospitalStore;
    clock: FixedClock;
    config: SchedulingConfig;
    ctx: LifecycleContext;
}

export function createFixture(options: { config?: Record<string, unknown>; notifier?: NotificationSink } = {}): Fixture {
    const store = new HospitalStore();
    const clock = new FixedClock(NOW);
    const config = buildConfig({ timezone: 'UTC', jwtSecret: 'test-secret', ...options.config });
    const ctx = createLifecycleContext({
        store,
        config,
        clock,
        logger: createLogger({ level: 'silent' }),
        notifier: options.notifier ?? new InAppNotificationSink(store, clock)
    });
    return { store, clock, config, ctx };
}

/**
 * Add a doctor directly to the store with the given windows (Monday 09:00-12:00 by default)
 */
export function seedDoctor(
    store: HospitalStore,
    overrides: Partial<Doctor> = {},
    windows: Array<Omit<AvailabilityWindow, 'doctorId'>> = [
        { weekday: Weekday.MONDAY, startTime: '09:00', endTime: '12:00', isActive: true }
    ]
): Doctor {
    const doctor: Doctor = {
        id: store.nextId('DOC'),
        userId: 'doctor-1',
        name: 'Dr. Lee',
        specialization: 'Cardiology',
        department: 'Cardiology',
        consultationFee: null,
        ...overrides
    };
    store.transaction(tx => {
        tx.putDoctor(doctor);
        for (const window of windows) {
            tx.putAvailability({ doctorId: doctor.id, ...window });
        }
    });
    return doctor;
}

export function seedRoom(store: HospitalStore, roomNumber: string, type = RoomType.CONSULTATION): string {
    const id = store.nextId('ROOM');
    store.transaction(tx => tx.putRoom({ id, roomNumber, type, floor: 1, capacity: 1, isAvailable: true }));
    return id;
}

export function unwrap<T>(outcome: Outcome<T>): T {
    if (!outcome.ok) {
        throw new Error(`Expected success, got ${outcome.code}: ${outcome.reason}`);
    }
    return outcome.value;
}
