// src/engine/registry.ts

import { Actor, Role } from '../models/Actor';
import { AvailabilityWindow, Weekday } from '../models/Availability';
import { Doctor } from '../models/Doctor';
import { Equipment, EquipmentStatus } from '../models/Equipment';
import { Room, RoomType } from '../models/Room';
import { SchedulingConfig } from '../config';
import { UniqueConstraintError } from '../errors';
import { HospitalStore } from '../store/hospitalStore';
import { Outcome, RejectionCode, forbidden, notFound, reject, succeed } from './outcome';
import { formatTimeOfDay, parseTimeOfDay } from './timeUtils';

const WORKING_WEEK: readonly Weekday[] = [
    Weekday.MONDAY,
    Weekday.TUESDAY,
    Weekday.WEDNESDAY,
    Weekday.THURSDAY,
    Weekday.FRIDAY
];

export interface WindowInput {
    weekday: Weekday;
    startTime: string;
    endTime: string;
    isActive?: boolean;
}

export interface DoctorInput {
    userId: string;
    name: string;
    specialization: string;
    department: string;
    consultationFee?: number | null;
    availability?: WindowInput[];
}

export interface RoomInput {
    roomNumber: string;
    type: RoomType;
    floor: number;
    capacity: number;
}

export interface EquipmentInput {
    name: string;
    equipmentType: string;
    serialNumber: string;
    roomId?: string | null;
    status?: EquipmentStatus;
}

/**
 * Monday to Friday windows spanning the configured business hours
 */
export function defaultWorkingWeek(config: Pick<SchedulingConfig, 'businessHours'>): WindowInput[] {
    const startTime = formatTimeOfDay(config.businessHours.start * 60);
    const endTime = formatTimeOfDay(Math.min(config.businessHours.end * 60, 23 * 60 + 59));
    return WORKING_WEEK.map(weekday => ({ weekday, startTime, endTime }));
}

function checkWindow(input: WindowInput): string | null {
    const start = parseTimeOfDay(input.startTime);
    const end = parseTimeOfDay(input.endTime);
    if (start === null || end === null) {
        return 'Times must be HH:mm';
    }
    if (start >= end) {
        return 'Start time must be before end time';
    }
    return null;
}

/**
 * Register a doctor with weekly availability
 *
 * Without explicit windows the doctor works the default working week.
 * Duplicate weekdays are refused: one window per weekday.
 */
export function registerDoctor(store: HospitalStore, config: SchedulingConfig, input: DoctorInput): Outcome<Doctor> {
    if (store.findDoctorByUserId(input.userId)) {
        return reject(RejectionCode.INVALID_REQUEST, 'A doctor profile already exists for this user');
    }

    const windows = input.availability ?? defaultWorkingWeek(config);
    const weekdays = new Set<Weekday>();
    for (const window of windows) {
        const problem = checkWindow(window);
        if (problem) {
            return reject(RejectionCode.INVALID_REQUEST, `${window.weekday}: ${problem}`);
        }
        if (weekdays.has(window.weekday)) {
            return reject(RejectionCode.INVALID_REQUEST, `Only one availability window per weekday (${window.weekday})`);
        }
        weekdays.add(window.weekday);
    }

    const doctor: Doctor = {
        id: store.nextId('DOC'),
        userId: input.userId,
        name: input.name,
        specialization: input.specialization,
        department: input.department,
        consultationFee: input.consultationFee ?? null
    };

    store.transaction(tx => {
        tx.putDoctor(doctor);
        for (const window of windows) {
            tx.putAvailability({
                doctorId: doctor.id,
                weekday: window.weekday,
                startTime: window.startTime,
                endTime: window.endTime,
                isActive: window.isActive ?? true
            });
        }
    });

    return succeed(doctor);
}

/**
 * Insert or replace a doctor's window for one weekday
 *
 * Allowed for the doctor themself and for admins. Existing bookings are not
 * touched; the new window only governs future requests.
 */
export function setAvailability(
    store: HospitalStore,
    actor: Actor,
    doctorId: string,
    input: WindowInput
): Outcome<AvailabilityWindow> {
    const doctor = store.getDoctor(doctorId);
    if (!doctor) {
        return notFound('Doctor not found');
    }

    const isSelf = actor.role === Role.DOCTOR && actor.userId === doctor.userId;
    if (!isSelf && actor.role !== Role.ADMIN) {
        return forbidden('You can only change your own availability');
    }

    const problem = checkWindow(input);
    if (problem) {
        return reject(RejectionCode.INVALID_REQUEST, problem);
    }

    const window: AvailabilityWindow = {
        doctorId,
        weekday: input.weekday,
        startTime: input.startTime,
        endTime: input.endTime,
        isActive: input.isActive ?? true
    };
    store.transaction(tx => tx.putAvailability(window));

    return succeed(window);
}

export function registerRoom(store: HospitalStore, input: RoomInput): Outcome<Room> {
    const room: Room = {
        id: store.nextId('ROOM'),
        roomNumber: input.roomNumber,
        type: input.type,
        floor: input.floor,
        capacity: input.capacity,
        isAvailable: true
    };

    try {
        store.transaction(tx => tx.putRoom(room));
    } catch (err) {
        if (err instanceof UniqueConstraintError) {
            return reject(RejectionCode.INVALID_REQUEST, `Room ${input.roomNumber} already exists`);
        }
        throw err;
    }

    return succeed(room);
}

/**
 * Add equipment, optionally placed in an existing room
 */
export function registerEquipment(store: HospitalStore, input: EquipmentInput): Outcome<Equipment> {
    const roomId = input.roomId ?? null;
    if (roomId !== null && !store.getRoom(roomId)) {
        return notFound('Room not found');
    }

    const equipment: Equipment = {
        id: store.nextId('EQP'),
        name: input.name,
        equipmentType: input.equipmentType,
        serialNumber: input.serialNumber,
        roomId,
        status: input.status ?? EquipmentStatus.AVAILABLE
    };

    try {
        store.transaction(tx => tx.putEquipment(equipment));
    } catch (err) {
        if (err instanceof UniqueConstraintError) {
            return reject(RejectionCode.INVALID_REQUEST, `Serial number ${input.serialNumber} is already registered`);
        }
        throw err;
    }

    return succeed(equipment);
}
