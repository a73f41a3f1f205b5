// src/store/hospitalStore.ts

import { Appointment, AppointmentStatus } from '../models/Appointment';
import { AvailabilityWindow, Weekday } from '../models/Availability';
import { Doctor } from '../models/Doctor';
import { Equipment } from '../models/Equipment';
import { Notification } from '../models/Notification';
import { Room } from '../models/Room';
import { TimeSlot } from '../models/Slot';
import { UniqueConstraintError } from '../errors';
import { canTransition } from '../engine/appointmentStateMachine';

/**
 * Backing tables. Secondary maps are unique indexes.
 */
interface Tables {
    doctors: Map<string, Doctor>;
    availability: Map<string, AvailabilityWindow>;  // key: doctorId|weekday
    timeSlots: Map<string, TimeSlot>;
    bookedSlotIndex: Map<string, string>;           // key: doctorId|date|startTime → slot id
    appointments: Map<string, Appointment>;
    rooms: Map<string, Room>;
    roomNumberIndex: Map<string, string>;           // roomNumber → room id
    equipment: Map<string, Equipment>;
    serialNumberIndex: Map<string, string>;         // serialNumber → equipment id
    notifications: Map<string, Notification>;
}

type UndoEntry = () => void;

export const BOOKED_SLOT_CONSTRAINT = 'time_slots_booked_doctor_date_start';

function availabilityKey(doctorId: string, weekday: Weekday): string {
    return `${doctorId}|${weekday}`;
}

function slotKey(doctorId: string, date: string, startTime: string): string {
    return `${doctorId}|${date}|${startTime}`;
}

/**
 * Write handle of one unit of work
 *
 * Every write is applied immediately (reads inside the unit see it) and an
 * inverse is recorded. Rollback replays the inverses newest first.
 */
export class StoreTransaction {
    private readonly tables: Tables;
    private readonly undoLog: UndoEntry[] = [];
    private open = true;

    constructor(tables: Tables) {
        this.tables = tables;
    }

    putDoctor(doctor: Doctor): void {
        this.write(this.tables.doctors, doctor.id, { ...doctor });
    }

    /**
     * Insert or replace the window for (doctor, weekday)
     */
    putAvailability(window: AvailabilityWindow): void {
        this.write(this.tables.availability, availabilityKey(window.doctorId, window.weekday), { ...window });
    }

    /**
     * Insert a time slot
     *
     * @throws UniqueConstraintError if a booked slot already holds (doctor, date, startTime)
     */
    insertTimeSlot(slot: TimeSlot): void {
        if (this.tables.timeSlots.has(slot.id)) {
            throw new UniqueConstraintError('time_slots_pkey', slot.id);
        }
        if (slot.isBooked) {
            this.claimBookedKey(slot);
        }
        this.write(this.tables.timeSlots, slot.id, { ...slot });
    }

    /**
     * Mark a booked slot as history (isBooked = false), freeing its booked-key
     */
    retireTimeSlot(slotId: string): void {
        const slot = this.tables.timeSlots.get(slotId);
        if (!slot || !slot.isBooked) {
            return;
        }
        this.write(this.tables.bookedSlotIndex, slotKey(slot.doctorId, slot.date, slot.startTime), undefined);
        this.write(this.tables.timeSlots, slotId, { ...slot, isBooked: false });
    }

    deleteTimeSlot(slotId: string): boolean {
        const slot = this.tables.timeSlots.get(slotId);
        if (!slot) {
            return false;
        }
        if (slot.isBooked) {
            this.write(this.tables.bookedSlotIndex, slotKey(slot.doctorId, slot.date, slot.startTime), undefined);
        }
        this.write(this.tables.timeSlots, slotId, undefined);
        return true;
    }

    /**
     * @throws Error if the stored status cannot move to the new one
     */
    putAppointment(appointment: Appointment): void {
        const previous = this.tables.appointments.get(appointment.id);
        if (previous && !canTransition(previous.status, appointment.status)) {
            throw new Error(`Illegal transition ${previous.status} -> ${appointment.status} for ${appointment.id}`);
        }
        this.write(this.tables.appointments, appointment.id, appointment);
    }

    /**
     * @throws UniqueConstraintError if another room already uses the room number
     */
    putRoom(room: Room): void {
        const owner = this.tables.roomNumberIndex.get(room.roomNumber);
        if (owner !== undefined && owner !== room.id) {
            throw new UniqueConstraintError('rooms_room_number_key', room.roomNumber);
        }
        const previous = this.tables.rooms.get(room.id);
        if (previous && previous.roomNumber !== room.roomNumber) {
            this.write(this.tables.roomNumberIndex, previous.roomNumber, undefined);
        }
        this.write(this.tables.roomNumberIndex, room.roomNumber, room.id);
        this.write(this.tables.rooms, room.id, { ...room });
    }

    /**
     * @throws UniqueConstraintError if other equipment already uses the serial number
     */
    putEquipment(equipment: Equipment): void {
        const owner = this.tables.serialNumberIndex.get(equipment.serialNumber);
        if (owner !== undefined && owner !== equipment.id) {
            throw new UniqueConstraintError('equipment_serial_number_key', equipment.serialNumber);
        }
        const previous = this.tables.equipment.get(equipment.id);
        if (previous && previous.serialNumber !== equipment.serialNumber) {
            this.write(this.tables.serialNumberIndex, previous.serialNumber, undefined);
        }
        this.write(this.tables.serialNumberIndex, equipment.serialNumber, equipment.id);
        this.write(this.tables.equipment, equipment.id, { ...equipment });
    }

    putNotification(notification: Notification): void {
        this.write(this.tables.notifications, notification.id, { ...notification });
    }

    /** @internal */
    rollback(): void {
        while (this.undoLog.length > 0) {
            const undo = this.undoLog.pop();
            if (undo) {
                undo();
            }
        }
        this.open = false;
    }

    /** @internal */
    commit(): void {
        this.undoLog.length = 0;
        this.open = false;
    }

    private claimBookedKey(slot: TimeSlot): void {
        const key = slotKey(slot.doctorId, slot.date, slot.startTime);
        if (this.tables.bookedSlotIndex.has(key)) {
            throw new UniqueConstraintError(BOOKED_SLOT_CONSTRAINT, key);
        }
        this.write(this.tables.bookedSlotIndex, key, slot.id);
    }

    private write<V>(table: Map<string, V>, key: string, value: V | undefined): void {
        if (!this.open) {
            throw new Error('Transaction is no longer open');
        }

        const had = table.has(key);
        const previous = table.get(key);

        if (value === undefined) {
            table.delete(key);
        } else {
            table.set(key, value);
        }

        this.undoLog.push(() => {
            if (had && previous !== undefined) {
                table.set(key, previous);
            } else {
                table.delete(key);
            }
        });
    }
}

/**
 * In-memory relational store for the scheduler
 *
 * Reads are plain lookups. Writes only happen inside transaction(), which is
 * synchronous, so a check-then-write sequence inside one unit cannot
 * interleave with another request. The booked-slot unique index is the
 * final guard against double booking.
 */
export class HospitalStore {
    private readonly tables: Tables = {
        doctors: new Map(),
        availability: new Map(),
        timeSlots: new Map(),
        bookedSlotIndex: new Map(),
        appointments: new Map(),
        rooms: new Map(),
        roomNumberIndex: new Map(),
        equipment: new Map(),
        serialNumberIndex: new Map(),
        notifications: new Map()
    };
    private readonly sequences = new Map<string, number>();
    private activeTransaction: StoreTransaction | null = null;

    /**
     * Run a unit of work atomically
     *
     * If work throws, every write it made is undone and the error is rethrown.
     */
    transaction<T>(work: (tx: StoreTransaction) => T): T {
        if (this.activeTransaction) {
            throw new Error('Nested transactions are not supported');
        }

        const tx = new StoreTransaction(this.tables);
        this.activeTransaction = tx;
        try {
            const result = work(tx);
            if (result instanceof Promise) {
                throw new Error('Transaction work must be synchronous');
            }
            tx.commit();
            return result;
        } catch (err) {
            tx.rollback();
            throw err;
        } finally {
            this.activeTransaction = null;
        }
    }

    nextId(prefix: string): string {
        const next = (this.sequences.get(prefix) ?? 0) + 1;
        this.sequences.set(prefix, next);
        return `${prefix}-${String(next).padStart(4, '0')}`;
    }

    // ---- doctors ----

    getDoctor(id: string): Doctor | undefined {
        return this.tables.doctors.get(id);
    }

    findDoctorByUserId(userId: string): Doctor | undefined {
        for (const doctor of this.tables.doctors.values()) {
            if (doctor.userId === userId) {
                return doctor;
            }
        }
        return undefined;
    }

    listDoctors(): Doctor[] {
        return [...this.tables.doctors.values()];
    }

    // ---- availability ----

    getAvailability(doctorId: string, weekday: Weekday): AvailabilityWindow | undefined {
        return this.tables.availability.get(availabilityKey(doctorId, weekday));
    }

    listAvailability(doctorId: string): AvailabilityWindow[] {
        return [...this.tables.availability.values()].filter(w => w.doctorId === doctorId);
    }

    // ---- time slots ----

    findBookedSlot(doctorId: string, date: string, startTime: string): TimeSlot | undefined {
        const id = this.tables.bookedSlotIndex.get(slotKey(doctorId, date, startTime));
        return id === undefined ? undefined : this.tables.timeSlots.get(id);
    }

    /**
     * All slot rows (booked and retained history) of a doctor on a date
     */
    listSlots(doctorId: string, date: string): TimeSlot[] {
        return [...this.tables.timeSlots.values()].filter(s => s.doctorId === doctorId && s.date === date);
    }

    listAllSlots(): TimeSlot[] {
        return [...this.tables.timeSlots.values()];
    }

    findSlotForAppointment(appointmentId: string, doctorId: string, date: string, startTime: string): TimeSlot | undefined {
        for (const slot of this.tables.timeSlots.values()) {
            if (
                slot.appointmentId === appointmentId &&
                slot.doctorId === doctorId &&
                slot.date === date &&
                slot.startTime === startTime
            ) {
                return slot;
            }
        }
        return undefined;
    }

    // ---- appointments ----

    getAppointment(id: string): Appointment | undefined {
        return this.tables.appointments.get(id);
    }

    listAppointments(predicate: (appointment: Appointment) => boolean = () => true): Appointment[] {
        return [...this.tables.appointments.values()].filter(predicate);
    }

    /**
     * Non-cancelled appointments holding a doctor at (date, time)
     */
    findActiveDoctorBookings(doctorId: string, date: string, time: string): Appointment[] {
        return this.listAppointments(a =>
            a.status !== AppointmentStatus.PENDING &&
            a.status !== AppointmentStatus.CANCELLED &&
            a.booking.doctorId === doctorId &&
            a.booking.date === date &&
            a.booking.time === time
        );
    }

    /**
     * Non-cancelled appointments of a patient at (date, time)
     */
    findActivePatientBookings(patientId: string, date: string, time: string): Appointment[] {
        return this.listAppointments(a =>
            a.patientId === patientId &&
            a.status !== AppointmentStatus.PENDING &&
            a.status !== AppointmentStatus.CANCELLED &&
            a.booking.date === date &&
            a.booking.time === time
        );
    }

    // ---- rooms ----

    getRoom(id: string): Room | undefined {
        return this.tables.rooms.get(id);
    }

    /**
     * Rooms ordered by room number
     */
    listRooms(): Room[] {
        return [...this.tables.rooms.values()].sort((a, b) =>
            a.roomNumber.localeCompare(b.roomNumber, undefined, { numeric: true })
        );
    }

    // ---- equipment ----

    getEquipment(id: string): Equipment | undefined {
        return this.tables.equipment.get(id);
    }

    listEquipment(): Equipment[] {
        return [...this.tables.equipment.values()];
    }

    // ---- notifications ----

    getNotification(id: string): Notification | undefined {
        return this.tables.notifications.get(id);
    }

    listNotifications(userId: string): Notification[] {
        return [...this.tables.notifications.values()]
            .filter(n => n.userId === userId)
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    }
}
