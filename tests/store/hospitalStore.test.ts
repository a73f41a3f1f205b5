import { describe, it, expect } from 'vitest';
import { AppointmentStatus, PendingAppointment } from '../../src/models/Appointment';
import { RoomType } from '../../src/models/Room';
import { Equipment, EquipmentStatus } from '../../src/models/Equipment';
import { TimeSlot } from '../../src/models/Slot';
import { UniqueConstraintError } from '../../src/errors';
import { BOOKED_SLOT_CONSTRAINT, HospitalStore } from '../../src/store/hospitalStore';

function slot(id: string, overrides: Partial<TimeSlot> = {}): TimeSlot {
    return {
        id,
        doctorId: 'DOC-0001',
        date: '2026-10-26',
        startTime: '09:00',
        endTime: '09:30',
        isBooked: true,
        appointmentId: 'APT-0001',
        ...overrides
    };
}

function pending(id: string): PendingAppointment {
    const at = new Date('2026-10-19T08:00:00Z');
    return {
        id,
        status: AppointmentStatus.PENDING,
        patientId: 'patient-1',
        reason: 'Headache',
        preferredDate: null,
        createdAt: at,
        updatedAt: at
    };
}

describe('HospitalStore', () => {
    it('numbers ids per prefix', () => {
        const store = new HospitalStore();
        expect(store.nextId('APT')).toBe('APT-0001');
        expect(store.nextId('APT')).toBe('APT-0002');
        expect(store.nextId('DOC')).toBe('DOC-0001');
    });

    it('enforces one booked slot per doctor, date and start time', () => {
        const store = new HospitalStore();
        store.transaction(tx => tx.insertTimeSlot(slot('SLOT-0001')));

        let caught: unknown;
        try {
            store.transaction(tx => tx.insertTimeSlot(slot('SLOT-0002', { appointmentId: 'APT-0002' })));
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(UniqueConstraintError);
        expect(caught).toMatchObject({ constraint: BOOKED_SLOT_CONSTRAINT, key: 'DOC-0001|2026-10-26|09:00' });
        expect(store.listAllSlots().map(s => s.id)).toEqual(['SLOT-0001']);
    });

    it('frees the booked key when a slot is retired', () => {
        const store = new HospitalStore();
        store.transaction(tx => tx.insertTimeSlot(slot('SLOT-0001')));
        store.transaction(tx => tx.retireTimeSlot('SLOT-0001'));

        expect(store.findBookedSlot('DOC-0001', '2026-10-26', '09:00')).toBeUndefined();
        store.transaction(tx => tx.insertTimeSlot(slot('SLOT-0002', { appointmentId: 'APT-0002' })));
        expect(store.findBookedSlot('DOC-0001', '2026-10-26', '09:00')?.id).toBe('SLOT-0002');
    });

    it('undoes every write of a failed unit of work', () => {
        const store = new HospitalStore();
        store.transaction(tx => {
            tx.insertTimeSlot(slot('SLOT-0001'));
            tx.putAppointment(pending('APT-0001'));
        });

        expect(() => store.transaction(tx => {
            tx.deleteTimeSlot('SLOT-0001');
            tx.putAppointment(pending('APT-0002'));
            tx.putRoom({ id: 'ROOM-0001', roomNumber: '101', type: RoomType.CONSULTATION, floor: 1, capacity: 1, isAvailable: true });
            throw new Error('abort');
        })).toThrow('abort');

        expect(store.findBookedSlot('DOC-0001', '2026-10-26', '09:00')?.id).toBe('SLOT-0001');
        expect(store.getAppointment('APT-0002')).toBeUndefined();
        expect(store.listRooms()).toEqual([]);
    });

    it('refuses nested and asynchronous units of work', () => {
        const store = new HospitalStore();
        expect(() => store.transaction(() => store.transaction(() => undefined)))
            .toThrow('Nested transactions are not supported');
        expect(() => store.transaction(async () => undefined))
            .toThrow('Transaction work must be synchronous');
    });

    it('refuses illegal status changes', () => {
        const store = new HospitalStore();
        const appointment = pending('APT-0001');
        store.transaction(tx => tx.putAppointment(appointment));
        store.transaction(tx => tx.putAppointment({
            ...appointment,
            status: AppointmentStatus.CANCELLED,
            booking: null,
            cancelledBy: 'patient-1',
            cancelledAt: new Date('2026-10-19T09:00:00Z')
        }));

        expect(() => store.transaction(tx => tx.putAppointment(appointment)))
            .toThrow('Illegal transition CANCELLED -> PENDING for APT-0001');
        expect(store.getAppointment('APT-0001')?.status).toBe(AppointmentStatus.CANCELLED);
    });

    it('keeps room numbers unique and lists rooms by number', () => {
        const store = new HospitalStore();
        store.transaction(tx => {
            tx.putRoom({ id: 'ROOM-0001', roomNumber: '110', type: RoomType.CONSULTATION, floor: 1, capacity: 1, isAvailable: true });
            tx.putRoom({ id: 'ROOM-0002', roomNumber: '12', type: RoomType.OPERATION, floor: 0, capacity: 2, isAvailable: true });
        });

        expect(() => store.transaction(tx => tx.putRoom({
            id: 'ROOM-0003', roomNumber: '12', type: RoomType.EMERGENCY, floor: 0, capacity: 1, isAvailable: true
        }))).toThrow(UniqueConstraintError);
        expect(store.listRooms().map(r => r.roomNumber)).toEqual(['12', '110']);
    });

    it('keeps equipment serial numbers unique', () => {
        const store = new HospitalStore();
        const monitor: Equipment = {
            id: 'EQP-0001', name: 'ECG monitor', equipmentType: 'Monitor', serialNumber: 'SN-100', roomId: null, status: EquipmentStatus.AVAILABLE
        };
        store.transaction(tx => tx.putEquipment(monitor));

        let caught: unknown;
        try {
            store.transaction(tx => tx.putEquipment({ ...monitor, id: 'EQP-0002' }));
        } catch (err) {
            caught = err;
        }
        expect(caught).toMatchObject({ constraint: 'equipment_serial_number_key', key: 'SN-100' });

        store.transaction(tx => tx.putEquipment({ ...monitor, serialNumber: 'SN-101' }));
        store.transaction(tx => tx.putEquipment({ ...monitor, id: 'EQP-0002' }));
        expect(store.listEquipment().map(e => [e.id, e.serialNumber])).toEqual([['EQP-0001', 'SN-101'], ['EQP-0002', 'SN-100']]);
    });
});
