import { describe, it, expect } from 'vitest';
import { AppointmentStatus } from '../../src/models/Appointment';
import { checkInvariants } from '../../src/engine/invariants';
import { HospitalStore } from '../../src/store/hospitalStore';

describe('checkInvariants', () => {
    it('passes on an empty store', () => {
        expect(checkInvariants(new HospitalStore())).toEqual([]);
    });

    it('reports a scheduled appointment without a slot and an orphan slot', () => {
        const store = new HospitalStore();
        const at = new Date('2026-10-19T08:00:00Z');
        store.transaction(tx => {
            tx.putAppointment({
                id: 'APT-0001',
                status: AppointmentStatus.SCHEDULED,
                patientId: 'patient-1',
                reason: 'Checkup',
                preferredDate: null,
                createdAt: at,
                updatedAt: at,
                booking: { doctorId: 'DOC-0001', date: '2026-10-26', time: '09:00', roomId: null, assignedBy: 'reception-1' }
            });
            tx.insertTimeSlot({
                id: 'SLOT-0001',
                doctorId: 'DOC-0001',
                date: '2026-10-26',
                startTime: '10:00',
                endTime: '10:30',
                isBooked: true,
                appointmentId: 'APT-0009'
            });
        });

        expect(checkInvariants(store)).toEqual([
            {
                rule: 'SCHEDULED_HAS_SLOT',
                detail: 'Appointment APT-0001 is scheduled without a matching booked slot'
            },
            {
                rule: 'SLOT_HAS_SCHEDULED_OWNER',
                detail: 'Booked slot SLOT-0001 belongs to a missing appointment'
            }
        ]);
    });
});
