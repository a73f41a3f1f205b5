import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { Server } from 'http';
import jwt from 'jsonwebtoken';
import { createApp } from '../../src/app';
import { buildConfig } from '../../src/config';
import { FixedClock } from '../../src/engine/clock';
import { createLogger } from '../../src/logger';
import { Role } from '../../src/models/Actor';
import { HospitalStore } from '../../src/store/hospitalStore';
import { NEXT_MONDAY, NOW } from '../helpers';

const SECRET = 'test-secret';

function tokenFor(userId: string, role: Role): string {
    return jwt.sign({ sub: userId, role }, SECRET);
}

const ADMIN_TOKEN = tokenFor('admin-1', Role.ADMIN);
const RECEPTION_TOKEN = tokenFor('reception-1', Role.RECEPTIONIST);
const PATIENT_TOKEN = tokenFor('patient-1', Role.PATIENT);
const OTHER_PATIENT_TOKEN = tokenFor('patient-2', Role.PATIENT);
const DOCTOR_TOKEN = tokenFor('doctor-1', Role.DOCTOR);

describe('HTTP API', () => {
    let server: Server;
    let baseUrl: string;

    async function call(method: string, path: string, token?: string, body?: unknown) {
        const headers: Record<string, string> = { 'content-type': 'application/json' };
        if (token) {
            headers.authorization = `Bearer ${token}`;
        }
        const response = await fetch(`${baseUrl}${path}`, {
            method,
            headers,
            body: body === undefined ? undefined : JSON.stringify(body)
        });
        return { status: response.status, body: await response.json() };
    }

    beforeAll(async () => {
        const app = createApp({
            store: new HospitalStore(),
            config: buildConfig({ jwtSecret: SECRET, timezone: 'UTC' }),
            clock: new FixedClock(NOW),
            logger: createLogger({ level: 'silent' })
        });
        server = await new Promise<Server>(resolve => {
            const listening = app.listen(0, () => resolve(listening));
        });
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Server is not listening on a TCP port');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
        await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    });

    it('reports health without authentication', async () => {
        expect(await call('GET', '/health')).toEqual({
            status: 200,
            body: { status: 'healthy', doctors: 0, appointments: 0 }
        });
    });

    it('requires a valid bearer token', async () => {
        expect(await call('GET', '/appointments')).toEqual({ status: 401, body: { error: 'Authentication required' } });
        expect(await call('GET', '/appointments', jwt.sign({ sub: 'x', role: Role.ADMIN }, 'wrong-secret')))
            .toEqual({ status: 401, body: { error: 'Invalid or expired token' } });
        expect(await call('GET', '/appointments', jwt.sign({ sub: 'x', role: 'janitor' }, SECRET)))
            .toEqual({ status: 401, body: { error: 'Invalid token claims' } });
    });

    it('lets only admins register doctors', async () => {
        const doctor = { userId: 'doctor-1', name: 'Dr. Lee', specialization: 'Cardiology', department: 'Cardiology' };

        expect((await call('POST', '/doctors', PATIENT_TOKEN, doctor)).status).toBe(403);

        const created = await call('POST', '/doctors', ADMIN_TOKEN, doctor);
        expect(created.status).toBe(201);
        expect(created.body.doctor.id).toBe('DOC-0001');
        expect(created.body.availability).toHaveLength(5);
    });

    it('lists open slots for a date', async () => {
        const { status, body } = await call('GET', `/doctors/DOC-0001/slots?date=${NEXT_MONDAY}`, PATIENT_TOKEN);

        expect(status).toBe(200);
        expect(body.slots).toHaveLength(16);
        expect(body.slots[0]).toBe('09:00');
        expect(body.slots[15]).toBe('16:30');
    });

    it('validates request bodies', async () => {
        expect(await call('POST', '/appointments/request', PATIENT_TOKEN, { reason: 42 })).toMatchObject({
            status: 400,
            body: { error: 'Invalid request' }
        });
    });

    it('runs an appointment through request, assignment and completion', async () => {
        const requested = await call('POST', '/appointments/request', PATIENT_TOKEN, { reason: 'Chest pain' });
        expect(requested.status).toBe(201);
        expect(requested.body.appointment).toMatchObject({ id: 'APT-0001', status: 'PENDING' });

        const pending = await call('GET', '/appointments/pending', RECEPTION_TOKEN);
        expect(pending.body.count).toBe(1);
        expect(pending.body.requests[0].suggestion.specializations).toEqual(['Cardiology']);
        expect(pending.body.requests[0].suggestion.doctors[0].doctorId).toBe('DOC-0001');

        const assigned = await call('POST', '/appointments/APT-0001/assign', RECEPTION_TOKEN, {
            doctorId: 'DOC-0001', date: NEXT_MONDAY, time: '09:00'
        });
        expect(assigned.status).toBe(200);
        expect(assigned.body.appointment.status).toBe('SCHEDULED');

        expect(await call('GET', '/appointments/APT-0001', OTHER_PATIENT_TOKEN)).toEqual({
            status: 403,
            body: { error: 'You do not have permission to modify this appointment', code: 'FORBIDDEN' }
        });
        expect((await call('GET', '/appointments/APT-0001', DOCTOR_TOKEN)).status).toBe(200);

        const completed = await call('POST', '/appointments/APT-0001/complete', DOCTOR_TOKEN, { notes: 'Stable' });
        expect(completed.status).toBe(200);
        expect(completed.body.appointment).toMatchObject({ status: 'COMPLETED', notes: 'Stable' });
    });

    it('maps business rejections to 409', async () => {
        await call('POST', '/appointments/request', OTHER_PATIENT_TOKEN, { reason: 'Follow-up' });

        const conflict = await call('POST', '/appointments/APT-0002/assign', RECEPTION_TOKEN, {
            doctorId: 'DOC-0001', date: NEXT_MONDAY, time: '09:00'
        });

        expect(conflict).toEqual({
            status: 409,
            body: { error: 'Doctor already has an appointment at this time', code: 'DOCTOR_BOOKED' }
        });
    });

    it('scopes listings by role', async () => {
        const mine = await call('GET', '/appointments', PATIENT_TOKEN);
        expect(mine.body.appointments.map((a: { id: string }) => a.id)).toEqual(['APT-0001']);

        const all = await call('GET', '/appointments?status=PENDING', RECEPTION_TOKEN);
        expect(all.body.appointments.map((a: { id: string }) => a.id)).toEqual(['APT-0002']);

        expect((await call('GET', '/appointments?status=LOST', RECEPTION_TOKEN)).status).toBe(400);
    });

    it("lists and marks the caller's notifications", async () => {
        const inbox = await call('GET', '/notifications', PATIENT_TOKEN);
        expect(inbox.status).toBe(200);
        expect(inbox.body.notifications).toHaveLength(2);

        const id: string = inbox.body.notifications[0].id;
        expect((await call('POST', `/notifications/${id}/read`, OTHER_PATIENT_TOKEN)).status).toBe(403);
        expect((await call('POST', `/notifications/${id}/read`, PATIENT_TOKEN)).body.notification.isRead).toBe(true);
    });

    it('lets admins add equipment and staff list it', async () => {
        const monitor = { name: 'ECG monitor', equipmentType: 'Monitor', serialNumber: 'SN-100' };

        expect((await call('POST', '/equipment', PATIENT_TOKEN, monitor)).status).toBe(403);

        const created = await call('POST', '/equipment', ADMIN_TOKEN, monitor);
        expect(created.status).toBe(201);
        expect(created.body.equipment).toEqual({ id: 'EQP-0001', ...monitor, roomId: null, status: 'AVAILABLE' });

        expect(await call('POST', '/equipment', ADMIN_TOKEN, { ...monitor, roomId: 'ROOM-0404' })).toEqual({
            status: 404,
            body: { error: 'Room not found', code: 'NOT_FOUND' }
        });
        expect(await call('POST', '/equipment', ADMIN_TOKEN, monitor)).toEqual({
            status: 400,
            body: { error: 'Serial number SN-100 is already registered', code: 'INVALID_REQUEST' }
        });

        const listed = await call('GET', '/equipment', RECEPTION_TOKEN);
        expect(listed.status).toBe(200);
        expect(listed.body.count).toBe(1);
        expect((await call('GET', '/equipment', PATIENT_TOKEN)).status).toBe(403);
    });
});
