// src/simulation/runDaySimulation.ts

import { Actor, Role } from '../models/Actor';
import { AppointmentStatus } from '../models/Appointment';
import { RoomType } from '../models/Room';
import { buildConfig } from '../config';
import { FixedClock } from '../engine/clock';
import { InvariantViolation, checkInvariants } from '../engine/invariants';
import { Outcome, RejectionCode } from '../engine/outcome';
import { registerDoctor, registerRoom } from '../engine/registry';
import { LifecycleContext, createLifecycleContext } from '../events/lifecycleContext';
import { handleAppointmentRequest } from '../events/requestHandler';
import { handleAssignment } from '../events/assignmentHandler';
import { handleReschedule } from '../events/rescheduleHandler';
import { handleCompletion } from '../events/completionHandler';
import { handleCancellation } from '../events/cancellationHandler';
import { Logger, createLogger } from '../logger';
import { InAppNotificationSink } from '../services/notifier';
import { HospitalStore } from '../store/hospitalStore';

/**
 * Full Clinic Day Simulation
 *
 * Demonstrates:
 * - Doctors seeded with the default working week, rooms per type
 * - Patient requests assigned by reception
 * - A double-booking attempt
 * - A cancellation inside the threshold
 * - A reschedule to another doctor
 * - A withdrawn request
 * - Completions later in the day
 * - Invariant audit at the end
 */

export interface SimulationSummary {
    statusCounts: Record<AppointmentStatus, number>;
    rejections: RejectionCode[];
    notifications: number;
    violations: InvariantViolation[];
}

export interface SimulationOptions {
    logger?: Logger;
    /** Start of the simulated day (a Monday morning) */
    startAt?: string;
}

const SIMULATION_DAY = '2026-10-19';

const RECEPTION: Actor = { userId: 'reception-1', role: Role.RECEPTIONIST };

function patient(userId: string): Actor {
    return { userId, role: Role.PATIENT };
}

function expectOk<T>(outcome: Outcome<T>, step: string): T {
    if (!outcome.ok) {
        throw new Error(`Simulation step "${step}" failed: ${outcome.reason}`);
    }
    return outcome.value;
}

export function runDaySimulation(options: SimulationOptions = {}): SimulationSummary {
    const logger = options.logger ?? createLogger({ serviceName: 'day-simulation' });
    const clock = new FixedClock(options.startAt ?? `${SIMULATION_DAY}T08:00:00`);
    const config = buildConfig({ timezone: 'UTC', jwtSecret: 'day-simulation' });
    const store = new HospitalStore();
    const ctx: LifecycleContext = createLifecycleContext({
        store,
        config,
        clock,
        logger,
        notifier: new InAppNotificationSink(store, clock)
    });
    const rejections: RejectionCode[] = [];

    const attempt = <T>(step: string, outcome: Outcome<T>): Outcome<T> => {
        if (outcome.ok) {
            logger.info({ step }, 'step succeeded');
        } else {
            rejections.push(outcome.code);
            logger.info({ step, code: outcome.code, reason: outcome.reason }, 'step rejected');
        }
        return outcome;
    };

    // ========== STEP 1: Doctors and rooms ==========
    const cardiologist = expectOk(registerDoctor(store, config, {
        userId: 'doctor-heart',
        name: 'Dr. Maya Ortiz',
        specialization: 'Cardiology',
        department: 'Cardiology'
    }), 'register cardiologist');
    const generalist = expectOk(registerDoctor(store, config, {
        userId: 'doctor-general',
        name: 'Dr. Sam Reyes',
        specialization: 'General Medicine',
        department: 'Outpatient'
    }), 'register generalist');
    for (const roomNumber of ['101', '102']) {
        expectOk(registerRoom(store, { roomNumber, type: RoomType.CONSULTATION, floor: 1, capacity: 1 }), `room ${roomNumber}`);
    }
    logger.info({ doctors: store.listDoctors().length, rooms: store.listRooms().length }, 'hospital seeded');

    // ========== STEP 2: Requests ==========
    const chestPain = expectOk(handleAppointmentRequest(ctx, patient('patient-1'), { reason: 'Chest pain on exertion' }), 'request 1');
    const palpitations = expectOk(handleAppointmentRequest(ctx, patient('patient-2'), { reason: 'Palpitations' }), 'request 2');
    const fever = expectOk(handleAppointmentRequest(ctx, patient('patient-3'), { reason: 'Fever and cough' }), 'request 3');
    const checkup = expectOk(handleAppointmentRequest(ctx, patient('patient-4'), { reason: 'Routine checkup' }), 'request 4');

    // ========== STEP 3: Assignments, one conflicting ==========
    attempt('assign patient-1', handleAssignment(ctx, RECEPTION, chestPain.id, {
        doctorId: cardiologist.id, date: SIMULATION_DAY, time: '10:00'
    }));
    attempt('assign patient-2 to a taken slot', handleAssignment(ctx, RECEPTION, palpitations.id, {
        doctorId: cardiologist.id, date: SIMULATION_DAY, time: '10:00'
    }));
    attempt('assign patient-2', handleAssignment(ctx, RECEPTION, palpitations.id, {
        doctorId: cardiologist.id, date: SIMULATION_DAY, time: '10:30'
    }));
    attempt('assign patient-3', handleAssignment(ctx, RECEPTION, fever.id, {
        doctorId: generalist.id, date: SIMULATION_DAY, time: '09:00'
    }));

    // ========== STEP 4: Late cancellation, reschedule, withdrawal ==========
    attempt('late cancellation by patient-3', handleCancellation(ctx, patient('patient-3'), fever.id));
    attempt('reschedule patient-2 to the generalist', handleReschedule(ctx, patient('patient-2'), palpitations.id, {
        doctorId: generalist.id, date: '2026-10-20', time: '11:00'
    }));
    attempt('withdraw patient-4 request', handleCancellation(ctx, patient('patient-4'), checkup.id));

    // ========== STEP 5: Visits happen ==========
    clock.set(`${SIMULATION_DAY}T10:45:00`);
    attempt('complete patient-3', handleCompletion(ctx, { userId: generalist.userId, role: Role.DOCTOR }, fever.id, {
        notes: 'Viral infection, rest advised'
    }));
    attempt('complete patient-1', handleCompletion(ctx, { userId: cardiologist.userId, role: Role.DOCTOR }, chestPain.id));

    // ========== STEP 6: Audit ==========
    const statusCounts: Record<AppointmentStatus, number> = {
        [AppointmentStatus.PENDING]: 0,
        [AppointmentStatus.SCHEDULED]: 0,
        [AppointmentStatus.COMPLETED]: 0,
        [AppointmentStatus.CANCELLED]: 0
    };
    for (const appointment of store.listAppointments()) {
        statusCounts[appointment.status] += 1;
    }

    const violations = checkInvariants(store);
    if (violations.length > 0) {
        logger.error({ violations }, 'invariant violations found');
    } else {
        logger.info('all invariants hold');
    }

    const notifications = ['patient-1', 'patient-2', 'patient-3', 'patient-4', cardiologist.userId, generalist.userId]
        .reduce((total, userId) => total + store.listNotifications(userId).length, 0);

    const summary: SimulationSummary = { statusCounts, rejections, notifications, violations };
    logger.info({ statusCounts, rejections, notifications }, 'simulation finished');
    return summary;
}

// Run simulation
if (require.main === module) {
    runDaySimulation();
}
