// src/routes/doctorRoutes.ts

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { Role } from '../models/Actor';
import { Weekday } from '../models/Availability';
import { registerDoctor, setAvailability } from '../engine/registry';
import { LifecycleContext } from '../events/lifecycleContext';
import { actorOf, requireRoles } from '../middleware/authenticate';
import { CalendarDateSchema, TimeOfDaySchema, parseBody, sendOutcome } from './respond';

const WindowSchema = z.object({
    weekday: z.nativeEnum(Weekday),
    startTime: TimeOfDaySchema,
    endTime: TimeOfDaySchema,
    isActive: z.boolean().optional()
});

const DoctorBodySchema = z.object({
    userId: z.string().min(1),
    name: z.string().min(1),
    specialization: z.string().min(1),
    department: z.string().min(1),
    consultationFee: z.number().nonnegative().nullish(),
    availability: z.array(WindowSchema).optional()
});

const SlotsQuerySchema = z.object({
    date: CalendarDateSchema
});

/**
 * Doctor routes - HTTP mapping only
 * Business logic delegated to engine/events
 */
export function createDoctorRoutes(ctx: LifecycleContext): Router {
    const router = Router();

    /**
     * Add a new doctor
     * POST /doctors
     * Body: { userId, name, specialization, department, consultationFee?, availability? }
     */
    router.post('/', requireRoles(Role.ADMIN), (req: Request, res: Response) => {
        const body = parseBody(DoctorBodySchema, req, res);
        if (!body) {
            return;
        }

        const outcome = registerDoctor(ctx.store, ctx.config, body);
        if (!outcome.ok) {
            sendOutcome(res, outcome, 'doctor');
            return;
        }

        res.status(201).json({
            doctor: outcome.value,
            availability: ctx.store.listAvailability(outcome.value.id)
        });
    });

    /**
     * Doctor directory
     * GET /doctors?department=Cardiology
     */
    router.get('/', (req: Request, res: Response) => {
        const department = typeof req.query.department === 'string' ? req.query.department : undefined;
        const doctors = ctx.store
            .listDoctors()
            .filter(doctor => department === undefined || doctor.department === department);

        res.json({ count: doctors.length, doctors });
    });

    /**
     * Open slots of a doctor on a date
     * GET /doctors/:id/slots?date=2026-10-26
     */
    router.get('/:id/slots', (req: Request, res: Response) => {
        const doctor = ctx.store.getDoctor(req.params.id);
        if (!doctor) {
            res.status(404).json({ error: 'Doctor not found' });
            return;
        }

        const query = SlotsQuerySchema.safeParse(req.query);
        if (!query.success) {
            res.status(400).json({ error: 'Query parameter date must be YYYY-MM-DD' });
            return;
        }

        const slots = ctx.slotEngine.listOpenSlots(doctor.id, query.data.date);
        res.json({ doctorId: doctor.id, date: query.data.date, slots });
    });

    /**
     * Weekly availability
     * GET /doctors/:id/availability
     */
    router.get('/:id/availability', (req: Request, res: Response) => {
        const doctor = ctx.store.getDoctor(req.params.id);
        if (!doctor) {
            res.status(404).json({ error: 'Doctor not found' });
            return;
        }

        res.json({ availability: ctx.store.listAvailability(doctor.id) });
    });

    /**
     * Set the window of one weekday
     * PUT /doctors/:id/availability
     * Body: { weekday, startTime, endTime, isActive? }
     */
    router.put('/:id/availability', (req: Request, res: Response) => {
        const body = parseBody(WindowSchema, req, res);
        if (!body) {
            return;
        }

        sendOutcome(res, setAvailability(ctx.store, actorOf(req), req.params.id, body), 'availability');
    });

    return router;
}
