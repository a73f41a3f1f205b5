// src/routes/appointmentRoutes.ts

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { Role } from '../models/Actor';
import { AppointmentStatus } from '../models/Appointment';
import { RoomType } from '../models/Room';
import { AppointmentAction, authorize } from '../engine/accessPolicy';
import { listPendingRequests, listVisibleAppointments } from '../engine/appointmentQueries';
import { handleAppointmentRequest } from '../events/requestHandler';
import { handleAssignment } from '../events/assignmentHandler';
import { handleReschedule } from '../events/rescheduleHandler';
import { handleCompletion } from '../events/completionHandler';
import { handleCancellation } from '../events/cancellationHandler';
import { LifecycleContext } from '../events/lifecycleContext';
import { SuggestionProvider, suggestSafely } from '../services/suggestionProvider';
import { actorOf, requireRoles } from '../middleware/authenticate';
import { CalendarDateSchema, TimeOfDaySchema, parseBody, sendOutcome } from './respond';

const RequestBodySchema = z.object({
    reason: z.string(),
    preferredDate: CalendarDateSchema.nullish()
});

const AssignBodySchema = z.object({
    doctorId: z.string().min(1),
    date: CalendarDateSchema,
    time: TimeOfDaySchema,
    roomType: z.nativeEnum(RoomType).optional()
});

const RescheduleBodySchema = z.object({
    doctorId: z.string().min(1).optional(),
    date: CalendarDateSchema,
    time: TimeOfDaySchema,
    reason: z.string().optional()
});

const CompleteBodySchema = z.object({
    notes: z.string().nullish()
});

const ListQuerySchema = z.object({
    status: z.nativeEnum(AppointmentStatus).optional()
});

/**
 * Appointment routes - HTTP mapping only
 * Business logic delegated to engine/events
 */
export function createAppointmentRoutes(ctx: LifecycleContext, suggestions: SuggestionProvider): Router {
    const router = Router();
    const staffOnly = requireRoles(Role.ADMIN, Role.RECEPTIONIST);

    /**
     * Request an appointment
     * POST /appointments/request
     * Body: { reason, preferredDate? }
     */
    router.post('/request', requireRoles(Role.PATIENT), (req: Request, res: Response) => {
        const body = parseBody(RequestBodySchema, req, res);
        if (!body) {
            return;
        }

        const outcome = handleAppointmentRequest(ctx, actorOf(req), body);
        sendOutcome(res, outcome, 'appointment', 201);
    });

    /**
     * Appointments visible to the caller, newest first
     * GET /appointments?status=SCHEDULED
     */
    router.get('/', (req: Request, res: Response) => {
        const query = ListQuerySchema.safeParse(req.query);
        if (!query.success) {
            res.status(400).json({ error: 'Invalid status filter' });
            return;
        }

        const appointments = listVisibleAppointments(ctx.store, actorOf(req), query.data.status);
        res.json({ count: appointments.length, appointments });
    });

    /**
     * Pending requests with triage suggestions, oldest first
     * GET /appointments/pending
     */
    router.get('/pending', staffOnly, (_req: Request, res: Response) => {
        const requests = listPendingRequests(ctx.store).map(appointment => ({
            appointment,
            suggestion: suggestSafely(suggestions, ctx.logger, appointment.reason, ctx.config.suggestionLimit)
        }));

        res.json({ count: requests.length, requests });
    });

    /**
     * Get one appointment
     * GET /appointments/:id
     */
    router.get('/:id', (req: Request, res: Response) => {
        const appointment = ctx.store.getAppointment(req.params.id);
        if (!appointment) {
            res.status(404).json({ error: 'Appointment not found' });
            return;
        }

        const access = authorize(ctx.store, actorOf(req), appointment, AppointmentAction.VIEW);
        if (!access.ok) {
            sendOutcome(res, access, 'appointment');
            return;
        }

        res.json({ appointment });
    });

    /**
     * Schedule a pending request
     * POST /appointments/:id/assign
     * Body: { doctorId, date, time, roomType? }
     */
    router.post('/:id/assign', staffOnly, (req: Request, res: Response) => {
        const body = parseBody(AssignBodySchema, req, res);
        if (!body) {
            return;
        }

        sendOutcome(res, handleAssignment(ctx, actorOf(req), req.params.id, body), 'appointment');
    });

    /**
     * Move a scheduled appointment
     * POST /appointments/:id/reschedule
     * Body: { date, time, doctorId?, reason? }
     */
    router.post('/:id/reschedule', (req: Request, res: Response) => {
        const body = parseBody(RescheduleBodySchema, req, res);
        if (!body) {
            return;
        }

        sendOutcome(res, handleReschedule(ctx, actorOf(req), req.params.id, body), 'appointment');
    });

    /**
     * Mark a visit as done
     * POST /appointments/:id/complete
     * Body: { notes? }
     */
    router.post('/:id/complete', requireRoles(Role.DOCTOR), (req: Request, res: Response) => {
        const body = parseBody(CompleteBodySchema, req, res);
        if (!body) {
            return;
        }

        sendOutcome(res, handleCompletion(ctx, actorOf(req), req.params.id, body), 'appointment');
    });

    /**
     * Cancel a request or a scheduled appointment
     * POST /appointments/:id/cancel
     */
    router.post('/:id/cancel', (req: Request, res: Response) => {
        sendOutcome(res, handleCancellation(ctx, actorOf(req), req.params.id), 'appointment');
    });

    return router;
}
