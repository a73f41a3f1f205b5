// src/routes/respond.ts

import { Request, Response } from 'express';
import { z } from 'zod';
import { FailureKind, Outcome, RejectionCode } from '../engine/outcome';

/**
 * Status code of a failed outcome
 */
export function statusOf(kind: FailureKind, code: RejectionCode): number {
    switch (kind) {
        case FailureKind.FORBIDDEN:
            return 403;
        case FailureKind.NOT_FOUND:
            return 404;
        case FailureKind.REJECTED:
            return code === RejectionCode.INVALID_REQUEST ? 400 : 409;
    }
}

/**
 * Write an outcome: { [key]: value } on success, { error, code } otherwise
 */
export function sendOutcome<T>(res: Response, outcome: Outcome<T>, key: string, successStatus = 200): void {
    if (!outcome.ok) {
        res.status(statusOf(outcome.kind, outcome.code)).json({ error: outcome.reason, code: outcome.code });
        return;
    }
    res.status(successStatus).json({ [key]: outcome.value });
}

/**
 * Validate the request body. On failure the 400 is already written and null returned.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, req: Request, res: Response): z.infer<S> | null {
    const result = schema.safeParse(req.body);
    if (!result.success) {
        res.status(400).json({
            error: 'Invalid request',
            details: result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
        });
        return null;
    }
    return result.data;
}

export const CalendarDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be YYYY-MM-DD');
export const TimeOfDaySchema = z.string().regex(/^([01]\d|2[0-3]):([0-5]\d)$/, 'must be HH:mm');
