// src/engine/outcome.ts

/**
 * Failure categories returned (never thrown) by the scheduling core
 */
export enum FailureKind {
    REJECTED = 'REJECTED',     // business rule violated
    FORBIDDEN = 'FORBIDDEN',   // caller may not touch this appointment
    NOT_FOUND = 'NOT_FOUND'    // referenced entity missing
}

export enum RejectionCode {
    INVALID_REQUEST = 'INVALID_REQUEST',
    PAST_DATE = 'PAST_DATE',
    TOO_FAR_AHEAD = 'TOO_FAR_AHEAD',
    DOCTOR_UNAVAILABLE = 'DOCTOR_UNAVAILABLE',
    OUTSIDE_WORKING_HOURS = 'OUTSIDE_WORKING_HOURS',
    INVALID_SLOT = 'INVALID_SLOT',
    SLOT_BOOKED = 'SLOT_BOOKED',
    DOCTOR_BOOKED = 'DOCTOR_BOOKED',
    PATIENT_CONFLICT = 'PATIENT_CONFLICT',
    CANCELLATION_WINDOW = 'CANCELLATION_WINDOW',
    INVALID_TRANSITION = 'INVALID_TRANSITION',
    FORBIDDEN = 'FORBIDDEN',
    NOT_FOUND = 'NOT_FOUND'
}

export type Failure = {
    ok: false;
    kind: FailureKind;
    code: RejectionCode;
    reason: string;
};

/**
 * Result of a check with no payload
 */
export type Decision = { ok: true } | Failure;

/**
 * Result of a lifecycle operation
 */
export type Outcome<T> = { ok: true; value: T } | Failure;

export const ALLOWED: Decision = { ok: true };

export function succeed<T>(value: T): Outcome<T> {
    return { ok: true, value };
}

export function reject(code: RejectionCode, reason: string): Failure {
    return { ok: false, kind: FailureKind.REJECTED, code, reason };
}

export function forbidden(reason: string): Failure {
    return { ok: false, kind: FailureKind.FORBIDDEN, code: RejectionCode.FORBIDDEN, reason };
}

export function notFound(reason: string): Failure {
    return { ok: false, kind: FailureKind.NOT_FOUND, code: RejectionCode.NOT_FOUND, reason };
}
