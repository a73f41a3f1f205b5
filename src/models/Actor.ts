// src/models/Actor.ts

export enum Role {
    PATIENT = 'patient',
    DOCTOR = 'doctor',
    ADMIN = 'admin',
    RECEPTIONIST = 'receptionist'
}

/**
 * Authenticated caller, as supplied by the identity provider.
 * The core trusts this value and performs no credential checks.
 */
export interface Actor {
    userId: string;
    role: Role;
}

export function isStaff(actor: Actor): boolean {
    return actor.role === Role.ADMIN || actor.role === Role.RECEPTIONIST;
}
