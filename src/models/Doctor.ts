// src/models/Doctor.ts

/**
 * Doctor profile
 *
 * userId links the profile to the login identity that acts as this doctor.
 */
export interface Doctor {
    id: string;
    userId: string;
    name: string;
    specialization: string;
    department: string;
    consultationFee: number | null;
}
