// src/models/Room.ts

export enum RoomType {
    CONSULTATION = 'CONSULTATION',
    OPERATION = 'OPERATION',
    EMERGENCY = 'EMERGENCY'
}

/**
 * Hospital room
 *
 * isAvailable is false while the room is attached to a scheduled appointment.
 */
export interface Room {
    id: string;
    roomNumber: string;
    type: RoomType;
    floor: number;
    capacity: number;
    isAvailable: boolean;
}
