// src/models/Equipment.ts

export enum EquipmentStatus {
    AVAILABLE = 'AVAILABLE',
    IN_USE = 'IN_USE',
    MAINTENANCE = 'MAINTENANCE'
}

/**
 * Medical equipment, optionally kept in a room
 *
 * Invariant: serialNumber is unique across all equipment
 */
export interface Equipment {
    id: string;
    name: string;
    equipmentType: string;
    serialNumber: string;
    roomId: string | null;
    status: EquipmentStatus;
}
