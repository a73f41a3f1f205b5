// src/engine/roomAllocator.ts

import { Room, RoomType } from '../models/Room';
import { HospitalStore, StoreTransaction } from '../store/hospitalStore';

/**
 * Room assignment
 *
 * A room is free while isAvailable is true. The lifecycle reserves the room
 * in the same transaction that schedules the appointment and releases it when
 * the appointment is cancelled (or completed, depending on configuration).
 */
export class RoomAllocator {
    private readonly store: HospitalStore;

    constructor(store: HospitalStore) {
        this.store = store;
    }

    /**
     * First available room of the type, by room number
     */
    assignAvailableRoom(type: RoomType): Room | null {
        return this.store.listRooms().find(room => room.type === type && room.isAvailable) ?? null;
    }

    reserve(tx: StoreTransaction, roomId: string): void {
        this.setAvailability(tx, roomId, false);
    }

    release(tx: StoreTransaction, roomId: string): void {
        this.setAvailability(tx, roomId, true);
    }

    private setAvailability(tx: StoreTransaction, roomId: string, isAvailable: boolean): void {
        const room = this.store.getRoom(roomId);
        if (!room || room.isAvailable === isAvailable) {
            return;
        }
        tx.putRoom({ ...room, isAvailable });
    }
}
