// src/routes/roomRoutes.ts

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { Role } from '../models/Actor';
import { RoomType } from '../models/Room';
import { registerRoom } from '../engine/registry';
import { HospitalStore } from '../store/hospitalStore';
import { requireRoles } from '../middleware/authenticate';
import { parseBody, sendOutcome } from './respond';

const RoomBodySchema = z.object({
    roomNumber: z.string().min(1),
    type: z.nativeEnum(RoomType),
    floor: z.number().int(),
    capacity: z.number().int().positive().default(1)
});

export function createRoomRoutes(store: HospitalStore): Router {
    const router = Router();

    /**
     * Add a room
     * POST /rooms
     * Body: { roomNumber, type, floor, capacity? }
     */
    router.post('/', requireRoles(Role.ADMIN), (req: Request, res: Response) => {
        const body = parseBody(RoomBodySchema, req, res);
        if (!body) {
            return;
        }

        sendOutcome(res, registerRoom(store, body), 'room', 201);
    });

    /**
     * GET /rooms
     */
    router.get('/', requireRoles(Role.ADMIN, Role.RECEPTIONIST), (_req: Request, res: Response) => {
        const rooms = store.listRooms();
        res.json({ count: rooms.length, rooms });
    });

    return router;
}
