// src/routes/equipmentRoutes.ts

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { Role } from '../models/Actor';
import { EquipmentStatus } from '../models/Equipment';
import { registerEquipment } from '../engine/registry';
import { HospitalStore } from '../store/hospitalStore';
import { requireRoles } from '../middleware/authenticate';
import { parseBody, sendOutcome } from './respond';

const EquipmentBodySchema = z.object({
    name: z.string().min(1).max(100),
    equipmentType: z.string().min(1).max(50),
    serialNumber: z.string().min(1).max(100),
    roomId: z.string().min(1).nullish(),
    status: z.nativeEnum(EquipmentStatus).optional()
});

export function createEquipmentRoutes(store: HospitalStore): Router {
    const router = Router();

    /**
     * Add equipment
     * POST /equipment
     * Body: { name, equipmentType, serialNumber, roomId?, status? }
     */
    router.post('/', requireRoles(Role.ADMIN), (req: Request, res: Response) => {
        const body = parseBody(EquipmentBodySchema, req, res);
        if (!body) {
            return;
        }

        sendOutcome(res, registerEquipment(store, body), 'equipment', 201);
    });

    /**
     * GET /equipment
     */
    router.get('/', requireRoles(Role.ADMIN, Role.RECEPTIONIST), (_req: Request, res: Response) => {
        const equipment = store.listEquipment();
        res.json({ count: equipment.length, equipment });
    });

    return router;
}
