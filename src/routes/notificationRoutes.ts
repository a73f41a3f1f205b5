// src/routes/notificationRoutes.ts

import { Router, Request, Response } from 'express';
import { HospitalStore } from '../store/hospitalStore';
import { markNotificationRead } from '../services/notifier';
import { actorOf } from '../middleware/authenticate';
import { sendOutcome } from './respond';

export function createNotificationRoutes(store: HospitalStore): Router {
    const router = Router();

    /**
     * The caller's notifications, newest first
     * GET /notifications
     */
    router.get('/', (req: Request, res: Response) => {
        const notifications = store.listNotifications(actorOf(req).userId);
        res.json({
            unread: notifications.filter(n => !n.isRead).length,
            notifications
        });
    });

    /**
     * POST /notifications/:id/read
     */
    router.post('/:id/read', (req: Request, res: Response) => {
        sendOutcome(res, markNotificationRead(store, actorOf(req), req.params.id), 'notification');
    });

    return router;
}
