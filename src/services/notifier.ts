// src/services/notifier.ts

import { Actor } from '../models/Actor';
import { Clock } from '../engine/clock';
import { Notification, NotificationKind } from '../models/Notification';
import { Outcome, forbidden, notFound, succeed } from '../engine/outcome';
import { HospitalStore } from '../store/hospitalStore';
import { Logger } from '../logger';

/**
 * Notification delivery collaborator
 */
export interface NotificationSink {
    notify(userId: string, message: string, kind: NotificationKind): Promise<void>;
}

/**
 * Stores notifications for users to read in the application
 */
export class InAppNotificationSink implements NotificationSink {
    private readonly store: HospitalStore;
    private readonly clock: Clock;

    constructor(store: HospitalStore, clock: Clock) {
        this.store = store;
        this.clock = clock;
    }

    async notify(userId: string, message: string, kind: NotificationKind): Promise<void> {
        const notification: Notification = {
            id: this.store.nextId('NTF'),
            userId,
            message,
            kind,
            isRead: false,
            createdAt: this.clock.now().toJSDate()
        };
        this.store.transaction(tx => tx.putNotification(notification));
    }
}

/**
 * Fire-and-forget delivery. Failures are logged and never reach the caller.
 */
export function notifySafely(
    sink: NotificationSink,
    logger: Logger,
    userId: string,
    message: string,
    kind: NotificationKind
): void {
    let delivery: Promise<void>;
    try {
        delivery = sink.notify(userId, message, kind);
    } catch (err) {
        logger.warn({ err, userId, kind }, 'notification delivery failed');
        return;
    }
    void delivery.catch((err: unknown) => {
        logger.warn({ err, userId, kind }, 'notification delivery failed');
    });
}

/**
 * Mark one of the caller's notifications as read
 */
export function markNotificationRead(store: HospitalStore, actor: Actor, notificationId: string): Outcome<Notification> {
    const notification = store.getNotification(notificationId);
    if (!notification) {
        return notFound('Notification not found');
    }
    if (notification.userId !== actor.userId) {
        return forbidden('You can only read your own notifications');
    }
    if (notification.isRead) {
        return succeed(notification);
    }

    const read: Notification = { ...notification, isRead: true };
    store.transaction(tx => tx.putNotification(read));
    return succeed(read);
}
