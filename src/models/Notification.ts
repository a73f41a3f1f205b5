// src/models/Notification.ts

export enum NotificationKind {
    APPOINTMENT = 'APPOINTMENT',
    REMINDER = 'REMINDER',
    CANCELLATION = 'CANCELLATION'
}

export interface Notification {
    id: string;
    userId: string;
    message: string;
    kind: NotificationKind;
    isRead: boolean;
    createdAt: Date;
}
