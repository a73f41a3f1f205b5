// src/config/index.ts

import { DateTime } from 'luxon';
import { z } from 'zod';
import { RoomType } from '../models/Room';
import { ConfigValidationError } from '../errors';

const booleanFromEnv = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');

const SchedulingConfigSchema = z.object({
    port: z.coerce.number().int().min(0).max(65535).default(3000),
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    jwtSecret: z.string().min(1),
    timezone: z
        .string()
        .default('UTC')
        .refine(zone => DateTime.now().setZone(zone).isValid, 'must be a valid IANA time zone'),
    advanceBookingDays: z.coerce.number().int().min(0).default(90),
    cancellationHours: z.coerce.number().min(0).default(2),
    slotDurationMinutes: z.coerce.number().int().min(5).max(240).default(30),
    businessHours: z
        .object({
            start: z.coerce.number().int().min(0).max(23).default(9),
            end: z.coerce.number().int().min(1).max(24).default(17)
        })
        .default({})
        .refine(hours => hours.start < hours.end, 'start must be before end'),
    defaultRoomType: z.nativeEnum(RoomType).default(RoomType.CONSULTATION),
    releaseRoomOnCompletion: z.union([z.boolean(), booleanFromEnv]).default(true),
    suggestionLimit: z.coerce.number().int().min(1).default(5)
});

export type SchedulingConfig = z.infer<typeof SchedulingConfigSchema>;

/**
 * Validate a raw configuration object, filling in defaults.
 * jwtSecret has no default and must always be supplied.
 * Numeric fields accept numbers or numeric strings.
 */
export function buildConfig(input: unknown = {}): SchedulingConfig {
    const result = SchedulingConfigSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigValidationError(
            result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return result.data;
}

/**
 * Read configuration from environment variables
 *
 * Unset variables fall back to their defaults; JWT_SECRET must be set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SchedulingConfig {
    return buildConfig({
        port: env.PORT,
        logLevel: env.LOG_LEVEL,
        jwtSecret: env.JWT_SECRET,
        timezone: env.TIMEZONE,
        advanceBookingDays: env.ADVANCE_BOOKING_DAYS,
        cancellationHours: env.CANCELLATION_HOURS,
        slotDurationMinutes: env.SLOT_DURATION_MINUTES,
        businessHours: {
            start: env.BUSINESS_HOURS_START,
            end: env.BUSINESS_HOURS_END
        },
        defaultRoomType: env.DEFAULT_ROOM_TYPE,
        releaseRoomOnCompletion: env.RELEASE_ROOM_ON_COMPLETION,
        suggestionLimit: env.SUGGESTION_LIMIT
    });
}
