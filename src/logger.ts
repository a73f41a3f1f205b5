// src/logger.ts

import pino, { Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

const REDACT_PATHS = [
    'password',
    'token',
    'secret',
    'jwtSecret',
    'authorization',
    '*.password',
    '*.token',
    '*.jwtSecret',
    'req.headers.authorization',
    'req.headers.cookie'
];

export interface LoggerConfig {
    level?: LoggerOptions['level'];
    serviceName?: string;
}

/**
 * Root JSON logger. Components take a child: logger.child({ component: 'lifecycle' })
 */
export function createLogger(config: LoggerConfig = {}): Logger {
    const { level = 'info', serviceName = 'hospital-scheduler' } = config;

    return pino({
        level,
        name: serviceName,
        redact: {
            paths: REDACT_PATHS,
            censor: '[REDACTED]'
        },
        base: {
            service: serviceName,
            pid: process.pid
        },
        serializers: {
            err: pino.stdSerializers.err
        },
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
            level: (label: string) => ({ level: label })
        }
    });
}
