// src/app.ts

import express from 'express';
import dotenv from 'dotenv';
import { SchedulingConfig, loadConfig } from './config';
import { Clock, systemClock } from './engine/clock';
import { createLifecycleContext } from './events/lifecycleContext';
import { TransactionFailedError } from './errors';
import { Logger, createLogger } from './logger';
import { authenticate } from './middleware/authenticate';
import { createAppointmentRoutes } from './routes/appointmentRoutes';
import { createDoctorRoutes } from './routes/doctorRoutes';
import { createEquipmentRoutes } from './routes/equipmentRoutes';
import { createNotificationRoutes } from './routes/notificationRoutes';
import { createRoomRoutes } from './routes/roomRoutes';
import { InAppNotificationSink, NotificationSink } from './services/notifier';
import { KeywordSuggestionProvider, SuggestionProvider, loadKeywordTable } from './services/suggestionProvider';
import { HospitalStore } from './store/hospitalStore';

export interface AppDependencies {
    store: HospitalStore;
    config: SchedulingConfig;
    clock: Clock;
    logger: Logger;
    notifier?: NotificationSink;
    suggestions?: SuggestionProvider;
}

/**
 * Express application setup
 *
 * The store holds doctors, availability, time slots, appointments, rooms and
 * notifications. Notifications default to the in-app sink, suggestions to the
 * keyword table under data/.
 */
export function createApp(deps: AppDependencies): express.Express {
    const { store, config, clock, logger } = deps;
    const ctx = createLifecycleContext({
        store,
        config,
        clock,
        logger,
        notifier: deps.notifier ?? new InAppNotificationSink(store, clock)
    });
    const suggestions = deps.suggestions ?? new KeywordSuggestionProvider(store, loadKeywordTable());
    const httpLogger = logger.child({ component: 'http' });

    const app = express();

    // Middleware
    app.use(express.json());
    app.use((req, res, next) => {
        res.on('finish', () => {
            httpLogger.debug({ method: req.method, url: req.originalUrl, status: res.statusCode }, 'request handled');
        });
        next();
    });

    // Health check
    app.get('/health', (_req, res) => {
        res.json({
            status: 'healthy',
            doctors: store.listDoctors().length,
            appointments: store.listAppointments().length
        });
    });

    // Routes
    const requireAuth = authenticate(config.jwtSecret);
    app.use('/doctors', requireAuth, createDoctorRoutes(ctx));
    app.use('/rooms', requireAuth, createRoomRoutes(store));
    app.use('/equipment', requireAuth, createEquipmentRoutes(store));
    app.use('/appointments', requireAuth, createAppointmentRoutes(ctx, suggestions));
    app.use('/notifications', requireAuth, createNotificationRoutes(store));

    // Error handling
    app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: 'Malformed JSON body' });
            return;
        }
        if (!(err instanceof TransactionFailedError)) {
            httpLogger.error({ err, method: req.method, url: req.originalUrl }, 'unhandled error');
        }
        res.status(500).json({ error: 'Internal server error' });
    });

    return app;
}

// Start server
if (require.main === module) {
    dotenv.config();
    const config = loadConfig();
    const logger = createLogger({ level: config.logLevel });
    const app = createApp({ store: new HospitalStore(), config, clock: systemClock(config.timezone), logger });

    app.listen(config.port, () => {
        logger.info({ port: config.port, timezone: config.timezone }, 'Hospital scheduler running');
    });
}
