// src/events/lifecycleContext.ts

import { SchedulingConfig } from '../config';
import { Clock } from '../engine/clock';
import { Failure, Outcome, RejectionCode, reject } from '../engine/outcome';
import { RoomAllocator } from '../engine/roomAllocator';
import { SlotEngine } from '../engine/slotEngine';
import { TransactionFailedError, UniqueConstraintError } from '../errors';
import { Logger } from '../logger';
import { NotificationSink } from '../services/notifier';
import { BOOKED_SLOT_CONSTRAINT, HospitalStore, StoreTransaction } from '../store/hospitalStore';

/**
 * Everything a lifecycle handler needs
 */
export interface LifecycleContext {
    store: HospitalStore;
    slotEngine: SlotEngine;
    rooms: RoomAllocator;
    notifier: NotificationSink;
    config: SchedulingConfig;
    clock: Clock;
    logger: Logger;
}

export function createLifecycleContext(deps: {
    store: HospitalStore;
    notifier: NotificationSink;
    config: SchedulingConfig;
    clock: Clock;
    logger: Logger;
}): LifecycleContext {
    return {
        ...deps,
        slotEngine: new SlotEngine(deps.store, deps.config, deps.clock),
        rooms: new RoomAllocator(deps.store),
        logger: deps.logger.child({ component: 'lifecycle' })
    };
}

/**
 * Carries a business failure out of a unit of work so its writes roll back
 */
class RollbackSignal extends Error {
    readonly failure: Failure;

    constructor(failure: Failure) {
        super(failure.reason);
        this.failure = failure;
    }
}

/**
 * Run the state change of one transition as a single unit of work
 *
 * - a failure returned by work rolls back whatever it already wrote
 * - losing the booked-slot unique constraint becomes the "slot already booked" rejection
 * - any other error rolls back, is logged and surfaces as TransactionFailedError
 */
export function runTransition<T>(
    ctx: LifecycleContext,
    operation: string,
    work: (tx: StoreTransaction) => Outcome<T>
): Outcome<T> {
    try {
        return ctx.store.transaction(tx => {
            const outcome = work(tx);
            if (!outcome.ok) {
                throw new RollbackSignal(outcome);
            }
            return outcome;
        });
    } catch (err) {
        if (err instanceof RollbackSignal) {
            return err.failure;
        }
        if (err instanceof UniqueConstraintError && err.constraint === BOOKED_SLOT_CONSTRAINT) {
            ctx.logger.info({ operation, key: err.key }, 'booked slot claimed by a concurrent transaction');
            return reject(RejectionCode.SLOT_BOOKED, 'This time slot is already booked');
        }
        ctx.logger.error({ err, operation }, 'transaction rolled back');
        throw new TransactionFailedError(operation, err);
    }
}

/**
 * Log the result of a lifecycle operation and pass it through
 */
export function traced<T>(
    ctx: LifecycleContext,
    operation: string,
    appointmentId: string | null,
    outcome: Outcome<T>
): Outcome<T> {
    if (outcome.ok) {
        ctx.logger.info({ operation, appointmentId }, 'appointment transition committed');
    } else {
        ctx.logger.debug(
            { operation, appointmentId, kind: outcome.kind, code: outcome.code, reason: outcome.reason },
            'appointment operation rejected'
        );
    }
    return outcome;
}

export function timestamp(ctx: LifecycleContext): Date {
    return ctx.clock.now().toJSDate();
}
