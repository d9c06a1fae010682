import type { CircleDB, Queryable } from '../../utils/db';
import type { Logger } from '../../utils/logger';
import type { ServiceResult } from '../../types';
import { createRepositories, type Repositories } from '../../repositories';
import type { DomainEvent, EventSink } from '../events/types';
import { toResult } from './result';
import { withConflictRetry } from './retry';

/**
 * Dependencies every circle service shares.
 */
export interface ServiceContext {
    db: CircleDB;
    events: EventSink;
    logger: Logger;
    /** Total attempts for an operation that loses a compare-and-swap. */
    maxAttempts: number;
    clock: () => number;
}

/**
 * One open transaction: repositories bound to it, the time it started and
 * a buffer of events published after commit.
 */
export interface TxScope {
    tx: Queryable;
    repos: Repositories;
    now: number;
    emit(event: DomainEvent): void;
}

function publish(ctx: ServiceContext, events: DomainEvent[]): void {
    for (const event of events) {
        try {
            ctx.events.emit(event);
        } catch (error) {
            ctx.logger.error('Event sink threw', error, { eventType: event.type });
        }
    }
}

/**
 * Runs `work` in a transaction, retrying lost compare-and-swaps, and
 * publishes buffered events once the transaction has committed.
 */
export function runMutation<T>(
    ctx: ServiceContext,
    operation: string,
    work: (scope: TxScope) => Promise<T>
): Promise<ServiceResult<T>> {
    return toResult(async () => {
        const { value, events } = await withConflictRetry(
            async () => {
                const events: DomainEvent[] = [];
                const value = await ctx.db.transaction((tx) =>
                    work({
                        tx,
                        repos: createRepositories(tx),
                        now: ctx.clock(),
                        emit: (event) => {
                            events.push(event);
                        },
                    })
                );
                return { value, events };
            },
            ctx.maxAttempts,
            (attempt, error) => {
                ctx.logger.warn('Retrying after concurrent modification', {
                    operation,
                    attempt,
                    reason: error.message,
                });
            }
        );

        publish(ctx, events);
        return value;
    });
}

/** Read-only counterpart of `runMutation`; nothing is emitted. */
export function runQuery<T>(ctx: ServiceContext, work: (scope: TxScope) => Promise<T>): Promise<ServiceResult<T>> {
    return toResult(() =>
        ctx.db.transaction((tx) =>
            work({
                tx,
                repos: createRepositories(tx),
                now: ctx.clock(),
                emit: () => {
                    throw new Error('Read-only scope cannot emit events');
                },
            })
        )
    );
}
