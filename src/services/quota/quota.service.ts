import { ERROR_MESSAGES } from '../../constants/errors';
import { UNLIMITED } from '../../constants/quota';
import type { LimitTable, ResourceKind, ServiceResult, UsageStatus, UsageSummary } from '../../types';
import {
    concurrentModification,
    generateId,
    notFound,
    quotaExceeded,
    runQuery,
    validationFailed,
    type ServiceContext,
    type TxScope,
} from '../shared';
import type { SubscriptionResolver } from '../subscription';
import type { ReservationHandle } from './types';

function limitOf(limits: LimitTable, kind: ResourceKind): number {
    switch (kind) {
        case 'circle':
            return limits.maxCircles;
        case 'photo':
            return limits.maxPhotosPerCircle;
        case 'story':
            return limits.maxStoriesPerCircle;
    }
}

export function toUsageStatus(kind: ResourceKind, ownerKey: string, used: number, limit: number): UsageStatus {
    return {
        kind,
        ownerKey,
        used,
        limit,
        remaining: limit === UNLIMITED ? null : Math.max(limit - used, 0),
    };
}

// QuotaEnforcer - check-and-reserve against subscription-tier ceilings.
// Circle counts are keyed by user id and limited by that user's tier;
// photo and story counts are keyed by circle id and limited by the tier of
// the circle's current owner.
export class QuotaEnforcer {
    constructor(
        private ctx: ServiceContext,
        private subscriptions: SubscriptionResolver
    ) {}

    async reserve(scope: TxScope, kind: ResourceKind, ownerKey: string, amount: number = 1): Promise<ReservationHandle> {
        if (!Number.isInteger(amount) || amount < 1) {
            throw validationFailed(ERROR_MESSAGES.QUOTA.INVALID_AMOUNT, { amount });
        }

        const limit = await this.limitFor(scope, kind, ownerKey);
        const counter = await scope.repos.usage.get(kind, ownerKey);
        const used = counter?.used ?? 0;

        if (limit !== UNLIMITED && used + amount > limit) {
            this.ctx.logger.info('quota_exceeded', { kind, ownerKey, limit, used, amount });
            throw quotaExceeded(kind, limit, used);
        }

        const meta = await scope.repos.usage.compareAndSet(
            kind,
            ownerKey,
            used + amount,
            counter?.version ?? null,
            scope.now
        );
        if (meta.changes === 0) {
            throw concurrentModification('usage_counter');
        }

        return { id: generateId('rsv'), kind, ownerKey, amount, state: 'reserved' };
    }

    commit(handle: ReservationHandle): void {
        if (handle.state === 'released') {
            throw new Error(`Reservation ${handle.id} was already released`);
        }
        handle.state = 'committed';
    }

    /**
     * Gives reserved units back. Releasing a handle twice is a no-op, and a
     * counter that would drop below zero is clamped and logged.
     */
    async release(scope: TxScope, handle: ReservationHandle): Promise<void> {
        if (handle.state === 'released') {
            return;
        }

        const counter = await scope.repos.usage.get(handle.kind, handle.ownerKey);
        if (!counter || counter.used === 0) {
            this.ctx.logger.warn('Release on empty usage counter', {
                kind: handle.kind,
                ownerKey: handle.ownerKey,
                amount: handle.amount,
            });
            handle.state = 'released';
            return;
        }

        if (counter.used < handle.amount) {
            this.ctx.logger.warn('Usage counter clamped at zero', {
                kind: handle.kind,
                ownerKey: handle.ownerKey,
                used: counter.used,
                amount: handle.amount,
            });
        }

        const meta = await scope.repos.usage.compareAndSet(
            handle.kind,
            handle.ownerKey,
            Math.max(counter.used - handle.amount, 0),
            counter.version,
            scope.now
        );
        if (meta.changes === 0) {
            throw concurrentModification('usage_counter');
        }
        handle.state = 'released';
    }

    /** Handle for units recorded by an earlier, already committed transaction. */
    committed(kind: ResourceKind, ownerKey: string, amount: number = 1): ReservationHandle {
        return { id: generateId('rsv'), kind, ownerKey, amount, state: 'committed' };
    }

    async limitFor(scope: TxScope, kind: ResourceKind, ownerKey: string): Promise<number> {
        if (kind === 'circle') {
            const { limits } = await this.subscriptions.resolveTierWithin(scope, ownerKey);
            return limitOf(limits, kind);
        }

        const owner = await scope.repos.memberships.getOwner(ownerKey);
        if (!owner) {
            throw notFound('circle');
        }
        const { limits } = await this.subscriptions.resolveTierWithin(scope, owner.userId);
        return limitOf(limits, kind);
    }

    async usageWithin(scope: TxScope, kind: ResourceKind, ownerKey: string): Promise<UsageStatus> {
        const limit = await this.limitFor(scope, kind, ownerKey);
        const used = await scope.repos.usage.getUsed(kind, ownerKey);
        return toUsageStatus(kind, ownerKey, used, limit);
    }

    async getUsage(ownerKey: string, kind: ResourceKind): Promise<ServiceResult<UsageStatus>> {
        return runQuery(this.ctx, (scope) => this.usageWithin(scope, kind, ownerKey));
    }

    /** Circle count of the user plus photo and story usage of every circle they own. */
    async getUsageSummary(userId: string): Promise<ServiceResult<UsageSummary>> {
        return runQuery(this.ctx, async (scope) => {
            const { tier, limits } = await this.subscriptions.resolveTierWithin(scope, userId);
            const circlesUsed = await scope.repos.usage.getUsed('circle', userId);
            const ownedIds = await scope.repos.circles.listOwnedIds(userId);

            const ownedCircles: UsageSummary['ownedCircles'] = [];
            for (const circleId of ownedIds) {
                ownedCircles.push({
                    circleId,
                    photos: toUsageStatus('photo', circleId, await scope.repos.usage.getUsed('photo', circleId), limits.maxPhotosPerCircle),
                    stories: toUsageStatus('story', circleId, await scope.repos.usage.getUsed('story', circleId), limits.maxStoriesPerCircle),
                });
            }

            return {
                userId,
                tier,
                limits,
                circles: toUsageStatus('circle', userId, circlesUsed, limits.maxCircles),
                ownedCircles,
            };
        });
    }
}
