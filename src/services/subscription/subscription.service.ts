import { FALLBACK_TIER, TIER_LIMITS } from '../../constants/quota';
import type { LimitTable, ResolvedTier, ServiceResult, Subscription, SubscriptionTier } from '../../types';
import { notFound, runQuery, type ServiceContext, type TxScope } from '../shared';
import type { SubscriptionProvider } from './types';

/** Reads subscriptions written through the internal billing endpoint. */
export class StoredSubscriptionProvider implements SubscriptionProvider {
    async getSubscription(scope: TxScope, userId: string): Promise<Subscription | null> {
        return scope.repos.subscriptions.getByUser(userId);
    }
}

export function limitsForTier(tier: SubscriptionTier): LimitTable {
    return { ...TIER_LIMITS[tier] };
}

// Active status and, when a period end is set, still inside the period.
export function isSubscriptionActive(subscription: Subscription | null, now: number): subscription is Subscription {
    if (!subscription || subscription.status !== 'active') {
        return false;
    }
    return subscription.currentPeriodEnd === null || subscription.currentPeriodEnd > now;
}

// SubscriptionResolver - maps a user to the limit table of their tier.
// Users without a usable subscription get the free tier.
export class SubscriptionResolver {
    constructor(
        private ctx: ServiceContext,
        private provider: SubscriptionProvider = new StoredSubscriptionProvider()
    ) {}

    async resolveTier(userId: string): Promise<ServiceResult<ResolvedTier>> {
        return runQuery(this.ctx, (scope) => this.resolveTierWithin(scope, userId));
    }

    async resolveLimits(userId: string): Promise<ServiceResult<LimitTable>> {
        return runQuery(this.ctx, async (scope) => (await this.resolveTierWithin(scope, userId)).limits);
    }

    async resolveTierWithin(scope: TxScope, userId: string): Promise<ResolvedTier> {
        const user = await scope.repos.users.getById(userId);
        if (!user) {
            throw notFound('user');
        }

        const subscription = await this.provider.getSubscription(scope, userId);
        const tier = isSubscriptionActive(subscription, scope.now) ? subscription.tier : FALLBACK_TIER;

        return { tier, limits: limitsForTier(tier), subscription };
    }
}
