import type { Queryable, QueryMeta } from '../utils/db';
import type { Subscription } from '../types';
import type { SubscriptionRow } from '../db/row-types';
import { mapSubscription } from '../db/mappers';

export class SubscriptionRepository {
    constructor(private db: Queryable) {}

    async getByUser(userId: string): Promise<Subscription | null> {
        const row = await this.db.first<SubscriptionRow>(
            'SELECT * FROM subscriptions WHERE user_id = ?',
            [userId]
        );
        return row ? mapSubscription(row) : null;
    }

    async upsert(subscription: Subscription): Promise<QueryMeta> {
        return this.db.run(
            `INSERT INTO subscriptions (user_id, tier, status, current_period_end, updated_at)
             VALUES (?, ?, ?, ?, ?)
             ON CONFLICT(user_id) DO UPDATE SET
                tier = excluded.tier,
                status = excluded.status,
                current_period_end = excluded.current_period_end,
                updated_at = excluded.updated_at`,
            [
                subscription.userId,
                subscription.tier,
                subscription.status,
                subscription.currentPeriodEnd,
                subscription.updatedAt,
            ]
        );
    }
}
