import type { Subscription } from '../../types';
import type { TxScope } from '../shared';

/**
 * Source of subscription state. The billing system owns it; this service
 * only reads. Implementations receive the open transaction so that a
 * table-backed provider reads consistent state.
 */
export interface SubscriptionProvider {
    getSubscription(scope: TxScope, userId: string): Promise<Subscription | null>;
}
