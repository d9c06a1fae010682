import type { SubscriptionStatus, SubscriptionTier, User } from '../../types';

export interface UpsertSubscriptionInput {
    tier: SubscriptionTier;
    status: SubscriptionStatus;
    currentPeriodEnd?: number | null;
}

export interface RegisterUserResult {
    user: User;
    created: boolean;
}
