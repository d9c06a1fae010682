export {
    SubscriptionResolver,
    StoredSubscriptionProvider,
    limitsForTier,
    isSubscriptionActive,
} from './subscription.service';
export type { SubscriptionProvider } from './types';
