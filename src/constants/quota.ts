/**
 * Quota Constants
 * Tier ceilings and defaults for usage accounting
 */
import type { LimitTable, SubscriptionTier } from '../types';

export const UNLIMITED = -1;

export const TIER_LIMITS: Record<SubscriptionTier, LimitTable> = {
    free: { maxCircles: 3, maxPhotosPerCircle: 50, maxStoriesPerCircle: 10 },
    personal: { maxCircles: 10, maxPhotosPerCircle: 200, maxStoriesPerCircle: 100 },
    plus: { maxCircles: 25, maxPhotosPerCircle: 1000, maxStoriesPerCircle: 500 },
    premium: { maxCircles: UNLIMITED, maxPhotosPerCircle: UNLIMITED, maxStoriesPerCircle: UNLIMITED },
};

// Tier used when a user has no usable subscription
export const FALLBACK_TIER: SubscriptionTier = 'free';

// Largest amount a single media reservation may claim
export const MAX_MEDIA_RESERVATION = 100;
