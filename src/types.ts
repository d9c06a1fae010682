import type { ErrorCode } from './constants/errors';

// Circle Types
export const CIRCLE_TYPES = ['family', 'couple', 'friends', 'colleagues', 'community', 'mentor', 'personal'] as const;
export type CircleType = (typeof CIRCLE_TYPES)[number];

export const CIRCLE_PRIVACY_LEVELS = ['private', 'members_only', 'link_access'] as const;
export type CirclePrivacy = (typeof CIRCLE_PRIVACY_LEVELS)[number];

export const CIRCLE_ROLES = ['owner', 'admin', 'member'] as const;
export type CircleRole = (typeof CIRCLE_ROLES)[number];

export interface User {
    id: string;
    createdAt: number;
}

export interface Circle {
    id: string;
    type: CircleType;
    name: string;
    description: string | null;
    privacy: CirclePrivacy;
    createdBy: string;
    createdAt: number;
    updatedAt: number;
}

export interface CircleStats {
    memberCount: number;
    photoCount: number;
    storyCount: number;
}

/** A circle as seen by one of its members. */
export interface CircleView extends Circle {
    role: CircleRole;
}

export interface CircleDetails extends CircleView {
    stats: CircleStats;
}

export interface CircleMembership {
    circleId: string;
    userId: string;
    role: CircleRole;
    invitedBy: string | null;
    joinedAt: number;
}

// Invite Types
export const INVITE_STATES = ['active', 'exhausted', 'expired', 'revoked'] as const;
export type InviteState = (typeof INVITE_STATES)[number];

export interface Invite {
    token: string;
    circleId: string;
    createdBy: string;
    maxUses: number;
    usesRemaining: number;
    expiresAt: number;
    state: InviteState;
    version: number;
    createdAt: number;
    updatedAt: number;
}

// Subscription Types
export const SUBSCRIPTION_TIERS = ['free', 'personal', 'plus', 'premium'] as const;
export type SubscriptionTier = (typeof SUBSCRIPTION_TIERS)[number];

export const SUBSCRIPTION_STATUSES = ['active', 'expired', 'cancelled'] as const;
export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

export interface Subscription {
    userId: string;
    tier: SubscriptionTier;
    status: SubscriptionStatus;
    currentPeriodEnd: number | null;
    updatedAt: number;
}

/** Per-tier ceilings; -1 means unlimited. */
export interface LimitTable {
    maxCircles: number;
    maxPhotosPerCircle: number;
    maxStoriesPerCircle: number;
}

export interface ResolvedTier {
    tier: SubscriptionTier;
    limits: LimitTable;
    subscription: Subscription | null;
}

// Usage Types
export const RESOURCE_KINDS = ['circle', 'photo', 'story'] as const;
export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export const MEDIA_KINDS = ['photo', 'story'] as const;
export type MediaKind = (typeof MEDIA_KINDS)[number];

export interface UsageCounter {
    kind: ResourceKind;
    ownerKey: string;
    used: number;
    version: number;
    updatedAt: number;
}

export interface UsageStatus {
    kind: ResourceKind;
    ownerKey: string;
    used: number;
    limit: number;
    remaining: number | null;
}

export interface UsageSummary {
    userId: string;
    tier: SubscriptionTier;
    limits: LimitTable;
    circles: UsageStatus;
    ownedCircles: Array<{ circleId: string; photos: UsageStatus; stories: UsageStatus }>;
}

// Auth Types
export interface AuthContext {
    userId: string;
}

// Service Result Types
export type ServiceResult<T> =
    | { success: true; data: T }
    | { success: false; error: string; code: ErrorCode; details?: Record<string, unknown> };

export type ServiceFailure = Extract<ServiceResult<unknown>, { success: false }>;
