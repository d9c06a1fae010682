/**
 * Row to domain mappers. Enumerated columns are narrowed against their
 * allowed values; the schema CHECK constraints keep them valid.
 */

import {
    CIRCLE_PRIVACY_LEVELS,
    CIRCLE_ROLES,
    CIRCLE_TYPES,
    INVITE_STATES,
    RESOURCE_KINDS,
    SUBSCRIPTION_STATUSES,
    SUBSCRIPTION_TIERS,
    type Circle,
    type CircleMembership,
    type CircleView,
    type Invite,
    type Subscription,
    type UsageCounter,
    type User,
} from '../types';
import type {
    CircleRow,
    CircleWithRoleRow,
    InviteRow,
    MembershipRow,
    SubscriptionRow,
    UsageCounterRow,
    UserRow,
} from './row-types';

export function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
    return values.some((candidate) => candidate === value);
}

function narrow<T extends string>(values: readonly T[], value: string, column: string): T {
    if (!isOneOf(values, value)) {
        throw new Error(`Unexpected value "${value}" in column ${column}`);
    }
    return value;
}

export function mapUser(row: UserRow): User {
    return {
        id: row.id,
        createdAt: row.created_at,
    };
}

export function mapSubscription(row: SubscriptionRow): Subscription {
    return {
        userId: row.user_id,
        tier: narrow(SUBSCRIPTION_TIERS, row.tier, 'subscriptions.tier'),
        status: narrow(SUBSCRIPTION_STATUSES, row.status, 'subscriptions.status'),
        currentPeriodEnd: row.current_period_end,
        updatedAt: row.updated_at,
    };
}

export function mapCircle(row: CircleRow): Circle {
    return {
        id: row.id,
        type: narrow(CIRCLE_TYPES, row.type, 'circles.type'),
        name: row.name,
        description: row.description,
        privacy: narrow(CIRCLE_PRIVACY_LEVELS, row.privacy, 'circles.privacy'),
        createdBy: row.created_by,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

export function mapCircleView(row: CircleWithRoleRow): CircleView {
    return {
        ...mapCircle(row),
        role: narrow(CIRCLE_ROLES, row.role, 'circle_memberships.role'),
    };
}

export function mapMembership(row: MembershipRow): CircleMembership {
    return {
        circleId: row.circle_id,
        userId: row.user_id,
        role: narrow(CIRCLE_ROLES, row.role, 'circle_memberships.role'),
        invitedBy: row.invited_by,
        joinedAt: row.joined_at,
    };
}

export function mapInvite(row: InviteRow): Invite {
    return {
        token: row.token,
        circleId: row.circle_id,
        createdBy: row.created_by,
        maxUses: row.max_uses,
        usesRemaining: row.uses_remaining,
        expiresAt: row.expires_at,
        state: narrow(INVITE_STATES, row.state, 'invites.state'),
        version: row.version,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

export function mapUsageCounter(row: UsageCounterRow): UsageCounter {
    return {
        kind: narrow(RESOURCE_KINDS, row.kind, 'usage_counters.kind'),
        ownerKey: row.owner_key,
        used: row.used,
        version: row.version,
        updatedAt: row.updated_at,
    };
}
