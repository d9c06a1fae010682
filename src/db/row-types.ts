/**
 * Database row types (snake_case to match the SQLite schema).
 */

export interface UserRow {
    [key: string]: unknown;
    id: string;
    created_at: number;
}

export interface SubscriptionRow {
    [key: string]: unknown;
    user_id: string;
    tier: string;
    status: string;
    current_period_end: number | null;
    updated_at: number;
}

export interface CircleRow {
    [key: string]: unknown;
    id: string;
    type: string;
    name: string;
    description: string | null;
    privacy: string;
    created_by: string;
    created_at: number;
    updated_at: number;
}

/** Circle joined with the viewer's membership role. */
export interface CircleWithRoleRow extends CircleRow {
    role: string;
}

export interface MembershipRow {
    [key: string]: unknown;
    circle_id: string;
    user_id: string;
    role: string;
    invited_by: string | null;
    joined_at: number;
}

export interface InviteRow {
    [key: string]: unknown;
    token: string;
    circle_id: string;
    created_by: string;
    max_uses: number;
    uses_remaining: number;
    expires_at: number;
    state: string;
    version: number;
    created_at: number;
    updated_at: number;
}

export interface UsageCounterRow {
    [key: string]: unknown;
    kind: string;
    owner_key: string;
    used: number;
    version: number;
    updated_at: number;
}

export interface CountRow {
    [key: string]: unknown;
    count: number;
}
