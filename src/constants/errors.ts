/**
 * Standardized Error Messages
 * Centralized error messages for consistent user-facing errors
 */

export const ERROR_MESSAGES = {
    USER: {
        NOT_FOUND: 'User not found',
    },

    CIRCLE: {
        NOT_FOUND: 'Circle not found',
    },

    MEMBERSHIP: {
        NOT_FOUND: 'Membership not found',
        ALREADY_MEMBER: 'User is already a member of this circle',
        PERMISSION_DENIED: 'Insufficient permissions for this circle',
        NOT_A_MEMBER: 'You are not a member of this circle',
        CANNOT_ASSIGN_OWNER: 'Owner role can only be assigned through an ownership transfer',
        SOLE_OWNER_DEMOTION: 'The owner cannot be demoted without transferring ownership',
        OWNER_MUST_TRANSFER: 'The owner must name a successor before leaving a circle with other members',
        INVALID_SUCCESSOR: 'Successor must be another member of the circle',
    },

    INVITE: {
        NOT_FOUND: 'Invite not found',
        EXPIRED: 'Invite has expired',
        EXHAUSTED: 'Invite has no uses remaining',
        REVOKED: 'Invite has been revoked',
    },

    QUOTA: {
        EXCEEDED: 'Quota limit exceeded',
        INVALID_AMOUNT: 'Amount must be a positive integer',
    },

    CONCURRENCY: {
        CONFLICT: 'The resource was modified concurrently, please retry',
    },

    VALIDATION: {
        FAILED: 'Validation failed',
    },

    GENERIC: {
        INTERNAL_ERROR: 'Internal server error',
        NOT_FOUND: 'Resource not found',
        UNAUTHORIZED: 'Unauthorized',
    },
} as const;

export const ErrorCode = {
    PERMISSION_DENIED: 'PERMISSION_DENIED',
    QUOTA_EXCEEDED: 'QUOTA_EXCEEDED',
    INVITE_EXPIRED: 'INVITE_EXPIRED',
    INVITE_EXHAUSTED: 'INVITE_EXHAUSTED',
    INVITE_REVOKED: 'INVITE_REVOKED',
    INVALID_ROLE: 'INVALID_ROLE',
    OWNERSHIP_CONFLICT: 'OWNERSHIP_CONFLICT',
    NOT_FOUND: 'NOT_FOUND',
    CONFLICT: 'CONFLICT',
    VALIDATION_FAILED: 'VALIDATION_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorStatus = 400 | 402 | 403 | 404 | 409 | 410;

export const ERROR_STATUS: Record<ErrorCode, ErrorStatus> = {
    PERMISSION_DENIED: 403,
    QUOTA_EXCEEDED: 402,
    INVITE_EXPIRED: 410,
    INVITE_EXHAUSTED: 410,
    INVITE_REVOKED: 410,
    INVALID_ROLE: 400,
    OWNERSHIP_CONFLICT: 409,
    NOT_FOUND: 404,
    CONFLICT: 409,
    VALIDATION_FAILED: 400,
};
