import { ERROR_MESSAGES, ERROR_STATUS, ErrorCode, type ErrorStatus } from '../../constants/errors';
import type { ResourceKind } from '../../types';

export type EntityKind = 'user' | 'circle' | 'membership' | 'invite';

/**
 * Domain failure raised inside a transaction. Throwing it rolls the
 * transaction back; the service boundary turns it into a failed result.
 */
export class CircleError extends Error {
    readonly status: ErrorStatus;

    constructor(
        readonly code: ErrorCode,
        message: string,
        readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'CircleError';
        this.status = ERROR_STATUS[code];
    }
}

export function isCircleError(error: unknown): error is CircleError {
    return error instanceof CircleError;
}

const NOT_FOUND_MESSAGES: Record<EntityKind, string> = {
    user: ERROR_MESSAGES.USER.NOT_FOUND,
    circle: ERROR_MESSAGES.CIRCLE.NOT_FOUND,
    membership: ERROR_MESSAGES.MEMBERSHIP.NOT_FOUND,
    invite: ERROR_MESSAGES.INVITE.NOT_FOUND,
};

export function notFound(entity: EntityKind): CircleError {
    return new CircleError(ErrorCode.NOT_FOUND, NOT_FOUND_MESSAGES[entity], { entity });
}

export function permissionDenied(message: string = ERROR_MESSAGES.MEMBERSHIP.PERMISSION_DENIED): CircleError {
    return new CircleError(ErrorCode.PERMISSION_DENIED, message);
}

export function quotaExceeded(kind: ResourceKind, limit: number, current: number): CircleError {
    return new CircleError(ErrorCode.QUOTA_EXCEEDED, ERROR_MESSAGES.QUOTA.EXCEEDED, { kind, limit, current });
}

export function invalidRole(message: string = ERROR_MESSAGES.MEMBERSHIP.CANNOT_ASSIGN_OWNER): CircleError {
    return new CircleError(ErrorCode.INVALID_ROLE, message);
}

export function ownershipConflict(message: string): CircleError {
    return new CircleError(ErrorCode.OWNERSHIP_CONFLICT, message);
}

export function validationFailed(message: string, details?: Record<string, unknown>): CircleError {
    return new CircleError(ErrorCode.VALIDATION_FAILED, message, details);
}

/** Lost compare-and-swap; the operation may be retried against fresh state. */
export function concurrentModification(resource: string): CircleError {
    return new CircleError(ErrorCode.CONFLICT, ERROR_MESSAGES.CONCURRENCY.CONFLICT, {
        resource,
        retryable: true,
    });
}

/** Terminal conflict, such as a duplicate membership. */
export function duplicate(message: string): CircleError {
    return new CircleError(ErrorCode.CONFLICT, message);
}

export function isRetryableConflict(error: unknown): error is CircleError {
    return isCircleError(error) && error.code === ErrorCode.CONFLICT && error.details?.retryable === true;
}
