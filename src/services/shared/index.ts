export { generateId } from './id';
export { bytesToBase62, generateRandomBytes, generateRandomToken } from './crypto';
export { nowMs, isExpired, expiresIn } from './time';
export { ok, err, toResult } from './result';
export {
    CircleError,
    isCircleError,
    isRetryableConflict,
    notFound,
    permissionDenied,
    quotaExceeded,
    invalidRole,
    ownershipConflict,
    validationFailed,
    concurrentModification,
    duplicate,
    type EntityKind,
} from './errors';
export { withConflictRetry, DEFAULT_MAX_ATTEMPTS } from './retry';
export { runMutation, runQuery, type ServiceContext, type TxScope } from './unit-of-work';
