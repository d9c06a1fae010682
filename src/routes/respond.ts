import type { Context } from 'hono';
import type { ZodError } from 'zod';
import { ERROR_MESSAGES, ERROR_STATUS, ErrorCode } from '../constants/errors';
import type { ServiceFailure } from '../types';

/** Writes a failed service result with the status its code maps to. */
export function sendFailure(c: Context, failure: ServiceFailure): Response {
    return c.json(
        {
            success: false,
            error: failure.error,
            code: failure.code,
            ...(failure.details ? { details: failure.details } : {}),
        },
        ERROR_STATUS[failure.code]
    );
}

/** zValidator hook: rejects invalid input with the validation envelope. */
export function onValidationError(
    result: { success: true } | { success: false; error: ZodError },
    c: Context
): Response | undefined {
    if (!result.success) {
        return c.json(
            {
                success: false,
                error: ERROR_MESSAGES.VALIDATION.FAILED,
                code: ErrorCode.VALIDATION_FAILED,
                details: result.error.flatten(),
            },
            400
        );
    }
    return undefined;
}
