import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError } from "zod";
import { ERROR_MESSAGES, ErrorCode } from "../constants/errors";
import type { AppEnv } from "../env";
import { CircleError } from "../services/shared";
import { logger as rootLogger } from "../utils/logger";

export interface ErrorResponse {
    success: false;
    error: string;
    code?: string;
    details?: unknown;
    timestamp: string;
    path: string;
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
    const timestamp = new Date().toISOString();
    const path = c.req.path;

    if (err instanceof HTTPException) {
        return c.json<ErrorResponse>(
            { success: false, error: err.message, timestamp, path },
            err.status
        );
    }

    if (err instanceof CircleError) {
        return c.json<ErrorResponse>(
            { success: false, error: err.message, code: err.code, details: err.details, timestamp, path },
            err.status
        );
    }

    if (err instanceof ZodError) {
        return c.json<ErrorResponse>(
            {
                success: false,
                error: ERROR_MESSAGES.VALIDATION.FAILED,
                code: ErrorCode.VALIDATION_FAILED,
                details: err.errors.map(e => ({ path: e.path, message: e.message })),
                timestamp,
                path,
            },
            400
        );
    }

    const logger = c.get("logger") ?? rootLogger;
    logger.error("Unhandled error", err, { path });

    return c.json<ErrorResponse>(
        { success: false, error: ERROR_MESSAGES.GENERIC.INTERNAL_ERROR, timestamp, path },
        500
    );
}
