import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../env';
import { generateId } from '../services/shared';

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Request ID Middleware
 * Generates or extracts a unique request ID for tracking requests through the system
 */
export const requestIdMiddleware = createMiddleware<AppEnv>(async (c, next) => {
    const incoming = c.req.header('X-Request-ID');
    const requestId = incoming && incoming.length <= MAX_REQUEST_ID_LENGTH ? incoming : generateId('req');

    c.set('requestId', requestId);
    c.header('X-Request-ID', requestId);

    await next();
});
