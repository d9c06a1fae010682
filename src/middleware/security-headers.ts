import { createMiddleware } from 'hono/factory';
import type { AppEnv, EnvConfig } from '../env';

/**
 * Security Headers Middleware
 * Adds security-related HTTP headers to all responses
 */
export function createSecurityHeadersMiddleware(config: EnvConfig) {
    return createMiddleware<AppEnv>(async (c, next) => {
        await next();

        c.header('X-Frame-Options', 'DENY');
        c.header('X-Content-Type-Options', 'nosniff');
        c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

        // JSON API: nothing is meant to render or load sub-resources
        c.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

        if (config.isProduction) {
            c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
        }
    });
}
