import { createMiddleware } from "hono/factory";
import type { AppEnv } from "../env";
import { logger as rootLogger } from "../utils/logger";

/**
 * Request logger middleware with structured JSON logging.
 *
 * - Creates a request-scoped child logger attached to the context
 * - Logs request completion with status and duration
 */
export const requestLogger = createMiddleware<AppEnv>(async (c, next) => {
    const start = Date.now();

    const logger = rootLogger.child({
        requestId: c.get("requestId"),
        method: c.req.method,
        path: c.req.path,
    });
    c.set("logger", logger);

    logger.debug("Request started", {
        userAgent: c.req.header("user-agent"),
    });

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;
    const requestLog = c.get("logger");

    if (status >= 500) {
        requestLog.error("Request completed with server error", undefined, { status, duration });
    } else if (status >= 400) {
        requestLog.warn("Request completed with client error", { status, duration });
    } else {
        requestLog.info("Request completed", { status, duration });
    }
});
