import { cors } from "hono/cors";
import type { EnvConfig } from "../env";

const ALLOWED_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"];
const ALLOWED_HEADERS = ["Content-Type", "X-User-Id", "X-Internal-Secret", "X-Request-ID"];
const EXPOSED_HEADERS = ["X-Request-ID"];
const MAX_AGE = 86400;

export function createCorsMiddleware(config: EnvConfig) {
    const allowAny = config.allowedOrigins.includes("*");
    return cors({
        origin: allowAny
            ? "*"
            : (origin) => config.allowedOrigins.includes(origin) ? origin : null,
        allowMethods: ALLOWED_METHODS,
        allowHeaders: ALLOWED_HEADERS,
        exposeHeaders: EXPOSED_HEADERS,
        maxAge: MAX_AGE,
        credentials: !allowAny,
    });
}
