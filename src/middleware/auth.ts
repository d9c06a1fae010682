import { timingSafeEqual } from "node:crypto";
import type { Context } from "hono";
import { createMiddleware } from "hono/factory";
import { HTTPException } from "hono/http-exception";
import type { AppEnv } from "../env";
import type { AuthContext } from "../types";

export const USER_ID_HEADER = "X-User-Id";
export const INTERNAL_SECRET_HEADER = "X-Internal-Secret";

function secretsMatch(provided: string | undefined, expected: string): boolean {
    if (!provided || !expected) {
        return false;
    }
    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Requests arrive through the identity gateway, which has already
 * authenticated the caller. The shared secret proves the hop; the user id
 * header carries the identity.
 */
export const gatewayAuthMiddleware = createMiddleware<AppEnv>(async (c, next) => {
    const config = c.get("config");
    if (!secretsMatch(c.req.header(INTERNAL_SECRET_HEADER), config.internalSecret)) {
        throw new HTTPException(401, { message: "Invalid internal secret" });
    }

    const userId = c.req.header(USER_ID_HEADER)?.trim();
    if (!userId) {
        throw new HTTPException(401, { message: "Authentication required" });
    }

    c.set("auth", { userId });
    c.set("logger", c.get("logger").child({ userId }));
    await next();
});

export const internalAuthMiddleware = createMiddleware<AppEnv>(async (c, next) => {
    const config = c.get("config");
    if (!secretsMatch(c.req.header(INTERNAL_SECRET_HEADER), config.internalSecret)) {
        throw new HTTPException(401, { message: "Invalid internal secret" });
    }

    await next();
});

export function getAuth(c: Context<AppEnv>): AuthContext {
    const auth = c.get("auth");
    if (!auth) {
        throw new HTTPException(401, { message: "Authentication required" });
    }
    return auth;
}
