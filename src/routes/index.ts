import { Hono } from "hono";
import type { AppEnv } from "../env";
import { gatewayAuthMiddleware } from "../middleware/auth";
import circleRoutes from "./circles";
import inviteRoutes from "./invites";
import usageRoutes from "./usage";

export function createAPIRouter() {
    const api = new Hono<AppEnv>();

    api.use("*", gatewayAuthMiddleware);

    api.route("/circles", circleRoutes);
    api.route("/invites", inviteRoutes);
    api.route("/usage", usageRoutes);

    return api;
}
