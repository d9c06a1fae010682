import { Hono } from "hono";
import type { AppEnv } from "./env";
import { SERVICE_NAME, SERVICE_VERSION } from "./constants/http";
import { createAPIRouter } from "./routes";
import healthRoutes from "./routes/health";
import internalRoutes from "./routes/internal";
import { errorHandler } from "./middleware/error-handler";
import { createCorsMiddleware } from "./middleware/cors";
import { requestLogger } from "./middleware/logger";
import { injectServices, type AppDependencies } from "./middleware/service-injector";
import { requestIdMiddleware } from "./middleware/request-id";
import { createSecurityHeadersMiddleware } from "./middleware/security-headers";

export function createApp(deps: AppDependencies) {
    const app = new Hono<AppEnv>();

    app.onError(errorHandler);
    app.use("*", requestIdMiddleware);
    app.use("*", createSecurityHeadersMiddleware(deps.config));
    app.use("*", requestLogger);
    app.use("*", createCorsMiddleware(deps.config));
    app.use("*", injectServices(deps));

    app.get("/", (c) => c.json({
        name: SERVICE_NAME,
        version: SERVICE_VERSION,
        status: "operational",
        endpoints: {
            health: "/health",
            circles: "/api/circles",
            invites: "/api/invites/:token",
            usage: "/api/usage",
            internal: "/internal",
        },
    }));

    // No auth
    app.route("/health", healthRoutes);

    // Gateway-authenticated user API
    app.route("/api", createAPIRouter());

    // Service-to-service endpoints
    app.route("/internal", internalRoutes);

    app.notFound((c) => c.json({
        success: false,
        error: "Not found",
        path: c.req.path,
    }, 404));

    return app;
}

export type App = ReturnType<typeof createApp>;
