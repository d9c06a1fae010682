import { createMiddleware } from "hono/factory";
import type { AppEnv, EnvConfig } from "../env";
import type { CircleServices } from "../services";
import type { CircleDB } from "../utils/db";

export interface AppDependencies {
    config: EnvConfig;
    db: CircleDB;
    services: CircleServices;
}

/** Shares the long-lived database and services with every handler. */
export function injectServices(deps: AppDependencies) {
    return createMiddleware<AppEnv>(async (c, next) => {
        c.set("config", deps.config);
        c.set("db", deps.db);
        c.set("services", deps.services);
        await next();
    });
}
