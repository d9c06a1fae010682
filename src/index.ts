import { serve } from "@hono/node-server";
import { getEnv, readBindings, validateEnv } from "./env";
import { applyMigrations } from "./db/migrate";
import { createApp } from "./server";
import { createCircleServices } from "./services";
import { createEventSink } from "./services/events";
import { scheduleInviteExpiry } from "./scheduled/expire-invites";
import { createCircleDB, openDatabase } from "./utils/db";
import { logger } from "./utils/logger";

async function main(): Promise<void> {
    const bindings = readBindings();
    if (!validateEnv(bindings)) {
        process.exit(1);
    }

    const config = getEnv(bindings);
    logger.setLevel(config.logLevel);

    const client = await openDatabase(config.databasePath);
    await applyMigrations(client);
    const db = createCircleDB(client);

    const services = createCircleServices({
        db,
        events: createEventSink(config, logger),
        logger,
        maxAttempts: config.conflictMaxRetries,
        inviteTtlSeconds: config.inviteTtlSeconds,
    });

    const app = createApp({ config, db, services });
    const stopExpiry = scheduleInviteExpiry(services.invites);

    const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
        logger.info("Server listening", { port: info.port, environment: config.environment });
    });

    const shutdown = (signal: string) => {
        logger.info("Shutting down", { signal });
        stopExpiry();
        server.close(() => {
            db.close();
            process.exit(0);
        });
    };

    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
    logger.error("Startup failed", error);
    process.exit(1);
});
