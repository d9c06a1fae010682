import type { CircleServices } from "./services";
import type { AuthContext } from "./types";
import type { CircleDB } from "./utils/db";
import { logger, parseLogLevel, type Logger } from "./utils/logger";

export type Environment = "production" | "development" | "staging" | "test";

const ENVIRONMENTS: readonly Environment[] = ["production", "development", "staging", "test"];

export interface Bindings {
    ENVIRONMENT?: string;
    PORT?: string;
    DATABASE_PATH?: string;
    INTERNAL_SECRET?: string;
    ALLOWED_ORIGINS?: string;
    EVENT_SINK_URL?: string;
    EVENT_SINK_TIMEOUT_MS?: string;
    INVITE_TTL_SECONDS?: string;
    CONFLICT_MAX_RETRIES?: string;
    LOG_LEVEL?: string;
}

export interface AppEnv {
    Variables: {
        config: EnvConfig;
        db: CircleDB;
        services: CircleServices;
        requestId: string;
        logger: Logger;
        auth?: AuthContext;
    };
}

export function readBindings(source: NodeJS.ProcessEnv = process.env): Bindings {
    return {
        ENVIRONMENT: source.ENVIRONMENT,
        PORT: source.PORT,
        DATABASE_PATH: source.DATABASE_PATH,
        INTERNAL_SECRET: source.INTERNAL_SECRET,
        ALLOWED_ORIGINS: source.ALLOWED_ORIGINS,
        EVENT_SINK_URL: source.EVENT_SINK_URL,
        EVENT_SINK_TIMEOUT_MS: source.EVENT_SINK_TIMEOUT_MS,
        INVITE_TTL_SECONDS: source.INVITE_TTL_SECONDS,
        CONFLICT_MAX_RETRIES: source.CONFLICT_MAX_RETRIES,
        LOG_LEVEL: source.LOG_LEVEL,
    };
}

function parseEnvironment(value: string | undefined): Environment {
    return ENVIRONMENTS.find((candidate) => candidate === value) ?? "production";
}

function parseInteger(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === "") {
        return fallback;
    }
    const parsed = Number(value);
    return Number.isInteger(parsed) ? parsed : fallback;
}

export function getEnv(bindings: Bindings) {
    const environment = parseEnvironment(bindings.ENVIRONMENT);

    return {
        environment,
        port: parseInteger(bindings.PORT, 8787),
        databasePath: bindings.DATABASE_PATH || "circles.db",
        internalSecret: bindings.INTERNAL_SECRET ?? "",
        allowedOrigins: bindings.ALLOWED_ORIGINS?.split(",").map(o => o.trim()) || ["*"],
        eventSinkUrl: bindings.EVENT_SINK_URL || undefined,
        eventSinkTimeoutMs: parseInteger(bindings.EVENT_SINK_TIMEOUT_MS, 5000),
        inviteTtlSeconds: parseInteger(bindings.INVITE_TTL_SECONDS, 604800),
        conflictMaxRetries: parseInteger(bindings.CONFLICT_MAX_RETRIES, 3),
        logLevel: parseLogLevel(bindings.LOG_LEVEL),
        isProduction: environment === "production",
        isDevelopment: environment === "development",
        isTest: environment === "test",
    } as const;
}

export type EnvConfig = ReturnType<typeof getEnv>;

function isPositiveInteger(value: string): boolean {
    const parsed = Number(value);
    return Number.isInteger(parsed) && parsed > 0;
}

export function validateEnv(bindings: Bindings): boolean {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!bindings.INTERNAL_SECRET) {
        errors.push("Missing required secret: INTERNAL_SECRET");
    } else if (bindings.INTERNAL_SECRET.length < 32) {
        errors.push("INTERNAL_SECRET must be at least 32 characters long");
    }

    if (bindings.ENVIRONMENT && !ENVIRONMENTS.some((candidate) => candidate === bindings.ENVIRONMENT)) {
        warnings.push(`Unknown ENVIRONMENT "${bindings.ENVIRONMENT}", defaulting to production`);
    }

    const numeric: Array<[keyof Bindings, string | undefined]> = [
        ["PORT", bindings.PORT],
        ["EVENT_SINK_TIMEOUT_MS", bindings.EVENT_SINK_TIMEOUT_MS],
        ["INVITE_TTL_SECONDS", bindings.INVITE_TTL_SECONDS],
        ["CONFLICT_MAX_RETRIES", bindings.CONFLICT_MAX_RETRIES],
    ];
    for (const [name, value] of numeric) {
        if (value !== undefined && !isPositiveInteger(value)) {
            errors.push(`${name} must be a positive integer`);
        }
    }

    if (bindings.EVENT_SINK_URL && !URL.canParse(bindings.EVENT_SINK_URL)) {
        errors.push("EVENT_SINK_URL must be a valid URL");
    }

    if (bindings.ALLOWED_ORIGINS === undefined && parseEnvironment(bindings.ENVIRONMENT) === "production") {
        warnings.push("ALLOWED_ORIGINS is not set; CORS allows every origin");
    }

    if (warnings.length > 0) {
        logger.warn("Environment warnings", { warnings });
    }

    if (errors.length > 0) {
        logger.error("Environment validation failed", undefined, { errors });
        return false;
    }

    return true;
}
