/**
 * Centralized Logging Utility
 * Provides structured logging with consistent format across the application
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
    requestId?: string;
    [key: string]: unknown;
}

export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    requestId?: string;
    error?: {
        name: string;
        message: string;
        stack?: string;
    };
    context?: LogContext;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel | 'silent', number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

export function parseLogLevel(value: string | undefined): LogLevel | 'silent' {
    switch (value?.toLowerCase()) {
        case 'debug':
            return 'debug';
        case 'warn':
            return 'warn';
        case 'error':
            return 'error';
        case 'silent':
            return 'silent';
        default:
            return 'info';
    }
}

export class Logger {
    constructor(
        private minLevel: LogLevel | 'silent' = 'info',
        private readonly baseContext: LogContext = {}
    ) {}

    setLevel(level: LogLevel | 'silent'): void {
        this.minLevel = level;
    }

    /** Returns a logger that adds `context` to every entry. */
    child(context: LogContext): Logger {
        return new Logger(this.minLevel, { ...this.baseContext, ...context });
    }

    private enabled(level: LogLevel): boolean {
        return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
    }

    private build(level: LogLevel, message: string, context?: LogContext): LogEntry {
        const merged = { ...this.baseContext, ...context };
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            message,
            requestId: merged.requestId,
        };
        if (Object.keys(merged).length > 0) {
            entry.context = merged;
        }
        return entry;
    }

    error(message: string, error?: unknown, context?: LogContext): void {
        if (!this.enabled('error')) return;
        const entry = this.build('error', message, context);

        if (error instanceof Error) {
            entry.error = {
                name: error.name,
                message: error.message,
                stack: error.stack,
            };
        } else if (error) {
            entry.error = {
                name: 'Unknown',
                message: String(error),
            };
        }

        console.error(JSON.stringify(entry));
    }

    warn(message: string, context?: LogContext): void {
        if (!this.enabled('warn')) return;
        console.warn(JSON.stringify(this.build('warn', message, context)));
    }

    info(message: string, context?: LogContext): void {
        if (!this.enabled('info')) return;
        console.log(JSON.stringify(this.build('info', message, context)));
    }

    debug(message: string, context?: LogContext): void {
        if (!this.enabled('debug')) return;
        console.log(JSON.stringify(this.build('debug', message, context)));
    }
}

export const logger = new Logger(parseLogLevel(process.env.LOG_LEVEL));
