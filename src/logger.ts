/**
 * Level-based logging to stderr.
 *
 * stdout carries the MCP stdio transport, so nothing here may write to it.
 * Header maps passed in the log context have credential headers redacted.
 */

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4,
}

export interface Logger {
    debug(message: string, context?: Record<string, unknown>): void;
    info(message: string, context?: Record<string, unknown>): void;
    warn(message: string, context?: Record<string, unknown>): void;
    error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

const SENSITIVE_HEADERS = new Set(['authorization', 'proxy-authorization', 'x-api-key', 'cookie']);

export function parseLogLevel(value: string | undefined): LogLevel {
    switch (value?.trim().toUpperCase()) {
        case 'DEBUG': return LogLevel.DEBUG;
        case 'WARN': return LogLevel.WARN;
        case 'ERROR': return LogLevel.ERROR;
        case 'SILENT': return LogLevel.SILENT;
        default: return LogLevel.INFO;
    }
}

export function redactHeaders(headers: unknown): unknown {
    if (!headers || typeof headers !== 'object' || Array.isArray(headers)) return headers;

    const redacted: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(headers)) {
        redacted[name] = SENSITIVE_HEADERS.has(name.toLowerCase()) ? '[REDACTED]' : value;
    }
    return redacted;
}

export class ConsoleLogger implements Logger {
    private readonly level: LogLevel;

    constructor(level?: LogLevel) {
        this.level = level ?? parseLogLevel(process.env.LOG_LEVEL);
    }

    debug(message: string, context?: Record<string, unknown>): void {
        if (this.level <= LogLevel.DEBUG) {
            this.write('DEBUG', message, context);
        }
    }

    info(message: string, context?: Record<string, unknown>): void {
        if (this.level <= LogLevel.INFO) {
            this.write('INFO', message, context);
        }
    }

    warn(message: string, context?: Record<string, unknown>): void {
        if (this.level <= LogLevel.WARN) {
            this.write('WARN', message, context);
        }
    }

    error(message: string, error?: unknown, context?: Record<string, unknown>): void {
        if (this.level <= LogLevel.ERROR) {
            const errorContext = error instanceof Error
                ? { error: error.message, stack: error.stack, ...context }
                : error !== undefined ? { error: String(error), ...context } : context;
            this.write('ERROR', message, errorContext);
        }
    }

    private write(level: string, message: string, context?: Record<string, unknown>): void {
        const timestamp = new Date().toISOString();
        let ctx = '';
        if (context) {
            const safe = 'headers' in context ? { ...context, headers: redactHeaders(context.headers) } : context;
            ctx = ` ${JSON.stringify(safe)}`;
        }
        console.error(`[${timestamp}] ${level}: ${message}${ctx}`);
    }
}

export const logger: Logger = new ConsoleLogger();
