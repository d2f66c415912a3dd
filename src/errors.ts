/**
 * Error types raised by the bridge.
 *
 * Only ParseError and ConfigurationError are fatal; they abort startup.
 * CompileError and TransportError are converted into error tool results
 * before they leave a tool call.
 */

export class BridgeError extends Error {
    constructor(
        message: string,
        public code: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'BridgeError';
    }
}

export class ParseError extends BridgeError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'PARSE_ERROR', details);
        this.name = 'ParseError';
    }
}

export class ConfigurationError extends BridgeError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'CONFIGURATION_ERROR', details);
        this.name = 'ConfigurationError';
    }
}

export type CompileFailure = 'MissingPathParameter' | 'InvalidUrl';

export class CompileError extends BridgeError {
    constructor(
        public reason: CompileFailure,
        message: string,
        details?: Record<string, unknown>
    ) {
        super(message, 'COMPILE_ERROR', { reason, ...details });
        this.name = 'CompileError';
    }
}

export type TransportFailure = 'connection' | 'unknown-host' | 'timeout' | 'cancelled' | 'generic';

export class TransportError extends BridgeError {
    constructor(
        public category: TransportFailure,
        message: string,
        details?: Record<string, unknown>
    ) {
        super(message, 'TRANSPORT_ERROR', { category, ...details });
        this.name = 'TransportError';
    }
}

export function isBridgeError(error: unknown): error is BridgeError {
    return error instanceof BridgeError;
}

/**
 * Reads the `code` property Node and axios attach to I/O errors.
 */
export function getErrorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}

/**
 * Flattens any thrown value into a loggable record
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
    if (isBridgeError(error)) {
        return {
            name: error.name,
            code: error.code,
            message: error.message,
            details: error.details,
        };
    }

    if (error instanceof Error) {
        return {
            name: error.name,
            message: error.message,
            code: getErrorCode(error),
        };
    }

    return { message: String(error) };
}
