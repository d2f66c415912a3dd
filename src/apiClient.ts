import axios, { type AxiosRequestConfig } from 'axios';
import { TransportError, getErrorCode, getErrorMessage } from './errors';
import { logger } from './logger';
import { errorResult, foldHeaders, formatHttpResult } from './responseFormatter';
import type { CompiledRequest, HeaderEntry, ToolResult } from './types';

export const USER_AGENT = 'openapi-tool-bridge/1.0.0';
export const DEFAULT_TIMEOUT_MS = 30000;

export interface ExecuteOptions {
    operationId: string;
    pathTemplate: string;
    timeoutMs?: number;
    additionalHeaders?: Record<string, string>;
    disableXMcp?: boolean;
    signal?: AbortSignal;
}

type HeaderLayer = Iterable<HeaderEntry>;

/**
 * Layers header sets so that later layers replace earlier ones by
 * case-insensitive name. Repeats inside the last layer are joined with ", ".
 */
export function mergeHeaders(...layers: HeaderLayer[]): Record<string, string> {
    const merged = new Map<string, HeaderEntry>();
    layers.forEach((layer, position) => {
        const isLast = position === layers.length - 1;
        const seen = new Set<string>();
        for (const [name, value] of layer) {
            const key = name.toLowerCase();
            const existing = merged.get(key);
            if (isLast && existing && seen.has(key)) {
                merged.set(key, [existing[0], `${existing[1]}, ${value}`]);
            } else {
                merged.set(key, [name, value]);
            }
            seen.add(key);
        }
    });

    const headers: Record<string, string> = {};
    for (const [name, value] of merged.values()) {
        headers[name] = value;
    }
    return headers;
}

function defaultHeaders(request: CompiledRequest, disableXMcp: boolean): HeaderEntry[] {
    const headers: HeaderEntry[] = [
        ['Accept', 'application/json'],
        ['User-Agent', USER_AGENT],
    ];
    if (!disableXMcp) headers.push(['X-MCP', '1']);
    if (request.contentType) headers.push(['Content-Type', request.contentType]);
    return headers;
}

/**
 * Maps a failed request to its transport category by error code
 */
export function classifyTransportError(error: unknown, url: string, timeoutMs: number): TransportError {
    const code = getErrorCode(error);
    const message = getErrorMessage(error);

    switch (code) {
        case 'ECONNREFUSED':
            return new TransportError('connection',
                `Connection error: Cannot connect to ${url}. Please check if the URL is correct and the server is running. Error: ${message}`,
                { code });
        case 'ENOTFOUND':
        case 'EAI_AGAIN':
            return new TransportError('unknown-host',
                `Unknown host: Cannot resolve hostname in ${url}. Please check if the URL is correct. Error: ${message}`,
                { code });
        case 'ECONNABORTED':
        case 'ETIMEDOUT':
            return timeoutError(url, timeoutMs, code);
        case 'ERR_CANCELED':
            return new TransportError('cancelled', `Cancelled: The request to ${url} was aborted before it completed.`, { code });
        default:
            return new TransportError('generic', `Error: ${message}`, { code });
    }
}

function timeoutError(url: string, timeoutMs: number, code?: string): TransportError {
    return new TransportError('timeout', `Timeout: No response from ${url} within ${timeoutMs} ms.`, { code });
}

interface Deadline {
    signal: AbortSignal;
    expired: () => boolean;
    dispose: () => void;
}

/**
 * Aborts after `timeoutMs` or when the caller's signal aborts, whichever
 * comes first. axios's own `timeout` only bounds socket inactivity.
 */
function startDeadline(timeoutMs: number, callerSignal: AbortSignal | undefined): Deadline {
    const controller = new AbortController();
    let expired = false;
    const timer = setTimeout(() => {
        expired = true;
        controller.abort();
    }, timeoutMs);
    const forward = (): void => controller.abort();

    if (callerSignal?.aborted) {
        controller.abort();
    } else {
        callerSignal?.addEventListener('abort', forward, { once: true });
    }

    return {
        signal: controller.signal,
        expired: () => expired,
        dispose: () => {
            clearTimeout(timer);
            callerSignal?.removeEventListener('abort', forward);
        },
    };
}

function bodyText(data: unknown): string {
    if (typeof data === 'string') return data;
    if (data === undefined || data === null) return '';
    return JSON.stringify(data);
}

/**
 * Sends a compiled request and turns whatever comes back into a tool result.
 * Never rejects: transport failures become error results, and every HTTP
 * status is reported with its body.
 */
export async function executeRequest(request: CompiledRequest, options: ExecuteOptions): Promise<ToolResult> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const headers = mergeHeaders(
        defaultHeaders(request, options.disableXMcp === true),
        Object.entries(options.additionalHeaders ?? {}),
        request.headers
    );

    const deadline = startDeadline(timeoutMs, options.signal);
    const requestConfig: AxiosRequestConfig = {
        method: request.method,
        url: request.url,
        headers,
        data: request.body,
        timeout: timeoutMs,
        signal: deadline.signal,
        // Every status resolves; the body is kept exactly as sent
        validateStatus: () => true,
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
    };

    logger.info(`Executing ${options.operationId}: ${request.method} ${request.url}`, {
        headers,
        body: request.body !== undefined ? '[Request Body Present]' : undefined,
    });

    try {
        const response = await axios.request<unknown>(requestConfig);
        logger.info(`API response received for ${options.operationId}: Status ${response.status}`);

        return formatHttpResult({
            status: response.status,
            body: bodyText(response.data),
            headers: foldHeaders(response.headers),
            operationId: options.operationId,
            method: request.method,
            path: options.pathTemplate,
        });
    } catch (error) {
        const failure = deadline.expired()
            ? timeoutError(request.url, timeoutMs, getErrorCode(error))
            : classifyTransportError(error, request.url, timeoutMs);
        logger.error(`API call failed for ${options.operationId} (${failure.category})`, error);
        return errorResult(failure.message);
    } finally {
        deadline.dispose();
    }
}
