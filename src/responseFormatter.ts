import type { HttpMethod, ToolResult } from './types';

const STATUS_LEGENDS: Record<number, string> = {
    200: 'OK - Request succeeded',
    201: 'Created - Resource successfully created',
    202: 'Accepted - Request accepted for processing',
    204: 'No Content - Request succeeded but no content returned',
    400: 'Bad Request - The request was invalid',
    401: 'Unauthorized - Authentication is required',
    403: "Forbidden - You don't have permission",
    404: 'Not Found - The requested resource was not found',
    409: 'Conflict - Request conflicts with current state',
    429: 'Too Many Requests - Rate limit exceeded',
    500: 'Internal Server Error - Something went wrong on the server',
    502: 'Bad Gateway - Invalid response from upstream server',
    503: 'Service Unavailable - Server temporarily unavailable',
};

export interface HttpOutcome {
    status: number;
    body: string;
    headers: Record<string, string>;
    operationId: string;
    method: HttpMethod;
    path: string;
}

export function isSuccessStatus(status: number): boolean {
    return status >= 200 && status < 300;
}

export function statusLegend(status: number): string {
    const known = STATUS_LEGENDS[status];
    if (known) return known;
    if (isSuccessStatus(status)) return 'Request succeeded';
    if (status >= 400 && status < 500) return 'Client error';
    if (status >= 500) return 'Server error';
    return 'Unexpected status';
}

function parseJson(body: string): unknown {
    const text = body.trim();
    if (!text.startsWith('{') && !text.startsWith('[')) return undefined;
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

/**
 * Classifies a parsed JSON body by its shape. Returns undefined for
 * anything that is not a JSON object or array.
 */
export function describeJsonShape(value: unknown): string | undefined {
    if (Array.isArray(value)) {
        return `Array with ${value.length} elements`;
    }
    if (typeof value !== 'object' || value === null) {
        return undefined;
    }

    const entries = Object.entries(value);
    if (entries.length === 0) return 'Empty object';

    let hasId = false;
    let hasList = false;
    let hasError = false;
    for (const [key, field] of entries) {
        const lower = key.toLowerCase();
        if (lower === 'id' || key.endsWith('Id')) {
            hasId = true;
        } else if (lower === 'items' || lower === 'results' || lower === 'data' || Array.isArray(field)) {
            hasList = true;
        } else if (lower === 'error' || lower === 'errors' || lower === 'message') {
            hasError = true;
        }
    }

    if (hasList) return 'Collection of resources';
    if (hasId) return 'Single resource';
    if (hasError) return 'Error details';
    return 'Object';
}

/**
 * Status line, a shape hint for JSON bodies, then the body exactly as received
 */
export function formatResponseText(status: number, body: string): string {
    const outcome = isSuccessStatus(status) ? 'SUCCESS' : 'ERROR';
    let text = `${outcome} (${status}): ${statusLegend(status)}`;

    const shape = describeJsonShape(parseJson(body));
    if (shape) {
        text += `\n\nRESPONSE TYPE: ${shape}`;
    }
    if (body.length > 0) {
        text += `\n\n${body}`;
    }
    return text;
}

/**
 * Folds response headers to one string per name, sorted by name.
 * Multi-valued headers are joined with ", ".
 */
export function foldHeaders(raw: object | undefined): Record<string, string> {
    if (!raw) return {};
    const folded: Record<string, string> = {};
    const entries = Object.entries(raw)
        .filter(([, value]) => value !== undefined && value !== null && typeof value !== 'function')
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [name, value] of entries) {
        folded[name] = Array.isArray(value) ? value.map(String).join(', ') : String(value);
    }
    return folded;
}

export function formatHttpResult(outcome: HttpOutcome): ToolResult {
    const metadata = {
        statusCode: outcome.status,
        operation: outcome.operationId,
        method: outcome.method,
        path: outcome.path,
        headers: outcome.headers,
    };

    return {
        isError: !isSuccessStatus(outcome.status),
        content: [
            { type: 'text', text: formatResponseText(outcome.status, outcome.body) },
            { type: 'text', text: JSON.stringify(metadata) },
        ],
    };
}

export function errorResult(message: string): ToolResult {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}
