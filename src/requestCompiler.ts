import { isBodyMethod } from './capabilityDescription';
import { CompileError } from './errors';
import type { ArgumentValue, CallArguments, CompiledRequest, HeaderEntry, OperationSpec } from './types';

const HEADER_PREFIX = 'header_';
const AUTH_PREFIX = 'auth_';

type ArgumentClass =
    | { kind: 'body'; value: ArgumentValue }
    | { kind: 'header'; name: string; value: ArgumentValue }
    | { kind: 'auth'; scheme: string; value: ArgumentValue }
    | { kind: 'query'; name: string; value: ArgumentValue };

function classifyArgument(key: string, value: ArgumentValue): ArgumentClass {
    if (key === 'body') return { kind: 'body', value };
    if (key.startsWith(HEADER_PREFIX)) return { kind: 'header', name: key.slice(HEADER_PREFIX.length), value };
    if (key.startsWith(AUTH_PREFIX)) return { kind: 'auth', scheme: key.slice(AUTH_PREFIX.length), value };
    return { kind: 'query', name: key, value };
}

/**
 * Renders a scalar or structured argument as text: arrays are comma-joined,
 * objects JSON-encoded.
 */
function stringifyValue(value: ArgumentValue): string {
    if (Array.isArray(value)) return value.map(stringifyValue).join(',');
    if (typeof value === 'object' && value !== null) return JSON.stringify(value);
    return String(value);
}

/**
 * Maps a credential supplied for a security scheme to the header carrying it.
 * The scheme token decides, not the declared scheme type.
 */
export function mapAuthHeader(scheme: string, value: string): HeaderEntry {
    switch (scheme.toLowerCase()) {
        case 'bearer':
        case 'token':
            return ['Authorization', `Bearer ${value}`];
        case 'basic':
            return ['Authorization', `Basic ${value}`];
        case 'apikey':
            return ['X-API-Key', value];
        default:
            return [scheme, value];
    }
}

export function joinUrl(baseUrl: string, path: string): string {
    return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

function substitutePath(template: string, args: CallArguments, consumed: Set<string>): string {
    return template.replace(/\{([^}]+)\}/g, (_match, name: string) => {
        const value = Object.hasOwn(args, name) ? args[name] : undefined;
        if (value === undefined || value === null) {
            throw new CompileError('MissingPathParameter', `Missing required path parameter: ${name}`, { parameter: name });
        }
        consumed.add(name);
        return encodeURIComponent(stringifyValue(value));
    });
}

function appendQuery(pairs: string[], name: string, value: ArgumentValue): void {
    if (value === null || value === undefined) return;
    const key = encodeURIComponent(name);
    if (Array.isArray(value)) {
        for (const element of value) {
            if (element === null || element === undefined) continue;
            pairs.push(`${key}=${encodeURIComponent(stringifyValue(element))}`);
        }
        return;
    }
    pairs.push(`${key}=${encodeURIComponent(stringifyValue(value))}`);
}

function isJsonContentType(contentType: string | undefined): boolean {
    if (!contentType) return true;
    const base = contentType.split(';')[0].trim().toLowerCase();
    return base === 'application/json' || base.endsWith('+json');
}

function serializeBody(value: ArgumentValue, declaredType: string | undefined): { body: string; contentType: string } {
    if (typeof value === 'string' && !isJsonContentType(declaredType) && declaredType) {
        return { body: value, contentType: declaredType };
    }
    return {
        body: JSON.stringify(value),
        contentType: declaredType && isJsonContentType(declaredType) ? declaredType : 'application/json',
    };
}

/**
 * Turns tool arguments into a concrete HTTP request for an operation.
 * Fails with CompileError when a path placeholder has no value or the
 * resulting URL does not parse.
 */
export function compileRequest(operation: OperationSpec, args: CallArguments, baseUrl: string): CompiledRequest {
    const consumed = new Set<string>();
    const path = substitutePath(operation.path, args, consumed);

    const queryPairs: string[] = [];
    const headers: HeaderEntry[] = [];
    let bodyValue: ArgumentValue = undefined;

    for (const [key, value] of Object.entries(args)) {
        if (consumed.has(key) || value === null || value === undefined) continue;

        const argument = classifyArgument(key, value);
        switch (argument.kind) {
            case 'body':
                bodyValue = argument.value;
                break;
            case 'header':
                headers.push([argument.name, stringifyValue(argument.value)]);
                break;
            case 'auth':
                headers.push(mapAuthHeader(argument.scheme, stringifyValue(argument.value)));
                break;
            case 'query':
                appendQuery(queryPairs, argument.name, argument.value);
                break;
        }
    }

    let url = joinUrl(baseUrl, path);
    if (queryPairs.length > 0) {
        url += `?${queryPairs.join('&')}`;
    }

    try {
        new URL(url);
    } catch {
        throw new CompileError('InvalidUrl', `Invalid URL: ${url}`, { url });
    }

    const request: CompiledRequest = { method: operation.method, url, headers };
    if (bodyValue !== undefined && isBodyMethod(operation.method)) {
        const { body, contentType } = serializeBody(bodyValue, operation.requestBody?.contentType);
        request.body = body;
        request.contentType = contentType;
    }
    return request;
}
