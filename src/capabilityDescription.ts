import { logger } from './logger';
import type { DescriptionIndex, HttpMethod, OperationSpec } from './types';

// Heuristic denylist; not a complete security control
const INSTRUCTION_PATTERN = /\b(ignore|forget|disregard)\s+(all\s+)?(previous|earlier|above|prior)\s+instructions\b/gi;
const UNSAFE_TERM_PATTERN = /(ignore|bypass|hack|sql\s*inject(?:ions?)?|xss|exploit|malicious|\bauth\b|\btokens?\b|credentials?)/gi;

const FILTERED_MARKER = '[FILTERED]';
const FILTERED_INSTRUCTION_MARKER = '[FILTERED CONTENT]';

const CAPABILITIES: Record<HttpMethod, string> = {
    GET: 'Retrieves data without modifying resources. Use this when you need to fetch information or check the current state.',
    POST: 'Creates new resources or submits data. Use this when you need to add new items or send information to the server.',
    PUT: 'Updates or replaces existing resources. Use this when you need to update the entire resource with a complete replacement.',
    PATCH: 'Partially updates existing resources. Use this when you need to make partial updates to a resource.',
    DELETE: 'Removes resources. Use this when you need to delete items or information.',
    HEAD: 'Retrieves response headers without a body. Use this when you only need metadata about a resource.',
    OPTIONS: 'Describes the communication options supported by a resource.',
    TRACE: 'Echoes the received request back for diagnostics.',
};

const BODY_REQUIRED_NOTICE = 'Body required for this operation. Provide all required fields in the body parameter.';
const DEPRECATION_WARNING = 'WARNING: This operation is deprecated and may be removed in future versions.';

export function isBodyMethod(method: HttpMethod): boolean {
    return method === 'POST' || method === 'PUT' || method === 'PATCH';
}

export function actionVerb(method: HttpMethod): string {
    switch (method) {
        case 'GET': return 'Retrieve';
        case 'POST': return 'Create';
        case 'PUT': return 'Update';
        case 'PATCH': return 'Modify';
        case 'DELETE': return 'Delete';
        default: return 'Use';
    }
}

/**
 * `/pets/{petId}/toys` reads as `pets specific petId toys`
 */
export function extractResourceFromPath(path: string): string {
    const resource = path
        .replace(/^\/+|\/+$/g, '')
        .replace(/\{([^}]+)\}/g, 'specific $1')
        .replace(/\//g, ' ');
    return resource.length > 0 ? resource : 'resource';
}

/**
 * Replaces prompt-injection phrases and credential-probing terms with neutral markers
 */
export function sanitizeText(text: string): string {
    const sanitized = text
        .replace(INSTRUCTION_PATTERN, FILTERED_INSTRUCTION_MARKER)
        .replace(UNSAFE_TERM_PATTERN, FILTERED_MARKER);
    if (sanitized !== text) {
        logger.warn('Potentially unsafe content detected in API description text. Sanitizing.');
    }
    return sanitized;
}

function domainSection(tags: string[], tagDescriptions: Record<string, string>): string | undefined {
    if (tags.length === 0) return undefined;

    const described = tags.some(tag => tagDescriptions[tag] !== undefined);
    if (!described) {
        return `Domain: ${sanitizeText(tags.join(', '))}`;
    }

    const lines = tags.map(tag => {
        const detail = tagDescriptions[tag];
        return detail !== undefined ? `- ${sanitizeText(tag)}: ${sanitizeText(detail)}` : `- ${sanitizeText(tag)}`;
    });
    return `Domain:\n${lines.join('\n')}`;
}

/**
 * Composes the capability-oriented description of a tool. Declared text from
 * the API description is sanitized; the fixed sentences are not.
 */
export function buildCapabilityDescription(operation: OperationSpec, index: DescriptionIndex): string {
    const resource = sanitizeText(extractResourceFromPath(operation.path));
    const verb = actionVerb(operation.method);
    const sections: string[] = [];

    const summary = operation.summary ?? operation.pathSummary;
    sections.push(summary ? sanitizeText(summary) : `${verb} ${resource}`);

    if (operation.description) {
        sections.push(sanitizeText(operation.description));
    }

    sections.push(`Capability: ${CAPABILITIES[operation.method]}`);

    const domain = domainSection(operation.tags, index.tagDescriptions);
    if (domain) sections.push(domain);

    if (operation.externalDocs?.description || operation.externalDocs?.url) {
        const parts = [operation.externalDocs.description, operation.externalDocs.url].filter(Boolean);
        sections.push(`Additional Information: ${sanitizeText(parts.join(' - '))}`);
    }

    if (operation.parameters.length > 0) {
        sections.push(`Usage Example:\n- To ${verb.toLowerCase()} ${resource}, provide the required parameters.`);
    }

    if (operation.requestBody?.required && isBodyMethod(operation.method)) {
        sections.push(BODY_REQUIRED_NOTICE);
    }

    if (operation.deprecated) {
        sections.push(DEPRECATION_WARNING);
    }

    return sections.join('\n\n');
}
