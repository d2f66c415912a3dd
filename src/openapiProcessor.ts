import SwaggerParser from '@apidevtools/swagger-parser';
import fs from 'fs/promises';
import YAML from 'js-yaml';
import type { OpenAPIV3 } from 'openapi-types';
import { ConfigurationError, ParseError, getErrorMessage } from './errors';
import { logger } from './logger';
import { fetchFromUrl } from './utils/httpClient';
import type {
    DescriptionIndex,
    DescriptionSource,
    HttpMethod,
    OperationSpec,
    ParameterLocation,
    ParameterSpec,
    RequestBodySpec,
    SecurityRequirement,
    SecuritySchemeSpec,
    ToolOverride,
} from './types';

const HTTP_METHODS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'] as const;
type PathItemMethod = typeof HTTP_METHODS[number];

const PARAMETER_LOCATIONS: readonly ParameterLocation[] = ['path', 'query', 'header'];

/**
 * Reads the raw API description text from a file, an HTTP(S) URL or an inline string
 */
export async function loadDescriptionText(source: DescriptionSource): Promise<string> {
    switch (source.kind) {
        case 'inline':
            return source.text;
        case 'url':
            try {
                return await fetchFromUrl(source.url);
            } catch (err) {
                throw new ConfigurationError(`Cannot fetch API description from ${source.url}: ${getErrorMessage(err)}`);
            }
        case 'file':
            logger.info(`Loading API description from: ${source.path}`);
            try {
                return await fs.readFile(source.path, 'utf-8');
            } catch (err) {
                throw new ConfigurationError(`Cannot read API description file ${source.path}: ${getErrorMessage(err)}`);
            }
    }
}

/**
 * Parses JSON or YAML text into a plain value
 */
function parseDocumentText(raw: string): unknown {
    const text = raw.trim();
    if (text.length === 0) {
        throw new ParseError('API description is empty');
    }

    try {
        return text.startsWith('{') ? JSON.parse(text) : YAML.load(text);
    } catch (err) {
        throw new ParseError(`API description is not valid JSON or YAML: ${getErrorMessage(err)}`);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOpenApiV3Document(value: unknown): value is OpenAPIV3.Document {
    return isRecord(value)
        && typeof value.openapi === 'string'
        && value.openapi.startsWith('3.')
        && isRecord(value.info)
        && isRecord(value.paths);
}

/**
 * Checks the top-level shape so that malformed input fails with a message
 * naming what is missing rather than a parser stack trace.
 */
function validateDocumentShape(document: unknown): OpenAPIV3.Document {
    if (!isRecord(document)) {
        throw new ParseError('API description must be a JSON or YAML object');
    }
    if (document.swagger !== undefined) {
        throw new ParseError(`Swagger ${String(document.swagger)} documents are not supported; an OpenAPI 3.x description is required`);
    }
    if (typeof document.openapi !== 'string') {
        throw new ParseError('Missing OpenAPI version identifier. This doesn\'t appear to be a valid OpenAPI description.');
    }
    if (!document.openapi.startsWith('3.')) {
        throw new ParseError(`Unsupported OpenAPI version: ${document.openapi}`);
    }
    if (!isRecord(document.info)) {
        throw new ParseError('Missing info section in API description');
    }
    if (!isRecord(document.paths)) {
        throw new ParseError('Missing top-level "paths" object in API description');
    }
    if (!isOpenApiV3Document(document)) {
        throw new ParseError('API description does not have the expected OpenAPI 3 shape');
    }
    return document;
}

async function resolveReferences(document: OpenAPIV3.Document): Promise<OpenAPIV3.Document> {
    let resolved: unknown;
    try {
        // Recursive schemas become cyclic object graphs; consumers must track ancestors
        resolved = await SwaggerParser.dereference(document);
    } catch (err) {
        throw new ParseError(`Unable to resolve API description: ${getErrorMessage(err)}`);
    }
    if (!isOpenApiV3Document(resolved)) {
        throw new ParseError('API description lost its OpenAPI 3 shape during reference resolution');
    }
    return resolved;
}

export function isReferenceObject(obj: unknown): obj is OpenAPIV3.ReferenceObject {
    return isRecord(obj) && typeof obj.$ref === 'string';
}

function isSchemaObject(obj: unknown): obj is OpenAPIV3.SchemaObject {
    return isRecord(obj) && !isReferenceObject(obj);
}

function capitalize(value: string): string {
    return value.length === 0 ? value : value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Builds an id for operations that declare no operationId:
 * `GET /pets/{petId}/toys` becomes `getPetsByPetIdToys`.
 */
export function syntheticOperationId(method: string, path: string): string {
    const segments = path.split('/').filter(segment => segment.length > 0);
    const words = segments.map(segment => {
        const placeholder = /^\{(.+)\}$/.exec(segment);
        const parts = (placeholder ? placeholder[1] : segment).split(/[^A-Za-z0-9]+/).filter(Boolean);
        const word = parts.map(capitalize).join('');
        return placeholder ? `By${word}` : word;
    });
    return method.toLowerCase() + (words.length > 0 ? words.join('') : 'Root');
}

/**
 * Returns `candidate`, or `candidate_2`, `candidate_3`... whichever is free, and claims it
 */
export function claimUniqueName(candidate: string, taken: Set<string>): string {
    let name = candidate;
    let suffix = 2;
    while (taken.has(name)) {
        name = `${candidate}_${suffix}`;
        suffix++;
    }
    taken.add(name);
    return name;
}

function pathPlaceholders(path: string): Set<string> {
    const names = new Set<string>();
    for (const match of path.matchAll(/\{([^}]+)\}/g)) {
        names.add(match[1]);
    }
    return names;
}

function toParameterSpec(param: OpenAPIV3.ParameterObject): ParameterSpec | undefined {
    const location = PARAMETER_LOCATIONS.find(candidate => candidate === param.in);
    if (!location) {
        logger.warn(`Skipping parameter '${param.name}' in unsupported location '${param.in}'`);
        return undefined;
    }

    let schema: OpenAPIV3.SchemaObject | undefined = isSchemaObject(param.schema) ? param.schema : undefined;
    if (!schema && param.content) {
        const mediaSchema = Object.values(param.content)[0]?.schema;
        schema = isSchemaObject(mediaSchema) ? mediaSchema : undefined;
    }

    return {
        name: param.name,
        location,
        required: location === 'path' ? true : param.required === true,
        schema,
        description: param.description,
        deprecated: param.deprecated === true ? true : undefined,
        example: param.example,
    };
}

/**
 * Merges path-item and operation parameters; an operation parameter replaces a
 * path-item parameter with the same name and location.
 */
function collectParameters(
    path: string,
    pathItem: OpenAPIV3.PathItemObject,
    operation: OpenAPIV3.OperationObject
): ParameterSpec[] {
    const merged = new Map<string, ParameterSpec>();
    const placeholders = pathPlaceholders(path);

    for (const declared of [...(pathItem.parameters ?? []), ...(operation.parameters ?? [])]) {
        if (isReferenceObject(declared) || !isRecord(declared) || typeof declared.name !== 'string') {
            logger.warn(`Skipping malformed parameter on ${path}`);
            continue;
        }
        const spec = toParameterSpec(declared);
        if (!spec) continue;

        if (spec.location === 'path' && !placeholders.has(spec.name)) {
            logger.warn(`Dropping path parameter '${spec.name}': no {${spec.name}} placeholder in ${path}`);
            continue;
        }
        merged.set(`${spec.location}:${spec.name}`, spec);
    }

    return [...merged.values()];
}

function isJsonMediaType(mediaType: string): boolean {
    const base = mediaType.split(';')[0].trim().toLowerCase();
    return base === 'application/json' || base.endsWith('+json');
}

function toRequestBodySpec(requestBody: OpenAPIV3.OperationObject['requestBody']): RequestBodySpec | undefined {
    if (!requestBody || isReferenceObject(requestBody)) return undefined;

    const mediaTypes = Object.keys(requestBody.content ?? {});
    const contentType = mediaTypes.includes('application/json')
        ? 'application/json'
        : mediaTypes.find(isJsonMediaType) ?? mediaTypes[0];
    const schema = contentType ? requestBody.content[contentType]?.schema : undefined;

    return {
        required: requestBody.required === true,
        contentType,
        schema,
        description: requestBody.description,
    };
}

function toSecurityRequirements(requirements: OpenAPIV3.SecurityRequirementObject[] | undefined): SecurityRequirement[] {
    const byScheme = new Map<string, SecurityRequirement>();
    for (const requirement of requirements ?? []) {
        for (const [scheme, scopes] of Object.entries(requirement)) {
            const existing = byScheme.get(scheme);
            if (existing) {
                for (const scope of scopes) {
                    if (!existing.scopes.includes(scope)) existing.scopes.push(scope);
                }
            } else {
                byScheme.set(scheme, { scheme, scopes: [...scopes] });
            }
        }
    }
    return [...byScheme.values()];
}

function toSecuritySchemes(components: OpenAPIV3.ComponentsObject | undefined): Record<string, SecuritySchemeSpec> {
    const schemes: Record<string, SecuritySchemeSpec> = {};
    for (const [name, scheme] of Object.entries(components?.securitySchemes ?? {})) {
        if (isReferenceObject(scheme)) continue;
        switch (scheme.type) {
            case 'apiKey':
                schemes[name] = { type: 'apiKey', description: scheme.description, in: scheme.in, name: scheme.name };
                break;
            case 'http':
                schemes[name] = { type: 'http', description: scheme.description, scheme: scheme.scheme };
                break;
            case 'oauth2':
            case 'openIdConnect':
                schemes[name] = { type: scheme.type, description: scheme.description };
                break;
        }
    }
    return schemes;
}

function readOverride(extension: unknown): ToolOverride | undefined {
    if (!isRecord(extension)) return undefined;
    const override: ToolOverride = {};
    if (typeof extension.name === 'string' && extension.name.length > 0) override.name = extension.name;
    if (typeof extension.description === 'string' && extension.description.length > 0) {
        override.description = extension.description;
    }
    return override.name || override.description ? override : undefined;
}

function readExtensions(operation: OpenAPIV3.OperationObject): Record<string, unknown> {
    const extensions: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(operation)) {
        if (key.startsWith('x-') && key !== 'x-mcp') {
            extensions[key] = value;
        }
    }
    return extensions;
}

/**
 * Parses the API description and indexes every (path, method) operation.
 * Any failure aborts the whole build with a ParseError.
 */
export async function buildDescriptionIndex(rawDescription: string): Promise<DescriptionIndex> {
    const document = await resolveReferences(validateDocumentShape(parseDocumentText(rawDescription)));

    const globalSecurity = document.security;
    const operations: OperationSpec[] = [];
    const takenIds = new Set<string>();

    for (const [path, pathItem] of Object.entries(document.paths)) {
        if (!isRecord(pathItem)) continue;

        for (const key of Object.keys(pathItem)) {
            const method = HTTP_METHODS.find(candidate => candidate === key);
            if (!method) continue;

            const operation = pathItem[method];
            if (!isRecord(operation)) continue;

            const baseId = operation.operationId || syntheticOperationId(method, path);
            const id = claimUniqueName(baseId, takenIds);
            if (id !== baseId) {
                logger.warn(`Duplicate operation id '${baseId}' on ${method.toUpperCase()} ${path}; using '${id}'`);
            }

            operations.push(buildOperationSpec(id, method, path, pathItem, operation, globalSecurity));
        }
    }

    const tagDescriptions: Record<string, string> = {};
    for (const tag of document.tags ?? []) {
        if (tag.description) tagDescriptions[tag.name] = tag.description;
    }

    const info: Record<string, unknown> = { ...document.info };

    logger.info(`Indexed ${operations.length} operations from ${document.info.title || 'API'} ${document.info.version || ''}`.trim());

    return {
        title: document.info.title || 'API',
        version: document.info.version || '',
        description: document.info.description,
        servers: (document.servers ?? []).map(server => server.url),
        tagDescriptions,
        securitySchemes: toSecuritySchemes(document.components),
        linkedData: info['x-linkedData'],
        operations,
    };
}

function buildOperationSpec(
    id: string,
    method: PathItemMethod,
    path: string,
    pathItem: OpenAPIV3.PathItemObject,
    operation: OpenAPIV3.OperationObject,
    globalSecurity: OpenAPIV3.SecurityRequirementObject[] | undefined
): OperationSpec {
    const httpMethod: HttpMethod = method === 'get' ? 'GET'
        : method === 'put' ? 'PUT'
        : method === 'post' ? 'POST'
        : method === 'delete' ? 'DELETE'
        : method === 'options' ? 'OPTIONS'
        : method === 'head' ? 'HEAD'
        : method === 'patch' ? 'PATCH'
        : 'TRACE';

    const operationExtension: unknown = Object.entries(operation).find(([key]) => key === 'x-mcp')?.[1];
    const pathExtension: unknown = Object.entries(pathItem).find(([key]) => key === 'x-mcp')?.[1];

    return {
        id,
        operationId: operation.operationId,
        method: httpMethod,
        path,
        parameters: collectParameters(path, pathItem, operation),
        requestBody: toRequestBodySpec(operation.requestBody),
        // Operation-level security overrides the document default, [] included
        security: toSecurityRequirements(operation.security ?? globalSecurity),
        summary: operation.summary,
        description: operation.description,
        pathSummary: pathItem.summary,
        tags: operation.tags ?? [],
        deprecated: operation.deprecated === true,
        externalDocs: operation.externalDocs,
        extensions: readExtensions(operation),
        override: isRecord(operationExtension) ? readOverride(operationExtension) : readOverride(pathExtension),
    };
}
