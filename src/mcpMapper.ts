import type { JSONSchema7, JSONSchema7Definition, JSONSchema7TypeName } from 'json-schema';
import { minimatch } from 'minimatch';
import type { OpenAPIV3 } from 'openapi-types';
import { buildCapabilityDescription, isBodyMethod, sanitizeText } from './capabilityDescription';
import { logger } from './logger';
import { claimUniqueName, isReferenceObject } from './openapiProcessor';
import type {
    DescriptionIndex,
    HttpMethod,
    MappedTool,
    OperationFilter,
    OperationSpec,
    ParameterLocation,
    ParameterSpec,
    ToolAnnotations,
    ToolDefinition,
    ToolInputSchema,
} from './types';

type PropertySchema = JSONSchema7 & {
    'x-parameter-location'?: ParameterLocation;
    example?: unknown;
    deprecated?: boolean;
};

const ACTION_VERBS = [
    'get', 'retrieve', 'fetch', 'list', 'find', 'search',
    'create', 'add', 'post', 'insert',
    'update', 'modify', 'change', 'edit', 'patch',
    'delete', 'remove', 'clear',
];

const METHOD_PREFIXES: Partial<Record<HttpMethod, string>> = {
    GET: 'get',
    POST: 'create',
    PUT: 'update',
    PATCH: 'modify',
    DELETE: 'delete',
};

const LOCATION_PREFIXES: Record<ParameterLocation, string> = {
    path: 'Path parameter: ',
    query: 'Query parameter: ',
    header: 'HTTP Header: ',
};

const RECURSIVE_REFERENCE: PropertySchema = {
    type: 'object',
    description: 'Recursive reference',
};

// Mapping from OpenAPI type/format to JSON Schema type
function mapOpenApiTypeToJsonSchemaType(openApiSchema: OpenAPIV3.SchemaObject): JSONSchema7TypeName | undefined {
    if (!openApiSchema.type) {
        if (openApiSchema.properties) return 'object';
        if (openApiSchema.allOf || openApiSchema.oneOf || openApiSchema.anyOf) return undefined;
        return 'string';
    }

    switch (openApiSchema.type) {
        case 'integer': return 'integer';
        case 'number': return 'number';
        case 'boolean': return 'boolean';
        case 'string': return 'string';
        case 'array': return 'array';
        case 'object': return 'object';
        default:
            logger.warn(`Unsupported OpenAPI type: ${String(openApiSchema.type)}. Defaulting to string.`);
            return 'string';
    }
}

function convertAll(
    schemas: (OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject)[],
    ancestors: Set<object>
): JSONSchema7Definition[] {
    return schemas.map(schema => openApiSchemaToJsonSchema(schema, ancestors));
}

/**
 * Converts an OpenAPI Schema Object to JSON Schema, keeping nullability,
 * formats, constraints and nested structure. A schema that recurs within
 * itself, or an unresolved reference, becomes a described object placeholder.
 */
export function openApiSchemaToJsonSchema(
    openApiSchema: OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject | undefined,
    ancestors: Set<object> = new Set()
): PropertySchema {
    if (!openApiSchema) return {};
    if (isReferenceObject(openApiSchema) || ancestors.has(openApiSchema)) {
        return { ...RECURSIVE_REFERENCE };
    }

    const nested = new Set(ancestors).add(openApiSchema);
    const jsonSchema: PropertySchema = {};
    const type = mapOpenApiTypeToJsonSchemaType(openApiSchema);

    if (type) {
        // JSON Schema expresses OpenAPI's nullable as a type union
        jsonSchema.type = openApiSchema.nullable === true ? [type, 'null'] : type;
    }
    if (openApiSchema.format) jsonSchema.format = openApiSchema.format;
    if (openApiSchema.title) jsonSchema.title = openApiSchema.title;
    if (openApiSchema.description) jsonSchema.description = openApiSchema.description;
    if (openApiSchema.default !== undefined) jsonSchema.default = openApiSchema.default;
    if (openApiSchema.enum) jsonSchema.enum = openApiSchema.enum;
    if (openApiSchema.example !== undefined) jsonSchema.example = openApiSchema.example;
    if (openApiSchema.readOnly) jsonSchema.readOnly = true;
    if (openApiSchema.writeOnly) jsonSchema.writeOnly = true;

    // Constraints
    if (typeof openApiSchema.minimum === 'number') jsonSchema.minimum = openApiSchema.minimum;
    if (typeof openApiSchema.maximum === 'number') jsonSchema.maximum = openApiSchema.maximum;
    if (typeof openApiSchema.minLength === 'number') jsonSchema.minLength = openApiSchema.minLength;
    if (typeof openApiSchema.maxLength === 'number') jsonSchema.maxLength = openApiSchema.maxLength;
    if (openApiSchema.pattern) jsonSchema.pattern = openApiSchema.pattern;
    if (typeof openApiSchema.multipleOf === 'number') jsonSchema.multipleOf = openApiSchema.multipleOf;
    if (typeof openApiSchema.minItems === 'number') jsonSchema.minItems = openApiSchema.minItems;
    if (typeof openApiSchema.maxItems === 'number') jsonSchema.maxItems = openApiSchema.maxItems;
    if (typeof openApiSchema.uniqueItems === 'boolean') jsonSchema.uniqueItems = openApiSchema.uniqueItems;

    if (openApiSchema.properties) {
        const properties: Record<string, JSONSchema7Definition> = {};
        for (const [propName, propSchema] of Object.entries(openApiSchema.properties)) {
            properties[propName] = openApiSchemaToJsonSchema(propSchema, nested);
        }
        jsonSchema.properties = properties;
    }
    if (openApiSchema.required && openApiSchema.required.length > 0) {
        jsonSchema.required = [...openApiSchema.required];
    }

    const additional = openApiSchema.additionalProperties;
    if (typeof additional === 'boolean') {
        jsonSchema.additionalProperties = additional;
    } else if (additional !== undefined) {
        jsonSchema.additionalProperties = openApiSchemaToJsonSchema(additional, nested);
    }

    if (openApiSchema.type === 'array') {
        jsonSchema.items = openApiSchemaToJsonSchema(openApiSchema.items, nested);
    }

    if (openApiSchema.allOf) jsonSchema.allOf = convertAll(openApiSchema.allOf, nested);
    if (openApiSchema.oneOf) jsonSchema.oneOf = convertAll(openApiSchema.oneOf, nested);
    if (openApiSchema.anyOf) jsonSchema.anyOf = convertAll(openApiSchema.anyOf, nested);
    if (openApiSchema.not) jsonSchema.not = openApiSchemaToJsonSchema(openApiSchema.not, nested);

    return jsonSchema;
}

function capitalize(value: string): string {
    return value.length === 0 ? value : value.charAt(0).toUpperCase() + value.slice(1);
}

export function sanitizeToolName(name: string): string {
    return name.replace(/[^A-Za-z0-9_-]/g, '_');
}

/**
 * Makes an operation id read as an action: `pets` on GET becomes `getPets`,
 * while `listPets` is already one and stays as it is.
 */
export function actionOrientedName(operationId: string, method: HttpMethod): string {
    const lower = operationId.toLowerCase();
    if (ACTION_VERBS.some(verb => lower.startsWith(verb))) {
        return operationId;
    }
    const prefix = METHOD_PREFIXES[method];
    return prefix ? prefix + capitalize(operationId) : operationId;
}

function parameterProperty(param: ParameterSpec): PropertySchema {
    const property: PropertySchema = param.schema ? openApiSchemaToJsonSchema(param.schema) : { type: 'string' };
    property.description = LOCATION_PREFIXES[param.location] + (param.description ?? param.schema?.description ?? param.name);
    property['x-parameter-location'] = param.location;
    if (param.deprecated) property.deprecated = true;
    if (param.example !== undefined) property.example = param.example;
    return property;
}

function authDescription(scheme: string, scopes: string[]): string {
    const base = `Authentication (${scheme}): Required for this operation.`;
    return scopes.length > 0 ? `${base} Required scopes: ${scopes.join(', ')}` : base;
}

function buildInputSchema(operation: OperationSpec, index: DescriptionIndex): ToolInputSchema {
    const properties: Record<string, JSONSchema7Definition> = {};
    const required: string[] = [];

    const addProperty = (key: string, schema: JSONSchema7Definition, isRequired: boolean): void => {
        if (key in properties) {
            // Reserved argument names are not renamed; the later property wins
            logger.warn(`Argument '${key}' of ${operation.id} is declared twice; the later declaration replaces the earlier one`);
            const at = required.indexOf(key);
            if (at >= 0) required.splice(at, 1);
        }
        properties[key] = schema;
        if (isRequired) required.push(key);
    };

    for (const location of ['path', 'query', 'header'] as const) {
        for (const param of operation.parameters.filter(p => p.location === location)) {
            const key = location === 'header' ? `header_${param.name}` : param.name;
            addProperty(key, parameterProperty(param), location === 'path' || param.required);
        }
    }

    const body = operation.requestBody;
    if (body && isBodyMethod(operation.method)) {
        const bodySchema: JSONSchema7 = body.schema ? openApiSchemaToJsonSchema(body.schema) : { type: 'object' };
        bodySchema.description = `Request Body: ${body.description ?? 'Data to be sent in the request'}`;
        addProperty('body', bodySchema, body.required);
    }

    for (const requirement of operation.security) {
        addProperty(`auth_${requirement.scheme}`, {
            type: 'string',
            description: authDescription(requirement.scheme, requirement.scopes),
        }, false);
    }

    const inputSchema: ToolInputSchema = { type: 'object', properties };
    if (required.length > 0) inputSchema.required = required;

    const annotations: Record<string, unknown> = { ...operation.extensions };
    if (index.linkedData !== undefined) annotations['x-linkedData'] = index.linkedData;
    if (Object.keys(annotations).length > 0) inputSchema['x-semantic-annotations'] = annotations;

    return inputSchema;
}

function buildAnnotations(operation: OperationSpec): ToolAnnotations {
    const { method } = operation;
    const annotations: ToolAnnotations = {
        readOnlyHint: method === 'GET' || method === 'HEAD' || method === 'OPTIONS',
        destructiveHint: method === 'DELETE',
        idempotentHint: method !== 'POST' && method !== 'PATCH',
        openWorldHint: true,
        'x-openapi-path': operation.path,
        'x-openapi-method': method,
    };
    if (operation.summary) annotations.title = operation.summary;
    return annotations;
}

/**
 * Synthesizes the tool definition of one operation. The name is not yet
 * deduplicated against other tools.
 */
export function synthesizeTool(operation: OperationSpec, index: DescriptionIndex): ToolDefinition {
    const name = sanitizeToolName(operation.override?.name ?? actionOrientedName(operation.id, operation.method));
    const override = operation.override?.description;
    const description = override !== undefined ? sanitizeText(override) : buildCapabilityDescription(operation, index);

    return {
        name,
        description,
        inputSchema: buildInputSchema(operation, index),
        annotations: buildAnnotations(operation),
    };
}

function matchesAny(operation: OperationSpec, patterns: string[]): boolean {
    const urlPattern = `${operation.method}:${operation.path}`;
    return patterns.some(pattern =>
        minimatch(operation.id, pattern)
        || (operation.operationId !== undefined && minimatch(operation.operationId, pattern))
        || minimatch(urlPattern, pattern));
}

/**
 * Checks an operation against the whitelist, or failing that the blacklist.
 * Patterns are globs over the operation id and `METHOD:/path`.
 */
export function shouldIncludeOperation(operation: OperationSpec, filter: OperationFilter): boolean {
    if (filter.whitelist) {
        return matchesAny(operation, filter.whitelist);
    }
    if (filter.blacklist.length > 0) {
        return !matchesAny(operation, filter.blacklist);
    }
    return true;
}

export function mapDescriptionToTools(
    index: DescriptionIndex,
    filter: OperationFilter = { whitelist: null, blacklist: [] }
): MappedTool[] {
    const mappedTools: MappedTool[] = [];
    const takenNames = new Set<string>();

    for (const operation of index.operations) {
        if (!shouldIncludeOperation(operation, filter)) {
            logger.info(`Skipping operation ${operation.id} (${operation.method} ${operation.path}) due to filter rules.`);
            continue;
        }

        const synthesized = synthesizeTool(operation, index);
        const name = claimUniqueName(synthesized.name, takenNames);
        if (name !== synthesized.name) {
            logger.warn(`Tool name '${synthesized.name}' is already taken; ${operation.method} ${operation.path} is exposed as '${name}'`);
        }

        mappedTools.push({ definition: { ...synthesized, name }, operation });
        logger.debug(`Mapped tool: ${name} (${operation.method} ${operation.path})`);
    }

    logger.info(`Total tools mapped: ${mappedTools.length}`);
    return mappedTools;
}
