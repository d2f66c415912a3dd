import type { JSONSchema7Definition } from 'json-schema';
import type { OpenAPIV3 } from 'openapi-types';

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE' | 'OPTIONS' | 'HEAD' | 'PATCH' | 'TRACE';

export type ParameterLocation = 'path' | 'query' | 'header';

// One declared parameter of an operation, after path-level and operation-level merging
export interface ParameterSpec {
    name: string;
    location: ParameterLocation;
    required: boolean;
    schema?: OpenAPIV3.SchemaObject;
    description?: string;
    deprecated?: boolean;
    example?: unknown;
}

export interface RequestBodySpec {
    required: boolean;
    contentType?: string;
    schema?: OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject;
    description?: string;
}

export interface SecurityRequirement {
    scheme: string;
    scopes: string[];
}

export interface SecuritySchemeSpec {
    type: 'apiKey' | 'http' | 'oauth2' | 'openIdConnect';
    description?: string;
    in?: string; // apiKey only
    name?: string; // apiKey only
    scheme?: string; // http only
}

export interface ToolOverride {
    name?: string;
    description?: string;
}

export interface OperationSpec {
    id: string;
    operationId?: string;
    method: HttpMethod;
    path: string;
    parameters: ParameterSpec[];
    requestBody?: RequestBodySpec;
    security: SecurityRequirement[];
    summary?: string;
    description?: string;
    pathSummary?: string;
    tags: string[];
    deprecated: boolean;
    externalDocs?: { description?: string; url?: string };
    extensions: Record<string, unknown>;
    override?: ToolOverride;
}

export interface DescriptionIndex {
    title: string;
    version: string;
    description?: string;
    servers: string[];
    tagDescriptions: Record<string, string>;
    securitySchemes: Record<string, SecuritySchemeSpec>;
    linkedData?: unknown;
    operations: OperationSpec[];
}

export type ToolInputSchema = {
    type: 'object';
    properties: Record<string, JSONSchema7Definition>;
    required?: string[];
    'x-semantic-annotations'?: Record<string, unknown>;
};

export type ToolAnnotations = {
    title?: string;
    readOnlyHint: boolean;
    destructiveHint: boolean;
    idempotentHint: boolean;
    openWorldHint: boolean;
    'x-openapi-path': string;
    'x-openapi-method': HttpMethod;
};

export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: ToolInputSchema;
    annotations: ToolAnnotations;
}

// A synthesized tool paired with the operation it dispatches to
export interface MappedTool {
    definition: ToolDefinition;
    operation: OperationSpec;
}

export type ArgumentValue =
    | string
    | number
    | boolean
    | null
    | undefined
    | ArgumentValue[]
    | { [key: string]: ArgumentValue };

export type CallArguments = Record<string, ArgumentValue>;

export type HeaderEntry = readonly [name: string, value: string];

export interface CompiledRequest {
    method: HttpMethod;
    url: string;
    headers: HeaderEntry[];
    body?: string;
    contentType?: string;
}

export type TextContent = {
    type: 'text';
    text: string;
};

export type ToolResult = {
    isError: boolean;
    content: TextContent[];
};

export interface OperationFilter {
    whitelist: string[] | null;
    blacklist: string[];
}

export type DescriptionSource =
    | { kind: 'file'; path: string }
    | { kind: 'url'; url: string }
    | { kind: 'inline'; text: string };
