import { executeRequest } from './apiClient';
import { CompileError, ConfigurationError } from './errors';
import { logger } from './logger';
import { mapDescriptionToTools } from './mcpMapper';
import { buildDescriptionIndex } from './openapiProcessor';
import { compileRequest } from './requestCompiler';
import { errorResult } from './responseFormatter';
import type {
    ArgumentValue,
    CallArguments,
    CompiledRequest,
    DescriptionIndex,
    MappedTool,
    OperationFilter,
    ToolDefinition,
    ToolResult,
} from './types';

export interface RegistryOptions {
    baseUrl?: string;
    filter?: OperationFilter;
    timeoutMs?: number;
    additionalHeaders?: Record<string, string>;
    disableXMcp?: boolean;
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

function isArgumentValue(value: unknown): value is ArgumentValue {
    switch (typeof value) {
        case 'string':
        case 'number':
        case 'boolean':
        case 'undefined':
            return true;
        case 'object':
            if (value === null) return true;
            if (Array.isArray(value)) return value.every(isArgumentValue);
            return Object.values(value).every(isArgumentValue);
        default:
            return false;
    }
}

function isCallArguments(value: unknown): value is CallArguments {
    return typeof value === 'object'
        && value !== null
        && !Array.isArray(value)
        && Object.values(value).every(isArgumentValue);
}

function resolveBaseUrl(configured: string | undefined, index: DescriptionIndex): string {
    const baseUrl = configured ?? index.servers[0];
    if (!baseUrl) {
        throw new ConfigurationError('No target API base URL configured and the API description declares no servers');
    }
    try {
        new URL(baseUrl);
    } catch {
        throw new ConfigurationError(`Target API base URL is not an absolute URL: ${baseUrl}`, { baseUrl });
    }
    return baseUrl;
}

/**
 * The immutable set of tools synthesized from one API description, and the
 * single entry point for invoking them.
 */
export class ToolRegistry {
    private readonly tools: ReadonlyMap<string, MappedTool>;
    private readonly definitions: readonly ToolDefinition[];

    private constructor(
        readonly index: DescriptionIndex,
        mappedTools: MappedTool[],
        readonly baseUrl: string,
        private readonly options: RegistryOptions
    ) {
        this.tools = new Map(mappedTools.map(tool => [tool.definition.name, tool]));
        this.definitions = deepFreeze(mappedTools.map(tool => tool.definition));
        deepFreeze(mappedTools);
    }

    /**
     * Builds every tool from the raw description text. Any parse failure
     * aborts the whole build; no partial registry is ever returned.
     */
    static async fromDescription(rawDescription: string, options: RegistryOptions = {}): Promise<ToolRegistry> {
        const index = await buildDescriptionIndex(rawDescription);
        const baseUrl = resolveBaseUrl(options.baseUrl, index);
        const mappedTools = mapDescriptionToTools(index, options.filter);
        logger.info(`Tool registry ready: ${mappedTools.length} tools targeting ${baseUrl}`);
        return new ToolRegistry(index, mappedTools, baseUrl, options);
    }

    get title(): string {
        return this.index.title;
    }

    get version(): string {
        return this.index.version;
    }

    listTools(): readonly ToolDefinition[] {
        return this.definitions;
    }

    hasTool(name: string): boolean {
        return this.tools.has(name);
    }

    async callTool(name: string, args: unknown, signal?: AbortSignal): Promise<ToolResult> {
        const tool = this.tools.get(name);
        if (!tool) {
            logger.warn(`Unknown tool requested: ${name}`);
            return errorResult(`Unknown tool: ${name}`);
        }

        const callArgs = args ?? {};
        if (!isCallArguments(callArgs)) {
            logger.warn(`Invalid arguments for ${name}: expected an object`);
            return errorResult('Invalid input: expected an object');
        }

        let request: CompiledRequest;
        try {
            request = compileRequest(tool.operation, callArgs, this.baseUrl);
        } catch (error) {
            if (error instanceof CompileError) {
                logger.warn(`Cannot compile request for ${name}: ${error.message}`);
                return errorResult(error.message);
            }
            throw error;
        }

        return executeRequest(request, {
            operationId: tool.operation.id,
            pathTemplate: tool.operation.path,
            timeoutMs: this.options.timeoutMs,
            additionalHeaders: this.options.additionalHeaders,
            disableXMcp: this.options.disableXMcp,
            signal,
        });
    }
}
