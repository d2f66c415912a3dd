import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { AppConfig } from './config';
import { logger } from './logger';
import { loadDescriptionText } from './openapiProcessor';
import { ToolRegistry } from './toolRegistry';
import type { ToolDefinition } from './types';

export interface ServerOptions {
    enableTools: boolean;
    advertiseTools: boolean;
}

function toProtocolTool(definition: ToolDefinition) {
    return {
        name: definition.name,
        description: definition.description,
        inputSchema: { ...definition.inputSchema },
        annotations: { ...definition.annotations },
    };
}

/**
 * Wraps a registry in an MCP server. With tools disabled the server declares
 * no tools capability at all; with advertising disabled `tools/list` is empty
 * but `tools/call` still dispatches.
 */
export function createMcpServer(registry: ToolRegistry, options: ServerOptions): Server {
    const server = new Server(
        { name: registry.title, version: registry.version || '1.0.0' },
        { capabilities: options.enableTools ? { tools: {} } : {} }
    );

    if (!options.enableTools) {
        logger.info('Tools capability disabled; no tools are registered');
        return server;
    }

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
        tools: options.advertiseTools ? registry.listTools().map(toProtocolTool) : [],
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
        const { name, arguments: args } = request.params;
        logger.info(`MCP tool '${name}' invoked`);

        const result = await registry.callTool(name, args, extra.signal);
        return {
            isError: result.isError,
            content: result.content.map(item => ({ type: 'text' as const, text: item.text })),
        };
    });

    return server;
}

/**
 * Loads the API description, builds the registry and serves it over stdio.
 * Any failure before the transport connects is fatal to the caller.
 */
export async function startServer(config: AppConfig): Promise<Server> {
    logger.info('Starting OpenAPI tool bridge...');

    const rawDescription = await loadDescriptionText(config.source);
    const registry = await ToolRegistry.fromDescription(rawDescription, {
        baseUrl: config.targetApiBaseUrl,
        filter: config.filter,
        timeoutMs: config.requestTimeoutMs,
        additionalHeaders: config.additionalHeaders,
        disableXMcp: config.disableXMcp,
    });

    if (registry.listTools().length === 0) {
        logger.warn('No tools were mapped from the API description with the current filter settings.');
    }
    if (registry.index.description) {
        logger.debug(`API Description: ${registry.index.description}`);
    }

    const server = createMcpServer(registry, {
        enableTools: config.enableTools,
        advertiseTools: config.advertiseTools,
    });

    await server.connect(new StdioServerTransport());
    logger.info('MCP Server started and ready for connections');
    return server;
}
