import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import { z } from 'zod';
import { DEFAULT_TIMEOUT_MS } from './apiClient';
import { ConfigurationError, getErrorMessage } from './errors';
import { logger } from './logger';
import { isHttpUrl } from './utils/httpClient';

const DEFAULT_CONFIG_FILES = ['config.json', 'openapi-mcp.json', '.openapi-mcp.json'];

const FileConfigSchema = z.object({
    spec: z.string().optional(),
    targetUrl: z.string().optional(),
    headers: z.union([z.string(), z.record(z.string())]).optional(),
    whitelist: z.union([z.string(), z.array(z.string())]).optional(),
    blacklist: z.union([z.string(), z.array(z.string())]).optional(),
    enableTools: z.boolean().optional(),
    advertiseTools: z.boolean().optional(),
    timeout: z.number().optional(),
    disableXMcp: z.boolean().optional(),
});

type FileConfig = z.infer<typeof FileConfigSchema>;

const AppConfigSchema = z.object({
    source: z.discriminatedUnion('kind', [
        z.object({ kind: z.literal('file'), path: z.string().min(1) }),
        z.object({ kind: z.literal('url'), url: z.string().url() }),
        z.object({ kind: z.literal('inline'), text: z.string().min(1) }),
    ]),
    targetApiBaseUrl: z.string().url().optional(),
    additionalHeaders: z.record(z.string()),
    filter: z.object({
        whitelist: z.array(z.string()).nullable(),
        blacklist: z.array(z.string()),
    }),
    enableTools: z.boolean(),
    advertiseTools: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    disableXMcp: z.boolean(),
});

export type AppConfig = Readonly<z.infer<typeof AppConfigSchema>>;

type Environment = Record<string, string | undefined>;

/**
 * Accepts true|yes|1|on and false|no|0|off, case-insensitive
 */
export function parseBoolean(value: string | undefined, name: string): boolean | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    switch (value.trim().toLowerCase()) {
        case 'true': case 'yes': case '1': case 'on':
            return true;
        case 'false': case 'no': case '0': case 'off':
            return false;
        default:
            throw new ConfigurationError(`Invalid boolean value for ${name}: ${value}`);
    }
}

function readConfigFile(configPath: string): FileConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    } catch (error) {
        throw new ConfigurationError(`Error loading JSON config from ${configPath}: ${getErrorMessage(error)}`);
    }

    const parsed = FileConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid configuration file ${configPath}: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
    }
    logger.info(`Loaded configuration from ${configPath}`);
    return parsed.data;
}

function findConfigFile(argv: string[], env: Environment, cwd: string): string | undefined {
    const flagIndex = argv.findIndex(arg => arg === '--config' || arg === '-c');
    if (flagIndex >= 0 && argv[flagIndex + 1]) {
        return path.resolve(cwd, argv[flagIndex + 1]);
    }
    const inline = argv.find(arg => arg.startsWith('--config='));
    if (inline) {
        return path.resolve(cwd, inline.slice('--config='.length));
    }
    if (env.CONFIG_FILE) {
        return path.resolve(cwd, env.CONFIG_FILE);
    }
    return DEFAULT_CONFIG_FILES
        .map(name => path.resolve(cwd, name))
        .find(candidate => fs.existsSync(candidate));
}

function parseJsonHeaders(text: string, origin: string): Record<string, string> {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ConfigurationError(`Failed to parse custom headers JSON from ${origin}: ${getErrorMessage(error)}`);
    }
    const parsed = z.record(z.string()).safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(`Custom headers from ${origin} must be a JSON object of string values`);
    }
    return parsed.data;
}

/**
 * `Name: value` pairs, one per line
 */
export function parseHeaderLines(text: string): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const line of text.split(/\r?\n/)) {
        const separator = line.indexOf(':');
        if (separator <= 0) continue;
        const name = line.slice(0, separator).trim();
        if (name) headers[name] = line.slice(separator + 1).trim();
    }
    return headers;
}

function headersFromEnvironment(env: Environment): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (key.startsWith('HEADER_') && key.length > 'HEADER_'.length && value !== undefined) {
            headers[key.slice('HEADER_'.length)] = value;
        }
    }
    return env.EXTRA_HEADERS ? { ...headers, ...parseHeaderLines(env.EXTRA_HEADERS) } : headers;
}

function splitPatterns(value: string | undefined): string[] | undefined {
    if (value === undefined) return undefined;
    const patterns = value.split(',').map(pattern => pattern.trim()).filter(pattern => pattern.length > 0);
    return patterns.length > 0 ? patterns : undefined;
}

function joinPatterns(value: string | string[] | undefined): string | undefined {
    return Array.isArray(value) ? value.join(',') : value;
}

function parseTimeout(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    const timeout = Number(value);
    if (!Number.isInteger(timeout) || timeout <= 0) {
        throw new ConfigurationError(`Invalid REQUEST_TIMEOUT_MS: ${value}`);
    }
    return timeout;
}

/**
 * Reads `.env` into process.env and returns it
 */
export function loadEnvironment(): Environment {
    dotenv.config();
    return process.env;
}

/**
 * Builds the frozen runtime configuration. Command-line flags win over the
 * JSON config file, which wins over environment variables.
 */
export function loadConfig(
    argv: string[] = hideBin(process.argv),
    env: Environment = loadEnvironment(),
    cwd: string = process.cwd()
): AppConfig {
    const configPath = findConfigFile(argv, env, cwd);
    const fileConfig: FileConfig = configPath ? readConfigFile(configPath) : {};

    const fileHeaders = fileConfig.headers;
    const args = yargs(argv)
        .option('config', {
            alias: 'c',
            type: 'string',
            description: 'Path to JSON configuration file',
        })
        .option('spec', {
            alias: 's',
            type: 'string',
            description: 'Path or URL of the OpenAPI description',
            default: fileConfig.spec ?? env.OPENAPI_SPEC_PATH,
        })
        .option('targetUrl', {
            alias: 'u',
            type: 'string',
            description: 'Target API base URL (overrides OpenAPI servers)',
            default: fileConfig.targetUrl ?? env.TARGET_API_BASE_URL ?? env.API_BASE_URL,
        })
        .option('headers', {
            type: 'string',
            description: 'JSON string containing custom headers to include in all API requests',
            default: typeof fileHeaders === 'object' ? JSON.stringify(fileHeaders) : fileHeaders ?? env.CUSTOM_HEADERS,
        })
        .option('whitelist', {
            alias: 'w',
            type: 'string',
            description: 'Comma-separated operationIds or METHOD:/path patterns to include (glob patterns)',
            default: joinPatterns(fileConfig.whitelist) ?? env.MCP_WHITELIST_OPERATIONS,
        })
        .option('blacklist', {
            alias: 'b',
            type: 'string',
            description: 'Comma-separated operationIds or METHOD:/path patterns to exclude (ignored if whitelist used)',
            default: joinPatterns(fileConfig.blacklist) ?? env.MCP_BLACKLIST_OPERATIONS,
        })
        .option('enableTools', {
            type: 'boolean',
            description: 'Expose the tools capability',
            default: fileConfig.enableTools ?? parseBoolean(env.ENABLE_TOOLS, 'ENABLE_TOOLS') ?? true,
        })
        .option('advertiseTools', {
            type: 'boolean',
            description: 'List the tools in tools/list responses',
            default: fileConfig.advertiseTools ?? parseBoolean(env.CAPABILITIES_TOOLS, 'CAPABILITIES_TOOLS') ?? true,
        })
        .option('timeout', {
            alias: 't',
            type: 'number',
            description: 'Request timeout in milliseconds',
            default: fileConfig.timeout ?? parseTimeout(env.REQUEST_TIMEOUT_MS) ?? DEFAULT_TIMEOUT_MS,
        })
        .option('disableXMcp', {
            type: 'boolean',
            description: 'Disable adding X-MCP: 1 header to all API requests',
            default: fileConfig.disableXMcp ?? parseBoolean(env.DISABLE_X_MCP, 'DISABLE_X_MCP') ?? false,
        })
        .fail((message, error) => {
            throw new ConfigurationError(message || getErrorMessage(error));
        })
        .help()
        .parseSync();

    let source: z.input<typeof AppConfigSchema>['source'];
    if (args.spec) {
        source = isHttpUrl(args.spec)
            ? { kind: 'url', url: args.spec }
            : { kind: 'file', path: path.resolve(cwd, args.spec) };
    } else if (env.OPENAPI_SPEC) {
        source = { kind: 'inline', text: env.OPENAPI_SPEC };
    } else {
        throw new ConfigurationError('OpenAPI description is required. Set OPENAPI_SPEC_PATH or OPENAPI_SPEC, use --spec, or specify it in a config file.');
    }

    const additionalHeaders = {
        ...headersFromEnvironment(env),
        ...(args.headers ? parseJsonHeaders(args.headers, '--headers') : {}),
    };

    const parsed = AppConfigSchema.safeParse({
        source,
        targetApiBaseUrl: args.targetUrl || undefined,
        additionalHeaders,
        filter: {
            whitelist: splitPatterns(args.whitelist) ?? null,
            blacklist: splitPatterns(args.blacklist) ?? [],
        },
        enableTools: args.enableTools,
        advertiseTools: args.advertiseTools,
        requestTimeoutMs: args.timeout,
        disableXMcp: args.disableXMcp,
    });
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid configuration: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
    }

    const config = parsed.data;
    Object.freeze(config.additionalHeaders);
    Object.freeze(config.filter);
    return Object.freeze(config);
}

export function describeSource(config: AppConfig): string {
    switch (config.source.kind) {
        case 'file': return config.source.path;
        case 'url': return config.source.url;
        case 'inline': return 'inline OPENAPI_SPEC';
    }
}

export function logConfigSummary(config: AppConfig): void {
    logger.info('Configuration loaded:');
    logger.info(`- OpenAPI description: ${describeSource(config)}`);
    if (config.targetApiBaseUrl) {
        logger.info(`- Target API Base URL: ${config.targetApiBaseUrl}`);
    } else {
        logger.info(`- Target API Base URL: Will use 'servers' from the API description.`);
    }
    if (config.filter.whitelist) {
        logger.info(`- Whitelist Patterns: ${config.filter.whitelist.join(', ')}`);
    } else if (config.filter.blacklist.length > 0) {
        logger.info(`- Blacklist Patterns: ${config.filter.blacklist.join(', ')}`);
    }
    if (Object.keys(config.additionalHeaders).length > 0) {
        logger.info(`- Custom Headers: ${Object.keys(config.additionalHeaders).join(', ')}`);
    }
    logger.info(`- Tools: ${config.enableTools ? 'Enabled' : 'Disabled'}${config.advertiseTools ? '' : ' (not advertised)'}`);
    logger.info(`- Request timeout: ${config.requestTimeoutMs} ms`);
    logger.info(`- X-MCP Header: ${config.disableXMcp ? 'Disabled' : 'Enabled'}`);
}
