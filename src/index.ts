#!/usr/bin/env node

import { loadConfig, logConfigSummary } from './config';
import { getErrorDetails } from './errors';
import { logger } from './logger';
import { startServer } from './server';

async function main(): Promise<void> {
    const config = loadConfig();
    logConfigSummary(config);
    await startServer(config);
}

main().catch((error: unknown) => {
    logger.error('Error starting server', error, getErrorDetails(error));
    process.exit(1);
});
