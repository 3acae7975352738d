#!/usr/bin/env node
/**
 * weathercaster
 * Entry point
 */

import { describeError, runCli } from './cli.js';
import { logger } from './logger.js';

async function main(): Promise<void> {
    try {
        await runCli(process.argv.slice(2), process.env, process.stdout);
    } catch (error) {
        logger.debug('Forecast failed', { stack: error instanceof Error ? error.stack : undefined });
        console.error(describeError(error));
        process.exitCode = 1;
    }
}

main().catch(error => {
    console.error('Unhandled error:', error);
    process.exit(1);
});
