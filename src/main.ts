#!/usr/bin/env node
import { runApplication } from './application';
import { PROGRAM_NAME } from './constants';
import { getLogger } from './logging';
import { handleCommandError } from './util/errorHandler';

/**
 * Main entry point - minimal wrapper around the application logic
 */
async function main(): Promise<number> {
    try {
        await runApplication();
        return 0;
    } catch (error: unknown) {
        return handleCommandError(error, { logger: getLogger(), command: PROGRAM_NAME });
    }
}

main().then((exitCode) => {
    process.exit(exitCode);
}).catch((error: unknown) => {
    const logger = getLogger();
    logger.error('Unhandled error in main: %s', error instanceof Error ? error.message : String(error));
    process.exit(1);
});
