import { CommandError, RequestError, UserCancellationError } from '../error/CommandErrors';
import { Logger } from '../logging';

export interface ErrorHandlerOptions {
    logger: Logger;
    command: string;
}

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Reports a failed command as a single line and returns the process exit code.
 * Causes, response bodies and stack traces only go to the debug log.
 */
export const handleCommandError = (error: unknown, options: ErrorHandlerOptions): number => {
    const { logger, command } = options;

    // Handle user cancellation gracefully
    if (error instanceof UserCancellationError) {
        logger.info(error.message);
        return 0;
    }

    if (error instanceof CommandError) {
        logger.error(`${command} failed: ${error.message}`);
        logger.debug(`Error code: ${error.code}`);
        if (error instanceof RequestError && error.responseBody) {
            logger.debug(`Response body: ${error.responseBody}`);
        }
        if (error.cause) {
            logger.debug(`Caused by: ${error.cause.message}`);
            logger.debug(`Stack trace: ${error.cause.stack ?? ''}`);
        }

        // Provide recovery suggestions for recoverable errors
        if (error.recoverable) {
            logger.info('This error is recoverable. You may try again.');
        }
        return 1;
    }

    // Handle unexpected errors
    logger.error(`${command} encountered unexpected error: ${describe(error)}`);
    if (error instanceof Error && error.stack) {
        logger.debug(`Stack trace: ${error.stack}`);
    }
    return 1;
};
