import child_process from 'child_process';
import { getLogger } from '../logging';

/**
 * Runs a program without a shell, writes `input` to its stdin and resolves once it exits
 * with code 0. Output is discarded.
 */
export async function runWithInput(command: string, args: string[], input: string): Promise<void> {
    const logger = getLogger();

    return new Promise((resolve, reject) => {
        logger.verbose(`Executing command: ${[command, ...args].join(' ')}`);

        const child = child_process.spawn(command, args, {
            stdio: ['pipe', 'ignore', 'ignore'],
        });

        child.on('close', (code) => {
            if (code === 0) {
                logger.verbose(`Command completed successfully with code ${code}`);
                resolve();
            } else {
                reject(new Error(`Command "${command}" failed with exit code ${code}`));
            }
        });

        child.on('error', (error) => {
            logger.verbose(`Command failed to start: ${error.message}`);
            reject(error);
        });

        // A program that exits before reading its input closes the pipe; 'close' reports the outcome
        child.stdin?.on('error', (error) => {
            logger.verbose(`Could not write to ${command}: ${error.message}`);
        });
        child.stdin?.end(input);
    });
}
