import 'dotenv/config';
import * as Arguments from './arguments';
import * as ChangeTone from './commands/change-tone';
import * as RecordCommand from './commands/record';
import * as Translate from './commands/translate';
import { COMMAND_CHANGE_TONE, COMMAND_RECORD, COMMAND_TRANSLATE, VERSION } from './constants';
import { UserCancellationError } from './error/CommandErrors';
import { getLogger, setLogLevel } from './logging';
import { Config } from './types';

/**
 * Print debug information about the command being executed when debug flag is enabled.
 */
function printDebugCommandInfo(commandName: string, runConfig: Config): void {
    if (runConfig.debug) {
        const logger = getLogger();
        logger.debug('Command being executed: %s', commandName);
        logger.debug('Version: %s', VERSION);
    }
}

/**
 * Set the log level from --verbose and --debug before the command line is fully parsed,
 * so that configuration problems are reported at the requested level.
 */
export function configureEarlyLogging(argv: string[] = process.argv): void {
    if (argv.includes('--debug')) {
        setLogLevel('debug');
    } else if (argv.includes('--verbose')) {
        setLogLevel('verbose');
    }
}

/**
 * Parses the command line, checks credentials and runs the selected command. Returns the
 * text the command printed, or an empty string when no command ran.
 */
export async function runApplication(argv: string[] = process.argv): Promise<string> {
    configureEarlyLogging(argv);

    const [runConfig, commandConfig] = await Arguments.configure(argv);

    if (runConfig.debug) {
        setLogLevel('debug');
    } else if (runConfig.verbose) {
        setLogLevel('verbose');
    }

    const logger = getLogger();
    const commandName = commandConfig.commandName;
    if (!commandName) {
        return '';
    }

    const secureConfig = await Arguments.validateAndProcessSecureOptions();
    printDebugCommandInfo(commandName, runConfig);

    let summary = '';
    try {
        if (commandName === COMMAND_RECORD) {
            summary = await RecordCommand.execute(runConfig, secureConfig);
        } else if (commandName === COMMAND_TRANSLATE) {
            summary = await Translate.execute(commandConfig.text ?? '', runConfig, secureConfig);
        } else if (commandName === COMMAND_CHANGE_TONE) {
            summary = await ChangeTone.execute(commandConfig.text ?? '', runConfig, secureConfig);
        }
    } catch (error: unknown) {
        // Handle user cancellation gracefully
        if (error instanceof UserCancellationError) {
            logger.info(error.message);
            return '';
        }

        // Re-throw other errors to be handled by main.ts
        throw error;
    }

    // eslint-disable-next-line no-console
    console.log(summary);
    return summary;
}
