import { Command, CommanderError } from "commander";
import { z } from "zod";
import {
    ALLOWED_COMMANDS,
    COMMAND_CHANGE_TONE,
    COMMAND_RECORD,
    COMMAND_TRANSLATE,
    DEFAULT_REQUEST_TIMEOUT_MS,
    MISTRAL_API_KEY_ENV,
    MISTRAL_TIMEOUT_ENV,
    PROGRAM_NAME,
    TRANSCRIBE_DEFAULTS,
    VERSION,
} from "./constants";
import { ConfigurationError } from "./error/CommandErrors";
import { getLogger } from "./logging";
import { CommandConfig, Config, ConfigSchema, RecordConfig, SecureConfig, SecureConfigSchema, TranslateConfig } from './types';

export const InputSchema = z.object({
    verbose: z.boolean().optional(),
    debug: z.boolean().optional(),
    largeModel: z.boolean().optional(),
    toClipboard: z.boolean().optional(),
    confirmThreshold: z.number().nonnegative().optional(),
    audioDevice: z.string().optional(),
    targetLanguage: z.string().optional(),
    customTonePrompt: z.string().optional(),
});

export type Input = z.infer<typeof InputSchema>;

/** Config as given on the command line: every field may be missing. */
export type ConfigOverrides = Partial<Pick<Config, 'verbose' | 'debug' | 'largeModel'>> & {
    record?: Partial<RecordConfig>;
    translate?: Partial<TranslateConfig>;
    changeTone?: { customTonePrompt?: string };
};

// The merged result is checked against ConfigSchema, so entries stay untyped here
const definedEntries = (value: object | undefined): Record<string, unknown> =>
    Object.fromEntries(Object.entries(value ?? {}).filter(([, v]) => v !== undefined));

const describeZodError = (error: z.ZodError): string =>
    error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ');

// Function to transform flat CLI args into nested Config structure
export const transformCliArgs = (finalCliArgs: Input): ConfigOverrides => {
    const transformedCliArgs: ConfigOverrides = {};

    if (finalCliArgs.verbose !== undefined) transformedCliArgs.verbose = finalCliArgs.verbose;
    if (finalCliArgs.debug !== undefined) transformedCliArgs.debug = finalCliArgs.debug;
    if (finalCliArgs.largeModel !== undefined) transformedCliArgs.largeModel = finalCliArgs.largeModel;

    if (finalCliArgs.toClipboard !== undefined || finalCliArgs.confirmThreshold !== undefined || finalCliArgs.audioDevice !== undefined) {
        transformedCliArgs.record = {};
        if (finalCliArgs.toClipboard !== undefined) transformedCliArgs.record.toClipboard = finalCliArgs.toClipboard;
        if (finalCliArgs.confirmThreshold !== undefined) transformedCliArgs.record.confirmThreshold = finalCliArgs.confirmThreshold;
        if (finalCliArgs.audioDevice !== undefined) transformedCliArgs.record.audioDevice = finalCliArgs.audioDevice;
    }

    if (finalCliArgs.targetLanguage !== undefined) {
        transformedCliArgs.translate = { targetLanguage: finalCliArgs.targetLanguage };
    }

    if (finalCliArgs.customTonePrompt !== undefined) {
        transformedCliArgs.changeTone = { customTonePrompt: finalCliArgs.customTonePrompt };
    }

    return transformedCliArgs;
};

const parseSeconds = (value: string): number => Number(value);

const addSharedOptions = (command: Command): Command => command
    .option('--large-model', 'use the larger transcription and chat models')
    .option('--verbose', 'enable verbose logging')
    .option('--debug', 'enable debug logging');

export const createProgram = (onCommand: (commandConfig: CommandConfig, rawInput: unknown) => void): Command => {
    const program = new Command();

    program
        .name(PROGRAM_NAME)
        .description('Record speech and transcribe it, or translate and rephrase text, using the Mistral API')
        .version(VERSION)
        .exitOverride()
        .configureOutput({ outputError: () => undefined });

    addSharedOptions(program);

    program
        .command(COMMAND_RECORD)
        .description('record from the microphone until Enter (keep) or Esc (discard), then transcribe')
        .option('--to-clipboard', 'copy the transcription to the clipboard')
        .option('--confirm-threshold <seconds>', 'ask before transcribing recordings longer than this', parseSeconds)
        .option('--audio-device <device>', 'ALSA capture device')
        .action((_options: unknown, command: Command) => {
            onCommand({ commandName: COMMAND_RECORD }, command.optsWithGlobals());
        });

    program
        .command(COMMAND_TRANSLATE)
        .description('translate text to another language')
        .argument('<text>', 'text to translate')
        .option('--target-language <language>', 'language to translate into')
        .action((text: string, _options: unknown, command: Command) => {
            onCommand({ commandName: COMMAND_TRANSLATE, text }, command.optsWithGlobals());
        });

    program
        .command(COMMAND_CHANGE_TONE)
        .description('rewrite text following a tone instruction')
        .argument('<text>', 'text to rephrase')
        .requiredOption('--custom-tone-prompt <prompt>', 'instruction describing the tone to apply')
        .action((text: string, _options: unknown, command: Command) => {
            onCommand({ commandName: COMMAND_CHANGE_TONE, text }, command.optsWithGlobals());
        });

    program.action(() => {
        program.outputHelp();
    });

    return program;
};

export async function getCliConfig(argv: string[]): Promise<[Input, CommandConfig]> {
    let commandConfig: CommandConfig = {};
    let rawInput: unknown = {};

    const program = createProgram((selected, input) => {
        commandConfig = selected;
        rawInput = input;
    });

    try {
        await program.parseAsync(argv);
    } catch (error: unknown) {
        if (error instanceof CommanderError) {
            // --help and --version end the run without a command
            if (error.exitCode === 0) {
                return [{}, {}];
            }
            throw new ConfigurationError(error.message.replace(/^error: /, ''), error);
        }
        throw error;
    }

    const parsed = InputSchema.safeParse(rawInput);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid options: ${describeZodError(parsed.error)}`, parsed.error);
    }

    return [parsed.data, commandConfig];
}

export async function validateAndProcessSecureOptions(env: NodeJS.ProcessEnv = process.env): Promise<SecureConfig> {
    const mistralApiKey = env[MISTRAL_API_KEY_ENV];
    if (!mistralApiKey) {
        throw new ConfigurationError(`Mistral API key is required. Please set the ${MISTRAL_API_KEY_ENV} environment variable.`);
    }

    const timeout = env[MISTRAL_TIMEOUT_ENV];
    const result = SecureConfigSchema.safeParse({
        mistralApiKey,
        requestTimeoutMs: timeout === undefined || timeout === '' ? DEFAULT_REQUEST_TIMEOUT_MS : Number(timeout),
    });
    if (!result.success) {
        throw new ConfigurationError(
            `${MISTRAL_TIMEOUT_ENV} must be a positive number of milliseconds, got "${timeout}"`,
            result.error
        );
    }

    return result.data;
}

export async function validateAndProcessOptions(options: ConfigOverrides): Promise<Config> {
    const finalConfig = {
        verbose: options.verbose ?? TRANSCRIBE_DEFAULTS.verbose,
        debug: options.debug ?? TRANSCRIBE_DEFAULTS.debug,
        largeModel: options.largeModel ?? TRANSCRIBE_DEFAULTS.largeModel,
        record: {
            ...TRANSCRIBE_DEFAULTS.record,
            ...definedEntries(options.record),
        },
        translate: {
            ...TRANSCRIBE_DEFAULTS.translate,
            ...definedEntries(options.translate),
        },
        changeTone: definedEntries(options.changeTone),
    };

    const result = ConfigSchema.safeParse(finalConfig);
    if (!result.success) {
        throw new ConfigurationError(`Invalid configuration: ${describeZodError(result.error)}`, result.error);
    }
    return result.data;
}

export function validateCommand(commandName: string): string {
    if (!ALLOWED_COMMANDS.includes(commandName)) {
        throw new ConfigurationError(`Invalid command: ${commandName}, allowed commands: ${ALLOWED_COMMANDS.join(', ')}`);
    }
    return commandName;
}

export const configure = async (argv: string[] = process.argv): Promise<[Config, CommandConfig]> => {
    const logger = getLogger();

    const [finalCliArgs, commandConfig] = await getCliConfig(argv);
    if (commandConfig.commandName) {
        validateCommand(commandConfig.commandName);
    }

    const config = await validateAndProcessOptions(transformCliArgs(finalCliArgs));
    logger.debug('Resolved configuration: %s', JSON.stringify(config));

    return [config, commandConfig];
};
