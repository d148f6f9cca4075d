import { OUTPUT_FOOTER } from '../constants';
import { ConfigurationError } from '../error/CommandErrors';
import { getLogger, Logger } from '../logging';
import { createToneMessages } from '../prompt/prompts';
import { Config, SecureConfig } from '../types';
import { ChatClient, getChatModel, MistralClient } from '../util/mistral';

export interface ChangeToneDependencies {
    logger?: Logger;
    chat?: ChatClient;
}

export const formatRephrased = (text: string): string =>
    `\n--- Rephrased Text ---\n${text}\n${OUTPUT_FOOTER}`;

export const execute = async (
    text: string,
    runConfig: Config,
    secureConfig: SecureConfig,
    dependencies: ChangeToneDependencies = {}
): Promise<string> => {
    const customTonePrompt = runConfig.changeTone?.customTonePrompt;
    if (!customTonePrompt) {
        throw new ConfigurationError('change-tone requires --custom-tone-prompt');
    }

    const logger = dependencies.logger ?? getLogger();
    const chat = dependencies.chat ?? new MistralClient(secureConfig, logger);

    logger.info('Changing the tone of the text...');
    const rephrased = await chat.complete(
        createToneMessages(text, customTonePrompt),
        getChatModel(runConfig.largeModel)
    );

    return formatRephrased(rephrased);
};
