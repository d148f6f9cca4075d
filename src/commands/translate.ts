import { OUTPUT_FOOTER } from '../constants';
import { getLogger, Logger } from '../logging';
import { createTranslationMessages } from '../prompt/prompts';
import { Config, SecureConfig } from '../types';
import { ChatClient, getChatModel, MistralClient } from '../util/mistral';

export interface TranslateDependencies {
    logger?: Logger;
    chat?: ChatClient;
}

export const formatTranslation = (text: string, targetLanguage: string): string =>
    `\n--- Translated Text (${targetLanguage}) ---\n${text}\n${OUTPUT_FOOTER}`;

export const execute = async (
    text: string,
    runConfig: Config,
    secureConfig: SecureConfig,
    dependencies: TranslateDependencies = {}
): Promise<string> => {
    const logger = dependencies.logger ?? getLogger();
    const chat = dependencies.chat ?? new MistralClient(secureConfig, logger);
    const { targetLanguage } = runConfig.translate;

    logger.info(`Translating text to ${targetLanguage}...`);
    const translated = await chat.complete(
        createTranslationMessages(text, targetLanguage),
        getChatModel(runConfig.largeModel)
    );

    return formatTranslation(translated, targetLanguage);
};
