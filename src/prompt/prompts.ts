import { ChatCompletionMessageParam } from 'openai/resources';

export const createTranslationMessages = (text: string, targetLanguage: string): ChatCompletionMessageParam[] => [
    { role: 'user', content: `Translate the following text to ${targetLanguage}:\n\n${text}` },
];

export const createToneMessages = (text: string, customTonePrompt: string): ChatCompletionMessageParam[] => [
    { role: 'user', content: `${customTonePrompt}\n\n${text}` },
];
