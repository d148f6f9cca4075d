import { APIError, OpenAI } from 'openai';
import { ChatCompletionMessageParam } from 'openai/resources';
// eslint-disable-next-line no-restricted-imports
import fs from 'fs';
import {
    DEFAULT_CHAT_MODEL,
    DEFAULT_TRANSCRIPTION_MODEL,
    LARGE_CHAT_MODEL,
    LARGE_TRANSCRIPTION_MODEL,
    MISTRAL_API_BASE_URL,
} from '../constants';
import { RequestError } from '../error/CommandErrors';
import { getLogger, Logger } from '../logging';
import { SecureConfig } from '../types';

export interface TranscriptionClient {
    /** An aborted `signal` cancels the upload in flight */
    transcribe(filePath: string, model: string, signal?: AbortSignal): Promise<string>;
}

export interface ChatClient {
    complete(messages: ChatCompletionMessageParam[], model: string): Promise<string>;
}

export const getTranscriptionModel = (largeModel: boolean): string =>
    largeModel ? LARGE_TRANSCRIPTION_MODEL : DEFAULT_TRANSCRIPTION_MODEL;

export const getChatModel = (largeModel: boolean): string =>
    largeModel ? LARGE_CHAT_MODEL : DEFAULT_CHAT_MODEL;

/**
 * Wraps anything the SDK or the transport throws so callers only ever see RequestError.
 */
export function toRequestError(operation: string, error: unknown): RequestError {
    if (error instanceof RequestError) {
        return error;
    }
    if (error instanceof APIError) {
        const responseBody = error.error === undefined ? undefined : JSON.stringify(error.error);
        const status = error.status === undefined ? '' : ` (HTTP ${error.status})`;
        return new RequestError(`${operation} failed${status}: ${error.message}`, error.status, responseBody, error);
    }
    if (error instanceof Error) {
        return new RequestError(`${operation} failed: ${error.message}`, undefined, undefined, error);
    }
    return new RequestError(`${operation} failed: ${String(error)}`);
}

export function createClient(secureConfig: SecureConfig): OpenAI {
    return new OpenAI({
        apiKey: secureConfig.mistralApiKey,
        baseURL: MISTRAL_API_BASE_URL,
        timeout: secureConfig.requestTimeoutMs,
        maxRetries: 0,
    });
}

/**
 * Mistral's speech-to-text and chat endpoints, reached through the OpenAI-compatible SDK.
 * Calls are made once; failures are not retried.
 */
export class MistralClient implements TranscriptionClient, ChatClient {
    private readonly client: OpenAI;

    constructor(secureConfig: SecureConfig, private readonly logger: Logger = getLogger()) {
        this.client = createClient(secureConfig);
    }

    async transcribe(filePath: string, model: string, signal?: AbortSignal): Promise<string> {
        this.logger.debug('Transcribing audio file: %s | Model: %s', filePath, model);
        const audioStream = fs.createReadStream(filePath);

        try {
            const transcription = await this.client.audio.transcriptions.create({
                model,
                file: audioStream,
            }, { signal });
            this.logger.debug('Received transcription (%d characters)', transcription.text.length);
            return transcription.text;
        } catch (error: unknown) {
            throw toRequestError('Transcription', error);
        } finally {
            if (!audioStream.destroyed) {
                audioStream.destroy();
            }
        }
    }

    async complete(messages: ChatCompletionMessageParam[], model: string): Promise<string> {
        this.logger.debug('Sending chat completion request | Model: %s | Messages: %d', model, messages.length);

        let content: string | null | undefined;
        try {
            const completion = await this.client.chat.completions.create({
                model,
                messages,
            });
            content = completion.choices[0]?.message?.content;
        } catch (error: unknown) {
            throw toRequestError('Chat completion', error);
        }

        if (!content) {
            throw new RequestError('Chat completion failed: the response contained no text');
        }
        return content.trim();
    }
}
