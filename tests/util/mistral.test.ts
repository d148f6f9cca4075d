import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';

const mockChatCreate = vi.fn();
const mockTranscriptionsCreate = vi.fn();

vi.mock('openai', () => {
    class APIError extends Error {
        constructor(
            public readonly status: number | undefined,
            public readonly error: object | undefined,
            message: string | undefined,
            _headers?: unknown
        ) {
            super(message);
        }
    }
    return {
        APIError,
        OpenAI: vi.fn().mockImplementation(() => ({
            chat: {
                completions: {
                    create: mockChatCreate
                }
            },
            audio: {
                transcriptions: {
                    create: mockTranscriptionsCreate
                }
            }
        })),
    };
});

vi.mock('../../src/logging', () => ({
    getLogger: vi.fn(() => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() })),
}));

import { APIError, OpenAI } from 'openai';
import { RequestError } from '../../src/error/CommandErrors';
import {
    createClient,
    getChatModel,
    getTranscriptionModel,
    MistralClient,
    toRequestError,
} from '../../src/util/mistral';

const secureConfig = { mistralApiKey: 'test-secret', requestTimeoutMs: 300000 };

describe('mistral', () => {
    let tempDir: string;
    let audioFile: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mistral-test-'));
        audioFile = path.join(tempDir, 'temp_recording.wav');
        await fs.writeFile(audioFile, Buffer.alloc(128));
    });

    afterEach(async () => {
        vi.clearAllMocks();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    describe('model selection', () => {
        it('picks the small models by default', () => {
            expect(getTranscriptionModel(false)).toBe('voxtral-mini-2507');
            expect(getChatModel(false)).toBe('mistral-small-latest');
        });

        it('picks the large models on request', () => {
            expect(getTranscriptionModel(true)).toBe('voxtral-large-latest');
            expect(getChatModel(true)).toBe('mistral-large-latest');
        });
    });

    describe('createClient', () => {
        it('points the SDK at the Mistral API without retries', () => {
            createClient(secureConfig);

            expect(OpenAI).toHaveBeenCalledWith({
                apiKey: 'test-secret',
                baseURL: 'https://api.mistral.ai/v1',
                timeout: 300000,
                maxRetries: 0,
            });
        });
    });

    describe('toRequestError', () => {
        it('keeps status and body from API errors', () => {
            const error = toRequestError('Transcription', new APIError(500, { message: 'upstream failure' }, 'Internal Server Error', undefined));

            expect(error).toBeInstanceOf(RequestError);
            expect(error.message).toBe('Transcription failed (HTTP 500): Internal Server Error');
            expect(error.status).toBe(500);
            expect(error.responseBody).toBe('{"message":"upstream failure"}');
        });

        it('wraps transport errors without a status', () => {
            const cause = new Error('socket hang up');
            const error = toRequestError('Chat completion', cause);

            expect(error.message).toBe('Chat completion failed: socket hang up');
            expect(error.status).toBeUndefined();
            expect(error.cause).toBe(cause);
        });

        it('returns an existing RequestError unchanged', () => {
            const original = new RequestError('already wrapped', 502);
            expect(toRequestError('Transcription', original)).toBe(original);
        });

        it('describes non-error values', () => {
            expect(toRequestError('Transcription', 'boom').message).toBe('Transcription failed: boom');
        });
    });

    describe('MistralClient.transcribe', () => {
        it('uploads the file and returns the text', async () => {
            mockTranscriptionsCreate.mockResolvedValue({ text: 'hello world' });
            const client = new MistralClient(secureConfig);

            await expect(client.transcribe(audioFile, 'voxtral-mini-2507')).resolves.toBe('hello world');

            const request = mockTranscriptionsCreate.mock.calls[0][0];
            expect(request.model).toBe('voxtral-mini-2507');
            expect(request.file.path).toBe(audioFile);
            expect(request.file.destroyed).toBe(true);
        });

        it('passes the abort signal to the request', async () => {
            mockTranscriptionsCreate.mockResolvedValue({ text: 'hello world' });
            const controller = new AbortController();
            const client = new MistralClient(secureConfig);

            await client.transcribe(audioFile, 'voxtral-mini-2507', controller.signal);

            expect(mockTranscriptionsCreate.mock.calls[0][1]).toEqual({ signal: controller.signal });
        });

        it('surfaces HTTP failures as RequestError', async () => {
            mockTranscriptionsCreate.mockRejectedValue(new APIError(500, { detail: 'internal' }, 'Internal Server Error', undefined));
            const client = new MistralClient(secureConfig);

            const result = client.transcribe(audioFile, 'voxtral-mini-2507');

            await expect(result).rejects.toBeInstanceOf(RequestError);
            await expect(result).rejects.toMatchObject({ status: 500, responseBody: '{"detail":"internal"}' });
        });
    });

    describe('MistralClient.complete', () => {
        it('sends the messages and returns the trimmed reply', async () => {
            mockChatCreate.mockResolvedValue({ choices: [{ message: { content: '  Bonjour  ' } }] });
            const client = new MistralClient(secureConfig);
            const messages = [{ role: 'user' as const, content: 'Translate the following text to French:\n\nHello' }];

            await expect(client.complete(messages, 'mistral-small-latest')).resolves.toBe('Bonjour');
            expect(mockChatCreate).toHaveBeenCalledWith({ model: 'mistral-small-latest', messages });
        });

        it('rejects an empty reply', async () => {
            mockChatCreate.mockResolvedValue({ choices: [{ message: { content: null } }] });
            const client = new MistralClient(secureConfig);

            await expect(client.complete([{ role: 'user', content: 'Hi' }], 'mistral-small-latest'))
                .rejects.toThrow('Chat completion failed: the response contained no text');
        });

        it('surfaces rate limiting as RequestError with the status', async () => {
            mockChatCreate.mockRejectedValue(new APIError(429, undefined, 'Too Many Requests', undefined));
            const client = new MistralClient(secureConfig);

            await expect(client.complete([{ role: 'user', content: 'Hi' }], 'mistral-small-latest'))
                .rejects.toMatchObject({ status: 429, message: 'Chat completion failed (HTTP 429): Too Many Requests' });
        });
    });
});
