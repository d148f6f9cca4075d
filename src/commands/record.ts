import fs from 'fs/promises';
import path from 'path';
import {
    ArecordBackend,
    CaptureBackend,
    ConfirmationPrompt,
    DiscardReason,
    KeyInput,
    LengthGate,
    RecordingConfig,
    RecordingSession,
    SignalSource,
    validateAudioFile,
} from '../audio';
import { CHANNELS, OUTPUT_FOOTER, SAMPLE_RATE } from '../constants';
import { UserCancellationError } from '../error/CommandErrors';
import { getLogger, Logger } from '../logging';
import { Config, SecureConfig } from '../types';
import { copyToClipboard } from '../util/clipboard';
import { TerminalPrompt } from '../util/interactive';
import { getTranscriptionModel, MistralClient, TranscriptionClient } from '../util/mistral';

/** Seams for the terminal, the recorder and the remote API; the defaults are the real ones. */
export interface RecordDependencies {
    logger?: Logger;
    backend?: CaptureBackend;
    keyInput?: KeyInput;
    signals?: SignalSource;
    createPrompt?: () => ConfirmationPrompt;
    transcriber?: TranscriptionClient;
    copy?: (text: string, logger: Logger) => Promise<boolean>;
}

const DISCARD_MESSAGES: Record<DiscardReason, string> = {
    'cancelled': 'Recording cancelled.',
    'interrupted': 'Recording stopped before it was confirmed.',
    'input-closed': 'Input closed before the recording was confirmed.',
    'empty': 'Nothing was recorded.',
};

export const formatTranscription = (text: string): string =>
    `\n--- Transcription ---\n${text}\n${OUTPUT_FOOTER}`;

/** Settles with `work`, or rejects as a user cancellation as soon as `signal` aborts. */
const untilCancelled = <T>(signal: AbortSignal, work: Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new UserCancellationError('Transcription cancelled.'));
        if (signal.aborted) {
            onAbort();
        } else {
            signal.addEventListener('abort', onAbort, { once: true });
        }
        work.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });

export const buildRecordingConfig = (runConfig: Config): RecordingConfig => ({
    sampleRate: SAMPLE_RATE,
    channels: CHANNELS,
    filePath: path.resolve(runConfig.record.file),
    largeModel: runConfig.largeModel,
    audioDevice: runConfig.record.audioDevice,
});

export const execute = async (
    runConfig: Config,
    secureConfig: SecureConfig,
    dependencies: RecordDependencies = {}
): Promise<string> => {
    const logger = dependencies.logger ?? getLogger();
    const signals = dependencies.signals ?? process;
    const recordingConfig = buildRecordingConfig(runConfig);

    const session = new RecordingSession({
        backend: dependencies.backend ?? new ArecordBackend({ logger }),
        keyInput: dependencies.keyInput ?? process.stdin,
        signals,
        logger,
    });

    const result = await session.run(recordingConfig);
    if (!result.accepted) {
        throw new UserCancellationError(DISCARD_MESSAGES[result.reason]);
    }

    let activePrompt: ConfirmationPrompt | undefined;
    const gate = new LengthGate({
        logger,
        createPrompt: () => {
            activePrompt = dependencies.createPrompt ? dependencies.createPrompt() : new TerminalPrompt();
            return activePrompt;
        },
    });

    // Ctrl+C from here on must still reach the finally below, which owns the working file
    const cancellation = new AbortController();
    const onSigint = () => {
        activePrompt?.interrupt?.();
        cancellation.abort();
    };
    signals.on('SIGINT', onSigint);

    try {
        const decision = await gate.evaluate(result.durationSeconds, runConfig.record.confirmThreshold);
        if (!decision.proceed) {
            throw new UserCancellationError('Recording deleted without transcription.');
        }

        const transcriber = dependencies.transcriber ?? new MistralClient(secureConfig, logger);
        const model = getTranscriptionModel(recordingConfig.largeModel);
        const text = await untilCancelled(cancellation.signal, (async () => {
            await validateAudioFile(result.filePath, logger);
            logger.info('Transcribing audio...');
            return transcriber.transcribe(result.filePath, model, cancellation.signal);
        })());

        if (runConfig.record.toClipboard) {
            const copy = dependencies.copy ?? copyToClipboard;
            await copy(text, logger);
        }

        return formatTranscription(text);
    } finally {
        await fs.rm(result.filePath, { force: true });
        logger.debug('Removed working file %s', result.filePath);
        signals.removeListener('SIGINT', onSigint);
    }
};
