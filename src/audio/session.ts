import fs from 'fs/promises';
import { CaptureInterruptedError } from '../error/CommandErrors';
import { Logger } from '../logging';
import { KeyMonitor } from './keys';
import { AudioSink } from './sink';
import {
    CaptureBackend,
    CaptureExit,
    CaptureStream,
    DiscardReason,
    KeyInput,
    RecordingConfig,
    RecordingResult,
    SignalSource,
    TerminalKeyEvent,
} from './types';

export interface RecordingSessionOptions {
    backend: CaptureBackend;
    keyInput: KeyInput;
    signals: SignalSource;
    logger: Logger;
}

type SessionOutcome =
    | { kind: 'key'; event: TerminalKeyEvent }
    | { kind: 'input-closed'; error: Error }
    | { kind: 'capture-ended'; exit: CaptureExit };

const removeFile = (filePath: string): Promise<void> => fs.rm(filePath, { force: true });

const discarded = (reason: DiscardReason, warning?: Error): RecordingResult =>
    warning ? { accepted: false, durationSeconds: 0, reason, warning } : { accepted: false, durationSeconds: 0, reason };

const describeExit = (exit: CaptureExit): string => {
    const status = exit.signal ? `signal ${exit.signal}` : `code ${exit.code}`;
    return exit.stderr ? `${status}: ${exit.stderr}` : status;
};

/**
 * Runs one record-then-decide cycle: the recorder streams into memory while the terminal is
 * watched for Enter or Escape, and the outcome is either a finalized WAV or nothing on disk.
 */
export class RecordingSession {
    private active = false;

    constructor(private readonly options: RecordingSessionOptions) {}

    async run(config: RecordingConfig): Promise<RecordingResult> {
        if (this.active) {
            throw new Error('A recording is already in progress for this session');
        }
        this.active = true;
        try {
            return await this.record(config);
        } finally {
            this.active = false;
        }
    }

    private async record(config: RecordingConfig): Promise<RecordingResult> {
        const { backend, keyInput, signals, logger } = this.options;
        const sink = new AudioSink({ sampleRate: config.sampleRate, channels: config.channels });

        const capture = await backend.start({
            sampleRate: config.sampleRate,
            channels: config.channels,
            device: config.audioDevice,
        });
        capture.onFrames((chunk) => sink.append(chunk));

        const monitor = new KeyMonitor(keyInput);
        const onSigint = () => monitor.interrupt();

        try {
            await removeFile(config.filePath);
            monitor.start();
            signals.on('SIGINT', onSigint);

            logger.info('Recording... Press Enter to finish or Esc to cancel.');

            const outcome = await Promise.race([
                monitor.nextTerminalEvent().then(
                    (event): SessionOutcome => ({ kind: 'key', event }),
                    (error: Error): SessionOutcome => ({ kind: 'input-closed', error })
                ),
                capture.closed.then((exit): SessionOutcome => ({ kind: 'capture-ended', exit })),
            ]);

            return await this.settle(outcome, capture, sink, config);
        } catch (error: unknown) {
            await capture.terminate();
            await removeFile(config.filePath);
            throw error;
        } finally {
            signals.removeListener('SIGINT', onSigint);
            monitor.stop();
        }
    }

    private async settle(
        outcome: SessionOutcome,
        capture: CaptureStream,
        sink: AudioSink,
        config: RecordingConfig
    ): Promise<RecordingResult> {
        const { logger } = this.options;

        if (outcome.kind === 'capture-ended') {
            const warning = new CaptureInterruptedError(`Recorder stopped unexpectedly (${describeExit(outcome.exit)})`);
            logger.warn('%s. Recording discarded.', warning.message);
            return discarded('interrupted', warning);
        }

        if (outcome.kind === 'input-closed') {
            logger.warn('%s. Recording discarded.', outcome.error.message);
            await capture.terminate();
            await removeFile(config.filePath);
            return discarded('input-closed');
        }

        if (outcome.event === 'cancel') {
            await capture.terminate();
            await removeFile(config.filePath);
            logger.info('Recording cancelled.');
            return discarded('cancelled');
        }

        await capture.stop();
        if (sink.frameCount === 0) {
            logger.warn('No audio was captured. Recording discarded.');
            return discarded('empty');
        }

        const durationSeconds = await sink.finalize(config.filePath);
        logger.info('Recording finished (%s seconds).', durationSeconds.toFixed(1));
        return { accepted: true, durationSeconds, filePath: config.filePath };
    }
}
