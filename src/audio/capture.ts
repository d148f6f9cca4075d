import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import { Readable } from 'stream';
import { RECORDER_STOP_TIMEOUT_MS, SAMPLE_FORMAT } from '../constants';
import { CaptureUnavailableError } from '../error/CommandErrors';
import { Logger } from '../logging';
import { CaptureBackend, CaptureExit, CaptureOptions, CaptureStream } from './types';

export const ARECORD_COMMAND = 'arecord';

/** The parts of a spawned child process the recorder relies on. */
export interface RecorderProcess extends EventEmitter {
    readonly stdout: Readable | null;
    readonly stderr: Readable | null;
    kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnRecorder = (command: string, args: string[]) => RecorderProcess;

export interface ArecordBackendOptions {
    logger: Logger;
    spawnRecorder?: SpawnRecorder;
    stopTimeoutMs?: number;
}

const spawnWithPipes: SpawnRecorder = (command, args) =>
    spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export const buildArecordArgs = (options: CaptureOptions): string[] => [
    '-D', options.device,
    '-q',
    '-r', String(options.sampleRate),
    '-c', String(options.channels),
    '-f', SAMPLE_FORMAT,
    '-t', 'raw',
];

class ProcessCaptureStream implements CaptureStream {
    readonly closed: Promise<CaptureExit>;
    private exited = false;
    private stderrOutput = '';

    constructor(
        private readonly child: RecorderProcess,
        private readonly logger: Logger,
        private readonly stopTimeoutMs: number
    ) {
        this.closed = new Promise<CaptureExit>((resolve) => {
            child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
                this.exited = true;
                this.logger.debug('Recorder exited | Code: %s | Signal: %s', code, signal);
                resolve({ code, signal, stderr: this.stderrOutput.trim() });
            });
        });
        child.on('error', (error: Error) => {
            this.logger.debug('Recorder process error: %s', error.message);
        });
        child.stderr?.on('data', (chunk: Buffer) => {
            this.stderrOutput += chunk.toString();
        });
    }

    onFrames(listener: (chunk: Buffer) => void): void {
        this.child.stdout?.on('data', listener);
    }

    stop(): Promise<void> {
        return this.halt('SIGTERM');
    }

    terminate(): Promise<void> {
        return this.halt('SIGKILL');
    }

    private async halt(signal: NodeJS.Signals): Promise<void> {
        if (this.exited) return;

        this.child.kill(signal);
        const escalation = setTimeout(() => {
            if (!this.exited) {
                this.logger.debug('Recorder ignored %s, sending SIGKILL', signal);
                this.child.kill('SIGKILL');
            }
        }, this.stopTimeoutMs);

        try {
            await this.closed;
        } finally {
            clearTimeout(escalation);
        }
    }
}

const waitForSpawn = (child: RecorderProcess): Promise<void> =>
    new Promise<void>((resolve, reject) => {
        const cleanup = () => {
            child.removeListener('spawn', onSpawn);
            child.removeListener('error', onError);
        };
        const onSpawn = () => {
            cleanup();
            resolve();
        };
        const onError = (error: Error) => {
            cleanup();
            reject(new CaptureUnavailableError(
                `Unable to start ${ARECORD_COMMAND}: ${error.message}. Make sure alsa-utils is installed.`,
                error
            ));
        };
        child.once('spawn', onSpawn);
        child.once('error', onError);
    });

/**
 * Captures audio by running `arecord` and reading raw PCM from its stdout.
 */
export class ArecordBackend implements CaptureBackend {
    private readonly logger: Logger;
    private readonly spawnRecorder: SpawnRecorder;
    private readonly stopTimeoutMs: number;

    constructor(options: ArecordBackendOptions) {
        this.logger = options.logger;
        this.spawnRecorder = options.spawnRecorder ?? spawnWithPipes;
        this.stopTimeoutMs = options.stopTimeoutMs ?? RECORDER_STOP_TIMEOUT_MS;
    }

    async start(options: CaptureOptions): Promise<CaptureStream> {
        const args = buildArecordArgs(options);
        this.logger.debug('Starting recorder: %s %s', ARECORD_COMMAND, args.join(' '));

        let child: RecorderProcess;
        try {
            child = this.spawnRecorder(ARECORD_COMMAND, args);
        } catch (error: unknown) {
            const cause = error instanceof Error ? error : undefined;
            throw new CaptureUnavailableError(`Unable to start ${ARECORD_COMMAND}: ${cause?.message ?? String(error)}`, cause);
        }

        const stream = new ProcessCaptureStream(child, this.logger, this.stopTimeoutMs);
        await waitForSpawn(child);
        return stream;
    }
}
