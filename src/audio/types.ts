/** Raw PCM layout shared by the recorder and the sink: signed 16-bit little-endian. */
export interface PcmFormat {
    sampleRate: number;
    channels: number;
}

export interface CaptureOptions extends PcmFormat {
    /** ALSA device name handed to the recorder */
    device: string;
}

export type RecordingConfig = Readonly<{
    sampleRate: number;
    channels: number;
    /** The single working file the recording is written to */
    filePath: string;
    /** Selects the larger remote models downstream; capture ignores it */
    largeModel: boolean;
    audioDevice: string;
}>;

export type DiscardReason = 'cancelled' | 'interrupted' | 'input-closed' | 'empty';

export type RecordingResult =
    | {
        accepted: true;
        durationSeconds: number;
        filePath: string;
    }
    | {
        accepted: false;
        durationSeconds: 0;
        filePath?: undefined;
        reason: DiscardReason;
        warning?: Error;
    };

export type KeyEvent = 'confirm' | 'cancel' | 'other';
export type TerminalKeyEvent = Exclude<KeyEvent, 'other'>;

export interface LengthDecision {
    proceed: boolean;
}

export interface CaptureExit {
    code: number | null;
    signal: NodeJS.Signals | null;
    /** Whatever the recorder printed to stderr */
    stderr: string;
}

/**
 * A running recorder. `closed` settles once the underlying process is gone, whether it was
 * stopped or died on its own; it never rejects.
 */
export interface CaptureStream {
    onFrames(listener: (chunk: Buffer) => void): void;
    readonly closed: Promise<CaptureExit>;
    /** Graceful stop: lets the recorder flush what it has captured */
    stop(): Promise<void>;
    /** Abrupt stop for discarded recordings */
    terminate(): Promise<void>;
}

export interface CaptureBackend {
    /** Rejects with CaptureUnavailableError when the recorder cannot be started */
    start(options: CaptureOptions): Promise<CaptureStream>;
}

/** Readable side of a terminal, as far as key monitoring needs it. */
export interface KeyInput {
    isTTY?: boolean;
    isRaw?: boolean;
    setRawMode?(mode: boolean): unknown;
    setEncoding(encoding: BufferEncoding): unknown;
    resume(): unknown;
    pause(): unknown;
    on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
    on(event: 'end' | 'close', listener: () => void): unknown;
    on(event: 'error', listener: (error: Error) => void): unknown;
    removeListener(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
    removeListener(event: 'end' | 'close', listener: () => void): unknown;
    removeListener(event: 'error', listener: (error: Error) => void): unknown;
}

export interface SignalSource {
    on(signal: 'SIGINT', listener: () => void): unknown;
    removeListener(signal: 'SIGINT', listener: () => void): unknown;
}
