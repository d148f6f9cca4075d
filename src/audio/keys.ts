import { InputStreamClosedError } from '../error/CommandErrors';
import { KeyEvent, KeyInput, TerminalKeyEvent } from './types';

const ESCAPE = '\u001b';
const CTRL_C = '\u0003';

/**
 * Maps one chunk of raw terminal input to a key event.
 *
 * A lone ESC byte cancels; longer chunks that start with ESC are escape sequences
 * (arrow keys, function keys) and are ignored.
 */
export const classifyKeyChunk = (chunk: Buffer | string): KeyEvent => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    if (text.startsWith(ESCAPE)) {
        return text === ESCAPE ? 'cancel' : 'other';
    }
    for (const char of text) {
        if (char === '\r' || char === '\n') return 'confirm';
        if (char === CTRL_C) return 'cancel';
    }
    return 'other';
};

interface Waiter {
    resolve: (event: TerminalKeyEvent) => void;
    reject: (error: Error) => void;
}

/**
 * Watches a terminal input in raw mode for Enter (confirm) and Escape or Ctrl+C (cancel).
 */
export class KeyMonitor {
    private active = false;
    private savedRawMode: boolean | undefined;
    private pending: TerminalKeyEvent | undefined;
    private failure: Error | undefined;
    private waiters: Waiter[] = [];

    constructor(private readonly input: KeyInput) {}

    start(): void {
        if (this.active) return;
        this.active = true;
        this.pending = undefined;
        this.failure = undefined;

        if (this.input.isTTY && this.input.setRawMode) {
            this.savedRawMode = this.input.isRaw ?? false;
            this.input.setRawMode(true);
        }
        this.input.setEncoding('utf8');
        this.input.on('data', this.handleData);
        this.input.on('end', this.handleClosed);
        this.input.on('close', this.handleClosed);
        this.input.on('error', this.handleError);
        this.input.resume();
    }

    /** Resolves with the first confirm or cancel; rejects when the input goes away first. */
    nextTerminalEvent(): Promise<TerminalKeyEvent> {
        if (this.pending) {
            const event = this.pending;
            this.pending = undefined;
            return Promise.resolve(event);
        }
        if (this.failure) {
            return Promise.reject(this.failure);
        }
        return new Promise<TerminalKeyEvent>((resolve, reject) => {
            this.waiters.push({ resolve, reject });
        });
    }

    /** Delivers a cancel as though the user had pressed Escape. */
    interrupt(): void {
        this.deliver('cancel');
    }

    stop(): void {
        if (!this.active) return;
        this.active = false;

        this.input.removeListener('data', this.handleData);
        this.input.removeListener('end', this.handleClosed);
        this.input.removeListener('close', this.handleClosed);
        this.input.removeListener('error', this.handleError);
        if (this.savedRawMode !== undefined && this.input.setRawMode) {
            this.input.setRawMode(this.savedRawMode);
        }
        this.savedRawMode = undefined;
        this.input.pause();
    }

    private readonly handleData = (chunk: Buffer | string): void => {
        const event = classifyKeyChunk(chunk);
        if (event !== 'other') {
            this.deliver(event);
        }
    };

    private readonly handleClosed = (): void => {
        this.fail(new InputStreamClosedError());
    };

    private readonly handleError = (error: Error): void => {
        this.fail(new InputStreamClosedError(`Input stream error: ${error.message}`, error));
    };

    private deliver(event: TerminalKeyEvent): void {
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.resolve(event);
        } else if (!this.pending) {
            this.pending = event;
        }
    }

    private fail(error: Error): void {
        if (this.failure) return;
        this.failure = error;
        const waiters = this.waiters;
        this.waiters = [];
        for (const waiter of waiters) {
            waiter.reject(error);
        }
    }
}
