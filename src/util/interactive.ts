import readline from 'readline';
import { ConfirmationPrompt } from '../audio/gate';
import { InputStreamClosedError, PromptInterruptedError } from '../error/CommandErrors';

interface PendingQuestion {
    resolve: (answer: string) => void;
    reject: (error: Error) => void;
}

/**
 * Line-oriented question and answer over a terminal. Lines typed ahead of a question are
 * queued and used as its answer.
 */
export class TerminalPrompt implements ConfirmationPrompt {
    private readonly rl: readline.Interface;
    private readonly queuedLines: string[] = [];
    private pending: PendingQuestion | null = null;
    private failure: Error | null = null;

    constructor(
        input: NodeJS.ReadableStream = process.stdin,
        private readonly output: NodeJS.WritableStream = process.stdout
    ) {
        this.rl = readline.createInterface({ input, terminal: false });

        this.rl.on('line', (line: string) => {
            if (this.pending) {
                const { resolve } = this.pending;
                this.pending = null;
                resolve(line);
            } else {
                this.queuedLines.push(line);
            }
        });

        this.rl.on('SIGINT', () => this.interrupt());

        this.rl.on('close', () => {
            this.fail(new InputStreamClosedError());
        });
    }

    ask(question: string): Promise<string> {
        if (this.pending) {
            return Promise.reject(new Error('A question is already waiting for an answer'));
        }
        this.output.write(question);

        const queued = this.queuedLines.shift();
        if (queued !== undefined) {
            return Promise.resolve(queued);
        }
        if (this.failure) {
            return Promise.reject(this.failure);
        }
        return new Promise<string>((resolve, reject) => {
            this.pending = { resolve, reject };
        });
    }

    /** Fails the waiting question as a Ctrl+C would. */
    interrupt(): void {
        this.fail(new PromptInterruptedError());
        this.rl.close();
    }

    close(): void {
        this.rl.close();
    }

    private fail(error: Error): void {
        if (this.failure) return;
        this.failure = error;
        if (this.pending) {
            const { reject } = this.pending;
            this.pending = null;
            reject(error);
        }
    }
}
