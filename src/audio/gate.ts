import { Logger } from '../logging';
import { LengthDecision } from './types';

export const LENGTH_CONFIRMATION_QUESTION = 'Do you want to proceed with transcription (y) or delete the recording (d)? ';

/** Asks a single question and yields the raw answer line. */
export interface ConfirmationPrompt {
    ask(question: string): Promise<string>;
    close?(): void;
    /** Abandons the question in progress, as Ctrl+C at the terminal would */
    interrupt?(): void;
}

export interface LengthGateOptions {
    /** Called only when a recording is over the threshold */
    createPrompt: () => ConfirmationPrompt;
    logger: Logger;
}

/**
 * Holds back long recordings until the user explicitly agrees to send them.
 */
export class LengthGate {
    constructor(private readonly options: LengthGateOptions) {}

    async evaluate(durationSeconds: number, thresholdSeconds: number): Promise<LengthDecision> {
        if (durationSeconds <= thresholdSeconds) {
            return { proceed: true };
        }

        const { createPrompt, logger } = this.options;
        logger.warn(`The recording is ${durationSeconds.toFixed(1)} seconds long, which exceeds the ${thresholdSeconds} second threshold.`);

        const prompt = createPrompt();
        try {
            for (;;) {
                const answer = (await prompt.ask(LENGTH_CONFIRMATION_QUESTION)).trim().toLowerCase();
                if (answer === 'y') return { proceed: true };
                if (answer === 'd') return { proceed: false };
                logger.warn(`Invalid input: ${answer}. Please enter 'y' or 'd'.`);
            }
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`No answer received (${message}). The recording will be deleted.`);
            return { proceed: false };
        } finally {
            prompt.close?.();
        }
    }
}
