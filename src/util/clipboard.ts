import { Logger } from '../logging';
import { runWithInput } from './child';

interface ClipboardCommand {
    command: string;
    args: string[];
}

export const getClipboardCommands = (platform: NodeJS.Platform): ClipboardCommand[] => {
    switch (platform) {
        case 'darwin':
            return [{ command: 'pbcopy', args: [] }];
        case 'win32':
            return [{ command: 'clip', args: [] }];
        case 'linux':
            return [
                { command: 'xclip', args: ['-selection', 'clipboard'] },
                { command: 'xsel', args: ['--clipboard', '--input'] },
            ];
        default:
            return [];
    }
};

/**
 * Copies text to the system clipboard with the first helper program that works.
 * Returns false when none did; the failure is logged, never thrown.
 */
export async function copyToClipboard(
    text: string,
    logger: Logger,
    platform: NodeJS.Platform = process.platform
): Promise<boolean> {
    const candidates = getClipboardCommands(platform);
    const failures: string[] = [];

    for (const { command, args } of candidates) {
        try {
            await runWithInput(command, args, text);
            logger.info('Transcription copied to clipboard.');
            return true;
        } catch (error: unknown) {
            failures.push(`${command}: ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    if (candidates.length === 0) {
        logger.error(`Failed to copy to clipboard: no clipboard program is known for platform ${platform}`);
    } else {
        logger.error(`Failed to copy to clipboard (${failures.join('; ')})`);
        if (platform === 'linux') {
            logger.info('Install xclip or xsel for clipboard support.');
        }
    }
    return false;
}
