import fs from 'fs/promises';
import { WAV_HEADER_BYTES } from '../constants';
import { FileStateError } from '../error/CommandErrors';
import { Logger } from '../logging';

/**
 * Checks that a finished recording is on disk and holds audio beyond the WAV header.
 */
export const validateAudioFile = async (filePath: string, logger: Logger): Promise<void> => {
    let size: number;
    try {
        size = (await fs.stat(filePath)).size;
    } catch (error: unknown) {
        const cause = error instanceof Error ? error : undefined;
        throw new FileStateError(`Audio file not found: ${filePath}`, filePath, cause);
    }

    if (size <= WAV_HEADER_BYTES) {
        throw new FileStateError(`Audio file is empty: ${filePath}`, filePath);
    }

    logger.debug('Audio file validation passed: %s (%d bytes)', filePath, size);
};
