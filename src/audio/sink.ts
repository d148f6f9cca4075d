import fs from 'fs/promises';
import { WaveFile } from 'wavefile';
import { BYTES_PER_SAMPLE } from '../constants';
import { FileStateError } from '../error/CommandErrors';
import { PcmFormat } from './types';

/**
 * Accumulates raw S16_LE PCM chunks from the recorder and turns them into a single WAV file.
 *
 * Chunks may split a sample or a frame; only whole frames are counted and written.
 */
export class AudioSink {
    private readonly chunks: Buffer[] = [];
    private byteLength = 0;

    constructor(private readonly format: PcmFormat) {}

    append(chunk: Buffer): void {
        if (chunk.length === 0) return;
        this.chunks.push(chunk);
        this.byteLength += chunk.length;
    }

    get frameCount(): number {
        return Math.floor(this.byteLength / (BYTES_PER_SAMPLE * this.format.channels));
    }

    get durationSeconds(): number {
        return this.frameCount / this.format.sampleRate;
    }

    /**
     * Writes the captured frames to `filePath`. The container is written next to the target
     * first and renamed into place, so the target is either absent or complete.
     */
    async finalize(filePath: string): Promise<number> {
        const partialPath = `${filePath}.partial`;
        const samples = this.toSamples();

        const wav = new WaveFile();
        wav.fromScratch(this.format.channels, this.format.sampleRate, '16', samples);

        try {
            await fs.writeFile(partialPath, wav.toBuffer());
            await fs.rename(partialPath, filePath);
        } catch (error: unknown) {
            await fs.rm(partialPath, { force: true });
            const cause = error instanceof Error ? error : undefined;
            throw new FileStateError(`Failed to write recording to ${filePath}: ${cause?.message ?? String(error)}`, filePath, cause);
        }

        return this.durationSeconds;
    }

    private toSamples(): Int16Array {
        const data = Buffer.concat(this.chunks, this.byteLength);
        const sampleCount = this.frameCount * this.format.channels;
        const samples = new Int16Array(sampleCount);
        for (let i = 0; i < sampleCount; i++) {
            samples[i] = data.readInt16LE(i * BYTES_PER_SAMPLE);
        }
        return samples;
    }
}
