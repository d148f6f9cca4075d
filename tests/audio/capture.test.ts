import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { ArecordBackend, buildArecordArgs, RecorderProcess } from '../../src/audio/capture';
import { CaptureUnavailableError } from '../../src/error/CommandErrors';
import { createMockLogger } from '../fakes';

class FakeRecorder extends EventEmitter implements RecorderProcess {
    readonly stdout = new PassThrough();
    readonly stderr = new PassThrough();
    ignoreSigterm = false;

    readonly kill = vi.fn((signal?: NodeJS.Signals | number) => {
        if (signal === 'SIGTERM' && this.ignoreSigterm) return true;
        setImmediate(() => this.emit('close', null, signal));
        return true;
    });
}

const options = { sampleRate: 16000, channels: 1, device: 'hw:1,0' };

const startWith = async (recorder: FakeRecorder, stopTimeoutMs?: number) => {
    const spawnRecorder = vi.fn(() => recorder);
    const backend = new ArecordBackend({ logger: createMockLogger(), spawnRecorder, stopTimeoutMs });
    const started = backend.start(options);
    recorder.emit('spawn');
    return { spawnRecorder, stream: await started };
};

describe('buildArecordArgs', () => {
    it('requests raw 16-bit little-endian PCM on stdout', () => {
        expect(buildArecordArgs(options)).toEqual([
            '-D', 'hw:1,0', '-q', '-r', '16000', '-c', '1', '-f', 'S16_LE', '-t', 'raw',
        ]);
    });
});

describe('ArecordBackend', () => {
    it('spawns arecord with the capture arguments', async () => {
        const { spawnRecorder } = await startWith(new FakeRecorder());

        expect(spawnRecorder).toHaveBeenCalledWith('arecord', buildArecordArgs(options));
    });

    it('reports a missing recorder as CaptureUnavailableError', async () => {
        const recorder = new FakeRecorder();
        const backend = new ArecordBackend({ logger: createMockLogger(), spawnRecorder: () => recorder });

        const started = backend.start(options);
        const enoent = Object.assign(new Error('spawn arecord ENOENT'), { code: 'ENOENT' });
        recorder.emit('error', enoent);

        await expect(started).rejects.toBeInstanceOf(CaptureUnavailableError);
        await expect(started).rejects.toThrow('Unable to start arecord: spawn arecord ENOENT. Make sure alsa-utils is installed.');
    });

    it('wraps a synchronous spawn failure', async () => {
        const backend = new ArecordBackend({
            logger: createMockLogger(),
            spawnRecorder: () => {
                throw new Error('EAGAIN');
            },
        });

        await expect(backend.start(options)).rejects.toBeInstanceOf(CaptureUnavailableError);
    });

    it('forwards PCM chunks from stdout', async () => {
        const recorder = new FakeRecorder();
        const { stream } = await startWith(recorder);
        const received: Buffer[] = [];
        stream.onFrames((chunk) => received.push(chunk));

        recorder.stdout.write(Buffer.from([1, 2, 3, 4]));
        await new Promise((resolve) => setImmediate(resolve));

        expect(Buffer.concat(received)).toEqual(Buffer.from([1, 2, 3, 4]));
    });

    it('stops with SIGTERM and waits for the process to close', async () => {
        const recorder = new FakeRecorder();
        const { stream } = await startWith(recorder);

        await stream.stop();

        expect(recorder.kill).toHaveBeenCalledTimes(1);
        expect(recorder.kill).toHaveBeenCalledWith('SIGTERM');
        await expect(stream.closed).resolves.toEqual({ code: null, signal: 'SIGTERM', stderr: '' });
    });

    it('escalates to SIGKILL when the recorder ignores SIGTERM', async () => {
        const recorder = new FakeRecorder();
        recorder.ignoreSigterm = true;
        const { stream } = await startWith(recorder, 10);

        await stream.stop();

        expect(recorder.kill.mock.calls).toEqual([['SIGTERM'], ['SIGKILL']]);
    });

    it('terminates with SIGKILL', async () => {
        const recorder = new FakeRecorder();
        const { stream } = await startWith(recorder);

        await stream.terminate();

        expect(recorder.kill).toHaveBeenCalledWith('SIGKILL');
    });

    it('does not signal a recorder that has already exited', async () => {
        const recorder = new FakeRecorder();
        const { stream } = await startWith(recorder);

        recorder.emit('close', 1, null);
        await stream.closed;
        await stream.stop();

        expect(recorder.kill).not.toHaveBeenCalled();
    });

    it('includes recorder stderr in the exit details', async () => {
        const recorder = new FakeRecorder();
        const { stream } = await startWith(recorder);

        recorder.stderr.write('arecord: main:831: audio open error: No such file or directory\n');
        await new Promise((resolve) => setImmediate(resolve));
        recorder.emit('close', 1, null);

        await expect(stream.closed).resolves.toEqual({
            code: 1,
            signal: null,
            stderr: 'arecord: main:831: audio open error: No such file or directory',
        });
    });
});
