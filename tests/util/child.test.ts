import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';

const { mockSpawn } = vi.hoisted(() => ({ mockSpawn: vi.fn() }));

vi.mock('child_process', () => ({
    default: { spawn: mockSpawn },
    spawn: mockSpawn,
}));

vi.mock('../../src/logging', () => ({
    getLogger: vi.fn(() => ({ verbose: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() })),
}));

import { runWithInput } from '../../src/util/child';

class FakeChild extends EventEmitter {
    readonly stdin = new PassThrough();
    written = '';

    constructor() {
        super();
        this.stdin.on('data', (chunk: Buffer) => {
            this.written += chunk.toString();
        });
    }
}

describe('runWithInput', () => {
    let child: FakeChild;

    beforeEach(() => {
        vi.clearAllMocks();
        child = new FakeChild();
        mockSpawn.mockImplementation(() => child);
    });

    it('writes the input to stdin and resolves on exit code 0', async () => {
        const done = runWithInput('pbcopy', [], 'copied text');
        await new Promise((resolve) => setImmediate(resolve));
        child.emit('close', 0);

        await expect(done).resolves.toBeUndefined();
        expect(child.written).toBe('copied text');
        expect(mockSpawn).toHaveBeenCalledWith('pbcopy', [], { stdio: ['pipe', 'ignore', 'ignore'] });
    });

    it('rejects on a non-zero exit code', async () => {
        const done = runWithInput('xclip', ['-selection', 'clipboard'], 'text');
        child.emit('close', 1);

        await expect(done).rejects.toThrow('Command "xclip" failed with exit code 1');
    });

    it('rejects when the program cannot be started', async () => {
        const done = runWithInput('xsel', ['--clipboard', '--input'], 'text');
        child.emit('error', new Error('spawn xsel ENOENT'));

        await expect(done).rejects.toThrow('spawn xsel ENOENT');
    });
});
