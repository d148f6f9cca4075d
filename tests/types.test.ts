import { describe, it, expect } from 'vitest';
import { CommandConfigSchema, ConfigSchema, SecureConfigSchema } from '../src/types';

const validConfig = {
    verbose: false,
    debug: false,
    largeModel: false,
    record: { toClipboard: false, confirmThreshold: 30, audioDevice: 'default', file: 'temp_recording.wav' },
    translate: { targetLanguage: 'English' },
};

describe('ConfigSchema', () => {
    it('accepts a complete configuration without a tone prompt', () => {
        expect(ConfigSchema.safeParse(validConfig).success).toBe(true);
    });

    it('accepts a zero threshold', () => {
        const result = ConfigSchema.safeParse({ ...validConfig, record: { ...validConfig.record, confirmThreshold: 0 } });
        expect(result.success).toBe(true);
    });

    it('rejects a negative threshold', () => {
        const result = ConfigSchema.safeParse({ ...validConfig, record: { ...validConfig.record, confirmThreshold: -5 } });
        expect(result.success).toBe(false);
    });

    it('rejects an empty audio device', () => {
        const result = ConfigSchema.safeParse({ ...validConfig, record: { ...validConfig.record, audioDevice: '' } });
        expect(result.success).toBe(false);
    });
});

describe('SecureConfigSchema', () => {
    it('requires a key and a positive timeout', () => {
        expect(SecureConfigSchema.safeParse({ mistralApiKey: 'test-secret', requestTimeoutMs: 1000 }).success).toBe(true);
        expect(SecureConfigSchema.safeParse({ mistralApiKey: '', requestTimeoutMs: 1000 }).success).toBe(false);
        expect(SecureConfigSchema.safeParse({ mistralApiKey: 'test-secret', requestTimeoutMs: 0 }).success).toBe(false);
    });
});

describe('CommandConfigSchema', () => {
    it('allows an empty selection', () => {
        expect(CommandConfigSchema.parse({})).toEqual({});
    });
});
