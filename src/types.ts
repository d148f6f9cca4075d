import { z } from "zod";

export const ConfigSchema = z.object({
    verbose: z.boolean(),
    debug: z.boolean(),
    largeModel: z.boolean(),
    record: z.object({
        toClipboard: z.boolean(),
        confirmThreshold: z.number().nonnegative(),
        audioDevice: z.string().min(1),
        file: z.string().min(1),
    }),
    translate: z.object({
        targetLanguage: z.string().min(1),
    }),
    changeTone: z.object({
        customTonePrompt: z.string().optional(),
    }).optional(),
});

export const SecureConfigSchema = z.object({
    mistralApiKey: z.string().min(1),
    requestTimeoutMs: z.number().int().positive(),
});

export const CommandConfigSchema = z.object({
    commandName: z.string().optional(),
    text: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SecureConfig = z.infer<typeof SecureConfigSchema>;
export type CommandConfig = z.infer<typeof CommandConfigSchema>;

export type RecordConfig = Config['record'];
export type TranslateConfig = Config['translate'];
