import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const ConverterConfigSchema = z.object({
  rules: z.object({
    vowels: z.string().regex(/^[a-z]+$/, 'vowels must be lowercase ASCII letters'),
    separator: z.string(),
    vowel_suffix: z.string(),
    consonant_suffix: z.string(),
  }),
  encoding: z.enum(['utf8', 'ascii', 'latin1']),
  log_level: z.enum(LOG_LEVELS).optional(),
});

export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;
export type LogLevel = (typeof LOG_LEVELS)[number];
