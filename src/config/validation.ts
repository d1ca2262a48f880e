import { z } from 'zod';

export const configSchema = z.object({
  nodeEnv: z.string(),
  openai: z.object({
    apiKey: z.string().min(1).optional(),
    baseURL: z.string().url().optional(),
  }),
  llm: z.object({
    model: z.string().min(1).default('gpt-4o-mini'),
    temperature: z.coerce.number().min(0).max(2).default(0.7),
    timeoutMs: z.coerce.number().int().min(1000).default(60000),
    maxOutputTokens: z.coerce.number().int().min(256).max(16384).default(4096),
    maxRetries: z.coerce.number().int().min(0).max(5).default(0),
  }),
  output: z.object({
    save: z.boolean().default(true),
    directory: z.string().min(1).default('.'),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    filePath: z.string().optional(),
    console: z.boolean().default(false),
    rotate: z.enum(['none', 'size']).default('size'),
    maxSizeMB: z.coerce.number().min(1).max(1024).default(5),
    maxFiles: z.coerce.number().int().min(1).max(100).default(3),
  }),
});

export type Config = z.infer<typeof configSchema>;
