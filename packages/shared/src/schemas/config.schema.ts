import { z } from 'zod';

export const extensionsConfigSchema = z.object({
  repository: z.string().url().optional(),
  dir: z.string().min(1).default('.bindery/extensions'),
  indexTimeoutMs: z.number().int().positive().default(30_000),
  updateStrategy: z.enum(['replace', 'stage']).default('replace'),
});

export const serverConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(4646),
  host: z.string().default('127.0.0.1'),
  apiKey: z.string().optional(),
});

export const loggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const binderyConfigSchema = z.object({
  extensions: extensionsConfigSchema.default({}),
  server: serverConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});
