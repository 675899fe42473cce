import { z } from 'zod';
import { searchFilterSchema } from './catalog.schema.js';

export const sourceIdParamSchema = z.object({
  sourceId: z.coerce.number().int().nonnegative(),
});

export const pageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
});

export const pathQuerySchema = z.object({
  path: z.string().min(1),
});

export const installedQuerySchema = z.object({
  check_update: z.enum(['true', 'false']).default('false').transform(v => v === 'true'),
});

export const searchRequestSchema = z.object({
  query: z.string().optional(),
  filters: z.array(searchFilterSchema).optional(),
});
