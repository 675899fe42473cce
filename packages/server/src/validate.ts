import type { Context } from 'hono';
import type { ZodType, ZodTypeDef } from 'zod';
import { RequestValidationError } from './errors.js';

export function parse<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw RequestValidationError.fromZod(result.error);
  }
  return result.data;
}

/** JSON body, or `{}` when the request has none. */
export async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (text.trim() === '') return {};
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new RequestValidationError([
      { path: '', message: `body is not valid JSON: ${err instanceof Error ? err.message : String(err)}` },
    ]);
  }
}
