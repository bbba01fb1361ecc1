import { z } from 'zod';

/** Query-string boolean in the spellings HTML forms and curl users send. */
export const QueryBoolean = z
  .enum(['true', 'false', 'True', 'False', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === 'True' || value === '1' || value === 'yes');

/** express leaves `{}` in `req.body` when no parser matched. */
export function bodyOrDefault(body: unknown, fallback: unknown): unknown {
  if (body === undefined || body === null) {
    return fallback;
  }
  if (typeof body === 'object' && !Array.isArray(body) && Object.keys(body).length === 0) {
    return fallback;
  }
  return body;
}
