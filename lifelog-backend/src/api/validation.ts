import { z } from 'zod';
import type { TimeBound } from '../db/activity-store.js';

export const idParamSchema = z.coerce.number().int().positive();

/** `YYYY-MM-DD` (whole local day) or an ISO-8601 datetime with zone. */
export const timeBoundSchema = z
  .union([z.string().date(), z.string().datetime({ offset: true })], {
    errorMap: () => ({ message: 'expected YYYY-MM-DD or an ISO-8601 datetime' }),
  })
  .transform((value): TimeBound =>
    /^\d{4}-\d{2}-\d{2}$/.test(value)
      ? { kind: 'date', value }
      : { kind: 'instant', value: new Date(value).toISOString() });

/** 400 response body listing each invalid field. */
export function validationError(error: z.ZodError): { error: string; issues: string[] } {
  return {
    error: 'Invalid request',
    issues: error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)),
  };
}
