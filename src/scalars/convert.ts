import { z } from 'zod';
import { typeMismatch } from '../shared/errors';

const integerText = z.string().trim().regex(/^[-+]?\d+$/).transform(Number).pipe(z.number().int().safe());
const floatText = z.string().trim().min(1).transform(Number).pipe(z.number().finite());
const booleanText = z.string().trim().toLowerCase().pipe(z.enum(['true', 'false', '1', '0'])).transform((s) => s === 'true' || s === '1');
const dateTimeText = z.string().trim().datetime({ offset: true }).transform((s) => new Date(s));

function convert<T>(schema: z.ZodType<T, z.ZodTypeDef, string>, expected: string, text: string, path: string): T {
  const parsed = schema.safeParse(text);
  if (!parsed.success) throw typeMismatch(path, expected, text, parsed.error.issues);
  return parsed.data;
}

export function toInt(text: string, path: string): number {
  return convert(integerText, 'integer', text, path);
}

export function toFloat(text: string, path: string): number {
  return convert(floatText, 'float', text, path);
}

export function toBool(text: string, path: string): boolean {
  return convert(booleanText, 'boolean', text, path);
}

export function toDateTime(text: string, path: string): Date {
  return convert(dateTimeText, 'datetime', text, path);
}

/** RFC 3339 in UTC at second precision, e.g. `2015-06-03T13:42:23Z`. */
export function formatDateTime(date: Date): string {
  return date.toISOString().replace(/\.\d+Z$/, 'Z');
}
