import { type z } from 'zod';

export type Row = Record<string, unknown>;

export function toDate(value: unknown): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') return new Date(value);
  throw new TypeError(`Expected a timestamp, got ${typeof value}`);
}

export function toNullableString(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

/** Narrows a text column onto a closed enum; a mismatch means schema drift. */
export function toEnum<T extends [string, ...string[]]>(schema: z.ZodEnum<T>, value: unknown): T[number] {
  return schema.parse(value);
}
