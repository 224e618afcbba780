import { z } from 'zod';

/**
 * Calendar date in `YYYY-MM-DD` form that also exists on the calendar.
 */
export const isoDateSchema = z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format')
    .refine(value => !Number.isNaN(Date.parse(`${value}T00:00:00Z`)) && new Date(`${value}T00:00:00Z`).toISOString().startsWith(value), {
        message: 'Invalid calendar date'
    });

/**
 * Optional free text. Blank strings are stored as null.
 */
export const optionalTextSchema = z
    .string()
    .nullish()
    .transform(value => (value === undefined || value === null || value.trim() === '' ? null : value.trim()));

/**
 * Optional free text on a partial update: omitted stays omitted, blank
 * clears the field.
 */
export const patchTextSchema = z
    .string()
    .nullable()
    .optional()
    .transform(value => (value === undefined ? undefined : value === null || value.trim() === '' ? null : value.trim()));

/**
 * Boolean query-string flag: `true`/`1` or `false`/`0`.
 */
export const queryBooleanSchema = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');
