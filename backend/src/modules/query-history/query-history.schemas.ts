/**
 * backend/src/modules/query-history/query-history.schemas.ts
 *
 * WHY:
 * - Request validation for POST /query and GET /history.
 * - Prevents invalid payloads from reaching services.
 *
 * COORDINATES:
 * - latitude in the open interval (-90, 90), longitude in (-180, 180).
 * - At most 6 decimal places (storage is NUMERIC(8,6) / NUMERIC(9,6)).
 *   With the range bounds this also caps total digits at 8 / 9.
 * - Omitted or null = absent. Each coordinate is independent.
 *
 * RULES:
 * - The history filter is NOT format-checked here: the service runs it through the
 *   validator so the client gets the fixed format message.
 */

import { z } from 'zod';
import { isCadastralNumber } from './validators/cadastral-number';
import { CADASTRAL_NUMBER_FORMAT_MESSAGE } from './query-history.errors';

export const MAX_COORDINATE_DECIMALS = 6;
export const MAX_PAGE_SIZE = 100;

/**
 * Decimal places of a finite number as JS prints it.
 * Exponent notation only appears for magnitudes below 1e-6 or from 1e21 up,
 * both out of contract, so it counts as "too many".
 */
export function countDecimalPlaces(value: number): number {
  const text = String(value);
  if (/e/i.test(text)) return Number.POSITIVE_INFINITY;

  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

function coordinate(name: string, bound: number) {
  return z
    .number({ invalid_type_error: `${name} must be a number` })
    .gt(-bound, `${name} must be greater than ${-bound}`)
    .lt(bound, `${name} must be less than ${bound}`)
    .refine((v) => countDecimalPlaces(v) <= MAX_COORDINATE_DECIMALS, {
      message: `${name} must have at most ${MAX_COORDINATE_DECIMALS} decimal places`,
    })
    .nullish()
    .transform((v) => v ?? null);
}

export const latitudeSchema = coordinate('latitude', 90);
export const longitudeSchema = coordinate('longitude', 180);

export const submitQuerySchema = z.object({
  cadastralNumber: z
    .string()
    .min(15, 'cadastral number must be at least 15 characters')
    .max(25, 'cadastral number must be at most 25 characters')
    .refine(isCadastralNumber, { message: CADASTRAL_NUMBER_FORMAT_MESSAGE }),
  latitude: latitudeSchema,
  longitude: longitudeSchema,
});

export type SubmitQueryInput = z.infer<typeof submitQuerySchema>;

export const listHistoryQuerySchema = z.object({
  // '' behaves like an absent filter
  cadastralNumber: z
    .string()
    .optional()
    .transform((v) => (v ? v : undefined)),
  page: z.coerce.number().int('page must be an integer').min(1, 'page must be >= 1').default(1),
  size: z.coerce
    .number()
    .int('size must be an integer')
    .min(1, 'size must be >= 1')
    .max(MAX_PAGE_SIZE, `size must be <= ${MAX_PAGE_SIZE}`)
    .default(10),
});

export type ListHistoryQuery = z.infer<typeof listHistoryQuerySchema>;

export const resolverStubQuerySchema = z.object({
  cadastral_number: z.string().min(1, 'cadastral_number is required'),
});
