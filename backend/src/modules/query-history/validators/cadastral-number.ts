/**
 * backend/src/modules/query-history/validators/cadastral-number.ts
 *
 * Cadastral number grammar: `AA:BB:CCCCCC[C]:D+`
 * - district (2 digits), area (2 digits), quarter (6 or 7 digits), parcel (1+ digits).
 * - Whole-string match. No trimming, no normalization.
 */

import { QueryHistoryErrors } from '../query-history.errors';

const CADASTRAL_NUMBER_PATTERN = /^\d{2}:\d{2}:\d{6,7}:\d+$/;

export function isCadastralNumber(candidate: string): boolean {
  return CADASTRAL_NUMBER_PATTERN.test(candidate);
}

/** Returns the input unchanged, or throws a 400 with the fixed format message. */
export function validateCadastralNumber(candidate: string): string {
  if (!isCadastralNumber(candidate)) {
    throw QueryHistoryErrors.invalidCadastralNumber();
  }
  return candidate;
}
