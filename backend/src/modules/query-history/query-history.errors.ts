/**
 * backend/src/modules/query-history/query-history.errors.ts
 *
 * WHY:
 * - Query history owns its error semantics (format, uniqueness, empty pages).
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Messages are part of the API contract; clients match on them.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const CADASTRAL_NUMBER_FORMAT_MESSAGE =
  'cadastral number does not match the required format';

export const NO_RECORDS_FOUND_MESSAGE = 'no records found';

export const COORDINATES_UNIQUE_CONSTRAINT = 'query_history_coordinates_unique';
export const CADASTRAL_NUMBER_UNIQUE_CONSTRAINT = 'query_history_cadastral_number_unique';

export const QueryHistoryErrors = {
  invalidCadastralNumber(meta?: AppErrorMeta) {
    return AppError.validationError(CADASTRAL_NUMBER_FORMAT_MESSAGE, meta);
  },

  /**
   * Empty result page. Covers both "nothing matches" and "page past the end":
   * clients cannot tell the two apart.
   */
  noRecordsFound(meta?: AppErrorMeta) {
    return AppError.notFound(NO_RECORDS_FOUND_MESSAGE, meta);
  },

  /** Storage rejected the row on a uniqueness rule. */
  duplicate(constraint: string | null, meta?: AppErrorMeta) {
    if (constraint === COORDINATES_UNIQUE_CONSTRAINT) {
      return AppError.validationError('duplicate coordinates', meta);
    }
    if (constraint === CADASTRAL_NUMBER_UNIQUE_CONSTRAINT) {
      return AppError.validationError('duplicate cadastral number', meta);
    }
    return AppError.validationError('duplicate query', meta);
  },
} as const;
