/**
 * backend/src/modules/query-history/index.ts
 *
 * WHY:
 * - Public surface of the query-history module.
 *
 * RULES:
 * - Other modules import from here, never from /dal or /resolver directly.
 */

export { QueryHistoryRepo } from './dal/query-history.repo';
export { HttpCadastralResolver } from './resolver/http-cadastral-resolver';
export { isCadastralNumber, validateCadastralNumber } from './validators/cadastral-number';
export type { CadastralResolver, ResolveOutcome } from './resolver/cadastral-resolver';
export type { QueryHistoryStore, HistoryPageQuery } from './query-history.store';
export type { QueryHistoryRecord, NewQueryHistoryRecord } from './query-history.types';
