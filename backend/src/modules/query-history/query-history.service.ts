/**
 * backend/src/modules/query-history/query-history.service.ts
 *
 * WHY:
 * - submit(): resolve a cadastral number and persist the outcome for the caller.
 * - list(): the caller's own history, newest first, paginated.
 *
 * SUBMIT:
 * 1. Input already passed the request schema (grammar, length, coordinate bounds).
 * 2. Resolver call, bounded by its timeout. Never throws; failure = matched:false.
 * 3. Insert (one transaction). Coordinates stored as given.
 * - Uniqueness violations → 400 with a constraint-specific message.
 * - Any other storage error propagates (500).
 *
 * LIST:
 * - Non-empty filter goes through the validator first (400 regardless of data).
 * - Empty page → 404 'no records found' (also past the last page).
 *
 * RULES:
 * - No HTTP concerns here.
 * - Every read is scoped to params.userId.
 */

import type { Logger } from '../../shared/logger/logger';
import { UniqueViolationError } from '../../shared/db/unique-violation';

import type { CadastralResolver } from './resolver/cadastral-resolver';
import type { QueryHistoryStore } from './query-history.store';
import type {
  ListHistoryParams,
  QueryHistoryRecord,
  SubmitQueryParams,
} from './query-history.types';
import { QueryHistoryErrors } from './query-history.errors';
import { validateCadastralNumber } from './validators/cadastral-number';

export class QueryHistoryService {
  constructor(
    private readonly deps: {
      store: QueryHistoryStore;
      resolver: CadastralResolver;
      logger: Logger;
    },
  ) {}

  async submit(params: SubmitQueryParams): Promise<QueryHistoryRecord> {
    const flow = 'query.submit';

    this.deps.logger.info({
      msg: 'query.submit.start',
      flow,
      requestId: params.requestId,
      userId: params.userId,
      cadastralNumber: params.cadastralNumber,
    });

    const { matched } = await this.deps.resolver.resolve(params.cadastralNumber, {
      authorization: params.authorization,
      requestId: params.requestId,
    });

    let record: QueryHistoryRecord;
    try {
      record = await this.deps.store.insert({
        userId: params.userId,
        cadastralNumber: params.cadastralNumber,
        latitude: params.latitude,
        longitude: params.longitude,
        result: matched,
      });
    } catch (err) {
      if (err instanceof UniqueViolationError) {
        this.deps.logger.warn({
          msg: 'query.submit.duplicate',
          flow,
          requestId: params.requestId,
          userId: params.userId,
          constraint: err.constraint,
        });
        throw QueryHistoryErrors.duplicate(err.constraint, { constraint: err.constraint });
      }
      throw err;
    }

    this.deps.logger.info({
      msg: 'query.submit.success',
      flow,
      requestId: params.requestId,
      userId: params.userId,
      recordId: record.id,
      result: record.result,
    });

    return record;
  }

  async list(params: ListHistoryParams): Promise<QueryHistoryRecord[]> {
    const cadastralNumber = params.cadastralNumber
      ? validateCadastralNumber(params.cadastralNumber)
      : undefined;

    const offset = (params.page - 1) * params.size;

    // Offsets past 2^53 are past every page.
    const records = Number.isSafeInteger(offset)
      ? await this.deps.store.listForUser({
          userId: params.userId,
          cadastralNumber,
          limit: params.size,
          offset,
        })
      : [];

    if (records.length === 0) {
      throw QueryHistoryErrors.noRecordsFound({
        userId: params.userId,
        page: params.page,
        size: params.size,
      });
    }

    this.deps.logger.debug({
      msg: 'query.list.success',
      flow: 'query.list',
      requestId: params.requestId,
      userId: params.userId,
      count: records.length,
    });

    return records;
  }
}
