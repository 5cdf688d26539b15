import { describe, it, expect, vi } from 'vitest';
import { QueryHistoryService } from '../../../src/modules/query-history/query-history.service';
import type { QueryHistoryStore } from '../../../src/modules/query-history';
import { AppError } from '../../../src/shared/http/errors';
import { UniqueViolationError } from '../../../src/shared/db/unique-violation';
import { logger } from '../../../src/shared/logger/logger';
import { HttpCadastralResolver } from '../../../src/modules/query-history/resolver/http-cadastral-resolver';
import { FakeResolver } from '../../helpers/fake-resolver';
import { InMemDb, InMemQueryHistoryStore, InMemUserStore } from '../../helpers/inmem-db';

async function setup(answer: (n: string) => boolean = () => true) {
  const db = new InMemDb();
  const userStore = new InMemUserStore(db);
  const store = new InMemQueryHistoryStore(db);
  const resolver = new FakeResolver(answer);
  const service = new QueryHistoryService({ store, resolver, logger });

  const alice = await userStore.insertUser({ email: 'alice@example.com', hashedPassword: 'x' });
  const bob = await userStore.insertUser({ email: 'bob@example.com', hashedPassword: 'x' });

  return { db, store, resolver, service, alice, bob };
}

function submitParams(userId: number, cadastralNumber = '12:34:567890:1011') {
  return {
    userId,
    cadastralNumber,
    latitude: null,
    longitude: null,
    authorization: 'Bearer test-token',
    requestId: 'req-1',
  };
}

async function expectAppError(promise: Promise<unknown>, status: number, message: string) {
  const err: unknown = await promise.then(
    () => null,
    (e: unknown) => e,
  );
  expect(err).toBeInstanceOf(AppError);
  if (!(err instanceof AppError)) return;
  expect(err.status).toBe(status);
  expect(err.message).toBe(message);
}

describe('QueryHistoryService.submit', () => {
  it('stores the resolver outcome with coordinates unchanged', async () => {
    const { service, alice, resolver } = await setup(() => true);

    const record = await service.submit({
      ...submitParams(alice.id),
      latitude: 55.755826,
      longitude: -37.6173,
    });

    expect(record).toMatchObject({
      id: 1,
      cadastralNumber: '12:34:567890:1011',
      latitude: 55.755826,
      longitude: -37.6173,
      result: true,
    });
    expect(record.createdAt).toBeInstanceOf(Date);
    expect(resolver.calls).toEqual([
      { cadastralNumber: '12:34:567890:1011', authorization: 'Bearer test-token' },
    ]);
  });

  it('stores result=false when the resolver reports no match', async () => {
    const { service, alice } = await setup(() => false);

    const record = await service.submit(submitParams(alice.id));
    expect(record.result).toBe(false);
  });

  it('maps a coordinates uniqueness violation to 400 "duplicate coordinates"', async () => {
    const { service, store, alice, db } = await setup();
    await store.setCoordinateUniqueness(true);

    const params = { ...submitParams(alice.id), latitude: 10.5, longitude: 20.25 };
    await service.submit(params);

    await expectAppError(service.submit(params), 400, 'duplicate coordinates');
    expect(db.history).toHaveLength(1);
  });

  it('maps a cadastral number uniqueness violation to 400 "duplicate cadastral number"', async () => {
    const store: QueryHistoryStore = {
      insert: vi.fn(() =>
        Promise.reject(new UniqueViolationError('query_history_cadastral_number_unique')),
      ),
      listForUser: vi.fn(),
      deleteUserCascade: vi.fn(),
      setCoordinateUniqueness: vi.fn(),
    };
    const service = new QueryHistoryService({ store, resolver: new FakeResolver(), logger });

    await expectAppError(service.submit(submitParams(1)), 400, 'duplicate cadastral number');
  });

  it('maps an unknown uniqueness violation to 400 "duplicate query"', async () => {
    const store: QueryHistoryStore = {
      insert: vi.fn(() => Promise.reject(new UniqueViolationError(null))),
      listForUser: vi.fn(),
      deleteUserCascade: vi.fn(),
      setCoordinateUniqueness: vi.fn(),
    };
    const service = new QueryHistoryService({ store, resolver: new FakeResolver(), logger });

    await expectAppError(service.submit(submitParams(1)), 400, 'duplicate query');
  });

  it('propagates other storage failures untouched', async () => {
    const failure = new Error('connection reset');
    const store: QueryHistoryStore = {
      insert: vi.fn(() => Promise.reject(failure)),
      listForUser: vi.fn(),
      deleteUserCascade: vi.fn(),
      setCoordinateUniqueness: vi.fn(),
    };
    const service = new QueryHistoryService({ store, resolver: new FakeResolver(), logger });

    await expect(service.submit(submitParams(1))).rejects.toBe(failure);
  });

  it('completes within one resolver timeout and persists result=false', async () => {
    const db = new InMemDb();
    const alice = await new InMemUserStore(db).insertUser({
      email: 'alice@example.com',
      hashedPassword: 'x',
    });
    const hangingFetch: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) return;
        signal.addEventListener('abort', () => reject(signal.reason));
      });
    const resolver = new HttpCadastralResolver({
      baseUrl: 'http://resolver.test',
      timeoutMs: 30,
      logger,
      fetch: hangingFetch,
    });
    const service = new QueryHistoryService({
      store: new InMemQueryHistoryStore(db),
      resolver,
      logger,
    });

    const startedAt = Date.now();
    const record = await service.submit(submitParams(alice.id));
    const elapsed = Date.now() - startedAt;

    expect(elapsed).toBeGreaterThanOrEqual(20);
    expect(elapsed).toBeLessThan(1000);
    expect(record.result).toBe(false);
    expect(db.history).toHaveLength(1);
    expect(db.history[0]).toMatchObject({
      userId: alice.id,
      cadastralNumber: '12:34:567890:1011',
      result: false,
    });
  });

  it('logs start and success', async () => {
    const info = vi.spyOn(logger, 'info');
    const { service, alice } = await setup();

    await service.submit(submitParams(alice.id));

    expect(info).toHaveBeenCalledWith(expect.objectContaining({ msg: 'query.submit.start' }));
    expect(info).toHaveBeenCalledWith(
      expect.objectContaining({ msg: 'query.submit.success', recordId: 1 }),
    );
  });
});

describe('QueryHistoryService.list', () => {
  async function seeded(count: number) {
    const ctx = await setup();
    for (let i = 0; i < count; i++) {
      await ctx.service.submit(submitParams(ctx.alice.id, `12:34:567890:${1000 + i}`));
    }
    return ctx;
  }

  it('returns newest first', async () => {
    const { service, alice } = await seeded(3);

    const records = await service.list({ userId: alice.id, page: 1, size: 10, requestId: 'r' });

    expect(records.map((r) => r.cadastralNumber)).toEqual([
      '12:34:567890:1002',
      '12:34:567890:1001',
      '12:34:567890:1000',
    ]);
  });

  it.each([
    // [total, page, size, expected count]
    [4, 1, 3, 3],
    [4, 2, 3, 1],
    [10, 2, 5, 5],
    [10, 1, 100, 10],
  ])('total=%i page=%i size=%i → %i rows', async (total, page, size, expected) => {
    const { service, alice } = await seeded(total);

    const records = await service.list({ userId: alice.id, page, size, requestId: 'r' });
    expect(records).toHaveLength(expected);
  });

  it('returns the second page without overlapping the first', async () => {
    const { service, alice } = await seeded(5);

    const first = await service.list({ userId: alice.id, page: 1, size: 2, requestId: 'r' });
    const second = await service.list({ userId: alice.id, page: 2, size: 2, requestId: 'r' });

    expect(first.map((r) => r.id)).toEqual([5, 4]);
    expect(second.map((r) => r.id)).toEqual([3, 2]);
  });

  it('throws 404 "no records found" past the last page', async () => {
    const { service, alice } = await seeded(4);

    await expectAppError(
      service.list({ userId: alice.id, page: 3, size: 3, requestId: 'r' }),
      404,
      'no records found',
    );
  });

  it('throws 404 when the user has no history at all', async () => {
    const { service, bob } = await seeded(2);

    await expectAppError(
      service.list({ userId: bob.id, page: 1, size: 10, requestId: 'r' }),
      404,
      'no records found',
    );
  });

  it('throws 404 without querying storage when the offset is past 2^53', async () => {
    const { service, store, alice } = await seeded(2);
    const listForUser = vi.spyOn(store, 'listForUser');

    await expectAppError(
      service.list({ userId: alice.id, page: 1_000_000_000_000_000_000, size: 100, requestId: 'r' }),
      404,
      'no records found',
    );
    expect(listForUser).not.toHaveBeenCalled();
  });

  it('never returns rows owned by another user', async () => {
    const { service, alice, bob } = await seeded(2);
    await service.submit(submitParams(bob.id, '99:99:999999:9'));

    const aliceRows = await service.list({ userId: alice.id, page: 1, size: 10, requestId: 'r' });
    const bobRows = await service.list({ userId: bob.id, page: 1, size: 10, requestId: 'r' });

    expect(aliceRows.map((r) => r.cadastralNumber)).not.toContain('99:99:999999:9');
    expect(bobRows.map((r) => r.cadastralNumber)).toEqual(['99:99:999999:9']);
  });

  it('filters by exact cadastral number', async () => {
    const { service, alice } = await seeded(3);
    await service.submit(submitParams(alice.id, '12:34:567890:1001'));

    const records = await service.list({
      userId: alice.id,
      cadastralNumber: '12:34:567890:1001',
      page: 1,
      size: 10,
      requestId: 'r',
    });

    expect(records).toHaveLength(2);
    expect(records.every((r) => r.cadastralNumber === '12:34:567890:1001')).toBe(true);
  });

  it('rejects a malformed filter with 400 even when rows exist', async () => {
    const { service, alice } = await seeded(2);

    await expectAppError(
      service.list({
        userId: alice.id,
        cadastralNumber: 'invalid_format',
        page: 1,
        size: 10,
        requestId: 'r',
      }),
      400,
      'cadastral number does not match the required format',
    );
  });
});
