import { describe, it, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { bearer, buildTestApp, signUp } from '../helpers/build-test-app';

const RecordListSchema = z.array(
  z.object({
    id: z.number(),
    cadastralNumber: z.string(),
    latitude: z.number().nullable(),
    longitude: z.number().nullable(),
    result: z.boolean(),
    createdAt: z.string(),
  }),
);

const ErrorSchema = z.object({
  error: z.object({ code: z.string(), message: z.string() }),
});

async function submit(app: FastifyInstance, token: string, cadastralNumber: string) {
  const res = await app.inject({
    method: 'POST',
    url: '/query',
    headers: bearer(token),
    payload: { cadastralNumber },
  });
  expect(res.statusCode).toBe(200);
}

describe('GET /history', () => {
  it('rejects a malformed filter with 400 and the format message', async () => {
    const { app, close } = await buildTestApp();

    try {
      const token = await signUp(app, 'alice@example.com');

      const res = await app.inject({
        method: 'GET',
        url: '/history?cadastralNumber=invalid_format',
        headers: bearer(token),
      });

      expect(res.statusCode).toBe(400);
      expect(ErrorSchema.parse(res.json())).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'cadastral number does not match the required format',
        },
      });
    } finally {
      await close();
    }
  });

  it('returns 404 "no records found" for a well-formed filter with no rows', async () => {
    const { app, close } = await buildTestApp();

    try {
      const token = await signUp(app, 'alice@example.com');
      await submit(app, token, '12:34:567890:1011');

      const res = await app.inject({
        method: 'GET',
        url: '/history?cadastralNumber=00:00:000000:00',
        headers: bearer(token),
      });

      expect(res.statusCode).toBe(404);
      expect(ErrorSchema.parse(res.json())).toEqual({
        error: { code: 'NOT_FOUND', message: 'no records found' },
      });
    } finally {
      await close();
    }
  });

  it('returns 404 for a page far beyond any offset storage can address', async () => {
    const { app, close } = await buildTestApp();

    try {
      const token = await signUp(app, 'alice@example.com');
      await submit(app, token, '12:34:567890:1011');

      const res = await app.inject({
        method: 'GET',
        url: '/history?page=1000000000000000000&size=100',
        headers: bearer(token),
      });

      expect(res.statusCode).toBe(404);
      expect(ErrorSchema.parse(res.json())).toEqual({
        error: { code: 'NOT_FOUND', message: 'no records found' },
      });
    } finally {
      await close();
    }
  });

  it('paginates newest first: page=1&size=3 over 4 rows returns 3', async () => {
    const { app, close } = await buildTestApp();

    try {
      const token = await signUp(app, 'alice@example.com');
      for (const suffix of ['1001', '1002', '1003', '1004']) {
        await submit(app, token, `12:34:567890:${suffix}`);
      }

      const first = await app.inject({
        method: 'GET',
        url: '/history?page=1&size=3',
        headers: bearer(token),
      });
      const second = await app.inject({
        method: 'GET',
        url: '/history?page=2&size=3',
        headers: bearer(token),
      });
      const third = await app.inject({
        method: 'GET',
        url: '/history?page=3&size=3',
        headers: bearer(token),
      });

      expect(first.statusCode).toBe(200);
      expect(RecordListSchema.parse(first.json()).map((r) => r.cadastralNumber)).toEqual([
        '12:34:567890:1004',
        '12:34:567890:1003',
        '12:34:567890:1002',
      ]);

      expect(second.statusCode).toBe(200);
      expect(RecordListSchema.parse(second.json()).map((r) => r.cadastralNumber)).toEqual([
        '12:34:567890:1001',
      ]);

      expect(third.statusCode).toBe(404);
    } finally {
      await close();
    }
  });

  it('uses page=1 and size=10 by default', async () => {
    const { app, close } = await buildTestApp();

    try {
      const token = await signUp(app, 'alice@example.com');
      for (let i = 0; i < 12; i++) {
        await submit(app, token, `12:34:567890:${2000 + i}`);
      }

      const res = await app.inject({ method: 'GET', url: '/history', headers: bearer(token) });

      expect(res.statusCode).toBe(200);
      const rows = RecordListSchema.parse(res.json());
      expect(rows).toHaveLength(10);
      expect(rows[0]?.cadastralNumber).toBe('12:34:567890:2011');
    } finally {
      await close();
    }
  });

  it('filters by exact cadastral number', async () => {
    const { app, close } = await buildTestApp();

    try {
      const token = await signUp(app, 'alice@example.com');
      await submit(app, token, '12:34:567890:1011');
      await submit(app, token, '12:34:567890:2022');
      await submit(app, token, '12:34:567890:1011');

      const res = await app.inject({
        method: 'GET',
        url: '/history?cadastralNumber=12:34:567890:1011',
        headers: bearer(token),
      });

      expect(res.statusCode).toBe(200);
      const rows = RecordListSchema.parse(res.json());
      expect(rows.map((r) => r.cadastralNumber)).toEqual(['12:34:567890:1011', '12:34:567890:1011']);
    } finally {
      await close();
    }
  });

  it('only lists rows owned by the caller', async () => {
    const { app, close } = await buildTestApp();

    try {
      const alice = await signUp(app, 'alice@example.com');
      const bob = await signUp(app, 'bob@example.com');
      await submit(app, alice, '12:34:567890:1011');
      await submit(app, bob, '98:76:543210:1');

      const aliceRes = await app.inject({ method: 'GET', url: '/history', headers: bearer(alice) });
      const bobRes = await app.inject({
        method: 'GET',
        url: '/history?cadastralNumber=12:34:567890:1011',
        headers: bearer(bob),
      });

      expect(RecordListSchema.parse(aliceRes.json()).map((r) => r.cadastralNumber)).toEqual([
        '12:34:567890:1011',
      ]);
      expect(bobRes.statusCode).toBe(404);
    } finally {
      await close();
    }
  });

  it.each([['page=0'], ['size=0'], ['size=101'], ['page=abc']])(
    'rejects %s with 400',
    async (query) => {
      const { app, close } = await buildTestApp();

      try {
        const token = await signUp(app, 'alice@example.com');

        const res = await app.inject({ method: 'GET', url: `/history?${query}`, headers: bearer(token) });

        expect(res.statusCode).toBe(400);
        expect(ErrorSchema.parse(res.json()).error.code).toBe('VALIDATION_ERROR');
      } finally {
        await close();
      }
    },
  );

  it('requires a bearer token', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({
        method: 'GET',
        url: '/history',
        headers: { authorization: 'Bearer not-a-real-token' },
      });

      expect(res.statusCode).toBe(401);
    } finally {
      await close();
    }
  });
});
