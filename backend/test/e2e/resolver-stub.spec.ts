import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { bearer, buildTestApp, signUp } from '../helpers/build-test-app';

describe('GET /result (resolver stub)', () => {
  it('answers with a boolean result for an authenticated caller', async () => {
    const { app, close } = await buildTestApp();

    try {
      const token = await signUp(app, 'alice@example.com');

      const res = await app.inject({
        method: 'GET',
        url: '/result?cadastral_number=12:34:567890:1011',
        headers: bearer(token),
      });

      expect(res.statusCode).toBe(200);
      expect(typeof z.object({ result: z.boolean() }).parse(res.json()).result).toBe('boolean');
    } finally {
      await close();
    }
  });

  it('requires a bearer token', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/result?cadastral_number=1' });
      expect(res.statusCode).toBe(401);
    } finally {
      await close();
    }
  });

  it('requires cadastral_number', async () => {
    const { app, close } = await buildTestApp();

    try {
      const token = await signUp(app, 'alice@example.com');

      const res = await app.inject({ method: 'GET', url: '/result', headers: bearer(token) });
      expect(res.statusCode).toBe(400);
    } finally {
      await close();
    }
  });

  it('is not registered when the stub is disabled', async () => {
    const { app, close } = await buildTestApp({ config: { resolverStub: { enabled: false } } });

    try {
      const token = await signUp(app, 'alice@example.com');

      const res = await app.inject({
        method: 'GET',
        url: '/result?cadastral_number=12:34:567890:1011',
        headers: bearer(token),
      });
      expect(res.statusCode).toBe(404);
    } finally {
      await close();
    }
  });
});
