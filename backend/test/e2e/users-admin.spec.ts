import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { bearer, buildTestApp, loginUser, signUp } from '../helpers/build-test-app';

const TokenSchema = z.object({ access_token: z.string() });

async function buildWithSuperuser() {
  const built = await buildTestApp();

  await built.userStore.insertUser({
    email: 'root@example.com',
    hashedPassword: await built.deps.passwordHasher.hash('test-password'),
    isSuperuser: true,
    isVerified: true,
  });
  const login = await loginUser(built.app, 'root@example.com', 'test-password');
  const { access_token } = TokenSchema.parse(login.json());

  return { ...built, rootToken: access_token };
}

describe('superuser administration', () => {
  it('GET /users/:id returns any user to a superuser', async () => {
    const { app, close, rootToken } = await buildWithSuperuser();

    try {
      await signUp(app, 'member@example.com');

      const res = await app.inject({ method: 'GET', url: '/users/2', headers: bearer(rootToken) });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        id: 2,
        email: 'member@example.com',
        isActive: true,
        isVerified: false,
        isSuperuser: false,
      });
    } finally {
      await close();
    }
  });

  it('GET /users/:id → 403 for regular users, 404 for missing ids, 400 for bad ids', async () => {
    const { app, close, rootToken } = await buildWithSuperuser();

    try {
      const member = await signUp(app, 'member@example.com');

      const forbidden = await app.inject({ method: 'GET', url: '/users/1', headers: bearer(member) });
      const missing = await app.inject({ method: 'GET', url: '/users/999', headers: bearer(rootToken) });
      const huge = await app.inject({
        method: 'GET',
        url: '/users/2147483648',
        headers: bearer(rootToken),
      });
      const bad = await app.inject({ method: 'GET', url: '/users/abc', headers: bearer(rootToken) });

      expect(forbidden.statusCode).toBe(403);
      expect(missing.statusCode).toBe(404);
      expect(huge.statusCode).toBe(404);
      expect(bad.statusCode).toBe(400);
    } finally {
      await close();
    }
  });

  it('DELETE /users/:id removes the user, their history and their sessions', async () => {
    const { app, close, db, rootToken } = await buildWithSuperuser();

    try {
      const member = await signUp(app, 'member@example.com');
      await app.inject({
        method: 'POST',
        url: '/query',
        headers: bearer(member),
        payload: { cadastralNumber: '12:34:567890:1011' },
      });
      expect(db.history).toHaveLength(1);

      const res = await app.inject({ method: 'DELETE', url: '/users/2', headers: bearer(rootToken) });

      expect(res.statusCode).toBe(204);
      expect(db.history).toHaveLength(0);
      expect(db.users.map((u) => u.email)).toEqual(['root@example.com']);

      const me = await app.inject({ method: 'GET', url: '/users/me', headers: bearer(member) });
      expect(me.statusCode).toBe(401);
    } finally {
      await close();
    }
  });

  it('DELETE /users/:id → 403 for regular users', async () => {
    const { app, close, db } = await buildWithSuperuser();

    try {
      const member = await signUp(app, 'member@example.com');

      const res = await app.inject({ method: 'DELETE', url: '/users/1', headers: bearer(member) });

      expect(res.statusCode).toBe(403);
      expect(db.users).toHaveLength(2);
    } finally {
      await close();
    }
  });
});
