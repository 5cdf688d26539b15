/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Orchestrates registration, token login and logout.
 *
 * RULES:
 * - No raw DB access (UserStore only).
 * - Never store/log raw passwords or tokens.
 * - Rate limit at the start of each flow (before any DB work).
 * - Login failures all map to the same 401 (no user enumeration).
 */

import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { SessionStore } from '../../shared/session/session.store';
import { UniqueViolationError } from '../../shared/db/unique-violation';

import { toPublicUser } from '../users';
import type { PublicUser, UserStore } from '../users';

import { AUTH_RATE_LIMITS, TOKEN_TYPE } from './auth.constants';
import { AuthErrors } from './auth.errors';
import type { AccessTokenResponse } from './auth.types';

// ── PII-safe helpers ─────────────────────────────────────────
// Raw emails stay out of infra keys (Redis) and operational logs.
function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}

// ── Params ──────────────────────────────────────────────────

export type RegisterParams = {
  email: string;
  password: string;
  ip: string;
  requestId: string;
};

export type LoginParams = {
  email: string;
  password: string;
  ip: string;
  requestId: string;
};

export type LogoutParams = {
  accessToken: string;
  userId: number;
  requestId: string;
};

type LoginFailureReason = 'user_not_found' | 'bad_password' | 'inactive';

// ── Service ─────────────────────────────────────────────────

export class AuthService {
  constructor(
    private readonly deps: {
      userStore: UserStore;
      passwordHasher: PasswordHasher;
      tokenHasher: TokenHasher;
      rateLimiter: RateLimiter;
      sessionStore: SessionStore;
      logger: Logger;
    },
  ) {}

  async register(params: RegisterParams): Promise<PublicUser> {
    const email = params.email.toLowerCase();
    const emailKey = this.deps.tokenHasher.hash(email);

    this.deps.logger.info({
      msg: 'auth.register.start',
      flow: 'auth.register',
      requestId: params.requestId,
      emailDomain: emailDomain(email),
      emailKey,
    });

    await this.deps.rateLimiter.hitOrThrow({
      key: `register:email:${emailKey}`,
      ...AUTH_RATE_LIMITS.register.perEmail,
    });
    await this.deps.rateLimiter.hitOrThrow({
      key: `register:ip:${params.ip}`,
      ...AUTH_RATE_LIMITS.register.perIp,
    });

    const hashedPassword = await this.deps.passwordHasher.hash(params.password);

    try {
      const user = await this.deps.userStore.insertUser({ email, hashedPassword });

      this.deps.logger.info({
        msg: 'auth.register.success',
        flow: 'auth.register',
        requestId: params.requestId,
        userId: user.id,
      });

      return toPublicUser(user);
    } catch (err) {
      if (err instanceof UniqueViolationError) {
        throw AuthErrors.alreadyRegistered({ emailKey });
      }
      throw err;
    }
  }

  async login(params: LoginParams): Promise<AccessTokenResponse> {
    const email = params.email.toLowerCase();
    const emailKey = this.deps.tokenHasher.hash(email);
    const flow = 'auth.login';

    this.deps.logger.info({
      msg: 'auth.login.start',
      flow,
      requestId: params.requestId,
      emailDomain: emailDomain(email),
      emailKey,
    });

    await this.deps.rateLimiter.hitOrThrow({
      key: `login:email:${emailKey}`,
      ...AUTH_RATE_LIMITS.login.perEmail,
    });
    await this.deps.rateLimiter.hitOrThrow({
      key: `login:ip:${params.ip}`,
      ...AUTH_RATE_LIMITS.login.perIp,
    });

    const user = await this.deps.userStore.findCredentialsByEmail(email);

    let failure: LoginFailureReason | null = null;
    if (!user) {
      failure = 'user_not_found';
    } else if (!(await this.deps.passwordHasher.verify(params.password, user.hashedPassword))) {
      failure = 'bad_password';
    } else if (!user.isActive) {
      failure = 'inactive';
    }

    if (!user || failure) {
      this.deps.logger.warn({
        msg: 'auth.login.failed',
        flow,
        requestId: params.requestId,
        emailKey,
        reason: failure,
      });
      throw AuthErrors.invalidCredentials();
    }

    const accessToken = await this.deps.sessionStore.create(user.id);

    this.deps.logger.info({
      msg: 'auth.login.success',
      flow,
      requestId: params.requestId,
      userId: user.id,
    });

    return { access_token: accessToken, token_type: TOKEN_TYPE };
  }

  async logout(params: LogoutParams): Promise<void> {
    await this.deps.sessionStore.destroy(params.accessToken);

    this.deps.logger.info({
      msg: 'auth.logout.success',
      flow: 'auth.logout',
      requestId: params.requestId,
      userId: params.userId,
    });
  }
}
