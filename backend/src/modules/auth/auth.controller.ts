/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → AuthService for register, token login and logout.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Login accepts form-encoded (OAuth2 password flow) or JSON bodies; both parse to
 *   a plain object before validation.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { registerSchema, loginSchema } from './auth.schemas';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import type { AuthService } from './auth.service';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const user = await this.authService.register({
      email: parsed.data.email,
      password: parsed.data.password,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(user);
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.login({
      email: parsed.data.username,
      password: parsed.data.password,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    await this.authService.logout({
      accessToken: session.sessionId,
      userId: session.userId,
      requestId: req.requestContext.requestId,
    });

    return reply.status(204).send();
  }
}
