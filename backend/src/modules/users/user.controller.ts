/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP → UserService.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here (superuser checks live in the service).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import type { UserService } from './user.service';
import { userIdParamsSchema } from './user.schemas';

export class UserController {
  constructor(private readonly userService: UserService) {}

  private parseParams(req: FastifyRequest) {
    const parsed = userIdParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw AppError.validationError('Invalid user id', {
        issues: parsed.error.issues,
      });
    }
    return parsed.data;
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const user = await this.userService.me(session.userId);
    return reply.status(200).send(user);
  }

  async getById(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const params = this.parseParams(req);

    const user = await this.userService.getById({
      callerId: session.userId,
      userId: params.id,
    });
    return reply.status(200).send(user);
  }

  async deleteById(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const params = this.parseParams(req);

    await this.userService.deleteById({
      callerId: session.userId,
      userId: params.id,
      requestId: req.requestContext.requestId,
    });
    return reply.status(204).send();
  }
}
