/**
 * backend/src/modules/query-history/query-history.controller.ts
 *
 * WHY:
 * - Maps HTTP → QueryHistoryService for POST /query and GET /history.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Both endpoints require a bearer session.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import type { QueryHistoryService } from './query-history.service';
import { listHistoryQuerySchema, submitQuerySchema } from './query-history.schemas';

export class QueryHistoryController {
  constructor(private readonly service: QueryHistoryService) {}

  async submit(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const parsed = submitQuerySchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const record = await this.service.submit({
      userId: session.userId,
      cadastralNumber: parsed.data.cadastralNumber,
      latitude: parsed.data.latitude,
      longitude: parsed.data.longitude,
      authorization: req.headers.authorization ?? null,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(record);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const parsed = listHistoryQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid query parameters', {
        issues: parsed.error.issues,
      });
    }

    const records = await this.service.list({
      userId: session.userId,
      cadastralNumber: parsed.data.cadastralNumber,
      page: parsed.data.page,
      size: parsed.data.size,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(records);
  }
}
