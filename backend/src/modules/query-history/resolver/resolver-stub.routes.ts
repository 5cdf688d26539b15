/**
 * backend/src/modules/query-history/resolver/resolver-stub.routes.ts
 *
 * WHY:
 * - Stand-in for the external cadastral registry: GET /result answers
 *   { result: boolean } at random after a random delay.
 * - Lets the HTTP resolver run end-to-end against this same server.
 *
 * RULES:
 * - Bearer session required (the resolver forwards the caller's header).
 * - Registered only when config.resolverStub.enabled.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../../shared/http/errors';
import { requireSession } from '../../../shared/http/require-auth-context';
import { withRequestContext } from '../../../shared/logger/with-context';
import { resolverStubQuerySchema } from '../query-history.schemas';

export type ResolverStubOptions = {
  minDelaySeconds: number;
  maxDelaySeconds: number;
  random?: () => number;
};

export class ResolverStubController {
  private readonly random: () => number;

  constructor(private readonly opts: ResolverStubOptions) {
    this.random = opts.random ?? Math.random;
  }

  delayMs(): number {
    const { minDelaySeconds, maxDelaySeconds } = this.opts;
    const seconds = minDelaySeconds + this.random() * (maxDelaySeconds - minDelaySeconds);
    return Math.round(seconds * 1000);
  }

  async result(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req);

    const parsed = resolverStubQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid query parameters', {
        issues: parsed.error.issues,
      });
    }

    const delayMs = this.delayMs();
    if (delayMs > 0) await sleep(delayMs);

    const result = this.random() < 0.5;

    withRequestContext(req).debug('resolver_stub.answered', {
      flow: 'resolver.stub',
      cadastralNumber: parsed.data.cadastral_number,
      delayMs,
      result,
    });

    return reply.status(200).send({ result });
  }
}

export function registerResolverStubRoutes(app: FastifyInstance, opts: ResolverStubOptions) {
  const controller = new ResolverStubController(opts);
  app.get('/result', controller.result.bind(controller));
}
