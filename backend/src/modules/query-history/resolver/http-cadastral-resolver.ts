/**
 * backend/src/modules/query-history/resolver/http-cadastral-resolver.ts
 *
 * WHY:
 * - Asks the external resolver whether a cadastral number matches.
 * - One GET {baseUrl}/result?cadastral_number=... per submission, no retries.
 *
 * FAILURE MODEL:
 * - Deadline: AbortSignal.timeout(timeoutMs) covers the request AND the body read.
 * - timeout          → warn 'resolver.timeout'      → { matched: false }
 * - network / non-2xx → warn 'resolver.unavailable' → { matched: false }
 * - body not { result: boolean } → warn 'resolver.bad_response' → { matched: false }
 *
 * RULES:
 * - Never throws to the caller.
 * - Never logs the forwarded Authorization header.
 */

import { z } from 'zod';
import type { Logger } from '../../../shared/logger/logger';
import { NO_MATCH } from './cadastral-resolver';
import type { CadastralResolver, ResolveOptions, ResolveOutcome } from './cadastral-resolver';

const ResolverResponseSchema = z.object({
  result: z.boolean(),
});

function isTimeoutError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class HttpCadastralResolver implements CadastralResolver {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly deps: {
      baseUrl: string;
      timeoutMs: number;
      logger: Logger;
      fetch?: typeof fetch;
    },
  ) {
    this.fetchImpl = deps.fetch ?? fetch;
  }

  buildUrl(cadastralNumber: string): URL {
    const url = new URL('/result', this.deps.baseUrl);
    url.searchParams.set('cadastral_number', cadastralNumber);
    return url;
  }

  async resolve(cadastralNumber: string, opts: ResolveOptions): Promise<ResolveOutcome> {
    const flow = 'resolver.resolve';
    const logMeta = { flow, requestId: opts.requestId, cadastralNumber };

    const headers: Record<string, string> = { accept: 'application/json' };
    if (opts.authorization) headers.authorization = opts.authorization;

    let body: unknown;

    try {
      const response = await this.fetchImpl(this.buildUrl(cadastralNumber), {
        method: 'GET',
        headers,
        signal: AbortSignal.timeout(this.deps.timeoutMs),
      });

      if (!response.ok) {
        this.deps.logger.warn({ msg: 'resolver.unavailable', ...logMeta, status: response.status });
        return NO_MATCH;
      }

      body = await response.json();
    } catch (err) {
      if (isTimeoutError(err)) {
        this.deps.logger.warn({
          msg: 'resolver.timeout',
          ...logMeta,
          timeoutMs: this.deps.timeoutMs,
        });
      } else if (err instanceof SyntaxError) {
        this.deps.logger.warn({ msg: 'resolver.bad_response', ...logMeta, reason: err.message });
      } else {
        this.deps.logger.warn({
          msg: 'resolver.unavailable',
          ...logMeta,
          reason: errorMessage(err),
        });
      }
      return NO_MATCH;
    }

    const parsed = ResolverResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.deps.logger.warn({ msg: 'resolver.bad_response', ...logMeta });
      return NO_MATCH;
    }

    return { matched: parsed.data.result };
  }
}
