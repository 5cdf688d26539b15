/**
 * backend/src/modules/query-history/resolver/cadastral-resolver.ts
 *
 * WHY:
 * - The query service depends on this interface, not on HTTP (DIP).
 * - Production: HttpCadastralResolver. Tests: deterministic fakes.
 *
 * RULES:
 * - resolve() NEVER rejects. Timeouts and failures come back as { matched: false }.
 */

export type ResolveOutcome = {
  matched: boolean;
};

export type ResolveOptions = {
  /** Forwarded verbatim as the Authorization header (null = none). */
  authorization: string | null;
  requestId?: string;
};

export interface CadastralResolver {
  resolve(cadastralNumber: string, opts: ResolveOptions): Promise<ResolveOutcome>;
}

export const NO_MATCH: ResolveOutcome = Object.freeze({ matched: false });
