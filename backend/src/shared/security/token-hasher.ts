/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Raw access tokens never become storage keys; only their hash does.
 * - Also used to derive PII-free rate-limit keys from emails.
 *
 * NOTE:
 * - Callers depend on this interface (DIP). Today the implementation is SHA-256.
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
