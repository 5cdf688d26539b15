/**
 * src/modules/auth/auth.types.ts
 *
 * RULES:
 * - Never include raw passwords or hashes in response types.
 * - Token response keys follow the OAuth2 password-flow convention (snake_case).
 */

import type { TOKEN_TYPE } from './auth.constants';

export type AccessTokenResponse = {
  access_token: string;
  token_type: typeof TOKEN_TYPE;
};
