/**
 * backend/src/modules/users/user.schemas.ts
 */

import { z } from 'zod';

export const userIdParamsSchema = z.object({
  id: z.coerce.number().int('User id must be an integer').positive('User id must be positive'),
});

export type UserIdParams = z.infer<typeof userIdParamsSchema>;
