/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules and the composition root.
 */

export { UserRepo } from './dal/user.repo';
export { toPublicUser } from './user.types';
export type { User, UserCredentials, UserId, PublicUser } from './user.types';
export type { NewUser, UserStore } from './user.store';
