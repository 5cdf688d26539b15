/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Account reads for the caller, plus superuser administration (read/delete any user).
 *
 * RULES:
 * - Superuser checks happen here, not in controllers.
 * - Deleting a user removes their history rows and the user in ONE transaction
 *   (History Store owns it), THEN revokes every access token they hold.
 */

import type { Logger } from '../../shared/logger/logger';
import type { SessionStore } from '../../shared/session/session.store';
import type { QueryHistoryStore } from '../query-history';

import type { UserStore } from './user.store';
import type { PublicUser, User, UserId } from './user.types';
import { MAX_USER_ID, toPublicUser } from './user.types';
import { UserErrors } from './user.errors';

export class UserService {
  constructor(
    private readonly deps: {
      userStore: UserStore;
      queryHistoryStore: QueryHistoryStore;
      sessionStore: SessionStore;
      logger: Logger;
    },
  ) {}

  private async loadCaller(callerId: UserId): Promise<User> {
    const caller = await this.deps.userStore.findById(callerId);
    if (!caller) throw UserErrors.sessionUserMissing();
    return caller;
  }

  private async loadSuperuser(callerId: UserId): Promise<User> {
    const caller = await this.loadCaller(callerId);
    if (!caller.isSuperuser) {
      throw UserErrors.superuserRequired({ callerId });
    }
    return caller;
  }

  async me(callerId: UserId): Promise<PublicUser> {
    return toPublicUser(await this.loadCaller(callerId));
  }

  async getById(params: { callerId: UserId; userId: UserId }): Promise<PublicUser> {
    await this.loadSuperuser(params.callerId);
    if (params.userId > MAX_USER_ID) throw UserErrors.notFound({ userId: params.userId });

    const user = await this.deps.userStore.findById(params.userId);
    if (!user) throw UserErrors.notFound({ userId: params.userId });

    return toPublicUser(user);
  }

  async deleteById(params: { callerId: UserId; userId: UserId; requestId: string }): Promise<void> {
    await this.loadSuperuser(params.callerId);
    if (params.userId > MAX_USER_ID) throw UserErrors.notFound({ userId: params.userId });

    const deleted = await this.deps.queryHistoryStore.deleteUserCascade(params.userId);
    if (!deleted) throw UserErrors.notFound({ userId: params.userId });

    await this.deps.sessionStore.destroyAllForUser(params.userId);

    this.deps.logger.info({
      msg: 'users.delete.success',
      flow: 'users.delete',
      requestId: params.requestId,
      callerId: params.callerId,
      userId: params.userId,
    });
  }
}
