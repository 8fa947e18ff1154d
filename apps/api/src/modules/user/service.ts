/**
 * User accounts, keyed by the identity provider's subject.
 *
 * An account is created the first time a caller is seen. First and last name
 * are split from the display name only then; later logins keep whatever the
 * user edited since.
 */

import { MAX_NAME_PART_LENGTH, USER_PROVISION_MAX_ATTEMPTS } from '@quill/shared';
import type { Identity, UpdateProfileInput, UserProfileDto, UserService } from '@quill/shared';
import { NotFoundError } from '../../middleware/error-handler';
import { logger } from '../../shared/logger';
import { claimWithRetry } from '../../store/retry';
import type { ContractStore, StoreSession, UserRecord } from '../../store/types';

/** "Ana Maria Lima" → first "Ana", last "Maria Lima". */
export function splitName(name: string | null): { firstName: string | null; lastName: string | null } {
  const [first, ...rest] = name?.trim().split(/\s+/).filter(Boolean) ?? [];
  return {
    firstName: first ? first.slice(0, MAX_NAME_PART_LENGTH) : null,
    lastName: rest.length > 0 ? rest.join(' ').slice(0, MAX_NAME_PART_LENGTH) : null,
  };
}

export function formatUser(user: UserRecord): UserProfileDto {
  return {
    id: user.id,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    role: user.role,
    preferences: user.preferences,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}

export class UserAccountService implements UserService {
  constructor(private readonly store: ContractStore) {}

  getProfile(identity: Identity): Promise<UserProfileDto> {
    return this.store.transaction(async (session) => formatUser(await this.ensureUser(session, identity)));
  }

  updateProfile(identity: Identity, input: UpdateProfileInput): Promise<UserProfileDto> {
    return this.store.transaction(async (session) => {
      const user = await this.ensureUser(session, identity);
      if (input.firstName === undefined && input.lastName === undefined) return formatUser(user);

      const updated = await session.users.update(user.id, input);
      if (!updated) throw new NotFoundError('User', user.id);
      return formatUser(updated);
    });
  }

  updatePreferences(identity: Identity, preferences: Record<string, unknown>): Promise<Record<string, unknown>> {
    return this.store.transaction(async (session) => {
      const user = await this.ensureUser(session, identity);
      const updated = await session.users.mergePreferences(user.id, preferences);
      if (!updated) throw new NotFoundError('User', user.id);
      return updated.preferences;
    });
  }

  private ensureUser(session: StoreSession, identity: Identity): Promise<UserRecord> {
    return claimWithRetry(
      async () => {
        const existing = await session.users.findById(identity.id);
        if (existing) return existing;

        const created = await session.users.create({
          id: identity.id,
          email: identity.email,
          ...splitName(identity.name),
        });
        if (created) logger.info({ userId: created.id }, 'User provisioned');
        return created;
      },
      {
        maxAttempts: USER_PROVISION_MAX_ATTEMPTS,
        conflictCode: 'USER_PROVISIONING_CONFLICT',
        conflictMessage: `Failed to auto-provision user ${identity.email}`,
      },
    );
  }
}
