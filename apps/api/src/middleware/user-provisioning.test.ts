import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { NextFunction, Request, Response } from 'express';
import type { UserProfileDto } from '@quill/shared';
import { OWNER } from '../__tests__/helpers/fixtures';
import { ConflictError, UnauthorizedError } from './error-handler';

vi.mock('../services', () => ({
  userService: { getProfile: vi.fn() },
}));

import { userService } from '../services';
import { provisionUser } from './user-provisioning';

const profile: UserProfileDto = {
  id: OWNER.id,
  email: OWNER.email,
  firstName: 'Olivia',
  lastName: 'Owner',
  role: 'USER',
  preferences: {},
  createdAt: '2025-06-15T12:00:00.000Z',
  updatedAt: '2025-06-15T12:00:00.000Z',
};

function run(identity: Request['identity']) {
  const req = { identity } as unknown as Request;
  const next = vi.fn() as NextFunction;
  return { done: provisionUser(req, {} as Response, next), next };
}

describe('provisionUser', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('ensures the account exists, then continues', async () => {
    vi.mocked(userService.getProfile).mockResolvedValue(profile);

    const { done, next } = run(OWNER);
    await done;

    expect(userService.getProfile).toHaveBeenCalledWith(OWNER);
    expect(next).toHaveBeenCalledWith();
  });

  it('forwards provisioning failures', async () => {
    const error = new ConflictError(`Failed to auto-provision user ${OWNER.email}`, 'USER_PROVISIONING_CONFLICT');
    vi.mocked(userService.getProfile).mockRejectedValue(error);

    const { done, next } = run(OWNER);
    await done;

    expect(next).toHaveBeenCalledWith(error);
  });

  it('forwards 401 when no identity was attached', async () => {
    const { done, next } = run(undefined);
    await done;

    expect(vi.mocked(next).mock.calls[0]?.[0]).toBeInstanceOf(UnauthorizedError);
    expect(userService.getProfile).not.toHaveBeenCalled();
  });
});
