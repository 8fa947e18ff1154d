/**
 * User API Routes
 *
 * Endpoints:
 * - GET    /me              — Own profile (provisioned on first call)
 * - PATCH  /me              — Update first / last name
 * - PATCH  /me/preferences  — Merge preferences, returns the merged object
 */

import { Router } from 'express';
import { z } from 'zod';
import { MAX_NAME_PART_LENGTH } from '@quill/shared';
import { getIdentity } from '../../middleware/identity-context';
import { userService } from '../../services';

export const userRouter = Router();

const namePart = z.string().trim().min(1).max(MAX_NAME_PART_LENGTH);

const updateProfileSchema = z.object({
  firstName: namePart.optional(),
  lastName: namePart.optional(),
});

const preferencesSchema = z.record(z.unknown());

userRouter.get('/me', async (req, res, next) => {
  try {
    res.json(await userService.getProfile(getIdentity(req)));
  } catch (err) {
    next(err);
  }
});

userRouter.patch('/me', async (req, res, next) => {
  try {
    const input = updateProfileSchema.parse(req.body);
    res.json(await userService.updateProfile(getIdentity(req), input));
  } catch (err) {
    next(err);
  }
});

userRouter.patch('/me/preferences', async (req, res, next) => {
  try {
    const preferences = preferencesSchema.parse(req.body);
    res.json(await userService.updatePreferences(getIdentity(req), preferences));
  } catch (err) {
    next(err);
  }
});
