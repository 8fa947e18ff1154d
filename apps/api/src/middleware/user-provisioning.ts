import type { NextFunction, Request, Response } from 'express';
import { userService } from '../services';
import { getIdentity } from './identity-context';

/** Creates the caller's account on its first authenticated request. */
export async function provisionUser(req: Request, _res: Response, next: NextFunction): Promise<void> {
  try {
    await userService.getProfile(getIdentity(req));
    next();
  } catch (err) {
    next(err);
  }
}
