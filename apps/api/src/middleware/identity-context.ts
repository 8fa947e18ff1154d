import type { Request } from 'express';
import type { Identity, SignatureEvidence } from '@quill/shared';
import { UnauthorizedError } from './error-handler';

// Declaration merging: `authenticate` attaches the caller to the request
declare module 'express-serve-static-core' {
  interface Request {
    identity?: Identity;
  }
}

/**
 * Extracts the authenticated Identity from an Express request.
 * Throws 401 if authenticate did not run for this route.
 */
export function getIdentity(req: Request): Identity {
  if (!req.identity?.id) {
    throw new UnauthorizedError('Identity not available. Ensure authenticate middleware is applied.');
  }
  return req.identity;
}

/** Client evidence recorded with a signature. */
export function requestEvidence(req: Request): SignatureEvidence {
  return {
    ipAddress: req.ip,
    userAgent: req.get('user-agent'),
  };
}
