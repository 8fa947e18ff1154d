/**
 * JWT Authentication Middleware
 *
 * Production: Validates the Bearer JWT against the OIDC provider's JWKS.
 * Development: Falls back to x-user-id / x-user-email / x-user-name headers.
 */

import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import jwksClient from 'jwks-rsa';
import { z } from 'zod';
import { MAX_IDENTITY_LENGTH } from '@quill/shared';
import type { Identity } from '@quill/shared';
import { config } from '../shared/config';
import { logger } from '../shared/logger';
import { AppError, UnauthorizedError } from './error-handler';

const OIDC_ISSUER = config.OIDC_ISSUER_URL;
const OIDC_AUDIENCE = config.OIDC_CLIENT_ID;
const DEV_MODE = !OIDC_ISSUER || config.NODE_ENV === 'development';

let jwks: jwksClient.JwksClient | null = null;

if (OIDC_ISSUER) {
  jwks = jwksClient({
    jwksUri: `${OIDC_ISSUER}/protocol/openid-connect/certs`,
    cache: true,
    cacheMaxAge: 600_000, // 10 min
    rateLimit: true,
    jwksRequestsPerMinute: 10,
  });
}

async function getSigningKey(header: jwt.JwtHeader): Promise<string> {
  if (!jwks) throw new Error('JWKS client not initialized');
  const key = await jwks.getSigningKey(header.kid);
  return key.getPublicKey();
}

// Ids and emails are stored in varchar(255) columns; longer ones are refused,
// display names are cut to fit.
const subjectSchema = z.string().trim().min(1).max(MAX_IDENTITY_LENGTH);
const emailSchema = z.string().trim().max(MAX_IDENTITY_LENGTH).email();
const nameSchema = z
  .string()
  .trim()
  .transform((value) => value.slice(0, MAX_IDENTITY_LENGTH));

const claimsSchema = z.object({
  sub: subjectSchema,
  email: emailSchema,
  name: nameSchema.optional(),
  preferred_username: nameSchema.optional(),
});

export type IdentityClaims = z.infer<typeof claimsSchema>;

const devHeadersSchema = z.object({
  'x-user-id': subjectSchema,
  'x-user-email': emailSchema,
  'x-user-name': nameSchema.optional(),
});

/** Maps verified token claims onto the caller's Identity. */
export function identityFromClaims(claims: IdentityClaims): Identity {
  return {
    id: claims.sub,
    email: claims.email.toLowerCase(),
    name: claims.name || claims.preferred_username || null,
  };
}

function identityFromHeaders(req: Request): Identity {
  const parsed = devHeadersSchema.safeParse(req.headers);
  if (!parsed.success) {
    throw new UnauthorizedError('Missing or invalid x-user-id / x-user-email headers (dev mode)');
  }
  const headers = parsed.data;
  return {
    id: headers['x-user-id'],
    email: headers['x-user-email'].toLowerCase(),
    name: headers['x-user-name'] || null,
  };
}

function verifyToken(token: string): Promise<IdentityClaims> {
  return new Promise((resolve, reject) => {
    jwt.verify(
      token,
      (jwtHeader, callback) => {
        getSigningKey(jwtHeader)
          .then((key) => callback(null, key))
          .catch(callback);
      },
      {
        issuer: OIDC_ISSUER,
        audience: OIDC_AUDIENCE,
        algorithms: ['RS256'],
      },
      (err, payload) => {
        if (err) return reject(err);
        const parsed = claimsSchema.safeParse(payload);
        if (!parsed.success) return reject(new UnauthorizedError('JWT sub or email claim missing or invalid'));
        resolve(parsed.data);
      },
    );
  });
}

/**
 * Authenticates the request and attaches the caller's Identity.
 * In dev mode, uses header-based identity (no JWT required).
 */
export async function authenticate(req: Request, _res: Response, next: NextFunction): Promise<void> {
  try {
    if (DEV_MODE) {
      req.identity = identityFromHeaders(req);
      return next();
    }

    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith('Bearer ')) {
      throw new UnauthorizedError('Missing or invalid Authorization header');
    }

    const claims = await verifyToken(authHeader.slice(7));
    req.identity = identityFromClaims(claims);

    next();
  } catch (err) {
    if (err instanceof AppError) return next(err);
    logger.warn({ err }, 'Authentication failed');
    next(new UnauthorizedError('Authentication failed'));
  }
}
