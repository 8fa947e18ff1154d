/**
 * Public API Routes (no authentication)
 *
 * Reached by guests through the signing link. Every endpoint is gated by the
 * signature token instead of an identity.
 *
 * - GET  /contracts/:id?token=              — Contract view for the invited party
 * - GET  /signatures/validate-token?token=  — Token check
 * - POST /signatures/guest-sign             — Sign with the token
 */

import { Router } from 'express';
import { z } from 'zod';
import { requestEvidence } from '../../middleware/identity-context';
import { contractService, signatureService } from '../../services';
import { evidenceSchema } from '../signature/routes';

export const publicRouter = Router();

const tokenQuery = z.object({ token: z.string().min(1).max(128) });

const guestSignSchema = z.object({
  token: z.string().min(1).max(128),
  evidence: evidenceSchema,
});

publicRouter.get('/contracts/:id', async (req, res, next) => {
  try {
    const { id } = z.object({ id: z.string().uuid() }).parse(req.params);
    const { token } = tokenQuery.parse(req.query);
    res.json(await contractService.getPublicView(id, token));
  } catch (err) {
    next(err);
  }
});

publicRouter.get('/signatures/validate-token', async (req, res, next) => {
  try {
    const { token } = tokenQuery.parse(req.query);
    res.json(await signatureService.validateToken(token));
  } catch (err) {
    next(err);
  }
});

publicRouter.post('/signatures/guest-sign', async (req, res, next) => {
  try {
    const { token, evidence } = guestSignSchema.parse(req.body);
    const result = await signatureService.signAsGuest({
      token,
      evidence: { ...evidence, ...requestEvidence(req) },
    });
    res.json(result);
  } catch (err) {
    next(err);
  }
});
