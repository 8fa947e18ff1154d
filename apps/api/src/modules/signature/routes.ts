/**
 * Signature API Routes (authenticated)
 *
 * - POST /create-token        — Issue a guest signing token for a party
 * - POST /sign                — Sign as the logged-in party
 * - GET  /:id/certificate     — Signature certificate PDF
 *
 * Token validation and guest signing live on the public router.
 */

import { Router } from 'express';
import { z } from 'zod';
import { SIGNATURE_TOKEN_MAX_TTL_MINUTES } from '@quill/shared';
import { getIdentity, requestEvidence } from '../../middleware/identity-context';
import { signatureService } from '../../services';
import { sendPdf } from '../document/http';

export const signatureRouter = Router();

export const evidenceSchema = z
  .object({
    geolocation: z.string().max(255).optional(),
  })
  .default({});

const createTokenSchema = z.object({
  contractId: z.string().uuid(),
  partyId: z.string().uuid(),
  expiresInMinutes: z.number().int().min(1).max(SIGNATURE_TOKEN_MAX_TTL_MINUTES).optional(),
});

const signSchema = z.object({
  contractId: z.string().uuid(),
  partyId: z.string().uuid(),
  evidence: evidenceSchema,
});

signatureRouter.post('/create-token', async (req, res, next) => {
  try {
    const input = createTokenSchema.parse(req.body);
    const token = await signatureService.createToken(getIdentity(req), input);
    res.status(201).json(token);
  } catch (err) {
    next(err);
  }
});

signatureRouter.post('/sign', async (req, res, next) => {
  try {
    const identity = getIdentity(req);
    const { contractId, partyId, evidence } = signSchema.parse(req.body);
    const result = await signatureService.sign(identity, {
      contractId,
      partyId,
      // ip and user agent come from the connection, never the body
      evidence: { ...evidence, ...requestEvidence(req) },
    });
    res.json(result);
  } catch (err) {
    next(err);
  }
});

signatureRouter.get('/:id/certificate', async (req, res, next) => {
  try {
    const { id } = z.object({ id: z.string().uuid() }).parse(req.params);
    const bytes = await signatureService.getCertificate(getIdentity(req), id);
    sendPdf(res, bytes, `signature-${id}.pdf`);
  } catch (err) {
    next(err);
  }
});
