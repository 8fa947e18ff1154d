import { Router } from 'express';
import { z } from 'zod';
import { getIdentity } from '../../middleware/identity-context';
import { auditService } from '../../services';
import { sendPdf } from '../document/http';

export const auditRouter = Router();

const idParams = z.object({ id: z.string().uuid() });

// --- Audit trail, oldest first ---
auditRouter.get('/contracts/:id/trail', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    res.json(await auditService.getTrail(getIdentity(req), id));
  } catch (err) {
    next(err);
  }
});

auditRouter.get('/contracts/:id/export', async (req, res, next) => {
  try {
    const { id } = idParams.parse(req.params);
    const bytes = await auditService.exportTrail(getIdentity(req), id);
    sendPdf(res, bytes, `audit-${id}.pdf`);
  } catch (err) {
    next(err);
  }
});
