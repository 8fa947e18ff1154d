/**
 * Template catalog routes. Read-only; `/types` is declared before `/:id`.
 */

import { Router } from 'express';
import { z } from 'zod';
import { templateService } from '../../services';

export const templateRouter = Router();

const filterSchema = z.object({
  category: z.string().min(1).optional(),
  jurisdiction: z.string().min(1).optional(),
});

templateRouter.get('/', (req, res, next) => {
  try {
    res.json(templateService.listTemplates(filterSchema.parse(req.query)));
  } catch (err) {
    next(err);
  }
});

templateRouter.get('/types', (_req, res, next) => {
  try {
    res.json(templateService.listTypes());
  } catch (err) {
    next(err);
  }
});

templateRouter.get('/types/:type/schema', (req, res, next) => {
  try {
    const { type } = z.object({ type: z.string().min(1) }).parse(req.params);
    res.json(templateService.getTypeSchema(type));
  } catch (err) {
    next(err);
  }
});

templateRouter.get('/:id', (req, res, next) => {
  try {
    const { id } = z.object({ id: z.string().min(1) }).parse(req.params);
    res.json(templateService.getTemplate(id));
  } catch (err) {
    next(err);
  }
});
