import { Router } from 'express';
import { sql } from 'drizzle-orm';
import { APP_VERSION } from '@quill/shared';
import { db } from '../shared/db';
import { logger } from '../shared/logger';

export const healthRouter = Router();

healthRouter.get('/', async (_req, res) => {
  try {
    await db.execute(sql`select 1`);
    res.json({
      status: 'ok',
      version: APP_VERSION,
      timestamp: new Date().toISOString(),
    });
  } catch (err) {
    logger.warn({ err }, 'Health check database ping failed');
    res.status(503).json({
      status: 'unhealthy',
      timestamp: new Date().toISOString(),
    });
  }
});
