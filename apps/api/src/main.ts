import express, { Request, Response, NextFunction, Router } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { pinoHttp } from 'pino-http';
import { APP_NAME, APP_VERSION } from '@quill/shared';
import { config } from './shared/config';
import { closeDatabase } from './shared/db';
import { logger } from './shared/logger';
import { authenticate } from './middleware/auth';
import { provisionUser } from './middleware/user-provisioning';
import { errorHandler } from './middleware/error-handler';
import { eventBus } from './events/bus';
import { registerNotificationConsumer } from './events/notification-consumer';
import { healthRouter } from './modules/health';
import { publicRouter } from './modules/public/routes';
import { contractRouter } from './modules/contract/routes';
import { signatureRouter } from './modules/signature/routes';
import { auditRouter } from './modules/audit/routes';
import { templateRouter } from './modules/template/routes';
import { userRouter } from './modules/user/routes';

const app = express();

const API_VERSION = APP_VERSION;

// --- Global Middleware ---
app.use(helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'self'"],
      scriptSrc: ["'self'"],
      styleSrc: ["'self'", "'unsafe-inline'"],
      imgSrc: ["'self'", 'data:', 'blob:'],
      connectSrc: ["'self'"],
      fontSrc: ["'self'"],
      objectSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginOpenerPolicy: { policy: 'same-origin' },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
}));
app.use(cors({
  origin: config.CORS_ORIGIN,
  methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'x-user-id', 'x-user-email', 'x-user-name'],
  exposedHeaders: ['Content-Disposition', 'X-API-Version'],
  credentials: true,
  maxAge: 86400,
}));
app.use(express.json({ limit: '1mb' }));
app.use(pinoHttp({ logger }));

// --- API Version Header ---
app.use('/api', (_req: Request, res: Response, next: NextFunction) => {
  res.setHeader('X-API-Version', API_VERSION);
  next();
});

/**
 * One router serves both prefixes: `/api/v1` (canonical) and `/api` (legacy).
 * Health and the token-gated public endpoints are mounted before authentication;
 * every authenticated caller has an account row before its route runs.
 */
const api = Router();
api.use('/health', healthRouter);
api.use('/public', publicRouter);

api.use(authenticate);
api.use(provisionUser);
api.use('/users', userRouter);
api.use('/contracts', contractRouter);
api.use('/signatures', signatureRouter);
api.use('/audit', auditRouter);
api.use('/templates', templateRouter);

app.use('/api/v1', api);
app.use('/api', api);

// --- Error Handler ---
app.use(errorHandler);

registerNotificationConsumer(eventBus);

if (config.NODE_ENV !== 'test') {
  const server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT, apiVersion: API_VERSION }, `${APP_NAME} API v${API_VERSION} listening on port ${config.PORT}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      closeDatabase()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Failed to close database pool');
          process.exit(1);
        });
    });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

export { app, API_VERSION };
