import pino from 'pino';
import { config } from './config';

export const logger = pino({
  name: 'quill-api',
  level: config.NODE_ENV === 'test' ? 'silent' : config.LOG_LEVEL,
  redact: {
    paths: ['req.headers.authorization', 'token', '*.token'],
    censor: '[REDACTED]',
  },
});
