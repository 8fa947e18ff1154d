import { Pool } from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from '../store/schema';
import { config } from './config';
import { logger } from './logger';

export type Database = NodePgDatabase<typeof schema>;

const pool = new Pool({
  connectionString: config.DATABASE_URL,
  max: config.DB_POOL_MAX,
  application_name: 'quill-api',
});

pool.on('error', (err) => {
  logger.error({ err }, 'Idle PostgreSQL client error');
});

export const db: Database = drizzle(pool, {
  schema,
  logger:
    config.NODE_ENV === 'development'
      ? { logQuery: (query, params) => logger.debug({ query, params }, 'SQL') }
      : false,
});

export async function closeDatabase(): Promise<void> {
  await pool.end();
}
