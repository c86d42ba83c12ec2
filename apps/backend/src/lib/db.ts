import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from '../db/schema.js';
import { logger, getErrorMessage } from '../utils/logger.js';

export type Database = NodePgDatabase<typeof schema>;

export type DatabaseHandle = {
  db: Database;
  close: () => Promise<void>;
};

export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new pg.Pool({ connectionString, max: 10 });
  pool.on('error', (err) => {
    logger.error('db.pool_error', { errorMessage: getErrorMessage(err) });
  });

  const db = drizzle(pool, {
    schema,
    logger: {
      logQuery: (query) => {
        // Params stay out of the log; they carry chat logins.
        logger.debug('db.query', { query: query.slice(0, 200) });
      },
    },
  });

  return {
    db,
    close: () => pool.end(),
  };
}
