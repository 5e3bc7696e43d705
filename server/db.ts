import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import logger from './logger';
const { Pool } = pg;

export type Database = NodePgDatabase;

export interface DatabaseHandle {
  pool: pg.Pool;
  db: Database;
}

export function sslFromConnectionString(connectionString: string): pg.ClientConfig['ssl'] | undefined {
  let url: URL;
  try {
    url = new URL(connectionString);
  } catch (error) {
    logger.warn({ err: error }, 'Could not parse DATABASE_URL; connecting without SSL');
    return undefined;
  }
  const sslmode = url.searchParams.get('sslmode');
  const sslParam = url.searchParams.get('ssl');
  if ((sslmode && sslmode.toLowerCase() === 'require') || (sslParam && sslParam.toLowerCase() === 'true')) {
    return { rejectUnauthorized: false };
  }
  return undefined;
}

export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new Pool({ connectionString, ssl: sslFromConnectionString(connectionString) });
  return { pool, db: drizzle(pool) };
}

export async function assertDbConnection(pool: pg.Pool): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query('select 1');
  } finally {
    client.release();
  }
}

export async function waitForDb(pool: pg.Pool, retries = 10): Promise<void> {
  for (let attempt = 0; attempt < retries; attempt++) {
    try {
      await assertDbConnection(pool);
      return;
    } catch (err) {
      const delay = Math.pow(2, attempt) * 100;
      logger.warn({ err }, `Database connection failed, retrying in ${delay}ms`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
  throw new Error('Unable to establish database connection');
}
