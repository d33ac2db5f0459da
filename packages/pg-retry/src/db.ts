import { Pool } from 'pg';
import { loadPgEnv } from './config';

export function createPool(env: Record<string, string | undefined> = process.env): Pool {
  const config = loadPgEnv(env);
  return new Pool({
    host: config.PGHOST,
    port: config.PGPORT,
    user: config.PGUSER,
    password: config.PGPASSWORD,
    database: config.PGDATABASE,
    max: config.PGPOOL_MAX,
  });
}
