import { readFile } from 'fs/promises';
import path from 'path';
import { Pool } from 'pg';
import type { Env } from './env';

const SCHEMA_PATH = path.resolve(__dirname, '..', 'db', 'schema.sql');

export function createPool(env: Env) {
  return new Pool({
    host: env.PGHOST,
    port: env.PGPORT,
    database: env.PGDATABASE,
    user: env.PGUSER,
    password: env.PGPASSWORD,
    max: Math.max(env.CHECK_CONCURRENCY + 2, 10)
  });
}

export async function migrate(pool: Pool, schemaPath = SCHEMA_PATH) {
  const sql = await readFile(schemaPath, 'utf8');
  await pool.query(sql);
}
