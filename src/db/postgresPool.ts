import pg from 'pg';
import { env } from '../config/env.js';

const { Pool } = pg;

function pgConfigFromUrl(rawUrl: string) {
  const url = new URL(rawUrl);
  const database = url.pathname.replace(/^\//, '');
  const sslMode = url.searchParams.get('sslmode');

  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : 5432,
    user: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    database,
    ssl: sslMode
      ? {
          rejectUnauthorized: env.POSTGRES_SSL_REJECT_UNAUTHORIZED
        }
      : undefined
  };
}

let pool: pg.Pool | null = null;

export function isPostgresConfigured(): boolean {
  return Boolean(env.POSTGRES_URL);
}

/** Created on first use; Postgres only backs the optional cost ledger. */
export function getPostgresPool(): pg.Pool {
  if (!env.POSTGRES_URL) {
    throw new Error('POSTGRES_URL is not set: required when COST_LEDGER_BACKEND=postgres');
  }
  if (!pool) pool = new Pool(pgConfigFromUrl(env.POSTGRES_URL));
  return pool;
}

export async function closePostgresPool(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}
