import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { RowDataPacket } from 'mysql2/promise';
import { env } from '../config/env.js';
import { mysqlPool } from './mysqlPool.js';
import { closePostgresPool, getPostgresPool, isPostgresConfigured } from './postgresPool.js';
import { log, logError } from '../utils/log.js';

type MigrationEngine = 'postgres' | 'mysql';

interface MigrationIdRow extends RowDataPacket {
  id: string;
}

function migrationsDir(engine: MigrationEngine): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  return path.resolve(__dirname, `../../migrations/${engine}`);
}

/** Statements are separated by a semicolon at the end of a line. */
function splitStatements(sql: string): string[] {
  return sql
    .split(/;\s*\n/)
    .map((s) => s.trim().replace(/;$/, ''))
    .filter(Boolean);
}

async function ensureMigrationsTable(engine: MigrationEngine) {
  if (engine === 'postgres') {
    await getPostgresPool().query(`
      CREATE TABLE IF NOT EXISTS schema_migrations_pg (
        id TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      );
    `);
    return;
  }

  await mysqlPool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations_mysql (
      id VARCHAR(255) PRIMARY KEY,
      applied_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
    )
  `);
}

async function getAppliedIds(engine: MigrationEngine): Promise<Set<string>> {
  if (engine === 'postgres') {
    const res = await getPostgresPool().query<{ id: string }>('SELECT id FROM schema_migrations_pg');
    return new Set(res.rows.map((r) => r.id));
  }

  const [rows] = await mysqlPool.query<MigrationIdRow[]>('SELECT id FROM schema_migrations_mysql');
  return new Set(rows.map((r) => r.id));
}

async function applyMigration(engine: MigrationEngine, id: string, sql: string) {
  if (engine === 'postgres') {
    const client = await getPostgresPool().connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations_pg(id) VALUES ($1)', [id]);
      await client.query('COMMIT');
      log(`Applied postgres migration ${id}`);
    } catch (e) {
      await client.query('ROLLBACK');
      throw e;
    } finally {
      client.release();
    }
    return;
  }

  // DDL auto-commits in MySQL; the transaction only guards the bookkeeping row
  const conn = await mysqlPool.getConnection();
  try {
    await conn.beginTransaction();
    for (const stmt of splitStatements(sql)) {
      await conn.query(stmt);
    }
    await conn.query('INSERT INTO schema_migrations_mysql(id) VALUES (?)', [id]);
    await conn.commit();
    log(`Applied mysql migration ${id}`);
  } catch (e) {
    await conn.rollback();
    throw e;
  } finally {
    conn.release();
  }
}

async function runMigrations(engine: MigrationEngine) {
  await ensureMigrationsTable(engine);

  const dir = migrationsDir(engine);
  const files = (await fs.readdir(dir)).filter((f) => f.endsWith('.sql')).sort();
  const applied = await getAppliedIds(engine);

  for (const file of files) {
    if (applied.has(file)) continue;
    const sql = await fs.readFile(path.join(dir, file), 'utf8');
    await applyMigration(engine, file, sql);
  }
}

async function main() {
  await runMigrations('mysql');
  if (env.COST_LEDGER_BACKEND === 'postgres' || isPostgresConfigured()) {
    await runMigrations('postgres');
  }
}

await main()
  .catch((err) => {
    logError('Migration failed', err);
    process.exitCode = 1;
  })
  .finally(async () => {
    await mysqlPool.end();
    await closePostgresPool();
  });
