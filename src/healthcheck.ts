import type { RowDataPacket } from 'mysql2/promise';
import { env } from './config/env.js';
import { loadRoutingTable, TASK_TYPES } from './config/routing.js';
import { mysqlPool } from './db/mysqlPool.js';
import { closePostgresPool, getPostgresPool, isPostgresConfigured } from './db/postgresPool.js';
import { CLIENT_PLANS } from './types.js';
import { errorMessage } from './utils/log.js';

interface TableRow extends RowDataPacket {
  table_name: string;
}

const MYSQL_TABLES = ['clients', 'money_pages', 'topic_clusters', 'seo_keywords', 'posts', 'seo_audit_logs', 'ai_usage', 'schema_migrations_mysql'];

async function checkMysql() {
  await mysqlPool.query('SELECT 1');
  const [tables] = await mysqlPool.query<TableRow[]>(
    `SELECT table_name AS table_name FROM information_schema.tables WHERE table_schema = DATABASE()`
  );
  const set = new Set(tables.map((r) => String(r.table_name)));
  return { ok: true, missing: MYSQL_TABLES.filter((t) => !set.has(t)) };
}

async function checkPostgres() {
  if (!isPostgresConfigured()) return { skipped: true, reason: 'POSTGRES_URL not set' };
  const pool = getPostgresPool();
  await pool.query('SELECT 1');
  const res = await pool.query<{ table_name: string }>(
    `SELECT table_name FROM information_schema.tables WHERE table_schema = 'public'`
  );
  const set = new Set(res.rows.map((r) => r.table_name));
  return { ok: true, missing: ['ai_usage', 'schema_migrations_pg'].filter((t) => !set.has(t)) };
}

/** Which (task, plan) routes point at a provider without an API key */
function checkRouting() {
  const routing = loadRoutingTable(env.AI_ROUTING_FILE);
  const keys = { deepseek: env.DEEPSEEK_API_KEY, claude: env.ANTHROPIC_API_KEY, gemini: env.GEMINI_API_KEY };
  const unreachable: string[] = [];
  for (const task of TASK_TYPES) {
    for (const plan of CLIENT_PLANS) {
      const route = routing.tasks[task][plan];
      if (route && !keys[route.provider]) unreachable.push(`${task}/${plan} → ${route.provider}`);
    }
  }
  return {
    ok: unreachable.length === 0 && Boolean(keys[routing.fallback.provider]),
    fallback: `${routing.fallback.provider}:${routing.fallback.model}`,
    fallbackKey: Boolean(keys[routing.fallback.provider]),
    unreachable
  };
}

async function main() {
  console.log('Healthcheck started');

  const mysql = await checkMysql();
  console.log('MySQL: ok', mysql.missing.length ? { missingTables: mysql.missing } : {});

  const pg = await checkPostgres();
  console.log('Postgres:', pg);

  const routing = checkRouting();
  console.log('Routing:', routing);

  console.log('Healthcheck finished');
}

await main()
  .catch((e) => {
    console.error('Healthcheck failed:', errorMessage(e));
    process.exitCode = 1;
  })
  .finally(async () => {
    await mysqlPool.end();
    await closePostgresPool();
  });
