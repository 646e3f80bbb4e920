import cron from 'node-cron';
import type { RowDataPacket } from 'mysql2/promise';
import { env } from '../config/env.js';
import { mysqlPool } from '../db/mysqlPool.js';
import type { Runtime } from '../runtime.js';
import { log, logError } from '../utils/log.js';

interface StatusCountRow extends RowDataPacket {
  status: string;
  count: number;
}

/**
 * Posts per status (MySQL) and this month's AI spend per provider (cost ledger)
 */
async function logStats(runtime: Runtime) {
  try {
    const [rows] = await mysqlPool.query<StatusCountRow[]>('SELECT status, COUNT(*) AS count FROM posts GROUP BY status');
    const posts = rows.map((r) => `${r.status}: ${r.count}`).join(' | ') || 'none';

    const spend = await runtime.ledger.summaryByProvider();
    const costs = spend.map((s) => `${s.provider}: $${s.costUsd.toFixed(4)} (${s.calls} calls)`).join(' | ') || 'none';

    log(`📊 Stats | Posts ${posts} | AI spend this month ${costs}`);
  } catch (err) {
    logError('Stats query failed:', err);
  }
}

async function runScheduledGeneration(runtime: Runtime) {
  try {
    await runtime.jobs.generateScheduledPosts();
  } catch (err) {
    logError('Scheduled generation failed:', err);
  }
}

export function startScheduler(runtime: Runtime) {
  log('Scheduler starting...');

  cron.schedule(env.CRON_GENERATION, async () => {
    await runScheduledGeneration(runtime);
  });
  log(`Article generation scheduled: ${env.CRON_GENERATION}`);

  cron.schedule(env.CRON_STATS, async () => {
    await logStats(runtime);
  });
  log(`Stats scheduled: ${env.CRON_STATS}`);

  void logStats(runtime);
}
