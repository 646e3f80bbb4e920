import crypto from 'node:crypto';
import type { Pool } from 'pg';
import type { Pool as MysqlPool, RowDataPacket } from 'mysql2/promise';
import type { TaskType } from '../config/routing.js';
import type { ProviderResponse } from './providers/base.js';

export interface CostEntry {
  clientId: string;
  taskType: TaskType;
  response: ProviderResponse;
  postId?: string | null;
  promptPreview?: string;
}

export interface ProviderCostSummary {
  provider: string;
  calls: number;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
}

/**
 * Append-only record of every provider call, for per-client billing and
 * per-provider reporting. `month` format: YYYY-MM (UTC), default current month.
 */
export interface CostLedger {
  record(entry: CostEntry): Promise<void>;
  totalForClient(clientId: string, month?: string): Promise<number>;
  summaryByProvider(month?: string): Promise<ProviderCostSummary[]>;
}

const PREVIEW_MAX = 500;

export function monthRange(month?: string, now: Date = new Date()): { start: Date; end: Date } {
  let year = now.getUTCFullYear();
  let monthIndex = now.getUTCMonth();
  if (month) {
    const m = /^(\d{4})-(\d{2})$/.exec(month);
    if (!m?.[1] || !m[2]) throw new Error(`CostLedger: invalid month "${month}", expected YYYY-MM`);
    year = Number(m[1]);
    monthIndex = Number(m[2]) - 1;
  }
  return {
    start: new Date(Date.UTC(year, monthIndex, 1)),
    end: new Date(Date.UTC(year, monthIndex + 1, 1))
  };
}

function rowValues(entry: CostEntry) {
  const r = entry.response;
  return [
    crypto.randomUUID(),
    entry.clientId,
    entry.postId ?? null,
    entry.taskType,
    r.provider,
    r.model,
    r.inputTokens,
    r.outputTokens,
    r.costUsd,
    r.cacheHit,
    r.success,
    r.error ?? null,
    entry.promptPreview?.slice(0, PREVIEW_MAX) ?? null
  ];
}

export class PostgresCostLedger implements CostLedger {
  constructor(private readonly pool: Pool) {}

  async record(entry: CostEntry): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO ai_usage(id, client_id, post_id, task_type, provider, model, input_tokens, output_tokens,
                           cost_usd, cache_hit, success, error_message, prompt_preview)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
      `,
      rowValues(entry)
    );
  }

  async totalForClient(clientId: string, month?: string): Promise<number> {
    const { start, end } = monthRange(month);
    const res = await this.pool.query<{ total: string | null }>(
      `SELECT SUM(cost_usd) AS total FROM ai_usage WHERE client_id = $1 AND created_at >= $2 AND created_at < $3`,
      [clientId, start, end]
    );
    return Number(res.rows[0]?.total ?? 0);
  }

  async summaryByProvider(month?: string): Promise<ProviderCostSummary[]> {
    const { start, end } = monthRange(month);
    const res = await this.pool.query<{ provider: string; calls: string; input_tokens: string; output_tokens: string; cost_usd: string }>(
      `
      SELECT provider, COUNT(*) AS calls, SUM(input_tokens) AS input_tokens,
             SUM(output_tokens) AS output_tokens, SUM(cost_usd) AS cost_usd
      FROM ai_usage
      WHERE created_at >= $1 AND created_at < $2
      GROUP BY provider
      ORDER BY SUM(cost_usd) DESC
      `,
      [start, end]
    );
    return res.rows.map((r) => ({
      provider: r.provider,
      calls: Number(r.calls),
      inputTokens: Number(r.input_tokens),
      outputTokens: Number(r.output_tokens),
      costUsd: Number(r.cost_usd)
    }));
  }
}

interface TotalRow extends RowDataPacket {
  total: string | number | null;
}

interface SummaryRow extends RowDataPacket {
  provider: string;
  calls: number | string;
  input_tokens: number | string | null;
  output_tokens: number | string | null;
  cost_usd: number | string | null;
}

export class MysqlCostLedger implements CostLedger {
  constructor(private readonly pool: MysqlPool) {}

  async record(entry: CostEntry): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO ai_usage(id, client_id, post_id, task_type, provider, model, input_tokens, output_tokens,
                           cost_usd, cache_hit, success, error_message, prompt_preview)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      rowValues(entry)
    );
  }

  async totalForClient(clientId: string, month?: string): Promise<number> {
    const { start, end } = monthRange(month);
    const [rows] = await this.pool.query<TotalRow[]>(
      'SELECT SUM(cost_usd) AS total FROM ai_usage WHERE client_id = ? AND created_at >= ? AND created_at < ?',
      [clientId, start, end]
    );
    return Number(rows[0]?.total ?? 0);
  }

  async summaryByProvider(month?: string): Promise<ProviderCostSummary[]> {
    const { start, end } = monthRange(month);
    const [rows] = await this.pool.query<SummaryRow[]>(
      `
      SELECT provider, COUNT(*) AS calls, SUM(input_tokens) AS input_tokens,
             SUM(output_tokens) AS output_tokens, SUM(cost_usd) AS cost_usd
      FROM ai_usage
      WHERE created_at >= ? AND created_at < ?
      GROUP BY provider
      ORDER BY SUM(cost_usd) DESC
      `,
      [start, end]
    );
    return rows.map((r) => ({
      provider: r.provider,
      calls: Number(r.calls),
      inputTokens: Number(r.input_tokens ?? 0),
      outputTokens: Number(r.output_tokens ?? 0),
      costUsd: Number(r.cost_usd ?? 0)
    }));
  }
}
