import crypto from 'node:crypto';
import type { Pool as MysqlPool, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { z } from 'zod';
import { PersistenceError } from '../errors.js';
import { isClientPlan } from '../config/routing.js';
import type { Client, ClientStatus, ExistingPostRef, KeywordStatus, MoneyPage, SeoKeyword } from '../types.js';
import type {
  AuditLogEntry,
  ContentStore,
  KeywordPatch,
  KeywordStore,
  NewCluster,
  NewKeyword,
  NewPost,
  PostPatch,
  StatusChange
} from './contentStore.js';
import { assertTransition, INITIAL_POST_STATUSES } from './postLifecycle.js';

interface ClientRow extends RowDataPacket {
  id: string;
  name: string;
  industry: string;
  website_url: string;
  brand_tone: string;
  language: string;
  plan: string;
  status: string;
  auto_publish: number;
  industry_instructions: string | null;
}

interface MoneyPageRow extends RowDataPacket {
  id: string;
  url: string;
  title: string;
  type: string;
  target_keywords: unknown;
  anchor_texts: unknown;
  priority: number;
  active: number;
}

interface PostRefRow extends RowDataPacket {
  slug: string;
  title: string;
  primary_keyword: string;
  excerpt: string | null;
}

interface KeywordRow extends RowDataPacket {
  id: string;
  client_id: string;
  cluster_id: string | null;
  keyword: string;
  secondary_keywords: unknown;
  suggested_title: string;
  intent: string;
  priority: number;
  is_pillar: number;
  status: string;
  post_id: string | null;
}

interface CountRow extends RowDataPacket {
  count: number;
}

const stringArray = z.array(z.string());
const clientStatus = z.enum(['active', 'trial', 'paused', 'cancelled']);
const keywordStatus = z.enum(['pending', 'in_progress', 'published', 'discarded']);

/** JSON columns come back parsed from MySQL and as text from some MySQL-compatible servers. */
function jsonStringArray(value: unknown): string[] {
  let v = value;
  if (typeof v === 'string') {
    try {
      v = JSON.parse(v);
    } catch {
      return [];
    }
  }
  const parsed = stringArray.safeParse(v);
  return parsed.success ? parsed.data : [];
}

function toClient(row: ClientRow): Client {
  const status: ClientStatus = clientStatus.catch('paused').parse(row.status);
  return {
    id: row.id,
    name: row.name,
    industry: row.industry,
    websiteUrl: row.website_url,
    brandTone: row.brand_tone,
    language: row.language,
    plan: isClientPlan(row.plan) ? row.plan : 'free',
    status,
    autoPublish: Boolean(row.auto_publish),
    industryInstructions: row.industry_instructions
  };
}

function toMoneyPage(row: MoneyPageRow): MoneyPage {
  const anchors = jsonStringArray(row.anchor_texts).filter((a) => a.trim());
  return {
    id: row.id,
    url: row.url,
    title: row.title,
    type: row.type,
    targetKeywords: jsonStringArray(row.target_keywords),
    anchorTexts: anchors.length ? anchors : [row.title],
    priority: Number(row.priority),
    active: Boolean(row.active)
  };
}

function toKeyword(row: KeywordRow): SeoKeyword {
  const status: KeywordStatus = keywordStatus.catch('pending').parse(row.status);
  return {
    id: row.id,
    clientId: row.client_id,
    clusterId: row.cluster_id,
    keyword: row.keyword,
    secondaryKeywords: jsonStringArray(row.secondary_keywords),
    suggestedTitle: row.suggested_title,
    intent: row.intent,
    priority: Number(row.priority),
    isPillar: Boolean(row.is_pillar),
    status,
    postId: row.post_id
  };
}

const POST_COLUMNS: Record<keyof PostPatch, string> = {
  title: 'title',
  slug: 'slug',
  metaDescription: 'meta_description',
  excerpt: 'excerpt',
  contentHtml: 'content_html',
  seoScore: 'seo_score',
  generationProvider: 'generation_provider',
  generationModel: 'generation_model',
  revisionProvider: 'revision_provider',
  revisionModel: 'revision_model',
  aiCostUsd: 'ai_cost_usd',
  aiTokensTotal: 'ai_tokens_total'
};

function isPatchKey(key: string): key is keyof PostPatch {
  return key in POST_COLUMNS;
}

export class MysqlContentStore implements ContentStore, KeywordStore {
  constructor(private readonly pool: MysqlPool) {}

  async getClient(clientId: string): Promise<Client | null> {
    const [rows] = await this.pool.query<ClientRow[]>('SELECT * FROM clients WHERE id = ?', [clientId]);
    const row = rows[0];
    return row ? toClient(row) : null;
  }

  async listActiveClients(): Promise<Client[]> {
    const [rows] = await this.pool.query<ClientRow[]>(
      `SELECT * FROM clients WHERE status IN ('active', 'trial') ORDER BY created_at`
    );
    return rows.map(toClient);
  }

  async getKeyword(clientId: string, keywordId: string): Promise<SeoKeyword | null> {
    const [rows] = await this.pool.query<KeywordRow[]>('SELECT * FROM seo_keywords WHERE id = ? AND client_id = ?', [
      keywordId,
      clientId
    ]);
    const row = rows[0];
    return row ? toKeyword(row) : null;
  }

  async listPendingKeywords(clientId: string, limit: number): Promise<SeoKeyword[]> {
    const [rows] = await this.pool.query<KeywordRow[]>(
      `
      SELECT * FROM seo_keywords
      WHERE client_id = ? AND status = 'pending'
      ORDER BY priority DESC, created_at ASC
      LIMIT ?
      `,
      [clientId, limit]
    );
    return rows.map(toKeyword);
  }

  async listKeywordTexts(clientId: string): Promise<string[]> {
    const [rows] = await this.pool.query<KeywordRow[]>('SELECT keyword FROM seo_keywords WHERE client_id = ?', [clientId]);
    return rows.map((r) => r.keyword);
  }

  async getActiveMoneyPages(clientId: string): Promise<MoneyPage[]> {
    const [rows] = await this.pool.query<MoneyPageRow[]>(
      'SELECT * FROM money_pages WHERE client_id = ? AND active = 1 ORDER BY priority DESC',
      [clientId]
    );
    return rows.map(toMoneyPage);
  }

  async getRecentPublishedPosts(clientId: string, excludePostId: string | null, limit = 20): Promise<ExistingPostRef[]> {
    const [rows] = await this.pool.query<PostRefRow[]>(
      `
      SELECT slug, title, primary_keyword, excerpt
      FROM posts
      WHERE client_id = ? AND status = 'published' AND (? IS NULL OR id <> ?)
      ORDER BY published_at DESC
      LIMIT ?
      `,
      [clientId, excludePostId, excludePostId, limit]
    );
    return rows.map((r) => ({ slug: r.slug, title: r.title, keyword: r.primary_keyword, excerpt: r.excerpt ?? '' }));
  }

  async countPostsSince(clientId: string, since: Date): Promise<number> {
    const [rows] = await this.pool.query<CountRow[]>(
      'SELECT COUNT(*) AS count FROM posts WHERE client_id = ? AND created_at >= ?',
      [clientId, since]
    );
    return Number(rows[0]?.count ?? 0);
  }

  async createPost(post: NewPost): Promise<string> {
    if (!INITIAL_POST_STATUSES.includes(post.status)) {
      throw new PersistenceError(`MysqlContentStore: posts cannot be created as ${post.status}`);
    }
    const id = crypto.randomUUID();
    await this.pool.query(
      `
      INSERT INTO posts(id, client_id, cluster_id, title, slug, primary_keyword, secondary_keywords, status)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `,
      [id, post.clientId, post.clusterId, post.title, post.slug, post.primaryKeyword, JSON.stringify(post.secondaryKeywords), post.status]
    );
    return id;
  }

  async updatePost(postId: string, patch: PostPatch, status?: StatusChange): Promise<void> {
    const sets: string[] = [];
    const params: unknown[] = [];

    for (const [key, value] of Object.entries(patch)) {
      if (!isPatchKey(key) || value === undefined) continue;
      sets.push(`${POST_COLUMNS[key]} = ?`);
      params.push(value);
    }

    if (status) {
      assertTransition(status.from, status.to);
      sets.push('status = ?');
      params.push(status.to);
      if (status.to === 'published') sets.push('published_at = CURRENT_TIMESTAMP');
    }

    if (sets.length === 0) return;

    let sql = `UPDATE posts SET ${sets.join(', ')} WHERE id = ?`;
    params.push(postId);
    if (status) {
      sql += ' AND status = ?';
      params.push(status.from);
    }

    const [result] = await this.pool.query<ResultSetHeader>(sql, params);
    if (result.affectedRows === 0) {
      throw new PersistenceError(
        status
          ? `MysqlContentStore: post ${postId} not found or no longer ${status.from}`
          : `MysqlContentStore: post ${postId} not found`
      );
    }
  }

  async appendAuditLog(entry: AuditLogEntry): Promise<void> {
    const r = entry.report;
    await this.pool.query(
      `
      INSERT INTO seo_audit_logs(id, post_id, client_id, score, primary_keyword, checks, critical_problems,
                                 suggestions, stats, passed, auto_revised)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `,
      [
        crypto.randomUUID(),
        entry.postId,
        entry.clientId,
        r.score,
        entry.primaryKeyword,
        JSON.stringify(r.checks),
        JSON.stringify(r.criticalProblems),
        JSON.stringify(r.suggestions),
        JSON.stringify(r.stats),
        r.passed,
        entry.autoRevised
      ]
    );
  }

  async updateKeyword(keywordId: string, patch: KeywordPatch): Promise<void> {
    const sets: string[] = [];
    const params: unknown[] = [];
    if (patch.status !== undefined) {
      sets.push('status = ?');
      params.push(patch.status);
    }
    if (patch.postId !== undefined) {
      sets.push('post_id = ?');
      params.push(patch.postId);
    }
    if (sets.length === 0) return;

    params.push(keywordId);
    const [result] = await this.pool.query<ResultSetHeader>(`UPDATE seo_keywords SET ${sets.join(', ')} WHERE id = ?`, params);
    if (result.affectedRows === 0) {
      throw new PersistenceError(`MysqlContentStore: keyword ${keywordId} not found`);
    }
  }

  async createCluster(cluster: NewCluster): Promise<string> {
    const id = crypto.randomUUID();
    await this.pool.query(
      'INSERT INTO topic_clusters(id, client_id, name, pillar_keyword, pillar_suggested_title) VALUES (?, ?, ?, ?, ?)',
      [id, cluster.clientId, cluster.name, cluster.pillarKeyword, cluster.pillarSuggestedTitle]
    );
    return id;
  }

  async createKeyword(keyword: NewKeyword): Promise<string> {
    const id = crypto.randomUUID();
    await this.pool.query(
      `
      INSERT INTO seo_keywords(id, client_id, cluster_id, keyword, secondary_keywords, suggested_title, intent,
                               difficulty, volume, priority, is_pillar, status)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'pending')
      `,
      [
        id,
        keyword.clientId,
        keyword.clusterId,
        keyword.keyword,
        JSON.stringify(keyword.secondaryKeywords),
        keyword.suggestedTitle,
        keyword.intent,
        keyword.difficulty,
        keyword.volume,
        keyword.priority,
        keyword.isPillar
      ]
    );
    return id;
  }
}
