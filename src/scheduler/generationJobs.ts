import type { ContentPipeline } from '../services/contentPipeline.js';
import type { ContentStore, KeywordStore } from '../services/contentStore.js';
import type { ClientPlan } from '../types.js';
import { errorMessage, log, logError } from '../utils/log.js';

/** Articles per calendar month (UTC) */
export const PLAN_LIMITS: Readonly<Record<ClientPlan, number>> = Object.freeze({
  free: 2,
  starter: 8,
  pro: 20,
  agency: 50
});

export type SingleArticleResult =
  | { success: true; postId: string; score: number; passed: boolean; keyword: string }
  | { success: false; error: string };

export interface ScheduledRunSummary {
  clients: number;
  generated: number;
  skippedQuota: number;
  skippedNoKeywords: number;
  failed: number;
}

export interface GenerationJobsDeps {
  store: ContentStore & KeywordStore;
  pipeline: ContentPipeline;
  now?: () => Date;
}

export function startOfMonthUtc(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
}

export class GenerationJobs {
  constructor(private readonly deps: GenerationJobsDeps) {}

  /**
   * One article per active client with quota left, on its highest-priority
   * pending keyword. A client's failure is logged and the run moves on.
   */
  async generateScheduledPosts(): Promise<ScheduledRunSummary> {
    const { store } = this.deps;
    const since = startOfMonthUtc(this.now());
    const clients = await store.listActiveClients();
    const summary: ScheduledRunSummary = { clients: clients.length, generated: 0, skippedQuota: 0, skippedNoKeywords: 0, failed: 0 };

    for (const client of clients) {
      try {
        const limit = PLAN_LIMITS[client.plan];
        const used = await store.countPostsSince(client.id, since);
        if (used >= limit) {
          log(`[Jobs] ${client.name}: monthly quota reached (${used}/${limit})`);
          summary.skippedQuota += 1;
          continue;
        }

        const [next] = await store.listPendingKeywords(client.id, 1);
        if (!next) {
          log(`[Jobs] ${client.name}: no pending keywords`);
          summary.skippedNoKeywords += 1;
          continue;
        }

        const result = await this.generateSingleArticle(client.id, next.id);
        if (result.success) summary.generated += 1;
        else summary.failed += 1;
      } catch (err) {
        logError(`[Jobs] ${client.name}: scheduled generation failed`, err);
        summary.failed += 1;
      }
    }

    log(
      `[Jobs] scheduled run | clients: ${summary.clients} | generated: ${summary.generated} | quota: ${summary.skippedQuota} | no keywords: ${summary.skippedNoKeywords} | failed: ${summary.failed}`
    );
    return summary;
  }

  /** Generates for one keyword. The keyword goes back to `pending` when generation throws. */
  async generateSingleArticle(clientId: string, keywordId: string): Promise<SingleArticleResult> {
    const { store, pipeline } = this.deps;
    const kw = await store.getKeyword(clientId, keywordId);
    if (!kw) return { success: false, error: `Keyword ${keywordId} not found for client ${clientId}` };

    await store.updateKeyword(kw.id, { status: 'in_progress' });
    try {
      const result = await pipeline.generateFromKeyword(clientId, kw.id);
      return { success: true, postId: result.postId, score: result.score, passed: result.passed, keyword: kw.keyword };
    } catch (err) {
      logError(`[Jobs] generation failed for "${kw.keyword}"`, err);
      await store.updateKeyword(kw.id, { status: 'pending' });
      return { success: false, error: errorMessage(err) };
    }
  }

  /** Top `count` pending keywords, one after another. */
  async generateBatch(clientId: string, count = 5): Promise<SingleArticleResult[]> {
    const keywords = await this.deps.store.listPendingKeywords(clientId, count);
    const results: SingleArticleResult[] = [];
    for (const kw of keywords) {
      results.push(await this.generateSingleArticle(clientId, kw.id));
    }
    return results;
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }
}
