import { ClientNotFoundError, DraftGenerationError, KeywordNotFoundError } from '../errors.js';
import type { TaskType } from '../config/routing.js';
import type { CostLedger } from '../llm/costLedger.js';
import type { ProviderRouter } from '../llm/providerRouter.js';
import { tokensTotal, type ProviderResponse } from '../llm/providers/base.js';
import { articleGenerationPrompt } from '../prompts/articleGeneration.js';
import { REVISION_SYSTEM, revisionPrompt } from '../prompts/revision.js';
import { auditArticle, type AuditReport } from '../seo/auditor.js';
import { ensureInternalLinks, ensureMoneyLinks, toLinkLocale } from '../seo/linkInjector.js';
import { selectRelevantMoneyPages } from '../seo/moneyPages.js';
import { isClientActive, type GenerationRequest, type GenerationResult } from '../types.js';
import { stripCodeFences } from '../utils/html.js';
import { errorMessage, log, warn } from '../utils/log.js';
import { toSlug } from '../utils/slug.js';
import type { ContentStore } from './contentStore.js';
import { parseDraft } from './draftParser.js';
import { finalStatus } from './postLifecycle.js';

export const MAX_REVISIONS = 2;
export const EXISTING_POSTS_LIMIT = 20;
export const PROMPT_EXISTING_POSTS = 5;

export type PipelineStage =
  | 'INIT'
  | 'DRAFTING'
  | 'AUDITING'
  | 'REVISING'
  | 'LINK_INJECTION'
  | 'FINALIZED'
  | 'FAILED';

export interface ContentPipelineDeps {
  store: ContentStore;
  router: ProviderRouter;
  ledger: CostLedger;
  /** Receives every stage change; defaults to the log. */
  onStage?: (stage: PipelineStage, postId: string | null) => void;
}

/**
 * Draft → audit → bounded revision → link injection for one keyword.
 * Runs are sequential and share nothing but the router's provider pool.
 */
export class ContentPipeline {
  constructor(private readonly deps: ContentPipelineDeps) {}

  async generateFromKeyword(clientId: string, keywordId: string): Promise<GenerationResult> {
    const kw = await this.deps.store.getKeyword(clientId, keywordId);
    if (!kw) throw new KeywordNotFoundError(keywordId, clientId);

    const result = await this.generateArticle({
      clientId,
      primaryKeyword: kw.keyword,
      secondaryKeywords: kw.secondaryKeywords,
      suggestedTitle: kw.suggestedTitle,
      isPillar: kw.isPillar,
      clusterId: kw.clusterId
    });

    await this.deps.store.updateKeyword(kw.id, {
      status: result.passed ? 'published' : 'in_progress',
      postId: result.postId
    });
    return result;
  }

  async generateArticle(req: GenerationRequest): Promise<GenerationResult> {
    const { store, router } = this.deps;

    // INIT
    this.stage('INIT', null);
    const client = await store.getClient(req.clientId);
    if (!client || !isClientActive(client)) throw new ClientNotFoundError(req.clientId);

    const keyword = req.primaryKeyword.trim();
    const secondary = req.secondaryKeywords ?? [];
    const isPillar = req.isPillar ?? false;
    const targetWords = req.targetWordCount ?? (isPillar ? 1500 : 1000);

    const moneyPages = selectRelevantMoneyPages(keyword, await store.getActiveMoneyPages(client.id));
    const existingPosts = await store.getRecentPublishedPosts(client.id, null, EXISTING_POSTS_LIMIT);

    const postId = await store.createPost({
      clientId: client.id,
      clusterId: req.clusterId ?? null,
      title: req.suggestedTitle || keyword,
      slug: toSlug(keyword),
      primaryKeyword: keyword,
      secondaryKeywords: secondary,
      status: 'generating'
    });
    log(`[Pipeline] "${keyword}" | client ${client.name} | money pages: ${moneyPages.length} | existing posts: ${existingPosts.length}`);

    // DRAFTING
    this.stage('DRAFTING', postId);
    const prompt = articleGenerationPrompt({
      topic: req.suggestedTitle || `Article about ${keyword}`,
      primaryKeyword: keyword,
      secondaryKeywords: secondary,
      clientName: client.name,
      industry: client.industry || 'general',
      tone: client.brandTone || 'professional',
      websiteUrl: client.websiteUrl,
      language: client.language,
      targetWords,
      moneyPages,
      existingPosts: existingPosts.slice(0, PROMPT_EXISTING_POSTS).map((p) => ({ title: p.title, url: `/${p.slug}` })),
      industryInstructions: client.industryInstructions
    });

    const draft = await router.dispatch({
      taskType: 'generacion_articulo',
      clientPlan: client.plan,
      prompt: prompt.user,
      system: prompt.system,
      maxTokens: isPillar ? 4500 : 3500,
      temperature: 0.7
    });
    await this.recordCost(client.id, 'generacion_articulo', draft, postId, prompt.user);

    if (!draft.success) {
      this.stage('FAILED', postId);
      await store.updatePost(postId, {}, { from: 'generating', to: 'failed' });
      throw new DraftGenerationError(postId, draft.error ?? 'unknown provider error');
    }

    let totalCostUsd = draft.costUsd;
    let totalTokens = tokensTotal(draft);

    const meta = parseDraft(draft.content, keyword);
    let body = meta.bodyHtml;
    await store.updatePost(postId, {
      title: meta.title,
      slug: meta.slug,
      metaDescription: meta.metaDescription,
      excerpt: meta.excerpt,
      contentHtml: body,
      generationProvider: draft.provider,
      generationModel: draft.model
    });

    // AUDITING ⇄ REVISING
    const audit = (html: string): AuditReport =>
      auditArticle({
        title: meta.title,
        metaDescription: meta.metaDescription,
        slug: meta.slug,
        bodyHtml: html,
        primaryKeyword: keyword,
        secondaryKeywords: secondary,
        existingPostsCount: existingPosts.length
      });

    this.stage('AUDITING', postId);
    let report = audit(body);
    log(`[Pipeline] audit: ${report.score}/100 | critical: ${report.criticalProblems.length}`);

    const maxRevisions = router.isTaskAvailable('revision_editorial', client.plan) ? MAX_REVISIONS : 0;
    let revisionCount = 0;
    let revisedBy: ProviderResponse | null = null;

    while (!report.passed && revisionCount < maxRevisions) {
      this.stage('REVISING', postId);
      const revisionUser = revisionPrompt({
        bodyHtml: body,
        primaryKeyword: keyword,
        secondaryKeywords: secondary,
        audit: report,
        tone: client.brandTone || 'professional'
      });
      const revision = await router.dispatch({
        taskType: 'revision_editorial',
        clientPlan: client.plan,
        prompt: revisionUser,
        system: REVISION_SYSTEM,
        maxTokens: 4096,
        temperature: 0.3
      });
      await this.recordCost(client.id, 'revision_editorial', revision, postId);

      const revised = revision.success ? stripCodeFences(revision.content) : '';
      if (!revised) {
        warn(`[Pipeline] revision ${revisionCount + 1} failed (${revision.error ?? 'empty body'}), keeping the last body`);
        break;
      }

      body = revised;
      totalCostUsd += revision.costUsd;
      totalTokens += tokensTotal(revision);
      revisionCount += 1;
      revisedBy = revision;

      this.stage('AUDITING', postId);
      report = audit(body);
      log(`[Pipeline] audit after revision ${revisionCount}: ${report.score}/100`);
    }

    // LINK_INJECTION
    this.stage('LINK_INJECTION', postId);
    const locale = toLinkLocale(client.language);
    body = ensureMoneyLinks(body, moneyPages, locale);
    body = ensureInternalLinks(body, existingPosts, keyword, locale);

    // FINALIZE
    await store.appendAuditLog({
      postId,
      clientId: client.id,
      primaryKeyword: keyword,
      report,
      autoRevised: revisionCount > 0
    });

    const status = finalStatus(report.passed, client.autoPublish);
    await store.updatePost(
      postId,
      {
        contentHtml: body,
        seoScore: report.score,
        aiCostUsd: totalCostUsd,
        aiTokensTotal: totalTokens,
        ...(revisedBy ? { revisionProvider: revisedBy.provider, revisionModel: revisedBy.model } : {})
      },
      { from: 'generating', to: status }
    );
    this.stage('FINALIZED', postId);

    if (!report.passed) {
      warn(`[Pipeline] "${meta.title}" did not pass the audit (${report.score}/100), left for manual review`);
    }
    log(
      `[Pipeline] ✅ "${meta.title}" | SEO ${report.score}/100 | $${totalCostUsd.toFixed(4)} | revisions: ${revisionCount} | ${status}`
    );

    return {
      postId,
      title: meta.title,
      slug: meta.slug,
      metaDescription: meta.metaDescription,
      primaryKeyword: keyword,
      score: report.score,
      passed: report.passed,
      status,
      totalCostUsd,
      totalTokens,
      revisionCount,
      criticalProblems: report.criticalProblems,
      suggestions: report.suggestions
    };
  }

  private stage(stage: PipelineStage, postId: string | null) {
    if (this.deps.onStage) this.deps.onStage(stage, postId);
    else log(`[Pipeline] → ${stage}${postId ? ` (post ${postId.slice(0, 8)})` : ''}`);
  }

  /** Requests that reached a provider are billed; a ledger outage never fails the run. */
  private async recordCost(
    clientId: string,
    taskType: TaskType,
    response: ProviderResponse,
    postId: string,
    promptPreview?: string
  ): Promise<void> {
    if (response.provider === 'none') return;
    try {
      await this.deps.ledger.record({ clientId, taskType, response, postId, promptPreview });
    } catch (err) {
      warn(`[Pipeline] cost ledger write failed: ${errorMessage(err)}`);
    }
  }
}
