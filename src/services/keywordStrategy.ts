import { z } from 'zod';
import { ClientNotFoundError, StrategyGenerationError } from '../errors.js';
import type { CostLedger } from '../llm/costLedger.js';
import type { ProviderRouter } from '../llm/providerRouter.js';
import type { ProviderResponse } from '../llm/providers/base.js';
import { languageName } from '../prompts/articleGeneration.js';
import { keywordStrategyPrompt } from '../prompts/keywordStrategy.js';
import { isClientActive } from '../types.js';
import { parseJsonReply } from '../utils/json.js';
import { errorMessage, log, warn } from '../utils/log.js';
import type { ContentStore, KeywordStore } from './contentStore.js';

export const DIRECT_FALLBACK = { providerId: 'deepseek', model: 'deepseek-chat' } as const;

const priority = z.coerce.number().int().catch(3).transform((n) => Math.min(5, Math.max(1, n)));

const keywordSchema = z.object({
  keyword: z.string().trim().min(1),
  intencion: z.string().default('informacional'),
  dificultad_estimada: z.string().default('media'),
  volumen_estimado: z.string().default('medio'),
  titulo_sugerido: z.string().default(''),
  keywords_secundarias: z.array(z.string()).catch([]).default([]),
  prioridad: priority.default(3)
});

const clusterSchema = z.object({
  nombre: z.string().default(''),
  pillar_keyword: z.string().trim().min(1),
  pillar_titulo_sugerido: z.string().default(''),
  keywords: z.array(keywordSchema).default([])
});

export const strategySchema = z.object({
  clusters: z.array(clusterSchema).min(1)
});

export type KeywordStrategy = z.infer<typeof strategySchema>;

export function parseStrategy(raw: string): KeywordStrategy {
  const reply = parseJsonReply(raw, strategySchema);
  if (reply.ok) return reply.data;
  throw new StrategyGenerationError(
    reply.reason === 'not_json' ? `reply is not JSON: ${reply.error}` : `reply does not match the strategy format: ${reply.error}`
  );
}

export interface KeywordResearchResult {
  clusters: number;
  keywords: number;
  strategy: KeywordStrategy;
}

export interface KeywordStrategistDeps {
  store: ContentStore & KeywordStore;
  router: ProviderRouter;
  ledger: CostLedger;
  /** Market the keywords are researched for */
  location?: string;
}

/**
 * Asks the model for keyword clusters and stores each cluster with its
 * pillar keyword (priority 5) and its long-tail keywords as `pending`.
 */
export class KeywordStrategist {
  constructor(private readonly deps: KeywordStrategistDeps) {}

  async researchKeywords(clientId: string, count = 20): Promise<KeywordResearchResult> {
    const { store, router } = this.deps;
    const client = await store.getClient(clientId);
    if (!client || !isClientActive(client)) throw new ClientNotFoundError(clientId);

    const existing = await store.listKeywordTexts(client.id);
    const moneyPages = await store.getActiveMoneyPages(client.id);
    const services = moneyPages.length ? moneyPages.map((p) => p.title) : [client.industry];

    const prompt = keywordStrategyPrompt({
      clientName: client.name,
      industry: client.industry,
      services,
      location: this.deps.location ?? 'not specified',
      language: languageName(client.language),
      existingKeywords: existing,
      count
    });

    const request = { prompt: prompt.user, system: prompt.system, maxTokens: 4000, temperature: 0.7 };
    let response = await router.dispatch({ ...request, taskType: 'estrategia_editorial', clientPlan: client.plan });
    await this.record(client.id, response);

    if (!response.success) {
      warn(`[KeywordStrategist] routed call failed (${response.error ?? 'unknown'}), trying ${DIRECT_FALLBACK.providerId} directly`);
      response = await router.dispatchDirect({ ...request, ...DIRECT_FALLBACK });
      await this.record(client.id, response);
    }

    if (!response.success) {
      throw new StrategyGenerationError(response.error ?? 'provider failed');
    }

    const strategy = parseStrategy(response.content);
    let keywords = 0;

    for (const cluster of strategy.clusters) {
      const clusterId = await store.createCluster({
        clientId: client.id,
        name: cluster.nombre || cluster.pillar_keyword,
        pillarKeyword: cluster.pillar_keyword,
        pillarSuggestedTitle: cluster.pillar_titulo_sugerido
      });

      await store.createKeyword({
        clientId: client.id,
        clusterId,
        keyword: cluster.pillar_keyword,
        secondaryKeywords: cluster.keywords.map((k) => k.keyword).slice(0, 5),
        suggestedTitle: cluster.pillar_titulo_sugerido,
        intent: 'informacional',
        difficulty: 'alta',
        volume: 'alto',
        priority: 5,
        isPillar: true
      });
      keywords += 1;

      for (const k of cluster.keywords) {
        await store.createKeyword({
          clientId: client.id,
          clusterId,
          keyword: k.keyword,
          secondaryKeywords: k.keywords_secundarias,
          suggestedTitle: k.titulo_sugerido,
          intent: k.intencion,
          difficulty: k.dificultad_estimada,
          volume: k.volumen_estimado,
          priority: k.prioridad,
          isPillar: false
        });
        keywords += 1;
      }
    }

    log(`[KeywordStrategist] ${client.name}: ${strategy.clusters.length} clusters, ${keywords} keywords stored`);
    return { clusters: strategy.clusters.length, keywords, strategy };
  }

  private async record(clientId: string, response: ProviderResponse) {
    if (response.provider === 'none') return;
    try {
      await this.deps.ledger.record({ clientId, taskType: 'estrategia_editorial', response });
    } catch (err) {
      warn(`[KeywordStrategist] cost ledger write failed: ${errorMessage(err)}`);
    }
  }
}
