import { env } from './config/env.js';
import { loadRoutingTable } from './config/routing.js';
import { mysqlPool } from './db/mysqlPool.js';
import { closePostgresPool, getPostgresPool } from './db/postgresPool.js';
import { MysqlCostLedger, PostgresCostLedger, type CostLedger } from './llm/costLedger.js';
import { ProviderRouter } from './llm/providerRouter.js';
import { createProviderFactory } from './llm/providers/index.js';
import { GenerationJobs } from './scheduler/generationJobs.js';
import { ContentPipeline } from './services/contentPipeline.js';
import { KeywordStrategist } from './services/keywordStrategy.js';
import { MysqlContentStore } from './services/mysqlContentStore.js';

export interface Runtime {
  store: MysqlContentStore;
  router: ProviderRouter;
  ledger: CostLedger;
  pipeline: ContentPipeline;
  strategist: KeywordStrategist;
  jobs: GenerationJobs;
  close(): Promise<void>;
}

/** Wires the process once: routing table, provider pool, storage and services. */
export function createRuntime(): Runtime {
  const routing = loadRoutingTable(env.AI_ROUTING_FILE);
  const router = new ProviderRouter({
    routing,
    createProvider: createProviderFactory({
      apiKeys: {
        deepseek: env.DEEPSEEK_API_KEY,
        claude: env.ANTHROPIC_API_KEY,
        gemini: env.GEMINI_API_KEY
      },
      deepseekBaseUrl: env.DEEPSEEK_BASE_URL,
      timeoutMs: env.PROVIDER_TIMEOUT_MS,
      maxRetries: env.PROVIDER_MAX_RETRIES
    })
  });

  const store = new MysqlContentStore(mysqlPool);
  const ledger: CostLedger =
    env.COST_LEDGER_BACKEND === 'postgres' ? new PostgresCostLedger(getPostgresPool()) : new MysqlCostLedger(mysqlPool);

  const pipeline = new ContentPipeline({ store, router, ledger });
  const strategist = new KeywordStrategist({ store, router, ledger });
  const jobs = new GenerationJobs({ store, pipeline });

  return {
    store,
    router,
    ledger,
    pipeline,
    strategist,
    jobs,
    async close() {
      await mysqlPool.end();
      await closePostgresPool();
    }
  };
}
