import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseRoutingTable } from '../src/config/routing.js';
import { ClientNotFoundError, StrategyGenerationError } from '../src/errors.js';
import { ProviderRouter } from '../src/llm/providerRouter.js';
import { KeywordStrategist, parseStrategy } from '../src/services/keywordStrategy.js';
import type { Client } from '../src/types.js';
import { InMemoryStore, MemoryLedger, scriptedProviders, type Reply } from './helpers/fakes.js';
import { makeClient, makeMoneyPage } from './helpers/fixtures.js';

const routing = parseRoutingTable({
  fallback: { provider: 'claude', model: 'haiku' },
  tasks: { estrategia_editorial: { starter: { provider: 'gemini', model: 'gemini-2.5-flash' } } }
});

const STRATEGY = JSON.stringify({
  clusters: [
    {
      nombre: 'Compra de vivienda',
      pillar_keyword: 'comprar casa',
      pillar_titulo_sugerido: 'Guía para comprar casa',
      keywords: [
        {
          keyword: 'requisitos para comprar casa',
          intencion: 'informacional',
          dificultad_estimada: 'baja',
          volumen_estimado: 'medio',
          titulo_sugerido: 'Requisitos para comprar casa en 2025',
          keywords_secundarias: ['documentos'],
          prioridad: 4
        },
        { keyword: 'comprar casa sin enganche', prioridad: '9' }
      ]
    }
  ]
});

function setup(scripts: Record<string, Reply[]>, client: Partial<Client> = {}) {
  const store = new InMemoryStore().addClient(makeClient(client), [makeMoneyPage()]);
  const ledger = new MemoryLedger();
  const providers = scriptedProviders(scripts);
  const router = new ProviderRouter({ routing, createProvider: providers.factory });
  const strategist = new KeywordStrategist({ store, router, ledger, location: 'CDMX' });
  return { store, ledger, providers, strategist };
}

describe('parseStrategy', () => {
  it('fills defaults and clamps priorities', () => {
    const strategy = parseStrategy(`\`\`\`json\n${STRATEGY}\n\`\`\``);
    const [first, second] = strategy.clusters[0]?.keywords ?? [];
    assert.equal(first?.prioridad, 4);
    assert.deepEqual(second, {
      keyword: 'comprar casa sin enganche',
      intencion: 'informacional',
      dificultad_estimada: 'media',
      volumen_estimado: 'medio',
      titulo_sugerido: '',
      keywords_secundarias: [],
      prioridad: 5
    });
  });

  it('falls back to priority 3 for non-numeric values', () => {
    const strategy = parseStrategy('{"clusters":[{"pillar_keyword":"x","keywords":[{"keyword":"y","prioridad":"alta"}]}]}');
    assert.equal(strategy.clusters[0]?.keywords[0]?.prioridad, 3);
  });

  it('rejects replies that are not JSON', () => {
    assert.throws(() => parseStrategy('lo siento, no puedo'), /Keyword research failed: reply is not JSON/);
  });

  it('rejects a strategy without clusters', () => {
    assert.throws(
      () => parseStrategy('{"clusters":[]}'),
      (err: unknown) => err instanceof StrategyGenerationError && err.message.startsWith('Keyword research failed: reply does not match')
    );
  });
});

describe('KeywordStrategist.researchKeywords', () => {
  it('stores the cluster, its pillar and its keywords', async () => {
    const { strategist, store, ledger, providers } = setup({ 'gemini:gemini-2.5-flash': [STRATEGY] });
    await store.createKeyword({
      clientId: 'client-1',
      clusterId: null,
      keyword: 'casas en renta',
      secondaryKeywords: [],
      suggestedTitle: '',
      intent: 'informacional',
      difficulty: 'media',
      volume: 'medio',
      priority: 3,
      isPillar: false
    });

    const result = await strategist.researchKeywords('client-1', 10);
    assert.equal(result.clusters, 1);
    assert.equal(result.keywords, 3);

    assert.deepEqual(store.clusters.map((c) => c.name), ['Compra de vivienda']);
    const stored = [...store.keywords.values()].filter((k) => k.clusterId === store.clusters[0]?.id);
    assert.deepEqual(
      stored.map((k) => [k.keyword, k.priority, k.isPillar, k.status]),
      [
        ['comprar casa', 5, true, 'pending'],
        ['requisitos para comprar casa', 4, false, 'pending'],
        ['comprar casa sin enganche', 5, false, 'pending']
      ]
    );
    assert.deepEqual(stored[0]?.secondaryKeywords, ['requisitos para comprar casa', 'comprar casa sin enganche']);

    const prompt = providers.created.get('gemini:gemini-2.5-flash')?.calls[0]?.prompt ?? '';
    assert.ok(prompt.includes('KEYWORDS ALREADY USED (do not repeat): casas en renta'));
    assert.ok(prompt.includes('SERVICES/PRODUCTS: Servicios inmobiliarios'));
    assert.ok(prompt.includes('LOCATION: CDMX'));
    assert.equal(ledger.entries.length, 1);
    assert.equal(ledger.entries[0]?.taskType, 'estrategia_editorial');
  });

  it('calls DeepSeek directly when the routed call and its fallback fail', async () => {
    const { strategist, ledger, providers } = setup({
      'gemini:gemini-2.5-flash': [new Error('quota')],
      'claude:haiku': [new Error('down')],
      'deepseek:deepseek-chat': [STRATEGY]
    });
    const result = await strategist.researchKeywords('client-1');
    assert.equal(result.keywords, 3);
    assert.equal(providers.callsTo('deepseek:deepseek-chat'), 1);
    assert.deepEqual(
      ledger.entries.map((e) => `${e.response.provider}:${e.response.success}`),
      ['claude:false', 'deepseek:true']
    );
  });

  it('uses the direct call for plans without a strategy route', async () => {
    const { strategist, ledger } = setup({ 'deepseek:deepseek-chat': [STRATEGY] }, { plan: 'free' });
    const result = await strategist.researchKeywords('client-1');
    assert.equal(result.clusters, 1);
    assert.deepEqual(ledger.entries.map((e) => e.response.provider), ['deepseek']);
  });

  it('fails when every provider fails', async () => {
    const { strategist, store } = setup({
      'gemini:gemini-2.5-flash': [new Error('quota')],
      'claude:haiku': [new Error('down')],
      'deepseek:deepseek-chat': [new Error('also down')]
    });
    await assert.rejects(strategist.researchKeywords('client-1'), StrategyGenerationError);
    assert.equal(store.clusters.length, 0);
  });

  it('fails on an unparseable strategy without storing anything', async () => {
    const { strategist, store } = setup({ 'gemini:gemini-2.5-flash': ['no tengo ideas'] });
    await assert.rejects(strategist.researchKeywords('client-1'), StrategyGenerationError);
    assert.equal(store.keywords.size, 0);
  });

  it('rejects inactive clients', async () => {
    const { strategist } = setup({}, { status: 'cancelled' });
    await assert.rejects(strategist.researchKeywords('client-1'), ClientNotFoundError);
  });
});
