/**
 * Run keyword research for a client and store the resulting clusters.
 * Usage: npx tsx scripts/research-keywords.ts <clientId> [count] [location]
 */

import { createRuntime } from '../src/runtime.js';
import { KeywordStrategist } from '../src/services/keywordStrategy.js';

async function main() {
  const [clientId, count, location] = process.argv.slice(2);
  if (!clientId) {
    console.log('Usage: npx tsx scripts/research-keywords.ts <clientId> [count] [location]');
    process.exitCode = 1;
    return;
  }

  const runtime = createRuntime();
  try {
    const strategist = location
      ? new KeywordStrategist({ store: runtime.store, router: runtime.router, ledger: runtime.ledger, location })
      : runtime.strategist;
    const result = await strategist.researchKeywords(clientId, count ? Number(count) : 20);
    console.log(`\n🔍 ${result.clusters} clusters, ${result.keywords} keywords stored`);
    for (const c of result.strategy.clusters) {
      console.log(`\n  ${c.nombre || c.pillar_keyword} (pillar: ${c.pillar_keyword})`);
      for (const k of c.keywords) console.log(`    - [${k.prioridad}] ${k.keyword} (${k.intencion})`);
    }
  } catch (err) {
    console.error('Keyword research failed:', err);
    process.exitCode = 1;
  } finally {
    await runtime.close();
  }
}

await main();
