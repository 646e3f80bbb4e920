/**
 * AI spend for a month, per provider and optionally for one client.
 * Usage: npx tsx scripts/cost-report.ts [YYYY-MM] [clientId]
 */

import { createRuntime } from '../src/runtime.js';

async function main() {
  const [month, clientId] = process.argv.slice(2);
  const runtime = createRuntime();
  try {
    const summary = await runtime.ledger.summaryByProvider(month);
    console.log(`\n💰 AI spend ${month ?? 'this month'}`);
    if (summary.length === 0) console.log('  (no calls recorded)');
    for (const s of summary) {
      console.log(`  ${s.provider.padEnd(10)} ${String(s.calls).padStart(6)} calls  ${s.inputTokens} in / ${s.outputTokens} out  $${s.costUsd.toFixed(4)}`);
    }
    if (clientId) {
      const total = await runtime.ledger.totalForClient(clientId, month);
      console.log(`\n  Client ${clientId}: $${total.toFixed(4)}`);
    }
  } catch (err) {
    console.error('Cost report failed:', err);
    process.exitCode = 1;
  } finally {
    await runtime.close();
  }
}

await main();
