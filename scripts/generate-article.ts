/**
 * Generate one article, either for a stored keyword or for a keyword typed in.
 * Usage:
 *   npx tsx scripts/generate-article.ts <clientId> --keyword-id <id>
 *   npx tsx scripts/generate-article.ts <clientId> "<keyword>" [secondary, keywords] [--pillar]
 *   npx tsx scripts/generate-article.ts <clientId> --batch <count>
 */

import { createRuntime } from '../src/runtime.js';
import type { GenerationResult } from '../src/types.js';

function printResult(r: GenerationResult) {
  console.log('\n📝 Result');
  console.log(`  Post:       ${r.postId}`);
  console.log(`  Title:      ${r.title}`);
  console.log(`  Slug:       ${r.slug}`);
  console.log(`  SEO score:  ${r.score}/100 (${r.passed ? 'passed' : 'below 70'})`);
  console.log(`  Status:     ${r.status}`);
  console.log(`  Revisions:  ${r.revisionCount}`);
  console.log(`  Cost:       $${r.totalCostUsd.toFixed(4)} (${r.totalTokens} tokens)`);
  for (const p of r.criticalProblems) console.log(`  ❌ ${p}`);
  for (const s of r.suggestions) console.log(`  💡 ${s}`);
}

async function main() {
  const [clientId, ...rest] = process.argv.slice(2);
  if (!clientId || rest.length === 0) {
    console.log('Usage: npx tsx scripts/generate-article.ts <clientId> --keyword-id <id> | "<keyword>" [secondaries] [--pillar] | --batch <n>');
    process.exitCode = 1;
    return;
  }

  const runtime = createRuntime();
  try {
    if (rest[0] === '--keyword-id' && rest[1]) {
      printResult(await runtime.pipeline.generateFromKeyword(clientId, rest[1]));
    } else if (rest[0] === '--batch') {
      const results = await runtime.jobs.generateBatch(clientId, Number(rest[1] ?? 5));
      for (const r of results) {
        console.log(r.success ? `  ✓ ${r.keyword}: ${r.score}/100 (post ${r.postId})` : `  ✗ ${r.error}`);
      }
    } else {
      const isPillar = rest.includes('--pillar');
      const args = rest.filter((a) => a !== '--pillar');
      const keyword = args[0] ?? '';
      const secondaryKeywords = (args[1] ?? '')
        .split(',')
        .map((k) => k.trim())
        .filter(Boolean);
      printResult(await runtime.pipeline.generateArticle({ clientId, primaryKeyword: keyword, secondaryKeywords, isPillar }));
    }
  } catch (err) {
    console.error('Generation failed:', err);
    process.exitCode = 1;
  } finally {
    await runtime.close();
  }
}

await main();
