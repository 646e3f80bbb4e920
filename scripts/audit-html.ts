/**
 * Audit a local HTML article without touching the database or any provider.
 * Usage: npx tsx scripts/audit-html.ts <file.html> "<keyword>" --title "<title>" --meta "<description>" --slug <slug>
 *        [--secondary "a, b"] [--existing <count>]
 */

import fs from 'node:fs/promises';
import { auditArticle } from '../src/seo/auditor.js';

function option(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx >= 0 ? args[idx + 1] : undefined;
}

async function main() {
  const args = process.argv.slice(2);
  const [file, keyword] = args;
  if (!file || !keyword) {
    console.log('Usage: npx tsx scripts/audit-html.ts <file.html> "<keyword>" --title "..." --meta "..." --slug ...');
    process.exitCode = 1;
    return;
  }

  const bodyHtml = await fs.readFile(file, 'utf8');
  const existing = option(args, '--existing');
  const report = auditArticle({
    bodyHtml,
    primaryKeyword: keyword,
    title: option(args, '--title') ?? '',
    metaDescription: option(args, '--meta') ?? '',
    slug: option(args, '--slug') ?? '',
    secondaryKeywords: (option(args, '--secondary') ?? '')
      .split(',')
      .map((k) => k.trim())
      .filter(Boolean),
    existingPostsCount: existing != null ? Number(existing) : undefined
  });

  console.log(`\nSEO score: ${report.score}/100 (${report.passed ? 'passed' : 'failed'})\n`);
  for (const c of report.checks) {
    console.log(`  ${c.passed ? '✓' : '✗'} ${c.name} ${c.points}/${c.maxPoints}${c.detail ? ` (${c.detail})` : ''}`);
  }
  for (const p of report.criticalProblems) console.log(`  ❌ ${p}`);
  for (const s of report.suggestions) console.log(`  💡 ${s}`);
  console.log('\nStats:', report.stats);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
