import type { AuditReport } from '../seo/auditor.js';

export const REVISION_SYSTEM =
  'You are an expert SEO editor. Fix ONLY the problems listed. Return the corrected HTML.';

export function revisionPrompt(args: {
  bodyHtml: string;
  primaryKeyword: string;
  secondaryKeywords: string[];
  audit: AuditReport;
  tone: string;
}): string {
  const { stats } = args.audit;
  const failing = args.audit.checks.filter((c) => !c.passed);

  let prompt = `Review and FIX this article according to the SEO problems found.

PRIMARY KEYWORD: "${args.primaryKeyword}"
SECONDARY KEYWORDS: ${args.secondaryKeywords.join(', ')}
REQUIRED TONE: ${args.tone}

CURRENT STATS:
- Words: ${stats.wordCount}
- Keyword density: ${stats.keywordDensity}%
- Keyword occurrences: ${stats.keywordCount}
- H2s: ${stats.h2Count}
- Internal links: ${stats.internalLinks}
`;

  if (failing.length) {
    prompt += '\nFAILED CHECKS:\n';
    for (const c of failing) prompt += `  - ${c.name}${c.detail ? `: ${c.detail}` : ''}\n`;
  }

  if (args.audit.criticalProblems.length) {
    prompt += '\nCRITICAL PROBLEMS TO FIX:\n';
    for (const p of args.audit.criticalProblems) prompt += `  - ${p}\n`;
  }

  if (args.audit.suggestions.length) {
    prompt += '\nSUGGESTED IMPROVEMENTS:\n';
    for (const s of args.audit.suggestions) prompt += `  - ${s}\n`;
  }

  prompt += `
INSTRUCTIONS:
1. Fix ALL critical problems
2. Apply the suggested improvements where possible
3. Do NOT change the overall structure of the article
4. Keep the ${args.tone} tone and the article's language
5. Return ONLY the corrected article in HTML (no META_TITLE or other fields)

ARTICLE TO FIX:
${args.bodyHtml}`;

  return prompt;
}
