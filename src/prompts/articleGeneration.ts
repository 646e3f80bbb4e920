import type { MoneyPage } from '../types.js';

export interface InternalLinkTarget {
  title: string;
  url: string;
}

export interface ArticlePromptArgs {
  topic: string;
  primaryKeyword: string;
  secondaryKeywords: string[];
  clientName: string;
  industry: string;
  tone: string;
  websiteUrl: string;
  language: string;
  targetWords: number;
  moneyPages: MoneyPage[];
  existingPosts: InternalLinkTarget[];
  industryInstructions?: string | null;
}

const LANGUAGE_NAMES: Record<string, string> = {
  es: 'Spanish',
  en: 'English',
  pt: 'Portuguese',
  fr: 'French',
  de: 'German',
  it: 'Italian'
};

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code.toLowerCase()] ?? code;
}

function quoted(items: string[]): string {
  return items.length ? items.map((k) => `"${k}"`).join(', ') : 'none';
}

export function articleGenerationPrompt(args: ArticlePromptArgs) {
  const kw = args.primaryKeyword;

  let system = `You are an expert SEO copywriter. Your ONLY goal is an article that RANKS ON GOOGLE for the keyword "${kw}".

MANDATORY SEO RULES (NON-NEGOTIABLE)
====================================

1. PRIMARY KEYWORD: "${kw}"
   - MUST appear in the title (ideally in the first 5 words)
   - MUST appear in the first paragraph (first 50 words)
   - MUST appear in at least 1 H2
   - MUST appear 4-8 times in total (density ~1-2%)
   - Use natural variations too

2. SECONDARY KEYWORDS: ${quoted(args.secondaryKeywords)}
   - Each must appear at least once
   - Ideally in an H2 or H3

3. STRUCTURE:
   - H1 title: 60 characters max, keyword first
   - At least 4 sections with H2
   - At least 1 H3 inside some H2
   - Short paragraphs (3-4 sentences max)
   - Total length: about ${args.targetWords} words

4. FIRST PARAGRAPH:
   - A hook that grabs the reader
   - Primary keyword within the first 2 sentences
   - Answers the search intent

5. LAST PARAGRAPH:
   - Summary of the key points
   - Clear CTA pointing to the client's business

CLIENT: ${args.clientName}
INDUSTRY: ${args.industry}
TONE: ${args.tone}
WEBSITE: ${args.websiteUrl}
WRITE IN: ${languageName(args.language)}

The article must NOT sound robotic or generic. Be useful, with concrete data
and real examples, as if written by a human expert in the field.`;

  if (args.industryInstructions?.trim()) {
    system += `\n\nINDUSTRY INSTRUCTIONS:\n${args.industryInstructions.trim()}`;
  }

  const user: string[] = [
    `Write an SEO-optimized blog article.

TOPIC: ${args.topic}
PRIMARY KEYWORD: ${kw}
SECONDARY KEYWORDS: ${args.secondaryKeywords.length ? args.secondaryKeywords.join(', ') : 'none'}
`
  ];

  if (args.moneyPages.length) {
    user.push("\nLINKS TO THE CLIENT'S SITE (work them in naturally):");
    for (const page of args.moneyPages.slice(0, 2)) {
      user.push(`  - Link to ${page.url} using as anchor text: ${page.anchorTexts.slice(0, 2).map((a) => `"${a}"`).join(' or ')}`);
    }
    user.push('  These links are REQUIRED. Place them where they flow naturally.');
  }

  if (args.existingPosts.length) {
    user.push('\nEXISTING BLOG ARTICLES (link 2-3 of them naturally):');
    for (const post of args.existingPosts.slice(0, 5)) {
      user.push(`  - "${post.title}" → ${post.url}`);
    }
    user.push('  Insert links to 2-3 of these articles where relevant.');
  }

  user.push(`
OUTPUT FORMAT
=============
First emit these lines (one per line, no extra formatting):
META_TITLE: [SEO title, max 60 chars, keyword first]
META_DESCRIPTION: [description with keyword + CTA, 120-155 chars]
SLUG: [url-friendly-slug-with-keyword]
EXTRACTO: [2 sentences for previews and social posts]

Then the full article in HTML:
- <h1> for the title (may differ slightly from META_TITLE)
- <h2> for main sections
- <h3> for subsections
- <p> for paragraphs
- <ul>/<li> for lists where useful
- <strong> for key concepts
- <a href="URL"> for links (internal and to the client's site)
- NO <html>, <head> or <body>
`);

  return { system, user: user.join('\n') };
}
