import { charLength, countOccurrences, stripTags } from '../utils/html.js';
import { toSlug } from '../utils/slug.js';

export const PASS_SCORE = 70;
export const DENSITY_MIN = 0.5;
export const DENSITY_MAX = 2.5;
export const TITLE_MAX_CHARS = 60;
export const META_MIN_CHARS = 120;
export const META_MAX_CHARS = 155;
export const MIN_WORDS = 800;
export const SHORT_WORDS = 500;

export type AuditCheckId =
  | 'title_keyword'
  | 'title_length'
  | 'meta_keyword'
  | 'meta_length'
  | 'slug_keyword'
  | 'intro_keyword'
  | 'h2_structure'
  | 'h2_keywords'
  | 'keyword_density'
  | 'internal_links'
  | 'word_count'
  | 'image_alt'
  | 'secondary_keywords'
  | 'external_links';

export interface AuditCheck {
  id: AuditCheckId;
  name: string;
  passed: boolean;
  points: number;
  maxPoints: number;
  detail?: string;
}

export interface AuditStats {
  wordCount: number;
  h2Count: number;
  internalLinks: number;
  externalLinks: number;
  /** Percentage, two decimals */
  keywordDensity: number;
  keywordCount: number;
}

export interface AuditReport {
  /** 0–100 */
  score: number;
  passed: boolean;
  checks: AuditCheck[];
  criticalProblems: string[];
  suggestions: string[];
  stats: AuditStats;
}

export interface AuditInput {
  title: string;
  metaDescription: string;
  slug: string;
  bodyHtml: string;
  primaryKeyword: string;
  secondaryKeywords?: string[];
  /** Published posts the client already has. At most one means nothing to link to yet. */
  existingPostsCount?: number;
}

const H2_RE = /<h2[^>]*>(.*?)<\/h2>/gi;
const HREF_RE = /<a[^>]+href=["']([^"']*)["']/gi;
const IMG_RE = /<img[^>]*>/g;
const ALT_RE = /\balt\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>"']+))/i;

export function isExternalHref(href: string): boolean {
  return href.startsWith('http://') || href.startsWith('https://');
}

export function isInternalHref(href: string): boolean {
  return !isExternalHref(href) && !href.startsWith('mailto:') && !href.startsWith('tel:');
}

function hasNonEmptyAlt(imgTag: string): boolean {
  const m = imgTag.match(ALT_RE);
  if (!m) return false;
  const value = m[1] ?? m[2] ?? m[3] ?? '';
  return value.trim().length > 0;
}

/**
 * Deterministic on-page audit of a rendered article. Pure: the same input
 * always yields the same report. Maximum raw total is 110; the score is
 * capped at 100.
 */
export function auditArticle(input: AuditInput): AuditReport {
  const checks: AuditCheck[] = [];
  const criticalProblems: string[] = [];
  const suggestions: string[] = [];

  const keyword = input.primaryKeyword.toLowerCase().trim();
  const secondary = (input.secondaryKeywords ?? []).map((k) => k.toLowerCase().trim()).filter(Boolean);

  const text = stripTags(input.bodyHtml).toLowerCase();
  const words = text.split(/\s+/).filter(Boolean);
  const wordCount = words.length;

  const push = (check: AuditCheck) => checks.push(check);

  // 1. keyword in title
  const titleLower = input.title.toLowerCase();
  const titleIdx = titleLower.indexOf(keyword);
  if (titleIdx !== -1 && titleIdx < 20) {
    push({ id: 'title_keyword', name: 'Keyword in title (early)', passed: true, points: 15, maxPoints: 15, detail: `"${keyword}" at position ${titleIdx}` });
  } else if (titleIdx !== -1) {
    push({ id: 'title_keyword', name: 'Keyword in title', passed: true, points: 10, maxPoints: 15, detail: 'present but not near the start' });
    suggestions.push(`Move "${keyword}" closer to the start of the title`);
  } else {
    push({ id: 'title_keyword', name: 'Keyword in title', passed: false, points: 0, maxPoints: 15, detail: `"${keyword}" not found in title` });
    criticalProblems.push(`Primary keyword "${keyword}" is missing from the title`);
  }

  // 2. title length
  const titleLen = charLength(input.title);
  if (titleLen <= TITLE_MAX_CHARS) {
    push({ id: 'title_length', name: 'Title length', passed: true, points: 5, maxPoints: 5, detail: `${titleLen} chars (max ${TITLE_MAX_CHARS})` });
  } else {
    push({ id: 'title_length', name: 'Title length', passed: false, points: 0, maxPoints: 5, detail: `${titleLen} chars (max ${TITLE_MAX_CHARS})` });
    suggestions.push(`Shorten the title to ${TITLE_MAX_CHARS} characters or fewer (currently ${titleLen})`);
  }

  // 3. keyword in meta description
  const metaLen = charLength(input.metaDescription);
  if (input.metaDescription.toLowerCase().includes(keyword)) {
    push({ id: 'meta_keyword', name: 'Keyword in meta description', passed: true, points: 5, maxPoints: 5 });
  } else {
    push({ id: 'meta_keyword', name: 'Keyword in meta description', passed: false, points: 0, maxPoints: 5 });
    criticalProblems.push('Primary keyword is missing from the meta description');
  }

  // 4. meta length
  if (metaLen >= META_MIN_CHARS && metaLen <= META_MAX_CHARS) {
    push({ id: 'meta_length', name: 'Meta description length', passed: true, points: 5, maxPoints: 5, detail: `${metaLen} chars` });
  } else {
    push({ id: 'meta_length', name: 'Meta description length', passed: false, points: 0, maxPoints: 5, detail: `${metaLen} chars (ideal ${META_MIN_CHARS}-${META_MAX_CHARS})` });
    suggestions.push(`Rewrite the meta description to ${META_MIN_CHARS}-${META_MAX_CHARS} characters (currently ${metaLen})`);
  }

  // 5. keyword in slug
  const slugLower = input.slug.toLowerCase();
  const hyphenated = keyword.replace(/ /g, '-');
  const slugified = toSlug(keyword);
  const slugHasKeyword =
    slugLower.includes(hyphenated) ||
    slugLower.replace(/-/g, '').includes(keyword.replace(/ /g, '')) ||
    (slugified.length > 0 && slugLower.includes(slugified));
  if (slugHasKeyword) {
    push({ id: 'slug_keyword', name: 'Keyword in slug', passed: true, points: 5, maxPoints: 5 });
  } else {
    push({ id: 'slug_keyword', name: 'Keyword in slug', passed: false, points: 0, maxPoints: 5 });
    suggestions.push(`Include the keyword in the slug: "${hyphenated}"`);
  }

  // 6. keyword in the first 100 words
  if (words.slice(0, 100).join(' ').includes(keyword)) {
    push({ id: 'intro_keyword', name: 'Keyword in first 100 words', passed: true, points: 10, maxPoints: 10 });
  } else {
    push({ id: 'intro_keyword', name: 'Keyword in first 100 words', passed: false, points: 0, maxPoints: 10 });
    criticalProblems.push('Primary keyword does not appear in the first 100 words');
  }

  // 7-8. H2 structure
  const h2s = Array.from(input.bodyHtml.matchAll(H2_RE), (m) => (m[1] ?? '').toLowerCase());
  const h2Count = h2s.length;
  const headingKeywords = [keyword, ...secondary];
  const h2WithKeywords = h2s.filter((h2) => headingKeywords.some((k) => h2.includes(k))).length;

  if (h2Count >= 3) {
    push({ id: 'h2_structure', name: `H2 structure (${h2Count} sections)`, passed: true, points: 5, maxPoints: 5 });
  } else {
    push({ id: 'h2_structure', name: `H2 structure (${h2Count} sections)`, passed: false, points: 0, maxPoints: 5 });
    suggestions.push('Add more H2 sections (at least 3)');
  }

  if (h2WithKeywords >= 1) {
    push({ id: 'h2_keywords', name: 'Keywords in H2s', passed: true, points: 5, maxPoints: 5, detail: `${h2WithKeywords} H2s with keywords` });
  } else {
    push({ id: 'h2_keywords', name: 'Keywords in H2s', passed: false, points: 0, maxPoints: 5 });
    suggestions.push('Use the primary or a secondary keyword in at least one H2');
  }

  // 9. density
  const keywordCount = countOccurrences(text, keyword);
  const density = wordCount > 0 ? (keywordCount / wordCount) * 100 : 0;
  const densityLabel = `${density.toFixed(1)}%`;
  if (density >= DENSITY_MIN && density <= DENSITY_MAX) {
    push({ id: 'keyword_density', name: `Keyword density (${densityLabel})`, passed: true, points: 10, maxPoints: 10 });
  } else if (density < DENSITY_MIN) {
    push({ id: 'keyword_density', name: `Keyword density (${densityLabel})`, passed: false, points: 0, maxPoints: 10, detail: 'too low' });
    suggestions.push(`Keyword density too low (${densityLabel}). Use the keyword more often, naturally.`);
  } else {
    push({ id: 'keyword_density', name: `Keyword density (${densityLabel})`, passed: false, points: 0, maxPoints: 10, detail: 'too high (keyword stuffing)' });
    suggestions.push(`Keyword density too high (${densityLabel}). Reduce it to avoid a stuffing penalty.`);
  }

  // 10. internal links
  const hrefs = Array.from(input.bodyHtml.matchAll(HREF_RE), (m) => m[1] ?? '');
  const internalLinks = hrefs.filter(isInternalHref).length;
  const externalLinks = hrefs.filter(isExternalHref).length;
  const firstArticle = input.existingPostsCount != null && input.existingPostsCount <= 1;

  if (internalLinks >= 2) {
    push({ id: 'internal_links', name: `Internal links (${internalLinks})`, passed: true, points: 10, maxPoints: 10 });
  } else if (firstArticle) {
    push({ id: 'internal_links', name: `Internal links (${internalLinks})`, passed: true, points: 10, maxPoints: 10, detail: 'first article, nothing to link to yet' });
  } else if (internalLinks === 1) {
    push({ id: 'internal_links', name: 'Internal links (1)', passed: false, points: 5, maxPoints: 10, detail: 'minimum 2' });
    suggestions.push('Add at least 1 more internal link to another article on the blog');
  } else {
    push({ id: 'internal_links', name: 'Internal links (0)', passed: false, points: 0, maxPoints: 10 });
    criticalProblems.push('No internal links. Add at least 2 links to other articles on the blog.');
  }

  // 11. length
  if (wordCount >= MIN_WORDS) {
    push({ id: 'word_count', name: `Length (${wordCount} words)`, passed: true, points: 10, maxPoints: 10 });
  } else if (wordCount >= SHORT_WORDS) {
    push({ id: 'word_count', name: `Length (${wordCount} words)`, passed: true, points: 5, maxPoints: 10, detail: 'acceptable but short' });
    suggestions.push(`Article is short (${wordCount} words). Aim for 800-1500.`);
  } else {
    push({ id: 'word_count', name: `Length (${wordCount} words)`, passed: false, points: 0, maxPoints: 10 });
    criticalProblems.push(`Article too short (${wordCount} words). Minimum ${MIN_WORDS}.`);
  }

  // 12. image alt text
  const imgTags = input.bodyHtml.match(IMG_RE) ?? [];
  const withAlt = imgTags.filter(hasNonEmptyAlt).length;
  if (imgTags.length > 0 && withAlt === imgTags.length) {
    push({ id: 'image_alt', name: 'Images with alt text', passed: true, points: 5, maxPoints: 5 });
  } else if (imgTags.length === 0) {
    push({ id: 'image_alt', name: 'Images', passed: false, points: 0, maxPoints: 5, detail: 'no images' });
    suggestions.push('Add at least 1 image with alt text that includes the keyword');
  } else {
    push({ id: 'image_alt', name: `Alt text on images (${withAlt}/${imgTags.length})`, passed: false, points: 0, maxPoints: 5 });
    suggestions.push(`Add alt text to ${imgTags.length - withAlt} image(s)`);
  }

  // 13. secondary keywords; skipped when there are none
  if (secondary.length > 0) {
    const missing = secondary.filter((k) => !text.includes(k));
    const found = secondary.length - missing.length;
    const name = `Secondary keywords (${found}/${secondary.length})`;
    if (found >= secondary.length * 0.5) {
      push({ id: 'secondary_keywords', name, passed: true, points: 10, maxPoints: 10 });
    } else {
      push({ id: 'secondary_keywords', name, passed: false, points: 0, maxPoints: 10 });
      suggestions.push(`Missing secondary keywords: ${missing.slice(0, 3).join(', ')}`);
    }
  }

  // 14. money/external links
  if (externalLinks >= 1) {
    push({ id: 'external_links', name: `Money/external links (${externalLinks})`, passed: true, points: 10, maxPoints: 10 });
  } else {
    push({ id: 'external_links', name: 'Money links (0)', passed: false, points: 0, maxPoints: 10 });
    criticalProblems.push("No money links. Add at least 1 link to the client's site.");
  }

  const total = checks.reduce((sum, c) => sum + c.points, 0);
  const score = Math.min(total, 100);

  return {
    score,
    passed: score >= PASS_SCORE,
    checks,
    criticalProblems,
    suggestions,
    stats: {
      wordCount,
      h2Count,
      internalLinks,
      externalLinks,
      keywordDensity: Math.round(density * 100) / 100,
      keywordCount
    }
  };
}
