import { stripCodeFences } from '../utils/html.js';
import { titleCase, toSlug } from '../utils/slug.js';

export interface ParsedDraft {
  title: string;
  slug: string;
  metaDescription: string;
  excerpt: string;
  bodyHtml: string;
}

const FIELDS = {
  'META_TITLE:': 'title',
  'META_DESCRIPTION:': 'metaDescription',
  'SLUG:': 'slug',
  'EXTRACTO:': 'excerpt'
} as const;

type FieldPrefix = keyof typeof FIELDS;
const PREFIXES = Object.keys(FIELDS).filter((k): k is FieldPrefix => k in FIELDS);

function matchPrefix(line: string): FieldPrefix | undefined {
  return PREFIXES.find((p) => line.startsWith(p));
}

/**
 * Splits a model reply into metadata and body. The reply may open with
 * `META_TITLE:`, `META_DESCRIPTION:`, `SLUG:` and `EXTRACTO:` lines in any
 * order; the last occurrence of a field wins and every such line is removed
 * from the body. Missing title and slug are derived from the keyword.
 */
export function parseDraft(raw: string, keyword: string): ParsedDraft {
  const fields = { title: '', metaDescription: '', slug: '', excerpt: '' };
  const bodyLines: string[] = [];

  for (const line of stripCodeFences(raw).split('\n')) {
    const trimmed = line.trim();
    const prefix = matchPrefix(trimmed);
    if (prefix) {
      fields[FIELDS[prefix]] = trimmed.slice(prefix.length).trim();
      continue;
    }
    bodyLines.push(line);
  }

  return {
    title: fields.title || titleCase(keyword),
    slug: toSlug(fields.slug) || toSlug(keyword),
    metaDescription: fields.metaDescription,
    excerpt: fields.excerpt,
    bodyHtml: stripCodeFences(bodyLines.join('\n'))
  };
}
