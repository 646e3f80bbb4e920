const ACCENTS: Array<[RegExp, string]> = [
  [/[áàäâ]/g, 'a'],
  [/[éèëê]/g, 'e'],
  [/[íìïî]/g, 'i'],
  [/[óòöô]/g, 'o'],
  [/[úùüû]/g, 'u'],
  [/ñ/g, 'n']
];

/**
 * URL slug for a keyword or title: accents folded, anything outside
 * [a-z0-9] dropped, whitespace runs become a single hyphen.
 */
export function toSlug(input: string): string {
  let slug = input.toLowerCase().trim();
  for (const [pattern, replacement] of ACCENTS) slug = slug.replace(pattern, replacement);
  return slug
    .replace(/[^a-z0-9\s-]/g, '')
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/** "comprar casa cdmx" → "Comprar Casa Cdmx" */
export function titleCase(input: string): string {
  return input
    .toLowerCase()
    .replace(/(^|[^\p{L}\p{N}'])(\p{L})/gu, (_m, sep: string, ch: string) => sep + ch.toUpperCase());
}
