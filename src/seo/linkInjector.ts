import type { ExistingPostRef, MoneyPage } from '../types.js';
import { escapeHtmlAttribute, escapeHtmlText } from '../utils/html.js';

export type LinkLocale = 'es' | 'en';

const PHRASES: Record<LinkLocale, { moneyLeadIn: string; related: string }> = {
  es: { moneyLeadIn: 'Si te interesa, puedes conocer más sobre', related: 'Te puede interesar:' },
  en: { moneyLeadIn: 'If you are interested, you can learn more about', related: 'You might also like:' }
};

export function toLinkLocale(language: string): LinkLocale {
  return language.toLowerCase().startsWith('en') ? 'en' : 'es';
}

const INTERNAL_LINK_RE = /<a[^>]+href=["']\/[^"']*["']/g;
export const MIN_INTERNAL_LINKS = 2;
export const MAX_INTERNAL_LINKS = 3;

function anchorTag(href: string, title: string, text: string): string {
  return `<a href="${escapeHtmlAttribute(href)}" title="${escapeHtmlAttribute(title)}">${escapeHtmlText(text)}</a>`;
}

export function countInternalLinks(html: string): number {
  return html.match(INTERNAL_LINK_RE)?.length ?? 0;
}

/**
 * Adds a link to every money page whose URL the article does not mention yet,
 * as a sentence appended to the last paragraph. A second call is a no-op.
 */
export function ensureMoneyLinks(html: string, moneyPages: MoneyPage[], locale: LinkLocale = 'es'): string {
  let out = html;
  for (const page of moneyPages) {
    if (out.includes(page.url) || out.includes(escapeHtmlAttribute(page.url))) continue;
    const lastP = out.lastIndexOf('</p>');
    if (lastP <= 0) continue;
    const anchor = page.anchorTexts[0] ?? page.title;
    const sentence = ` ${PHRASES[locale].moneyLeadIn} ${anchorTag(page.url, page.title, anchor)}.`;
    out = out.slice(0, lastP) + sentence + out.slice(lastP);
  }
  return out;
}

function isRelated(postKeyword: string, currentKeyword: string): boolean {
  const pk = postKeyword.toLowerCase().trim();
  const ck = currentKeyword.toLowerCase().trim();
  if (!pk) return false;
  if (ck.includes(pk) || pk.includes(ck)) return true;
  return pk.split(/\s+/).some((w) => w.length > 3 && ck.includes(w));
}

/**
 * Tops the article up to at least two root-relative links using related
 * published posts, stopping at three. Each link goes in its own paragraph
 * before the CTA box when there is one, otherwise after the last paragraph.
 */
export function ensureInternalLinks(
  html: string,
  existingPosts: ExistingPostRef[],
  currentKeyword: string,
  locale: LinkLocale = 'es'
): string {
  let count = countInternalLinks(html);
  if (count >= MIN_INTERNAL_LINKS) return html;

  let out = html;
  for (const post of existingPosts) {
    if (count >= MAX_INTERNAL_LINKS) break;
    if (!post.slug || !isRelated(post.keyword, currentKeyword)) continue;
    if (out.includes(post.slug) || out.includes(escapeHtmlAttribute(post.slug))) continue;

    const paragraph = `<p>${PHRASES[locale].related} ${anchorTag(`/${post.slug}`, post.title, post.title)}</p>`;
    const ctaPos = out.indexOf('class="cta-box"');
    if (ctaPos > 0) {
      const divStart = out.lastIndexOf('<div', ctaPos);
      if (divStart <= 0) continue;
      out = out.slice(0, divStart) + paragraph + '\n' + out.slice(divStart);
    } else {
      const lastP = out.lastIndexOf('</p>');
      if (lastP <= 0) continue;
      const at = lastP + '</p>'.length;
      out = out.slice(0, at) + '\n' + paragraph + out.slice(at);
    }
    count += 1;
  }
  return out;
}
