import type { MoneyPage } from '../types.js';

export const MAX_MONEY_PAGES = 2;

/**
 * Relevance of a money page to an article keyword: its priority, plus 10 for
 * every target keyword that contains or is contained by the article keyword,
 * otherwise 3 for every target keyword sharing a word with it.
 */
export function scoreMoneyPage(keyword: string, page: MoneyPage): number {
  const kw = keyword.toLowerCase();
  let score = page.priority;
  for (const target of page.targetKeywords) {
    const mk = target.toLowerCase().trim();
    if (!mk) continue;
    if (kw.includes(mk) || mk.includes(kw)) {
      score += 10;
    } else if (mk.split(/\s+/).some((word) => word.length > 0 && kw.includes(word))) {
      score += 3;
    }
  }
  return score;
}

/** Best pages first; ties by priority, then by the order they were given in. */
export function selectRelevantMoneyPages(keyword: string, pages: MoneyPage[], max = MAX_MONEY_PAGES): MoneyPage[] {
  return pages
    .filter((p) => p.active)
    .map((page, index) => ({ page, index, score: scoreMoneyPage(keyword, page) }))
    .sort((a, b) => b.score - a.score || b.page.priority - a.page.priority || a.index - b.index)
    .slice(0, max)
    .map((s) => s.page);
}
