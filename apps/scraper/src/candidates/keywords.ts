export const DEFAULT_KEYWORDS = ['engineer', 'ai', 'ml', 'machine learning', 'developer'] as const;

/**
 * Turns a boolean search query into title keywords:
 * `("AI engineer" OR "ML engineer")` → `['ai', 'engineer', 'ml']`.
 * Falls back to `DEFAULT_KEYWORDS` when nothing usable remains.
 */
export function parseQueryKeywords(query: string): string[] {
  const cleaned = query
    .toLowerCase()
    .replace(/[()"]/g, '')
    .replaceAll(' or ', ' ');

  const keywords = [...new Set(cleaned.split(/\s+/).filter((token) => token.length > 1))];
  return keywords.length > 0 ? keywords : [...DEFAULT_KEYWORDS];
}

export function titleMatches(title: string, keywords: readonly string[]): boolean {
  const lower = title.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}
