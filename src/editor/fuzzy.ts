export type FuzzyHit<T> = { item: T; score: number };

/**
 * Subsequence score, -1 if `query` is not a subsequence of `text`.
 * Contiguous runs and an early first match score higher; every skipped
 * character costs a point.
 */
export function fuzzyScore(query: string, text: string): number {
  const needle = query.toLowerCase();
  const hay = text.toLowerCase();
  if (!needle) return 0;

  let score = 0;
  let run = 0;
  let at = 0;
  let first = -1;
  for (const ch of needle) {
    const found = hay.indexOf(ch, at);
    if (found === -1) return -1;
    const skipped = found - at;
    run = skipped > 0 ? 1 : run + 1;
    score += 10 + run * 5 - skipped;
    if (first === -1) first = found;
    at = found + ch.length;
  }
  // Unmatched tail of the candidate counts against it too.
  score -= hay.length - at;
  return score + Math.max(0, 20 - first * 5);
}

export function fuzzyFind<T>(
  query: string,
  items: readonly T[],
  toText: (t: T) => string,
  limit = 20,
): FuzzyHit<T>[] {
  return items
    .map((item) => ({ item, score: fuzzyScore(query, toText(item)) }))
    .filter((hit) => hit.score >= 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}

/** Best candidate for a mistyped name, or null when nothing is close. */
export function closestMatch(
  query: string,
  candidates: readonly string[],
  minScore = 20,
): string | null {
  if (!query.trim()) return null;
  const [best] = fuzzyFind(query, candidates, (c) => c, 1);
  return best && best.score >= minScore ? best.item : null;
}
