/**
 * String similarity helpers built on the Indel distance
 * (insertions and deletions only, so a substitution costs 2)
 */

/**
 * Length of the longest common subsequence, two-row DP
 */
export function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];
  let prev = new Array<number>(inner.length + 1).fill(0);
  let curr = new Array<number>(inner.length + 1).fill(0);

  for (let i = 1; i <= outer.length; i++) {
    for (let j = 1; j <= inner.length; j++) {
      curr[j] = outer[i - 1] === inner[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[inner.length];
}

/**
 * Similarity ratio on a 0-100 scale.
 * 100 * 2 * lcs / (len(a) + len(b)); two empty strings are identical.
 * Symmetric in its arguments.
 *
 * similarityRatio('match odds ft', 'match odds') -> 86.96 (20 / 23)
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;

  return (200 * longestCommonSubsequence(a, b)) / total;
}

export interface CloseMatch {
  candidate: string;
  /** Similarity on a 0-1 scale */
  score: number;
}

/**
 * Rank candidates by similarity to a query
 * Returns at most `limit` matches scoring at least `cutoff` (0-1), best first.
 * Equal scores keep candidate order.
 */
export function closestMatches(
  query: string,
  candidates: Iterable<string>,
  limit = 5,
  cutoff = 0.6
): CloseMatch[] {
  const scored: Array<CloseMatch & { index: number }> = [];
  let index = 0;

  for (const candidate of candidates) {
    const score = similarityRatio(query, candidate) / 100;
    if (score >= cutoff) {
      scored.push({ candidate, score, index });
    }
    index++;
  }

  scored.sort((x, y) => y.score - x.score || x.index - y.index);
  return scored.slice(0, limit).map(({ candidate, score }) => ({ candidate, score }));
}
