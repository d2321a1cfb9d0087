/**
 * Levenshtein distance and "did you mean" helpers
 */

/**
 * Compute the Levenshtein edit distance between two strings.
 */
export function levenshteinDistance(a: string, b: string): number {
  const la = a.length;
  const lb = b.length;

  if (la === 0) return lb;
  if (lb === 0) return la;

  // Single-row optimization
  let prev = Array.from({ length: lb + 1 }, (_, i) => i);
  let curr = new Array<number>(lb + 1).fill(0);

  for (let i = 1; i <= la; i++) {
    curr[0] = i;
    for (let j = 1; j <= lb; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(
        curr[j - 1] + 1, // insertion
        prev[j] + 1, // deletion
        prev[j - 1] + cost // substitution
      );
    }
    [prev, curr] = [curr, prev];
  }

  return prev[lb];
}

/**
 * Short strings get a tighter threshold to avoid nonsensical suggestions.
 */
function adaptiveMaxDistance(target: string): number {
  const len = target.length;
  if (len <= 3) return 1;
  if (len <= 6) return 2;
  return 3;
}

/**
 * Find the closest matches from a list of candidates, nearest first.
 *
 * Comparison ignores case, so `httprequest` still finds `httpRequest`;
 * an exact (case-sensitive) match is never suggested back.
 */
export function findClosestMatches(
  target: string,
  candidates: Iterable<string>,
  maxDistance?: number
): string[] {
  const effectiveMax = maxDistance ?? adaptiveMaxDistance(target);
  const lowered = target.toLowerCase();
  const scored: Array<{ name: string; distance: number }> = [];

  for (const candidate of candidates) {
    if (candidate === target) continue;
    const distance = levenshteinDistance(lowered, candidate.toLowerCase());
    if (distance <= effectiveMax) {
      scored.push({ name: candidate, distance });
    }
  }

  return scored.sort((a, b) => a.distance - b.distance).map((s) => s.name);
}

/**
 * ` Did you mean "x"?` for the closest candidate, or an empty string.
 */
export function didYouMean(target: string, candidates: Iterable<string>): string {
  const [best] = findClosestMatches(target, candidates);
  return best !== undefined ? ` Did you mean "${best}"?` : '';
}
