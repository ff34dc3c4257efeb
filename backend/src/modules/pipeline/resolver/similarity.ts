/**
 * Token-order-independent string similarity on a 0..100 scale.
 *
 * Formula: both strings lower-cased, split on whitespace, tokens sorted and re-joined;
 * score = 100 * 2 * LCS(a, b) / (|a| + |b|), i.e. normalized indel similarity.
 * Not rounded, so cutoff comparisons stay exact.
 */

export function sortTokens(s: string): string {
  return s
    .toLowerCase()
    .split(/\s+/)
    .filter((t) => t !== "")
    .sort()
    .join(" ");
}

/** Length of the longest common subsequence. Two-row DP, O(|a|·|b|) time. */
export function lcsLength(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  let prev = new Array<number>(b.length + 1).fill(0);
  let curr = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        curr[j] = (prev[j - 1] ?? 0) + 1;
      } else {
        curr[j] = Math.max(prev[j] ?? 0, curr[j - 1] ?? 0);
      }
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length] ?? 0;
}

export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return (200 * lcsLength(a, b)) / total;
}

export function tokenSortRatio(a: string, b: string): number {
  return ratio(sortTokens(a), sortTokens(b));
}
