// src/diagnostics/suggest.ts
//
// "Did you mean ...?" support for undefined names.

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = new Array<number>(b.length + 1);
  let cur = new Array<number>(b.length + 1);
  for (let j = 0; j <= b.length; j++) prev[j] = j;

  for (let i = 1; i <= a.length; i++) {
    cur[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      cur[j] = Math.min(prev[j] + 1, cur[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, cur] = [cur, prev];
  }

  return prev[b.length];
}

/** 0..100, where 100 means identical. */
export function similarity(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 100;
  return Math.floor(100 - (levenshtein(a, b) * 100) / maxLen);
}

// Short names get a strict budget; long names are compared by percentage.
export function isSimilarIdentifier(typo: string, candidate: string): boolean {
  const d = levenshtein(typo, candidate);
  if (typo.length <= 4) return d <= 1;
  if (typo.length <= 8) return d <= 2;
  return similarity(typo, candidate) >= 70;
}

/** Up to `limit` candidates, closest first. Exact matches are skipped. */
export function suggestSimilar(typo: string, candidates: Iterable<string>, limit = 3): string[] {
  const scored: Array<{ name: string; dist: number }> = [];
  const seen = new Set<string>();

  for (const c of candidates) {
    if (c === typo || seen.has(c)) continue;
    seen.add(c);
    if (isSimilarIdentifier(typo, c)) scored.push({ name: c, dist: levenshtein(typo, c) });
  }

  scored.sort((x, y) => x.dist - y.dist || x.name.localeCompare(y.name));
  return scored.slice(0, limit).map((s) => s.name);
}

export function didYouMean(typo: string, candidates: Iterable<string>): string | undefined {
  const [best] = suggestSimilar(typo, candidates, 1);
  return best ? `Did you mean '${best}'?` : undefined;
}
