/**
 * Partial-match similarity on a 0..100 scale: how well `needle` fits somewhere
 * inside `haystack`, not how alike the two whole strings are.
 */
export type FuzzyScorer = {
  partialRatio(needle: string, haystack: string): number;
};

function lcsLength(a: string, b: string): number {
  if (!a || !b) return 0;
  let prev = new Array<number>(b.length + 1).fill(0);
  let curr = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i += 1) {
    for (let j = 1; j <= b.length; j += 1) {
      curr[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length];
}

/** Indel similarity: `2 * LCS / (|a| + |b|)`, scaled to 0..100. */
export function indelRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 0;
  return (200 * lcsLength(a, b)) / total;
}

// Windows of `long` sized like `short`, plus the partial windows hanging off either end.
function bestWindowRatio(short: string, long: string): number {
  const n = short.length;
  let best = 0;
  const consider = (window: string) => {
    const r = indelRatio(short, window);
    if (r > best) best = r;
  };

  for (let end = 1; end < n && best < 100; end += 1) consider(long.slice(0, end));
  for (let start = 0; start + n <= long.length && best < 100; start += 1) consider(long.slice(start, start + n));
  for (let start = Math.max(long.length - n + 1, 1); start < long.length && best < 100; start += 1) {
    consider(long.slice(start));
  }
  return best;
}

/**
 * Best indel ratio of the shorter string against any same-length window of the
 * longer one. A swapped pair of letters costs one deletion and one insertion, so
 * "pyhton" against "python" rates 83.3. Scores are not rounded.
 */
export function partialRatio(a: string, b: string): number {
  if (!a || !b) return 0;
  const [short, long] = a.length <= b.length ? [a, b] : [b, a];
  const best = bestWindowRatio(short, long);
  // Equal lengths: either side may serve as the window source.
  return short.length === long.length ? Math.max(best, bestWindowRatio(long, short)) : best;
}

export function createPartialRatioScorer(): FuzzyScorer {
  return {
    partialRatio(needle: string, haystack: string): number {
      return partialRatio(needle.trim(), haystack);
    },
  };
}
