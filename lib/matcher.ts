import type { FuzzyScorer } from "@/lib/fuzzy";
import { logWarning } from "@/lib/log";

export const DEFAULT_FUZZY_THRESHOLD = 80;

export type MatchTier = "exact" | "substring" | "fuzzy";

export type MatchOptions = {
  fuzzy: FuzzyScorer | null;
  fuzzyThreshold?: number;
};

export type ResumeTokens = {
  tokens: ReadonlySet<string>;
  joined: string;
};

/**
 * Returns the first tier that accepts `keyword`, or null. Tiers run cheapest and most
 * precise first, so a fuzzy hit is only consulted when nothing literal matched.
 */
export function matchKeyword(keyword: string, resume: ResumeTokens, options: MatchOptions): MatchTier | null {
  const k = keyword.trim().toLowerCase();
  if (!k) return null;

  if (resume.tokens.has(k)) return "exact";
  if (resume.joined.includes(k)) return "substring";

  const { fuzzy } = options;
  if (!fuzzy) return null;

  const threshold = options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD;
  try {
    return fuzzy.partialRatio(k, resume.joined) >= threshold ? "fuzzy" : null;
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    logWarning("[ats] fuzzy scorer failed", { keyword: k, message });
    return null;
  }
}

export function isMatch(
  keyword: string,
  resumeTokens: readonly string[],
  resumeJoinedText: string,
  options: MatchOptions,
): boolean {
  return matchKeyword(keyword, { tokens: new Set(resumeTokens), joined: resumeJoinedText }, options) !== null;
}
