import { cleanKeywords } from "@/lib/keywords";
import { matchKeyword, type MatchOptions, type ResumeTokens } from "@/lib/matcher";
import { joinTokens, tokenize } from "@/lib/text";

export type MatchResult = {
  score: number; // 0..100, one decimal
  matched: string[];
  missing: string[];
};

/**
 * Rounds to one decimal place, sending exact ties to the even neighbour
 * (6.25 gives 6.2, 18.75 gives 18.8). Only quarters can sit exactly halfway
 * between two tenths; every other value rounds on its exact binary value.
 */
export function roundToTenth(n: number): number {
  if (!Number.isFinite(n)) return 0;
  const quarters = n * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const below = Math.floor(n * 10);
    return (below % 2 === 0 ? below : below + 1) / 10;
  }
  return Number(n.toFixed(1));
}

export function buildResumeTokens(resumeText: string): ResumeTokens {
  const tokens = tokenize(resumeText);
  return { tokens: new Set(tokens), joined: joinTokens(tokens) };
}

/**
 * Splits the job's keywords into matched and missing against the resume text.
 * Keywords keep their original spelling; blank ones are ignored entirely.
 */
export function computeAtsScore(
  jobKeywords: readonly string[],
  resumeText: string,
  options: MatchOptions,
): MatchResult {
  const resume = buildResumeTokens(resumeText);
  const keywords = cleanKeywords(jobKeywords);
  const matched: string[] = [];
  const missing: string[] = [];

  for (const keyword of keywords) {
    if (matchKeyword(keyword, resume, options)) matched.push(keyword);
    else missing.push(keyword);
  }

  const total = keywords.length > 0 ? keywords.length : 1;
  return { score: roundToTenth(100 * (matched.length / total)), matched, missing };
}

/** The result reported when scoring itself failed: nothing matched. */
export function emptyMatchResult(jobKeywords: readonly string[]): MatchResult {
  return { score: 0, matched: [], missing: cleanKeywords(jobKeywords) };
}
