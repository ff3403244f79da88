import { tokenize } from "@/lib/text";

export const DEFAULT_MAX_DERIVED_KEYWORDS = 40;

export type JobKeywordSource = {
  requiredSkills?: readonly string[] | null;
  description?: string | null;
};

export type ResolvedKeywords = {
  keywords: string[];
  keywordSource: "required-skills" | "description";
};

/** Drops entries that are empty once trimmed; keeps the rest exactly as given. */
export function cleanKeywords(keywords: readonly unknown[]): string[] {
  return keywords.filter((k): k is string => typeof k === "string" && k.trim().length > 0);
}

/** Distinct description tokens longer than two characters, sorted, capped at `max`. */
export function deriveKeywordsFromDescription(description: string, max = DEFAULT_MAX_DERIVED_KEYWORDS): string[] {
  const distinct = new Set(tokenize(description).filter((t) => t.length > 2));
  return Array.from(distinct).sort().slice(0, max);
}

/** The posting's required skills; when it lists none, keywords derived from its description. */
export function resolveJobKeywords(
  job: JobKeywordSource,
  maxDerived = DEFAULT_MAX_DERIVED_KEYWORDS,
): ResolvedKeywords {
  const required = job.requiredSkills ?? [];
  if (required.length > 0) {
    return { keywords: [...required], keywordSource: "required-skills" };
  }
  return {
    keywords: deriveKeywordsFromDescription(job.description ?? "", maxDerived),
    keywordSource: "description",
  };
}
