import "server-only";

import { loadAtsConfig, type AtsConfig } from "@/lib/config";
import { extractDocxFileText } from "@/lib/docx";
import { extractResumeText, type ExtractionOutcome, type ResumeExtractors } from "@/lib/extract";
import { createPartialRatioScorer, type FuzzyScorer } from "@/lib/fuzzy";
import { resolveJobKeywords, type JobKeywordSource, type ResolvedKeywords } from "@/lib/keywords";
import { logError, logInfo, logWarning } from "@/lib/log";
import type { MatchOptions } from "@/lib/matcher";
import type { ResumeSource } from "@/lib/resume";
import { extractPdfFileText } from "@/lib/pdf";
import { computeAtsScore, emptyMatchResult, type MatchResult } from "@/lib/scoring";

export type AtsDependencies = {
  fuzzy: FuzzyScorer | null;
  extractors: ResumeExtractors;
};

export type AtsReport = MatchResult &
  ResolvedKeywords & {
    extraction: ExtractionOutcome | null;
  };

export type AtsEngine = {
  config: AtsConfig;
  extract(source: ResumeSource): Promise<ExtractionOutcome>;
  score(jobKeywords: readonly string[], resumeText: string): MatchResult;
  evaluate(params: { job: JobKeywordSource; resume: ResumeSource }): Promise<AtsReport>;
};

export function createAtsEngine(config: AtsConfig, deps: AtsDependencies): AtsEngine {
  const fuzzy = config.fuzzyMatching ? deps.fuzzy : null;
  if (!fuzzy) logInfo("[ats] fuzzy matching unavailable; keywords match on exact and substring tiers only");
  if (!deps.extractors.pdf) logInfo("[ats] no PDF extractor configured; PDF resumes will score as empty");
  if (!deps.extractors.docx) logInfo("[ats] no DOCX extractor configured; DOCX resumes will score as empty");

  const matchOptions: MatchOptions = { fuzzy, fuzzyThreshold: config.fuzzyThreshold };
  const extractionOptions = {
    extractionTimeoutMs: config.extractionTimeoutMs,
    unknownFormatAsDocx: config.unknownFormatAsDocx,
  };

  function extract(source: ResumeSource): Promise<ExtractionOutcome> {
    return extractResumeText(source, deps.extractors, extractionOptions);
  }

  function score(jobKeywords: readonly string[], resumeText: string): MatchResult {
    return computeAtsScore(jobKeywords, resumeText, matchOptions);
  }

  async function evaluate(params: { job: JobKeywordSource; resume: ResumeSource }): Promise<AtsReport> {
    let resolved: ResolvedKeywords = { keywords: [], keywordSource: "required-skills" };
    let extraction: ExtractionOutcome | null = null;
    try {
      resolved = resolveJobKeywords(params.job, config.maxDerivedKeywords);
      extraction = await extract(params.resume);
      return { ...score(resolved.keywords, extraction.text), ...resolved, extraction };
    } catch (e) {
      // Never fails the submission: report every keyword as missing.
      logError("[ats] scoring failed", e);
      return { ...emptyMatchResult(resolved.keywords), ...resolved, extraction };
    }
  }

  return { config, extract, score, evaluate };
}

/** Engine wired to the real collaborators, configured from the environment. */
export function createDefaultAtsEngine(env?: Record<string, string | undefined>): AtsEngine {
  const { config, warnings } = loadAtsConfig(env);
  for (const warning of warnings) logWarning("[ats] config:", warning);

  return createAtsEngine(config, {
    fuzzy: createPartialRatioScorer(),
    extractors: { pdf: extractPdfFileText, docx: extractDocxFileText },
  });
}
