import { DEFAULT_MAX_DERIVED_KEYWORDS } from "@/lib/keywords";
import { DEFAULT_FUZZY_THRESHOLD } from "@/lib/matcher";
import type { ParseResult } from "@/lib/json";

export type AtsConfig = {
  fuzzyMatching: boolean;
  fuzzyThreshold: number; // 0..100
  extractionTimeoutMs: number; // 0 disables the bound
  unknownFormatAsDocx: boolean;
  maxDerivedKeywords: number;
};

export const DEFAULT_ATS_CONFIG: AtsConfig = {
  fuzzyMatching: true,
  fuzzyThreshold: DEFAULT_FUZZY_THRESHOLD,
  extractionTimeoutMs: 15_000,
  unknownFormatAsDocx: false,
  maxDerivedKeywords: DEFAULT_MAX_DERIVED_KEYWORDS,
};

type Env = Record<string, string | undefined>;

function parseInteger(name: string, raw: string, min: number, max = Number.MAX_SAFE_INTEGER): ParseResult<number> {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) return { ok: false, error: `${name} must be an integer, got "${raw}"` };
  const n = Number(trimmed);
  if (n < min || n > max) return { ok: false, error: `${name} must be between ${min} and ${max}, got ${n}` };
  return { ok: true, value: n };
}

function parseChoice<T extends string>(name: string, raw: string, choices: readonly T[]): ParseResult<T> {
  const value = raw.trim().toLowerCase();
  const hit = choices.find((c) => c === value);
  if (hit === undefined) return { ok: false, error: `${name} must be one of ${choices.join(", ")}, got "${raw}"` };
  return { ok: true, value: hit };
}

/**
 * Builds the pipeline configuration from environment variables. Invalid values fall
 * back to their defaults and are reported in `warnings`.
 */
export function loadAtsConfig(env: Env = process.env): { config: AtsConfig; warnings: string[] } {
  const config: AtsConfig = { ...DEFAULT_ATS_CONFIG };
  const warnings: string[] = [];

  function apply<T>(name: string, parse: (raw: string) => ParseResult<T>, set: (value: T) => void): void {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") return;
    const result = parse(raw);
    if (result.ok) set(result.value);
    else warnings.push(result.error);
  }

  apply("ATS_FUZZY_MATCHING", (raw) => parseChoice("ATS_FUZZY_MATCHING", raw, ["on", "off"] as const), (v) => {
    config.fuzzyMatching = v === "on";
  });
  apply("ATS_FUZZY_THRESHOLD", (raw) => parseInteger("ATS_FUZZY_THRESHOLD", raw, 0, 100), (v) => {
    config.fuzzyThreshold = v;
  });
  apply("ATS_EXTRACTION_TIMEOUT_MS", (raw) => parseInteger("ATS_EXTRACTION_TIMEOUT_MS", raw, 0), (v) => {
    config.extractionTimeoutMs = v;
  });
  apply("ATS_UNKNOWN_FORMAT", (raw) => parseChoice("ATS_UNKNOWN_FORMAT", raw, ["reject", "docx"] as const), (v) => {
    config.unknownFormatAsDocx = v === "docx";
  });
  apply("ATS_MAX_DERIVED_KEYWORDS", (raw) => parseInteger("ATS_MAX_DERIVED_KEYWORDS", raw, 1), (v) => {
    config.maxDerivedKeywords = v;
  });

  return { config, warnings };
}
