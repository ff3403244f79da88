import "server-only";

import { debug, logWarning } from "@/lib/log";
import { structuredResumeToText, type ResumeSource } from "@/lib/resume";
import { readUploadBytes, withTempCopy } from "@/lib/tmp";

export type ResumeFormat = "pdf" | "docx";

export type ExtractionMethod = "structured" | ResumeFormat;

export type ExtractionFailureReason = "unsupported-format" | "parse-error" | "timeout" | "unavailable";

export type ExtractionOutcome =
  | { ok: true; text: string; method: ExtractionMethod }
  | { ok: false; text: ""; reason: ExtractionFailureReason; format: ResumeFormat | null; message: string };

/** Reads a file on disk and returns its plain text. */
export type FileTextExtractor = (filePath: string) => Promise<string>;

export type ResumeExtractors = {
  pdf: FileTextExtractor | null;
  docx: FileTextExtractor | null;
};

export type ExtractionOptions = {
  extractionTimeoutMs: number;
  unknownFormatAsDocx: boolean;
};

class ExtractionTimeoutError extends Error {
  constructor(ms: number) {
    super(`Extraction timed out after ${ms}ms`);
    this.name = "ExtractionTimeoutError";
  }
}

export function detectResumeFormat(fileName: string, unknownFormatAsDocx = false): ResumeFormat | null {
  const name = fileName.trim().toLowerCase();
  if (name.endsWith(".pdf")) return "pdf";
  if (name.endsWith(".docx")) return "docx";
  return unknownFormatAsDocx ? "docx" : null;
}

async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  if (ms <= 0) return promise;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ExtractionTimeoutError(ms)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } catch (e) {
    // A parser that lost the race may still reject later.
    if (e instanceof ExtractionTimeoutError) {
      void promise.catch((late: unknown) => debug("[ats] extraction failed after timeout", late));
    }
    throw e;
  } finally {
    clearTimeout(timer);
  }
}

function failure(
  reason: ExtractionFailureReason,
  format: ResumeFormat | null,
  message: string,
): ExtractionOutcome {
  return { ok: false, text: "", reason, format, message };
}

async function extractUpload(
  fileName: string,
  data: Uint8Array | Blob,
  extractors: ResumeExtractors,
  options: ExtractionOptions,
): Promise<ExtractionOutcome> {
  const format = detectResumeFormat(fileName, options.unknownFormatAsDocx);
  if (!format) return failure("unsupported-format", null, `Unsupported resume file type: ${fileName || "(no name)"}`);

  const extractor = extractors[format];
  if (!extractor) return failure("unavailable", format, `No ${format} extractor configured`);

  try {
    const bytes = await readUploadBytes(data);
    const text = await withTempCopy(bytes, `.${format}`, (filePath) =>
      withTimeout(extractor(filePath), options.extractionTimeoutMs),
    );
    return { ok: true, text, method: format };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    const reason = e instanceof ExtractionTimeoutError ? "timeout" : "parse-error";
    return failure(reason, format, `Failed to parse ${fileName}: ${message}`);
  }
}

/**
 * Turns a resume into plain text. Upload failures do not throw: they yield a failed
 * outcome whose `text` is empty, which scores zero.
 */
export async function extractResumeText(
  source: ResumeSource,
  extractors: ResumeExtractors,
  options: ExtractionOptions,
): Promise<ExtractionOutcome> {
  if (source.kind === "structured") {
    return { ok: true, text: structuredResumeToText(source.resume), method: "structured" };
  }

  const outcome = await extractUpload(source.fileName, source.data, extractors, options);
  if (outcome.ok) {
    debug("[ats] extracted", { fileName: source.fileName, method: outcome.method, chars: outcome.text.length });
  } else {
    logWarning("[ats] extraction failed", { fileName: source.fileName, reason: outcome.reason, message: outcome.message });
  }
  return outcome;
}
