export function normalizeText(raw: string): string {
  // Normalize common PDF text artifacts while preserving line breaks.
  let text = raw.replaceAll("\r\n", "\n").replaceAll("\r", "\n");

  // Non‑breaking space shows up frequently in PDF extraction.
  text = text.replaceAll("\u00a0", " ");

  // Soft hyphen (often inserted for hyphenation) should be removed.
  text = text.replaceAll("\u00ad", "");

  // NUL often stands in for a separator (sometimes replacing a dash in date ranges).
  text = text.replaceAll("\u0000", " - ");
  // Keep \n and \t, but remove the rest of ASCII control chars.
  // eslint-disable-next-line no-control-regex
  text = text.replaceAll(/[\x01-\x08\x0B\x0C\x0E-\x1F\x7F]/g, " ");

  // De-hyphenate line breaks: "micro-\nservices" -> "microservices".
  text = text.replaceAll(/(\p{L})-\n(\p{L})/gu, "$1$2");

  const lines = text.split("\n").map((line) => line.replaceAll(/[ \t]+/g, " ").trimEnd());

  const out: string[] = [];
  let blankRun = 0;
  for (const line of lines) {
    const isBlank = line.trim().length === 0;
    if (isBlank) {
      blankRun += 1;
      if (blankRun <= 2) out.push("");
      continue;
    }
    blankRun = 0;
    out.push(line);
  }

  return out.join("\n").trim();
}

// Word boundaries over Unicode letters and digits; a bare `\b` sees only ASCII.
const WORD_CHAR = String.raw`[\p{L}\p{N}_]`;
const BOUNDARY = `(?:(?<=${WORD_CHAR})(?!${WORD_CHAR})|(?<!${WORD_CHAR})(?=${WORD_CHAR}))`;
const TOKEN_RE = new RegExp(`${BOUNDARY}[a-z0-9+#.-]+${BOUNDARY}`, "gu");

/**
 * Lower-cases `text` and returns its runs of ASCII letters, digits and `+ # . -`
 * bounded by word boundaries, where any Unicode letter or digit is a word character.
 * `"Python, SQL!! Django-2.0"` gives `["python", "sql", "django-2.0"]`; `"Résumé"`
 * gives nothing.
 */
export function tokenize(text: string): string[] {
  if (!text) return [];
  return text.toLowerCase().match(TOKEN_RE) ?? [];
}

export function joinTokens(tokens: readonly string[]): string {
  return tokens.join(" ");
}

export function toLines(text: string): string[] {
  return text
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}
