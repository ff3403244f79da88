export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export function fail<T>(sourceLabel: string, message: string): ParseResult<T> {
  return { ok: false, error: `${sourceLabel}: ${message}` };
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}
