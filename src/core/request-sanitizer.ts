import type { QueryValue, RequestOptions } from "./types.js";

export interface SanitizerOptions {
  redactedKeys?: string[];
}

export const DEFAULT_REDACTED_KEYS: readonly string[] = [
  "authorization",
  "cookie",
  "token",
  "apikey",
  "api_key",
  "password",
  "secret",
  "body",
];

const REDACTED = "[REDACTED]";

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[-_]/g, "");
}

// Only names the request body; matched against keys, never values
const BODY_TERM = "body";

function isSensitive(key: string, value: QueryValue, redacted: string[]): boolean {
  const lowerKey = normalizeKey(key);
  const lowerValue = String(value).toLowerCase();
  return redacted.some(
    (r) => lowerKey.includes(normalizeKey(r)) || (r !== BODY_TERM && lowerValue.includes(r))
  );
}

function redactEntries<V extends QueryValue>(
  entries: Record<string, V>,
  redacted: string[]
): Record<string, V | string> {
  const copy: Record<string, V | string> = {};
  for (const [k, v] of Object.entries(entries)) {
    copy[k] = isSensitive(k, v, redacted) ? REDACTED : v;
  }
  return copy;
}

/**
 * Copy of request options that is safe to hand to observability adapters.
 * Headers and query parameters whose key or value mentions a redacted term
 * are replaced; the body is replaced whole while "body" is a redacted key.
 */
export function sanitizeRequestOptions(
  options: RequestOptions | undefined,
  opts?: SanitizerOptions
): RequestOptions {
  const redacted = (opts?.redactedKeys ?? DEFAULT_REDACTED_KEYS).map((k) => k.toLowerCase());
  const sanitized: RequestOptions = { ...(options ?? {}) };

  if (sanitized.headers) {
    sanitized.headers = redactEntries(sanitized.headers, redacted);
  }

  if (sanitized.query) {
    sanitized.query = redactEntries(sanitized.query, redacted);
  }

  if (sanitized.body !== undefined && redacted.includes("body")) {
    sanitized.body = REDACTED;
  }

  return sanitized;
}
