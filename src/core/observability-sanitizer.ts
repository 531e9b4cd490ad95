import type { Metric } from "./types.js";
import { DEFAULT_REDACTED_KEYS, type SanitizerOptions } from "./request-sanitizer.js";

function shouldRedact(key: string, redacted: string[]): boolean {
  const lower = key.toLowerCase();
  return redacted.some((r) => lower.includes(r));
}

function redactedKeys(opts?: SanitizerOptions): string[] {
  return (opts?.redactedKeys ?? DEFAULT_REDACTED_KEYS).map((s) => s.toLowerCase());
}

export function sanitizeObject(obj: unknown, opts?: SanitizerOptions): unknown {
  if (obj === null || typeof obj !== "object") return obj;

  if (Array.isArray(obj)) {
    return obj.map((v) => sanitizeObject(v, opts));
  }

  const redacted = redactedKeys(opts);
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    out[k] = shouldRedact(k, redacted) ? "[REDACTED]" : sanitizeObject(v, opts);
  }
  return out;
}

/**
 * Sanitizes a record-shaped value, keeping its shape.
 */
export function sanitizeRecord(
  record: Record<string, unknown>,
  opts?: SanitizerOptions
): Record<string, unknown> {
  const redacted = redactedKeys(opts);
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(record)) {
    out[k] = shouldRedact(k, redacted) ? "[REDACTED]" : sanitizeObject(v, opts);
  }
  return out;
}

export function sanitizeMetric(metric: Metric, opts?: SanitizerOptions): Metric {
  const redacted = redactedKeys(opts);
  const tags: Record<string, string> = {};
  for (const [k, v] of Object.entries(metric.tags)) {
    tags[k] = shouldRedact(k, redacted) || shouldRedact(v, redacted) ? "[REDACTED]" : v;
  }
  return { ...metric, tags };
}
