/**
 * Error metadata sanitizer
 *
 * Error metadata travels with thrown errors into application logs, so any key
 * that could carry a credential is dropped before the error is constructed.
 */

/**
 * Metadata keys that are dropped, matched case-insensitively as substrings.
 */
const UNSAFE_METADATA_KEYS: readonly string[] = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "session",
  "credentials",
  "privateKey",
  "private_key",
] as const;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Removes unsafe keys, recursing into nested objects.
 * Returns undefined when nothing is left.
 */
export function sanitizeErrorMetadata(
  metadata: Record<string, unknown> | undefined
): Record<string, unknown> | undefined {
  if (!metadata) {
    return undefined;
  }

  const sanitized: Record<string, unknown> = {};
  const lowerUnsafeKeys = UNSAFE_METADATA_KEYS.map((k) => k.toLowerCase());

  for (const [key, value] of Object.entries(metadata)) {
    const lowerKey = key.toLowerCase();

    if (lowerUnsafeKeys.some((unsafeKey) => lowerKey.includes(unsafeKey))) {
      continue;
    }

    if (isPlainObject(value)) {
      const sanitizedValue = sanitizeErrorMetadata(value);
      if (sanitizedValue) {
        sanitized[key] = sanitizedValue;
      }
    } else if (value !== undefined) {
      sanitized[key] = value;
    }
  }

  return Object.keys(sanitized).length > 0 ? sanitized : undefined;
}
