/**
 * Hardened header parsing utilities
 *
 * These utilities parse HTTP headers safely, handling malformed input
 * and edge cases that could cause issues.
 */

import type { RateLimitInfo } from "./types.js";

const ONE_YEAR_SECONDS = 86400 * 365;

/**
 * Parses the Retry-After header value.
 *
 * The header can be:
 * - A number of seconds (e.g., "120")
 * - An HTTP-date (e.g., "Wed, 21 Oct 2015 07:28:00 GMT")
 *
 * @returns Date when retry is allowed, or null if invalid
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): Date | null {
  if (!header) {
    return null;
  }

  const trimmed = header.trim();

  if (/^\d+$/.test(trimmed)) {
    const seconds = parseInt(trimmed, 10);
    // Cap at 1 year to prevent overflow
    if (seconds <= ONE_YEAR_SECONDS) {
      return new Date(now + seconds * 1000);
    }
    return null;
  }

  const date = Date.parse(trimmed);
  if (!isNaN(date) && date > now && date < now + ONE_YEAR_SECONDS * 1000) {
    return new Date(date);
  }

  return null;
}

/**
 * Parses Zendesk rate limit headers.
 *
 * Handles both formats Zendesk sends:
 * - Account-wide: X-Rate-Limit, X-Rate-Limit-Remaining
 * - Endpoint-specific: ratelimit-limit, ratelimit-remaining, ratelimit-reset
 *   (reset is a number of seconds until the window resets)
 *
 * Header lookups are case-insensitive (`Headers.get`).
 *
 * @returns Parsed rate limit info or null if not present
 */
export function parseRateLimitHeaders(headers: Headers, now: number = Date.now()): RateLimitInfo | null {
  let limit = parseIntHeader(headers.get("X-Rate-Limit"));
  let remaining = parseIntHeader(headers.get("X-Rate-Limit-Remaining"));

  if (limit === null) {
    limit = parseIntHeader(headers.get("RateLimit-Limit"));
  }
  if (remaining === null) {
    remaining = parseIntHeader(headers.get("RateLimit-Remaining"));
  }

  if (limit === null || remaining === null) {
    return null;
  }

  // Sanity checks
  if (remaining > limit) {
    return null;
  }

  const resetSeconds = parseIntHeader(headers.get("RateLimit-Reset"));
  const reset =
    resetSeconds !== null && resetSeconds <= ONE_YEAR_SECONDS
      ? new Date(now + resetSeconds * 1000)
      : null;

  return { limit, remaining, reset };
}

/**
 * Parses a non-negative integer header value.
 */
function parseIntHeader(value: string | null): number | null {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }

  const parsed = parseInt(trimmed, 10);
  if (parsed > Number.MAX_SAFE_INTEGER) {
    return null;
  }

  return parsed;
}
