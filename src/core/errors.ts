import type { ZendeskErrorCategory } from "./types.js";
import { sanitizeErrorMetadata } from "./error-sanitizer.js";

export interface ZendeskApiErrorInit {
  category: ZendeskErrorCategory;
  /** Whether the same request may succeed later. Informational only. */
  retryable: boolean;
  status?: number;
  retryAfter?: Date;
  /** Zendesk's `details` object from the error body, when present. */
  details?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * The only error type the HTTP layer throws.
 *
 * Metadata is sanitized at construction, so an instance is always safe to log.
 */
export class ZendeskApiError extends Error {
  readonly category: ZendeskErrorCategory;
  readonly retryable: boolean;
  readonly status: number | undefined;
  readonly retryAfter: Date | undefined;
  readonly details: Record<string, unknown> | undefined;
  readonly metadata: Record<string, unknown> | undefined;

  constructor(message: string, init: ZendeskApiErrorInit) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = "ZendeskApiError";
    this.category = init.category;
    this.retryable = init.retryable;
    this.status = init.status;
    this.retryAfter = init.retryAfter;
    this.details = init.details;
    this.metadata = sanitizeErrorMetadata(init.metadata);
  }

  /**
   * Every `description` found under `details`, e.g.
   * `{ base: [{ description: "Name already exists. Try another one." }] }`.
   */
  detailDescriptions(): string[] {
    const descriptions: string[] = [];
    for (const entries of Object.values(this.details ?? {})) {
      if (!Array.isArray(entries)) {
        continue;
      }
      for (const entry of entries) {
        if (
          typeof entry === "object" &&
          entry !== null &&
          "description" in entry &&
          typeof entry.description === "string"
        ) {
          descriptions.push(entry.description);
        }
      }
    }
    return descriptions;
  }
}

/**
 * Thrown when client configuration (explicit or from the environment) is invalid.
 */
export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
    this.name = "ConfigurationError";
    this.problems = problems;
  }
}
