import type { z } from "zod";
import { ZendeskApiError } from "./errors.js";

/**
 * Validates a response body against the shape the caller relies on.
 * A mismatch is a provider error: Zendesk answered 2xx with something else.
 */
export function expectPayload<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  what: string
): z.output<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ZendeskApiError(`Unexpected response shape for ${what}.`, {
      category: "provider",
      retryable: false,
      metadata: {
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      },
    });
  }
  return parsed.data;
}
