/**
 * Zendesk provider adapter
 *
 * Key normalizations:
 * - API token basic auth (`{email}/token:{apiToken}`)
 * - JSON or binary request bodies
 * - Rate limits from X-Rate-Limit / ratelimit-* headers
 * - Cursor pagination from `meta.has_more` / `meta.after_cursor`
 * - Maps all failures to ZendeskApiError categories
 */

import { z } from "zod";
import type {
  ProviderAdapter,
  AdapterInput,
  BuiltRequest,
  RawResponse,
  NormalizedResponse,
  RateLimitInfo,
  PaginationStrategy,
  ZendeskErrorCategory,
} from "../../core/types.js";
import { SDK_VERSION } from "../../core/types.js";
import { ZendeskApiError } from "../../core/errors.js";
import { ResponseNormalizer } from "../../core/normalizer.js";
import { parseRateLimitHeaders, parseRetryAfter } from "../../core/header-parser.js";
import { ZendeskCursorPaginationStrategy } from "./pagination.js";

/**
 * Zendesk error bodies come in two shapes:
 * `{ error, description, details }` (classic) and `{ errors: [{ title, detail }] }`.
 * This is provider-specific and does not leak outside this adapter.
 */
const ZendeskErrorBodySchema = z.object({
  error: z
    .union([z.string(), z.object({ title: z.string().optional(), message: z.string().optional() })])
    .optional()
    .catch(undefined),
  description: z.string().optional().catch(undefined),
  details: z.record(z.string(), z.unknown()).optional().catch(undefined),
  errors: z
    .array(
      z.object({
        code: z.string().optional(),
        title: z.string().optional(),
        detail: z.string().optional(),
      })
    )
    .optional()
    .catch(undefined),
});

type ZendeskErrorBody = z.infer<typeof ZendeskErrorBodySchema>;

const NETWORK_ERROR_HINTS = ["fetch", "network", "econnreset", "econnrefused", "etimedout", "enotfound", "socket"];

export function zendeskBaseUrl(subdomain: string): string {
  return `https://${subdomain}.zendesk.com/api/v2`;
}

export class ZendeskAdapter implements ProviderAdapter {
  private baseUrl: string;
  private pagination = new ZendeskCursorPaginationStrategy();

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  /**
   * Builds the request but does not execute it.
   */
  buildRequest(input: AdapterInput): BuiltRequest {
    const { endpoint, options, auth } = input;
    const method = options.method ?? "GET";

    let url = /^https?:\/\//.test(endpoint)
      ? endpoint
      : `${this.baseUrl}${endpoint.startsWith("/") ? "" : "/"}${endpoint}`;

    if (options.query && Object.keys(options.query).length > 0) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(options.query)) {
        params.append(key, String(value));
      }
      url += `${url.includes("?") ? "&" : "?"}${params.toString()}`;
    }

    const credentials = Buffer.from(`${auth.email}/token:${auth.apiToken}`).toString("base64");
    const headers: Record<string, string> = {
      Accept: "application/json",
      "User-Agent": `zendesk-custom-objects/${SDK_VERSION}`,
      ...options.headers,
      Authorization: `Basic ${credentials}`,
    };

    const built: BuiltRequest = { url, method, headers };

    if (options.body instanceof Uint8Array) {
      built.body = options.body;
      headers["Content-Type"] = "application/binary";
    } else if (options.body !== undefined && method !== "GET") {
      built.body = JSON.stringify(options.body);
      headers["Content-Type"] = "application/json";
    }

    return built;
  }

  parseResponse(raw: RawResponse, requestId: string): NormalizedResponse {
    return ResponseNormalizer.normalize(
      raw,
      requestId,
      this.rateLimitPolicy(raw.headers),
      ResponseNormalizer.extractPaginationInfo(raw, this.pagination)
    );
  }

  /**
   * Maps a non-2xx response:
   * - 401 / 403 → auth
   * - 404 → not_found
   * - 429 → rate_limit (Retry-After parsed)
   * - 5xx → provider
   * - other 4xx → validation
   */
  parseHttpError(raw: RawResponse): ZendeskApiError {
    const status = raw.status;
    const parsed = ZendeskErrorBodySchema.safeParse(raw.body);
    const body: ZendeskErrorBody = parsed.success ? parsed.data : {};
    const providerMessage = extractMessage(body, raw.body);

    let category: ZendeskErrorCategory;
    let retryable = false;
    let fallback: string;
    let retryAfter: Date | undefined;

    if (status === 401 || status === 403) {
      category = "auth";
      fallback =
        status === 401
          ? "Authentication failed. Check the email and API token."
          : "Permission denied for this resource.";
    } else if (status === 404) {
      category = "not_found";
      fallback = "Resource not found.";
    } else if (status === 429) {
      category = "rate_limit";
      retryable = true;
      fallback = "Rate limit exceeded.";
      retryAfter = parseRetryAfter(raw.headers.get("Retry-After")) ?? undefined;
    } else if (status >= 500) {
      category = "provider";
      retryable = true;
      fallback = `Zendesk API returned error ${status}.`;
    } else {
      category = "validation";
      fallback = `Request failed with status ${status}.`;
    }

    return new ZendeskApiError(providerMessage ?? fallback, {
      category,
      retryable,
      status,
      ...(retryAfter ? { retryAfter } : {}),
      ...(body.details ? { details: body.details } : {}),
      metadata: {
        status,
        zendeskError: typeof body.error === "string" ? body.error : body.error?.title,
        errors: body.errors,
      },
    });
  }

  /**
   * Maps anything thrown before a response arrived.
   */
  parseError(error: unknown): ZendeskApiError {
    if (error instanceof ZendeskApiError) {
      return error;
    }

    if (error instanceof Error) {
      const causeMessage = error.cause instanceof Error ? error.cause.message : "";
      const text = `${error.name} ${error.message} ${causeMessage}`.toLowerCase();
      if (error instanceof TypeError || NETWORK_ERROR_HINTS.some((hint) => text.includes(hint))) {
        return new ZendeskApiError("Network request failed.", {
          category: "network",
          retryable: true,
          metadata: { originalError: error.message },
          cause: error,
        });
      }

      return new ZendeskApiError(error.message, {
        category: "provider",
        retryable: false,
        cause: error,
      });
    }

    return new ZendeskApiError("An unexpected error occurred.", {
      category: "provider",
      retryable: false,
      metadata: { raw: String(error) },
    });
  }

  rateLimitPolicy(headers: Headers): RateLimitInfo | null {
    return parseRateLimitHeaders(headers);
  }

  paginationStrategy(): PaginationStrategy {
    return this.pagination;
  }
}

function extractMessage(body: ZendeskErrorBody, rawBody: unknown): string | undefined {
  if (body.description) {
    return body.description;
  }
  if (typeof body.error === "string") {
    return body.error;
  }
  if (body.error) {
    const message = body.error.message ?? body.error.title;
    if (message) {
      return message;
    }
  }
  const first = body.errors?.[0];
  if (first) {
    const message = first.detail ?? first.title;
    if (message) {
      return message;
    }
  }
  if (typeof rawBody === "string" && rawBody.trim() !== "" && rawBody.length <= 500) {
    return rawBody.trim();
  }
  return undefined;
}
