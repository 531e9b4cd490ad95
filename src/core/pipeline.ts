/**
 * Main request pipeline
 * Flow: build → fetch (with timeout) → parse response | map error → observe
 *
 * No retry, throttling or circuit breaking: a failure is mapped once and
 * thrown to the caller.
 */

import type {
  ProviderAdapter,
  RequestOptions,
  NormalizedResponse,
  RequestContext,
  ResponseContext,
  ErrorContext,
  RawResponse,
  AuthConfig,
  FetchLike,
} from "./types.js";
import { DEFAULT_TIMEOUT_MS } from "./types.js";
import { ZendeskApiError } from "./errors.js";
import { sanitizeMetric, sanitizeRecord } from "./observability-sanitizer.js";
import { sanitizeRequestOptions, type SanitizerOptions } from "./request-sanitizer.js";
import type { ObservabilityBroadcaster } from "../observability/broadcaster.js";
import { randomUUID } from "crypto";

export interface PipelineConfig {
  adapter: ProviderAdapter;
  auth: AuthConfig;
  observability: ObservabilityBroadcaster;
  timeout: number | undefined;
  fetch: FetchLike | undefined;
  sanitizerOptions?: SanitizerOptions;
}

export class RequestPipeline {
  private config: PipelineConfig;

  constructor(config: PipelineConfig) {
    this.config = config;
  }

  async execute(endpoint: string, options: RequestOptions = {}): Promise<NormalizedResponse> {
    const requestId = randomUUID();
    const method = options.method ?? "GET";
    const startTime = Date.now();
    const observability = this.config.observability;
    const sanitizerOptions = this.config.sanitizerOptions;

    const requestContext: RequestContext = {
      endpoint,
      method,
      requestId,
      timestamp: new Date(),
      options: sanitizeRequestOptions(options, sanitizerOptions),
    };
    observability.broadcast((obs) => obs.logRequest(requestContext), "logRequest");

    try {
      const raw = await this.executeHttpRequest(endpoint, options);
      if (raw.status >= 400) {
        throw this.config.adapter.parseHttpError(raw);
      }

      const normalized = this.config.adapter.parseResponse(raw, requestId);
      const duration = Date.now() - startTime;

      const responseContext: ResponseContext = {
        endpoint,
        method,
        requestId,
        statusCode: raw.status,
        duration,
        timestamp: new Date(),
      };
      observability.broadcast((obs) => obs.logResponse(responseContext), "logResponse");

      observability.broadcast(
        (obs) =>
          obs.recordMetric(
            sanitizeMetric(
              {
                name: "zendesk.request.count",
                value: 1,
                tags: { endpoint, method, status: String(raw.status) },
                timestamp: new Date(),
              },
              sanitizerOptions
            )
          ),
        "recordMetric:request.count"
      );

      observability.broadcast(
        (obs) =>
          obs.recordMetric(
            sanitizeMetric(
              {
                name: "zendesk.request.duration",
                value: duration,
                tags: { endpoint, method },
                timestamp: new Date(),
              },
              sanitizerOptions
            )
          ),
        "recordMetric:request.duration"
      );

      return normalized;
    } catch (error) {
      const duration = Date.now() - startTime;

      // The adapter is the only place errors are mapped
      const apiError =
        error instanceof ZendeskApiError ? error : this.config.adapter.parseError(error);

      const errorContext: ErrorContext = {
        endpoint,
        method,
        requestId,
        error: apiError,
        duration,
        timestamp: new Date(),
      };
      if (apiError.metadata) {
        errorContext.metadata = sanitizeRecord(apiError.metadata, sanitizerOptions);
      }
      observability.broadcast((obs) => obs.logError(errorContext), "logError");

      observability.broadcast(
        (obs) =>
          obs.recordMetric(
            sanitizeMetric(
              {
                name: "zendesk.request.error",
                value: 1,
                tags: { endpoint, method, errorCategory: apiError.category },
                timestamp: new Date(),
              },
              sanitizerOptions
            )
          ),
        "recordMetric:request.error"
      );

      throw apiError;
    }
  }

  /**
   * Executes the adapter-built request. This is the only place HTTP happens.
   * Error statuses are returned, not thrown; the caller maps them.
   */
  private async executeHttpRequest(
    endpoint: string,
    options: RequestOptions
  ): Promise<RawResponse> {
    const timeout = options.timeout ?? this.config.timeout ?? DEFAULT_TIMEOUT_MS;
    const doFetch = this.config.fetch ?? fetch;

    const builtRequest = this.config.adapter.buildRequest({
      endpoint,
      options,
      auth: this.config.auth,
    });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    const init: RequestInit = {
      method: builtRequest.method,
      headers: builtRequest.headers,
      signal: controller.signal,
    };
    if (builtRequest.body !== undefined) {
      init.body = builtRequest.body;
    }

    try {
      const response = await doFetch(builtRequest.url, init);
      const body = response.status === 204 ? null : await readBody(response);

      return {
        status: response.status,
        headers: response.headers,
        body,
      };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new ZendeskApiError(`Request timeout after ${timeout}ms`, {
          category: "network",
          retryable: true,
          metadata: {
            timeout,
            url: builtRequest.url,
            method: builtRequest.method,
          },
          cause: error,
        });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * JSON when the body parses as JSON, the raw text otherwise, null when empty.
 */
async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text === "") {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}
