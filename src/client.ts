/**
 * Zendesk HTTP client
 */

import type {
  ClientConfig,
  HttpMethod,
  NormalizedResponse,
  ObservabilityAdapter,
  RequestOptions,
} from "./core/types.js";
import { ConfigurationError, ZendeskApiError } from "./core/errors.js";
import { RequestPipeline } from "./core/pipeline.js";
import { ZendeskAdapter, zendeskBaseUrl } from "./providers/zendesk/adapter.js";
import { ConsoleObservability } from "./observability/console.js";
import { ObservabilityBroadcaster } from "./observability/broadcaster.js";
import { loadConfig, type Environment } from "./config/env.js";

/** Maximum pages walked by one paginate() call. */
export const MAX_PAGES = 1000;

/**
 * The request surface the record and schema managers depend on.
 */
export interface ZendeskHttpClient {
  get(endpoint: string, options?: RequestOptions): Promise<NormalizedResponse>;
  post(endpoint: string, options?: RequestOptions): Promise<NormalizedResponse>;
  put(endpoint: string, options?: RequestOptions): Promise<NormalizedResponse>;
  patch(endpoint: string, options?: RequestOptions): Promise<NormalizedResponse>;
  delete(endpoint: string, options?: RequestOptions): Promise<NormalizedResponse>;
  paginate(endpoint: string, options?: RequestOptions): AsyncGenerator<NormalizedResponse>;
  logInfo(message: string, metadata?: Record<string, unknown>): void;
  logWarning(message: string, metadata?: Record<string, unknown>): void;
}

export class ZendeskClient implements ZendeskHttpClient {
  readonly baseUrl: string;
  private adapter: ZendeskAdapter;
  private pipeline: RequestPipeline;
  private observability: ObservabilityBroadcaster;

  constructor(config: ClientConfig) {
    this.validateConfig(config);

    this.baseUrl = config.baseUrl ?? zendeskBaseUrl(config.subdomain ?? "");
    this.adapter = new ZendeskAdapter(this.baseUrl);

    let adapters: ObservabilityAdapter[];
    if (Array.isArray(config.observability)) {
      adapters = config.observability;
    } else if (config.observability) {
      adapters = [config.observability];
    } else {
      adapters = [new ConsoleObservability()];
    }
    this.observability = new ObservabilityBroadcaster(adapters);

    this.pipeline = new RequestPipeline({
      adapter: this.adapter,
      auth: config.auth,
      observability: this.observability,
      timeout: config.timeout,
      fetch: config.fetch,
      ...(config.sanitizer ? { sanitizerOptions: config.sanitizer } : {}),
    });
  }

  /**
   * Client configured from `ZENDESK_*` environment variables (and `.env`).
   * Options other than credentials and endpoint may be layered on top.
   */
  static fromEnv(
    overrides: Omit<ClientConfig, "auth" | "subdomain" | "baseUrl"> = {},
    env?: Environment
  ): ZendeskClient {
    return new ZendeskClient({ ...loadConfig(env), ...overrides });
  }

  private validateConfig(config: ClientConfig): void {
    const errors: string[] = [];

    if (!config.auth.email.trim()) {
      errors.push("auth.email is required");
    }
    if (!config.auth.apiToken.trim()) {
      errors.push("auth.apiToken is required");
    }

    if (config.baseUrl !== undefined) {
      if (!/^https?:\/\/\S+$/.test(config.baseUrl)) {
        errors.push("baseUrl must be an http(s) URL");
      }
    } else if (!config.subdomain?.trim()) {
      errors.push("subdomain is required unless baseUrl is set");
    }

    if (config.timeout !== undefined && (!Number.isFinite(config.timeout) || config.timeout <= 0)) {
      errors.push("timeout must be positive");
    }

    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }
  }

  private request(
    method: HttpMethod,
    endpoint: string,
    options: RequestOptions = {}
  ): Promise<NormalizedResponse> {
    return this.pipeline.execute(endpoint, { ...options, method });
  }

  get(endpoint: string, options?: RequestOptions): Promise<NormalizedResponse> {
    return this.request("GET", endpoint, options);
  }

  post(endpoint: string, options?: RequestOptions): Promise<NormalizedResponse> {
    return this.request("POST", endpoint, options);
  }

  put(endpoint: string, options?: RequestOptions): Promise<NormalizedResponse> {
    return this.request("PUT", endpoint, options);
  }

  patch(endpoint: string, options?: RequestOptions): Promise<NormalizedResponse> {
    return this.request("PATCH", endpoint, options);
  }

  delete(endpoint: string, options?: RequestOptions): Promise<NormalizedResponse> {
    return this.request("DELETE", endpoint, options);
  }

  /**
   * Walks cursor pages, yielding each response as it arrives.
   *
   * The method of `options` is kept for every page, so the POST search
   * endpoint paginates the same way as GET listings.
   */
  async *paginate(
    endpoint: string,
    options: RequestOptions = {}
  ): AsyncGenerator<NormalizedResponse> {
    const paginationStrategy = this.adapter.paginationStrategy();
    let currentEndpoint = endpoint;
    let currentOptions: RequestOptions = { ...options, method: options.method ?? "GET" };
    let hasNext = true;
    let pageCount = 0;
    const seenCursors = new Set<string>();

    while (hasNext && pageCount < MAX_PAGES) {
      const response = await this.pipeline.execute(currentEndpoint, currentOptions);
      pageCount++;

      yield response;

      hasNext = response.meta.pagination?.hasNext ?? false;
      const cursor = response.meta.pagination?.cursor;

      if (hasNext && cursor) {
        if (seenCursors.has(cursor)) {
          throw new ZendeskApiError(
            `Pagination cycle detected: cursor "${cursor}" was encountered twice. ` +
              `Stopping at page ${pageCount}.`,
            { category: "provider", retryable: false, metadata: { endpoint, cursor } }
          );
        }
        seenCursors.add(cursor);

        const next = paginationStrategy.buildNextRequest(currentEndpoint, currentOptions, cursor);
        currentEndpoint = next.endpoint;
        currentOptions = next.options;
      }
    }

    if (hasNext && pageCount >= MAX_PAGES) {
      this.logWarning(`Pagination limit reached: ${MAX_PAGES} pages. Remaining pages were not fetched.`, {
        endpoint,
      });
    }
  }

  logInfo(message: string, metadata?: Record<string, unknown>): void {
    this.observability.logInfo(message, metadata);
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    this.observability.logWarning(message, metadata);
  }
}
