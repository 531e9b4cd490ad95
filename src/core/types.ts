/**
 * Core type definitions for the Zendesk custom objects client
 */

import type { ZendeskApiError } from "./errors.js";

// ============================================================================
// Unified Response Shape
// ============================================================================

export interface NormalizedResponse {
  data: unknown;
  meta: ResponseMeta;
}

export interface ResponseMeta {
  requestId: string;
  status: number;
  /**
   * Zendesk rate limit window as reported by the response headers.
   * Null when the endpoint does not report one.
   */
  rateLimit: RateLimitInfo | null;
  pagination?: PaginationInfo;
}

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  reset: Date | null;
}

export interface PaginationInfo {
  hasNext: boolean;
  cursor?: string;
}

// ============================================================================
// Error Contract
// ============================================================================

/**
 * Canonical error categories. Every HTTP or network failure surfaced by the
 * client maps to exactly one of these.
 */
export type ZendeskErrorCategory =
  | "auth"        // 401 / 403
  | "not_found"   // 404
  | "rate_limit"  // 429
  | "network"     // timeouts, connection errors
  | "provider"    // 5xx and unreadable responses
  | "validation"; // other 4xx

// ============================================================================
// Request Types
// ============================================================================

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean;

export interface RequestOptions {
  method?: HttpMethod;
  headers?: Record<string, string>;
  /**
   * JSON-serializable payload, or raw bytes sent as `application/binary`.
   */
  body?: unknown;
  query?: Record<string, QueryValue>;
  /** Per-request timeout in milliseconds. */
  timeout?: number;
}

export interface RequestContext {
  endpoint: string;
  method: string;
  requestId: string;
  timestamp: Date;
  options: RequestOptions;
}

export interface ResponseContext {
  endpoint: string;
  method: string;
  requestId: string;
  statusCode: number;
  duration: number;
  timestamp: Date;
}

export interface ErrorContext {
  endpoint: string;
  method: string;
  requestId: string;
  error: ZendeskApiError;
  /** Error metadata after the observability sanitizer has run. */
  metadata?: Record<string, unknown>;
  duration: number;
  timestamp: Date;
}

// ============================================================================
// Authentication
// ============================================================================

/**
 * API token credentials. Zendesk authenticates them as HTTP basic auth with
 * the user `{email}/token`.
 */
export interface AuthConfig {
  email: string;
  apiToken: string;
}

// ============================================================================
// HTTP plumbing
// ============================================================================

export interface RawResponse {
  status: number;
  headers: Headers;
  body: unknown;
}

/**
 * Adapter input for building requests.
 */
export interface AdapterInput {
  endpoint: string;
  options: RequestOptions;
  auth: AuthConfig;
}

/**
 * Built request ready for HTTP execution.
 * Adapter builds this, but pipeline executes it.
 */
export interface BuiltRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string | Uint8Array;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Provider adapter: owns everything Zendesk-specific about a request.
 * The pipeline executes what the adapter builds and never inspects bodies.
 */
export interface ProviderAdapter {
  buildRequest(input: AdapterInput): BuiltRequest;
  parseResponse(raw: RawResponse, requestId: string): NormalizedResponse;
  /** Maps a non-2xx response. */
  parseHttpError(raw: RawResponse): ZendeskApiError;
  /** Maps anything thrown while the request was in flight. */
  parseError(error: unknown): ZendeskApiError;
  rateLimitPolicy(headers: Headers): RateLimitInfo | null;
  paginationStrategy(): PaginationStrategy;
}

// ============================================================================
// Pagination
// ============================================================================

export interface PaginationStrategy {
  extractCursor(response: RawResponse): string | null;
  hasNext(response: RawResponse): boolean;
  buildNextRequest(
    endpoint: string,
    options: RequestOptions,
    cursor: string
  ): { endpoint: string; options: RequestOptions };
}

// ============================================================================
// Observability
// ============================================================================

export interface Metric {
  name: string;
  value: number;
  tags: Record<string, string>;
  timestamp: Date;
}

export interface ObservabilityAdapter {
  logRequest(context: RequestContext): void;
  logResponse(context: ResponseContext): void;
  logError(context: ErrorContext): void;
  logInfo(message: string, metadata?: Record<string, unknown>): void;
  logWarning(message: string, metadata?: Record<string, unknown>): void;
  recordMetric(metric: Metric): void;
}

// ============================================================================
// Configuration
// ============================================================================

export interface ClientConfig {
  auth: AuthConfig;
  /** Account subdomain, e.g. "acme" for acme.zendesk.com. */
  subdomain?: string;
  /** Full API root; takes precedence over `subdomain`. */
  baseUrl?: string;
  /** Default request timeout in milliseconds (10000 when omitted). */
  timeout?: number;
  observability?: ObservabilityAdapter | ObservabilityAdapter[];
  sanitizer?: { redactedKeys?: string[] };
  fetch?: FetchLike;
}

export const SDK_VERSION = "0.1.0";

export const DEFAULT_TIMEOUT_MS = 10_000;
