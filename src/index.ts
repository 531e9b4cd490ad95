/**
 * zendesk-custom-objects - Main entry point
 *
 * Everything in the public surface, plus the building blocks for custom
 * transports and adapters.
 */

export * from "./public.js";

export { RequestPipeline } from "./core/pipeline.js";
export type { PipelineConfig } from "./core/pipeline.js";
export { ResponseNormalizer } from "./core/normalizer.js";
export { expectPayload } from "./core/payload.js";
export { parseRateLimitHeaders, parseRetryAfter } from "./core/header-parser.js";
export { sanitizeRequestOptions, DEFAULT_REDACTED_KEYS } from "./core/request-sanitizer.js";
export type { SanitizerOptions } from "./core/request-sanitizer.js";
export { SDK_VERSION, DEFAULT_TIMEOUT_MS } from "./core/types.js";
export type {
  ProviderAdapter,
  PaginationStrategy,
  AdapterInput,
  BuiltRequest,
  RawResponse,
} from "./core/types.js";

export { ZendeskAdapter, zendeskBaseUrl } from "./providers/zendesk/adapter.js";
export { ZendeskCursorPaginationStrategy } from "./providers/zendesk/pagination.js";
export { ObservabilityBroadcaster } from "./observability/broadcaster.js";
export { DriftDetector } from "./schema/drift-detector.js";
export type { RemoteFieldSummary } from "./schema/drift-detector.js";
export { buildFilter, buildSort } from "./orm/query.js";
