import type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "../core/types.js";

export interface ConsoleObservabilityConfig {
  pretty?: boolean;
}

/**
 * Writes one JSON object per event to stdout.
 */
export class ConsoleObservability implements ObservabilityAdapter {
  private config: ConsoleObservabilityConfig;

  constructor(config: ConsoleObservabilityConfig = {}) {
    this.config = config;
  }

  logRequest(context: RequestContext): void {
    this.output({
      level: "info",
      type: "request",
      endpoint: context.endpoint,
      method: context.method,
      requestId: context.requestId,
      timestamp: context.timestamp.toISOString(),
    });
  }

  logResponse(context: ResponseContext): void {
    this.output({
      level: "info",
      type: "response",
      endpoint: context.endpoint,
      method: context.method,
      requestId: context.requestId,
      statusCode: context.statusCode,
      duration: context.duration,
      timestamp: context.timestamp.toISOString(),
    });
  }

  logError(context: ErrorContext): void {
    this.output({
      level: "error",
      type: "error",
      endpoint: context.endpoint,
      method: context.method,
      requestId: context.requestId,
      error: {
        category: context.error.category,
        message: context.error.message,
        status: context.error.status,
        retryable: context.error.retryable,
        retryAfter: context.error.retryAfter?.toISOString(),
      },
      duration: context.duration,
      timestamp: context.timestamp.toISOString(),
    });
  }

  logInfo(message: string, metadata?: Record<string, unknown>): void {
    this.output({
      level: "info",
      type: "info",
      message,
      metadata,
      timestamp: new Date().toISOString(),
    });
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    this.output({
      level: "warn",
      type: "warning",
      message,
      metadata,
      timestamp: new Date().toISOString(),
    });
  }

  recordMetric(metric: Metric): void {
    this.output({
      level: "info",
      type: "metric",
      name: metric.name,
      value: metric.value,
      tags: metric.tags,
      timestamp: metric.timestamp.toISOString(),
    });
  }

  private output(data: Record<string, unknown>): void {
    if (this.config.pretty) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      console.log(JSON.stringify(data));
    }
  }
}
