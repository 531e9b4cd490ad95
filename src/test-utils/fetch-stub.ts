/**
 * In-process fetch replacement for tests. Routes are single-use and matched
 * in registration order; an unmatched request fails the test loudly.
 */

import type {
  FetchLike,
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "../core/types.js";
import { ZendeskClient } from "../client.js";

export const TEST_BASE_URL = "https://acme.zendesk.com/api/v2";

export interface StubResponse {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface RecordedCall {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: string | Uint8Array | undefined;
  /** The body parsed as JSON, when it was a JSON string. */
  json: unknown;
}

type RouteAction =
  | { kind: "respond"; response: StubResponse }
  | { kind: "fail"; error: Error }
  | { kind: "hang" };

interface Route {
  method: string;
  url: string;
  action: RouteAction;
}

export class FetchStub {
  readonly calls: RecordedCall[] = [];
  private routes: Route[] = [];

  /**
   * Registers a response. A URL without a query string matches any query.
   */
  on(method: string, url: string, response: StubResponse = {}): this {
    this.routes.push({ method, url, action: { kind: "respond", response } });
    return this;
  }

  fail(method: string, url: string, error: Error): this {
    this.routes.push({ method, url, action: { kind: "fail", error } });
    return this;
  }

  /** Never answers; rejects once the request is aborted. */
  hang(method: string, url: string): this {
    this.routes.push({ method, url, action: { kind: "hang" } });
    return this;
  }

  get pending(): number {
    return this.routes.length;
  }

  readonly fetch: FetchLike = async (url, init) => {
    const method = init.method ?? "GET";
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });

    const body = typeof init.body === "string" || init.body instanceof Uint8Array ? init.body : undefined;
    this.calls.push({
      method,
      url,
      headers,
      body,
      json: typeof body === "string" ? parseJson(body) : undefined,
    });

    const index = this.routes.findIndex((route) => route.method === method && matches(route.url, url));
    const route = this.routes[index];
    if (!route) {
      throw new Error(`Unexpected request: ${method} ${url}`);
    }
    this.routes.splice(index, 1);

    switch (route.action.kind) {
      case "fail":
        throw route.action.error;
      case "hang":
        return waitForAbort(init.signal);
      case "respond":
        return toResponse(route.action.response);
    }
  };
}

function matches(routeUrl: string, url: string): boolean {
  if (routeUrl.includes("?")) {
    return routeUrl === url;
  }
  return url.split("?")[0] === routeUrl;
}

function parseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

function toResponse(stub: StubResponse): Response {
  const status = stub.status ?? 200;
  if (status === 204 || stub.body === undefined) {
    return new Response(null, { status, headers: stub.headers ?? {} });
  }
  const isText = typeof stub.body === "string";
  return new Response(isText ? String(stub.body) : JSON.stringify(stub.body), {
    status,
    headers: {
      "content-type": isText ? "text/plain" : "application/json",
      ...stub.headers,
    },
  });
}

function waitForAbort(signal: AbortSignal | null | undefined): Promise<Response> {
  return new Promise((_resolve, reject) => {
    signal?.addEventListener("abort", () => {
      reject(new DOMException("This operation was aborted", "AbortError"));
    });
  });
}

/**
 * Observability adapter that keeps everything it receives.
 */
export class RecordingObservability implements ObservabilityAdapter {
  requests: RequestContext[] = [];
  responses: ResponseContext[] = [];
  errors: ErrorContext[] = [];
  infos: Array<{ message: string; metadata: Record<string, unknown> | undefined }> = [];
  warnings: Array<{ message: string; metadata: Record<string, unknown> | undefined }> = [];
  metrics: Metric[] = [];

  logRequest(context: RequestContext): void {
    this.requests.push(context);
  }

  logResponse(context: ResponseContext): void {
    this.responses.push(context);
  }

  logError(context: ErrorContext): void {
    this.errors.push(context);
  }

  logInfo(message: string, metadata?: Record<string, unknown>): void {
    this.infos.push({ message, metadata });
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    this.warnings.push({ message, metadata });
  }

  recordMetric(metric: Metric): void {
    this.metrics.push(metric);
  }
}

export function createTestClient(
  stub: FetchStub,
  observability: ObservabilityAdapter = new RecordingObservability()
): ZendeskClient {
  return new ZendeskClient({
    auth: { email: "agent@example.com", apiToken: "test-secret" },
    subdomain: "acme",
    fetch: stub.fetch,
    observability,
  });
}
