import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ZendeskClient, MAX_PAGES } from "./client.js";
import { ConfigurationError, ZendeskApiError } from "./core/errors.js";
import type { ObservabilityAdapter } from "./core/types.js";
import {
  FetchStub,
  RecordingObservability,
  TEST_BASE_URL,
  createTestClient,
} from "./test-utils/fetch-stub.js";

const RECORDS_URL = `${TEST_BASE_URL}/custom_objects/book/records`;

describe("ZendeskClient configuration", () => {
  it("lists every problem of an invalid configuration", () => {
    let thrown: unknown;
    try {
      new ZendeskClient({ auth: { email: " ", apiToken: "" }, timeout: 0 });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigurationError);
    expect(thrown instanceof ConfigurationError && thrown.problems).toEqual([
      "auth.email is required",
      "auth.apiToken is required",
      "subdomain is required unless baseUrl is set",
      "timeout must be positive",
    ]);
  });

  it("rejects a base URL that is not http(s)", () => {
    expect(
      () =>
        new ZendeskClient({
          auth: { email: "agent@example.com", apiToken: "test-secret" },
          baseUrl: "ftp://acme",
        })
    ).toThrow("Invalid configuration:\n  - baseUrl must be an http(s) URL");
  });

  it("prefers an explicit base URL over the subdomain", () => {
    const client = new ZendeskClient({
      auth: { email: "agent@example.com", apiToken: "test-secret" },
      subdomain: "acme",
      baseUrl: "http://localhost:8080/api/v2",
    });
    expect(client.baseUrl).toBe("http://localhost:8080/api/v2");
  });

  it("builds a client from environment variables", () => {
    const client = ZendeskClient.fromEnv(
      {},
      { ZENDESK_SUBDOMAIN: "acme", ZENDESK_EMAIL: "agent@example.com", ZENDESK_API_TOKEN: "test-secret" }
    );
    expect(client.baseUrl).toBe(TEST_BASE_URL);
  });
});

describe("ZendeskClient requests", () => {
  let stub: FetchStub;
  let obs: RecordingObservability;
  let client: ZendeskClient;

  beforeEach(() => {
    stub = new FetchStub();
    obs = new RecordingObservability();
    client = createTestClient(stub, obs);
  });

  it("returns parsed JSON with response metadata", async () => {
    stub.on("GET", `${TEST_BASE_URL}/custom_objects`, {
      body: { custom_objects: [] },
      headers: { "X-Rate-Limit": "700", "X-Rate-Limit-Remaining": "650" },
    });

    const response = await client.get("/custom_objects");

    expect(response.data).toEqual({ custom_objects: [] });
    expect(response.meta.status).toBe(200);
    expect(response.meta.rateLimit).toEqual({ limit: 700, remaining: 650, reset: null });
    expect(response.meta.requestId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("returns null data for 204 No Content", async () => {
    stub.on("DELETE", `${RECORDS_URL}/1`, { status: 204 });
    const response = await client.delete("/custom_objects/book/records/1");
    expect(response.data).toBeNull();
    expect(response.meta.status).toBe(204);
  });

  it("sends the method and JSON body", async () => {
    stub.on("PATCH", `${RECORDS_URL}/1`, { body: {} });
    await client.patch("/custom_objects/book/records/1", { body: { custom_object_record: { name: "Dune" } } });

    const [call] = stub.calls;
    expect(call?.method).toBe("PATCH");
    expect(call?.json).toEqual({ custom_object_record: { name: "Dune" } });
    expect(call?.headers["content-type"]).toBe("application/json");
  });

  it("throws ZendeskApiError for error statuses and observes it", async () => {
    stub.on("GET", `${RECORDS_URL}/missing`, { status: 404, body: { error: "RecordNotFound" } });

    await expect(client.get("/custom_objects/book/records/missing")).rejects.toMatchObject({
      name: "ZendeskApiError",
      category: "not_found",
      status: 404,
      message: "RecordNotFound",
    });

    expect(obs.errors).toHaveLength(1);
    expect(obs.errors[0]?.error.category).toBe("not_found");
    const errorMetric = obs.metrics.find((metric) => metric.name === "zendesk.request.error");
    expect(errorMetric?.tags).toEqual({
      endpoint: "/custom_objects/book/records/missing",
      method: "GET",
      errorCategory: "not_found",
    });
  });

  it("maps thrown fetch errors to network errors", async () => {
    stub.fail("GET", `${TEST_BASE_URL}/custom_objects`, new TypeError("fetch failed"));

    await expect(client.get("/custom_objects")).rejects.toMatchObject({
      category: "network",
      message: "Network request failed.",
    });
  });

  it("times out with a network error", async () => {
    stub.hang("GET", `${TEST_BASE_URL}/custom_objects`);

    const error = await client.get("/custom_objects", { timeout: 20 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ZendeskApiError);
    expect(error instanceof ZendeskApiError && error.message).toBe("Request timeout after 20ms");
    expect(error instanceof ZendeskApiError && error.category).toBe("network");
  });

  it("records count and duration metrics for successful requests", async () => {
    stub.on("GET", `${TEST_BASE_URL}/custom_objects`, { body: { custom_objects: [] } });
    await client.get("/custom_objects");

    expect(obs.metrics.map((metric) => metric.name)).toEqual([
      "zendesk.request.count",
      "zendesk.request.duration",
    ]);
    expect(obs.metrics[0]?.tags).toEqual({ endpoint: "/custom_objects", method: "GET", status: "200" });
    expect(obs.responses[0]?.statusCode).toBe(200);
  });

  it("redacts secrets and bodies from request logs", async () => {
    stub.on("POST", `${TEST_BASE_URL}/custom_objects`, { body: {} });
    await client.post("/custom_objects", {
      headers: { "X-Api-Key": "test-secret", "X-Trace": "abc" },
      query: { access_token: "test-secret", locale: "en" },
      body: { custom_object: { key: "book" } },
    });

    expect(obs.requests[0]?.options).toEqual({
      method: "POST",
      headers: { "X-Api-Key": "[REDACTED]", "X-Trace": "abc" },
      query: { access_token: "[REDACTED]", locale: "en" },
      body: "[REDACTED]",
    });
  });

  it("keeps requests working when an observability adapter throws", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    class BrokenObservability extends RecordingObservability {
      override logRequest(): void {
        throw new Error("sink unavailable");
      }
    }
    const adapters: ObservabilityAdapter[] = [new BrokenObservability(), obs];
    client = new ZendeskClient({
      auth: { email: "agent@example.com", apiToken: "test-secret" },
      subdomain: "acme",
      fetch: stub.fetch,
      observability: adapters,
    });
    stub.on("GET", `${TEST_BASE_URL}/custom_objects`, { body: { custom_objects: [] } });

    const response = await client.get("/custom_objects");

    expect(response.meta.status).toBe(200);
    expect(obs.requests).toHaveLength(1);
    expect(consoleError).toHaveBeenCalledWith(
      "[zendesk-custom-objects] Observability failure in logRequest (1/2 adapters failed):\n  - BrokenObservability: sink unavailable"
    );
    consoleError.mockRestore();
  });
});

describe("ZendeskClient.paginate", () => {
  let stub: FetchStub;
  let obs: RecordingObservability;
  let client: ZendeskClient;

  beforeEach(() => {
    stub = new FetchStub();
    obs = new RecordingObservability();
    client = createTestClient(stub, obs);
  });

  afterEach(() => {
    expect(stub.pending).toBe(0);
  });

  it("follows after_cursor until has_more is false", async () => {
    stub
      .on("GET", RECORDS_URL, {
        body: { custom_object_records: [{ id: "1" }], meta: { has_more: true, after_cursor: "c1" } },
      })
      .on("GET", RECORDS_URL, {
        body: { custom_object_records: [{ id: "2" }], meta: { has_more: false, after_cursor: null } },
      });

    const pages: unknown[] = [];
    for await (const page of client.paginate("/custom_objects/book/records", { query: { "page[size]": 100 } })) {
      pages.push(page.data);
    }

    expect(pages).toHaveLength(2);
    expect(stub.calls.map((call) => call.url)).toEqual([
      `${RECORDS_URL}?page%5Bsize%5D=100`,
      `${RECORDS_URL}?page%5Bsize%5D=100&page%5Bafter%5D=c1`,
    ]);
  });

  it("keeps the method and body of POST searches", async () => {
    const searchUrl = `${RECORDS_URL}/search`;
    stub
      .on("POST", searchUrl, { body: { custom_object_records: [], meta: { has_more: true, after_cursor: "c1" } } })
      .on("POST", searchUrl, { body: { custom_object_records: [], meta: { has_more: false } } });

    let pages = 0;
    for await (const _page of client.paginate("/custom_objects/book/records/search", {
      method: "POST",
      body: { filter: { name: { $eq: "Dune" } } },
    })) {
      pages++;
    }

    expect(pages).toBe(2);
    expect(stub.calls[1]?.method).toBe("POST");
    expect(stub.calls[1]?.url).toBe(`${searchUrl}?page%5Bafter%5D=c1`);
    expect(stub.calls[1]?.json).toEqual({ filter: { name: { $eq: "Dune" } } });
  });

  it("throws when a cursor repeats", async () => {
    const page = { body: { meta: { has_more: true, after_cursor: "loop" } } };
    stub.on("GET", RECORDS_URL, page).on("GET", RECORDS_URL, page);

    const walk = async () => {
      for await (const _page of client.paginate("/custom_objects/book/records")) {
        // drain
      }
    };

    await expect(walk()).rejects.toMatchObject({
      name: "ZendeskApiError",
      category: "provider",
      retryable: false,
      message: 'Pagination cycle detected: cursor "loop" was encountered twice. Stopping at page 2.',
    });
  });

  it(`stops after ${MAX_PAGES} pages with a warning`, async () => {
    for (let i = 0; i < MAX_PAGES; i++) {
      stub.on("GET", RECORDS_URL, { body: { meta: { has_more: true, after_cursor: `c${i}` } } });
    }

    let pages = 0;
    for await (const _page of client.paginate("/custom_objects/book/records")) {
      pages++;
    }

    expect(pages).toBe(MAX_PAGES);
    expect(obs.warnings).toEqual([
      {
        message: `Pagination limit reached: ${MAX_PAGES} pages. Remaining pages were not fetched.`,
        metadata: { endpoint: "/custom_objects/book/records" },
      },
    ]);
  });
});
