import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { defineCustomObject } from "./model.js";
import { DateTimeField, DropdownField, IntegerField, TextField } from "./fields.js";
import {
  BadRequestError,
  MultipleRecordsReturnedError,
  RecordNotFoundError,
} from "./errors.js";
import { ZendeskApiError } from "../core/errors.js";
import { FetchStub, TEST_BASE_URL, createTestClient } from "../test-utils/fetch-stub.js";

const RECORDS_URL = `${TEST_BASE_URL}/custom_objects/book/records`;
const SEARCH_URL = `${RECORDS_URL}/search`;

function payload(id: string, name: string, fields: Record<string, unknown> = {}) {
  return {
    id,
    name,
    external_id: null,
    created_at: "2024-03-01T10:00:00Z",
    updated_at: "2024-03-01T10:00:00Z",
    created_by_user_id: "7",
    updated_by_user_id: "7",
    custom_object_fields: fields,
  };
}

describe("RecordManager", () => {
  let stub: FetchStub;
  let Book: ReturnType<typeof defineBook>;

  function defineBook(fetchStub: FetchStub) {
    return defineCustomObject(
      {
        title: "Book",
        fields: {
          summary: new TextField(),
          pages: new IntegerField(),
          genre: new DropdownField({ choices: ["Science fiction", "Poetry"] }),
          releasedAt: new DateTimeField({ key: "released_at" }),
        },
      },
      { client: createTestClient(fetchStub) }
    );
  }

  beforeEach(() => {
    stub = new FetchStub();
    Book = defineBook(stub);
  });

  afterEach(() => {
    expect(stub.pending).toBe(0);
  });

  it("creates a record", async () => {
    stub.on("POST", RECORDS_URL, {
      status: 201,
      body: { custom_object_record: payload("1", "Dune", { pages: 412 }) },
    });

    const book = await Book.objects.create({ name: "Dune", pages: 412 });

    expect(book.id).toBe("1");
    expect(book.get("pages")).toBe(412);
  });

  it("gets a record by id and decodes every field", async () => {
    stub.on("GET", `${RECORDS_URL}/1`, {
      body: {
        custom_object_record: payload("1", "Dune", {
          summary: "Spice",
          pages: "412",
          genre: "science_fiction",
          released_at: "1965-08-01",
          released_at_time: "09:30:00.000+00:00",
        }),
      },
    });

    const book = await Book.objects.get({ id: 1 });

    expect(book.name).toBe("Dune");
    expect(book.values).toEqual({
      summary: "Spice",
      pages: 412,
      genre: "science_fiction",
      releasedAt: new Date("1965-08-01T09:30:00.000Z"),
    });
  });

  it("maps 404 and 400 on get by id", async () => {
    stub
      .on("GET", `${RECORDS_URL}/missing`, { status: 404, body: { error: "RecordNotFound" } })
      .on("GET", `${RECORDS_URL}/bad-id`, { status: 400, body: { description: "Invalid id" } });

    await expect(Book.objects.get({ id: "missing" })).rejects.toThrow(
      new RecordNotFoundError("Book", "missing")
    );
    await expect(Book.objects.get({ id: "bad-id" })).rejects.toThrow(new BadRequestError("Invalid id"));
  });

  it("rethrows other failures on get by id", async () => {
    stub.on("GET", `${RECORDS_URL}/1`, { status: 503 });
    await expect(Book.objects.get({ id: "1" })).rejects.toBeInstanceOf(ZendeskApiError);
  });

  it("gets exactly one record by criteria", async () => {
    stub
      .on("POST", SEARCH_URL, { body: { custom_object_records: [payload("1", "Dune")], meta: { has_more: false } } })
      .on("POST", SEARCH_URL, { body: { custom_object_records: [], meta: { has_more: false } } })
      .on("POST", SEARCH_URL, {
        body: { custom_object_records: [payload("1", "Dune"), payload("2", "Dune")], meta: { has_more: false } },
      });

    const book = await Book.objects.get({ name: "Dune" });
    expect(book.id).toBe("1");
    expect(stub.calls[0]?.json).toEqual({ filter: { name: { $eq: "Dune" } } });

    await expect(Book.objects.get({ name: "Emma" })).rejects.toThrow(
      new RecordNotFoundError("Book")
    );
    await expect(Book.objects.get({ name: "Dune" })).rejects.toBeInstanceOf(MultipleRecordsReturnedError);
  });

  it("lists every page of records", async () => {
    stub
      .on("GET", RECORDS_URL, {
        body: { custom_object_records: [payload("1", "Dune")], meta: { has_more: true, after_cursor: "c1" } },
      })
      .on("GET", RECORDS_URL, {
        body: { custom_object_records: [payload("2", "Emma")], meta: { has_more: false } },
      });

    const books = await Book.objects.all({ orderBy: "-pages" });

    expect(books.map((book) => book.name)).toEqual(["Dune", "Emma"]);
    expect(stub.calls.map((call) => call.url)).toEqual([
      `${RECORDS_URL}?page%5Bsize%5D=100&sort=-custom_object_fields.pages`,
      `${RECORDS_URL}?page%5Bsize%5D=100&sort=-custom_object_fields.pages&page%5Bafter%5D=c1`,
    ]);
  });

  it("filters through the search endpoint", async () => {
    stub.on("POST", SEARCH_URL, {
      body: { custom_object_records: [payload("1", "Dune", { pages: 412 })], meta: { has_more: false } },
    });

    const books = await Book.objects.filter({ pages: { $gte: 300 }, genre: "science_fiction" });

    expect(books).toHaveLength(1);
    expect(stub.calls[0]?.url).toBe(`${SEARCH_URL}?page%5Bsize%5D=100`);
    expect(stub.calls[0]?.json).toEqual({
      filter: {
        $and: [
          { "custom_object_fields.pages": { $gte: 300 } },
          { "custom_object_fields.genre": { $eq: "science_fiction" } },
        ],
      },
    });
  });

  it("lists all records for empty criteria", async () => {
    stub.on("GET", RECORDS_URL, { body: { custom_object_records: [], meta: { has_more: false } } });
    expect(await Book.objects.filter({})).toEqual([]);
    expect(stub.calls[0]?.method).toBe("GET");
  });

  it("iterates records lazily", async () => {
    stub.on("POST", SEARCH_URL, {
      body: { custom_object_records: [payload("1", "Dune"), payload("2", "Dune II")], meta: { has_more: false } },
    });

    const names: Array<string | null> = [];
    for await (const book of Book.objects.iterate({ name: { $starts_with: "Dune" } })) {
      names.push(book.name);
    }

    expect(names).toEqual(["Dune", "Dune II"]);
  });

  it("returns the last updated record or null", async () => {
    stub
      .on("GET", RECORDS_URL, { body: { custom_object_records: [payload("9", "Newest")] } })
      .on("GET", RECORDS_URL, { body: { custom_object_records: [] } });

    const last = await Book.objects.last();
    expect(last?.name).toBe("Newest");
    expect(stub.calls[0]?.url).toBe(`${RECORDS_URL}?sort=-updated_at&page%5Bsize%5D=1`);
    expect(await Book.objects.last()).toBeNull();
  });

  it("counts records", async () => {
    stub.on("GET", `${RECORDS_URL}/count`, { body: { count: { value: 42, refreshed_at: null } } });
    expect(await Book.objects.count()).toBe(42);
  });

  it("deletes by id", async () => {
    stub.on("DELETE", `${RECORDS_URL}/7`, { status: 204 });
    await Book.objects.delete(7);
    expect(stub.calls[0]?.method).toBe("DELETE");
  });

  it("reports unexpected payloads as provider errors", async () => {
    stub.on("GET", `${RECORDS_URL}/count`, { body: { total: 3 } });
    await expect(Book.objects.count()).rejects.toMatchObject({
      category: "provider",
      message: "Unexpected response shape for record count.",
    });
  });
});
