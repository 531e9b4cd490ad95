import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { defineCustomObject } from "./model.js";
import {
  AttachmentField,
  DateTimeField,
  DropdownField,
  IntegerField,
  LookupField,
  NameField,
  TextField,
} from "./fields.js";
import {
  CreateRecordError,
  DeleteRecordError,
  FieldTypeError,
  InvalidChoiceError,
  ModelError,
  UniqueConstraintError,
  UnsavedRecordError,
  UpdateRecordError,
} from "./errors.js";
import { AttachmentFile } from "../files/attachment.js";
import { ZendeskApiError } from "../core/errors.js";
import { FetchStub, TEST_BASE_URL, createTestClient } from "../test-utils/fetch-stub.js";

const RECORDS_URL = `${TEST_BASE_URL}/custom_objects/book/records`;

function defineBook(stub: FetchStub, name?: NameField) {
  return defineCustomObject(
    {
      title: "Book",
      ...(name ? { name } : {}),
      fields: {
        pages: new IntegerField(),
        genre: new DropdownField({ choices: ["Science fiction", "Poetry"] }),
        author: new LookupField({ target: "zen:user" }),
        releasedAt: new DateTimeField({ key: "released_at" }),
        cover: new AttachmentField(),
      },
    },
    { client: createTestClient(stub) }
  );
}

function recordPayload(fields: Record<string, unknown> = {}, extra: Record<string, unknown> = {}) {
  return {
    custom_object_record: {
      id: "01HREC",
      name: "Dune",
      external_id: null,
      created_at: "2024-03-01T10:00:00Z",
      updated_at: "2024-03-01T10:00:00Z",
      created_by_user_id: 7,
      updated_by_user_id: "7",
      custom_object_fields: fields,
      ...extra,
    },
  };
}

describe("defineCustomObject", () => {
  it("derives the key from the title", () => {
    const model = defineCustomObject(
      { title: "Reading List", fields: { note: new TextField() } },
      { client: createTestClient(new FetchStub()) }
    );
    expect(model.key).toBe("reading_list");
    expect(model.recordsPath).toBe("/custom_objects/reading_list/records");
    expect(String(model)).toBe("Reading List");
  });

  it("expands composite fields into remote fields", () => {
    const Book = defineBook(new FetchStub());
    expect(Book.remoteFields().map((field) => field.key)).toEqual([
      "pages",
      "genre",
      "author",
      "released_at",
      "released_at_time",
      "cover_id",
      "cover_url",
      "cover_filename",
      "cover_size",
    ]);
  });

  it("rejects reserved attributes, the name key and clashing keys", () => {
    expect(() =>
      defineCustomObject({
        title: "Bad",
        fields: {
          externalId: new TextField(),
          label: new TextField({ key: "name" }),
          due: new DateTimeField(),
          dueTime: new TextField({ key: "due_time" }),
        },
      })
    ).toThrow(
      "Invalid custom object 'Bad':\n" +
        "  - attribute 'externalId' is reserved for a standard record field\n" +
        "  - field 'label' cannot use the key 'name'; use the name option instead\n" +
        "  - remote field key 'due_time' is used more than once"
    );
  });

  it("rejects keys Zendesk would refuse", () => {
    expect(() => defineCustomObject({ key: "9lives", title: "Cat", fields: {} })).toThrow(ModelError);
  });
});

describe("CustomObjectRecord values", () => {
  it("validates on assignment", () => {
    const Book = defineBook(new FetchStub());
    const book = Book.build({ name: "Dune", pages: 412, genre: "science_fiction" });

    expect(book.get("pages")).toBe(412);
    expect(book.name).toBe("Dune");
    expect(() => book.set("genre", "horror")).toThrow(InvalidChoiceError);
    expect(() => Book.build({ pages: 1.5 })).toThrow(FieldTypeError);
    expect(() => Book.build({ name: null, externalId: null }).set("pages", null)).not.toThrow();
  });

  it("snapshots values and lists standard attributes that are set", () => {
    const Book = defineBook(new FetchStub());
    const book = Book.build({ name: "Dune", pages: 412, genre: "poetry" });

    expect(book.values).toEqual({
      pages: 412,
      genre: "poetry",
      author: null,
      releasedAt: null,
      cover: null,
    });
    expect(book.toDict()).toEqual({
      name: "Dune",
      pages: 412,
      genre: "poetry",
      author: null,
      releasedAt: null,
      cover: null,
    });
    expect(book.toRepresentation()).toEqual({
      name: "Dune",
      pages: 412,
      genre: { value: "poetry", label: "Poetry" },
      author: null,
      releasedAt: null,
      cover: null,
    });
    expect(String(book)).toBe("Book");
  });

  it("builds the create payload", () => {
    const Book = defineBook(new FetchStub());
    const book = Book.build({ pages: 412, releasedAt: new Date("2024-03-01T14:05:09.123Z") });
    book.set("author", 1234);

    expect(book.toPayload()).toEqual({
      name: "Unnamed Object",
      external_id: null,
      custom_object_fields: {
        pages: 412,
        genre: null,
        author: "1234",
        released_at: "2024-03-01",
        released_at_time: "14:05:09.123+00:00",
        cover_id: null,
        cover_url: null,
        cover_filename: null,
        cover_size: null,
      },
    });
  });

  it("leaves the name to Zendesk when it autoincrements", () => {
    const Book = defineBook(new FetchStub(), new NameField({ autoincrementEnabled: true }));
    expect(Book.build({ name: "ignored" }).toPayload()).not.toHaveProperty("name");
  });
});

describe("CustomObjectRecord persistence", () => {
  let stub: FetchStub;

  beforeEach(() => {
    stub = new FetchStub();
  });

  afterEach(() => {
    expect(stub.pending).toBe(0);
  });

  it("creates with POST and hydrates standard attributes", async () => {
    stub.on("POST", RECORDS_URL, { status: 201, body: recordPayload({ pages: 412 }) });
    const Book = defineBook(stub);

    const book = await Book.build({ name: "Dune", pages: 412 }).save();

    expect(stub.calls[0]?.json).toEqual({
      custom_object_record: {
        name: "Dune",
        external_id: null,
        custom_object_fields: {
          pages: 412,
          genre: null,
          author: null,
          released_at: null,
          released_at_time: null,
          cover_id: null,
          cover_url: null,
          cover_filename: null,
          cover_size: null,
        },
      },
    });
    expect(book.id).toBe("01HREC");
    expect(book.createdAt).toBe("2024-03-01T10:00:00Z");
    expect(book.createdByUserId).toBe("7");
    expect(book.updatedByUserId).toBe("7");
  });

  it("updates with PATCH once it has an id", async () => {
    stub.on("PATCH", `${RECORDS_URL}/01HREC`, { body: recordPayload({ pages: 500 }, { updated_at: "2024-04-01T00:00:00Z" }) });
    const Book = defineBook(stub);
    const book = Book.build({ name: "Dune", pages: 500 });
    book.id = "01HREC";

    await book.save();

    expect(stub.calls[0]?.method).toBe("PATCH");
    expect(book.updatedAt).toBe("2024-04-01T00:00:00Z");
  });

  it("turns a duplicate name into UniqueConstraintError", async () => {
    stub.on("POST", RECORDS_URL, {
      status: 422,
      body: {
        error: "RecordInvalid",
        description: "Record validation errors",
        details: { base: [{ description: "Name already exists. Try another one." }] },
      },
    });
    const Book = defineBook(stub);

    const error = await Book.build({ name: "Dune" }).save().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UniqueConstraintError);
    expect(error instanceof UniqueConstraintError && error.value).toBe("Dune");
    expect(error instanceof Error && error.cause).toBeInstanceOf(ZendeskApiError);
  });

  it("wraps other create and update failures", async () => {
    stub
      .on("POST", RECORDS_URL, { status: 500, body: { error: "InternalError" } })
      .on("PATCH", `${RECORDS_URL}/01HREC`, { status: 422, body: { description: "Invalid value" } });
    const Book = defineBook(stub);

    await expect(Book.build({ name: "Dune" }).save()).rejects.toThrow(
      new CreateRecordError("Error creating Book record: InternalError")
    );

    const existing = Book.build({ name: "Dune" });
    existing.id = "01HREC";
    await expect(existing.save()).rejects.toBeInstanceOf(UpdateRecordError);
  });

  it("uploads unsaved attachments before saving", async () => {
    stub
      .on("POST", `${TEST_BASE_URL}/uploads.json`, {
        status: 201,
        body: {
          upload: {
            token: "upload-token",
            attachment: { id: 555, file_name: "cover.png", content_url: "https://acme.zendesk.com/f/555", size: 3 },
          },
        },
      })
      .on("POST", RECORDS_URL, { status: 201, body: recordPayload() });
    const Book = defineBook(stub);
    const cover = new AttachmentFile({ filename: "cover.png", content: new Uint8Array([1, 2, 3]) });

    await Book.build({ name: "Dune", cover }).save();

    expect(stub.calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      `POST ${TEST_BASE_URL}/uploads.json?filename=cover.png`,
      `POST ${RECORDS_URL}`,
    ]);
    expect(cover.saved).toBe(true);
    expect(stub.calls[1]?.json).toMatchObject({
      custom_object_record: {
        custom_object_fields: {
          cover_id: "555",
          cover_url: "https://acme.zendesk.com/f/555",
          cover_filename: "cover.png",
          cover_size: 3,
        },
      },
    });
  });

  it("wraps a failed attachment upload as a create error", async () => {
    stub.on("POST", `${TEST_BASE_URL}/uploads.json`, { status: 422, body: { description: "Upload too large" } });
    const Book = defineBook(stub);
    const cover = new AttachmentFile({ filename: "cover.png", content: new Uint8Array([1]) });

    const error = await Book.build({ name: "Dune", cover }).save().catch((e: unknown) => e);

    expect(error).toEqual(new CreateRecordError("Error creating Book record: Upload too large"));
    expect(error instanceof Error && error.cause).toBeInstanceOf(ZendeskApiError);
    expect(cover.saved).toBe(false);
  });

  it("treats an empty attachment as none", async () => {
    stub.on("POST", RECORDS_URL, { status: 201, body: recordPayload() });
    const Book = defineBook(stub);

    await Book.build({ name: "Dune", cover: new AttachmentFile({ filename: "empty.png" }) }).save();

    expect(stub.calls).toHaveLength(1);
    expect(stub.calls[0]?.json).toMatchObject({
      custom_object_record: {
        custom_object_fields: { cover_id: null, cover_url: null, cover_filename: null, cover_size: null },
      },
    });
  });

  it("deletes by id and forgets it", async () => {
    stub.on("DELETE", `${RECORDS_URL}/01HREC`, { status: 204 });
    const Book = defineBook(stub);
    const book = Book.build({ name: "Dune" });
    book.id = "01HREC";

    await book.delete();

    expect(book.id).toBeNull();
  });

  it("refuses to delete an unsaved record", async () => {
    const Book = defineBook(stub);
    await expect(Book.build().delete()).rejects.toBeInstanceOf(UnsavedRecordError);
  });

  it("wraps delete failures", async () => {
    stub.on("DELETE", `${RECORDS_URL}/01HREC`, { status: 404, body: { error: "RecordNotFound" } });
    const Book = defineBook(stub);
    const book = Book.build();
    book.id = "01HREC";

    await expect(book.delete()).rejects.toThrow(
      new DeleteRecordError("Error deleting Book record '01HREC': RecordNotFound")
    );
    expect(book.id).toBe("01HREC");
  });
});
