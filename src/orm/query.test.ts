import { describe, it, expect } from "vitest";
import { buildFilter, buildSort } from "./query.js";
import { defineCustomObject } from "./model.js";
import {
  CheckboxField,
  DateTimeField,
  DropdownField,
  IntegerField,
  LookupField,
  MultiselectField,
  TextField,
} from "./fields.js";
import { InvalidChoiceError, ModelError } from "./errors.js";
import { FetchStub, createTestClient } from "../test-utils/fetch-stub.js";

const Book = defineCustomObject(
  {
    title: "Book",
    fields: {
      author: new TextField({ key: "author_name" }),
      pages: new IntegerField(),
      available: new CheckboxField(),
      genre: new DropdownField({ choices: ["Science fiction", "Poetry"] }),
      tags: new MultiselectField({ choices: ["Classic", "Award winner"] }),
      publisher: new LookupField({ target: "publisher" }),
      releasedAt: new DateTimeField({ key: "released_at" }),
    },
  },
  { client: createTestClient(new FetchStub()) }
);

describe("buildFilter", () => {
  it("turns a plain value into an equality on the remote key", () => {
    expect(buildFilter(Book, { author: "Herbert" })).toEqual({
      "custom_object_fields.author_name": { $eq: "Herbert" },
    });
  });

  it("combines several criteria with $and", () => {
    expect(buildFilter(Book, { pages: { $gte: 300, $lt: 500 }, available: true })).toEqual({
      $and: [
        { "custom_object_fields.pages": { $gte: 300, $lt: 500 } },
        { "custom_object_fields.available": { $eq: true } },
      ],
    });
  });

  it("leaves standard fields unprefixed", () => {
    expect(buildFilter(Book, { name: { $starts_with: "Du" } })).toEqual({
      name: { $starts_with: "Du" },
    });
    expect(buildFilter(Book, { updated_at: { $gt: new Date("2024-01-01T00:00:00.000Z") } })).toEqual({
      updated_at: { $gt: "2024-01-01T00:00:00.000Z" },
    });
  });

  it("encodes operands through the field", () => {
    expect(buildFilter(Book, { publisher: 42 })).toEqual({
      "custom_object_fields.publisher": { $eq: "42" },
    });
    expect(buildFilter(Book, { releasedAt: { $lte: new Date("2024-05-02T10:00:00Z") } })).toEqual({
      "custom_object_fields.released_at": { $lte: "2024-05-02" },
    });
    expect(buildFilter(Book, { tags: { $contains: "classic" } })).toEqual({
      "custom_object_fields.tags": { $contains: "classic" },
    });
  });

  it("encodes every $in item and keeps $exists as is", () => {
    expect(buildFilter(Book, { genre: { $in: ["poetry", "science_fiction"] }, author: { $exists: false } })).toEqual({
      $and: [
        { "custom_object_fields.genre": { $in: ["poetry", "science_fiction"] } },
        { "custom_object_fields.author_name": { $exists: false } },
      ],
    });
  });

  it("validates operands", () => {
    expect(() => buildFilter(Book, { genre: "horror" })).toThrow(InvalidChoiceError);
    expect(() => buildFilter(Book, { genre: { $in: "poetry" } })).toThrow(
      "$in on 'genre' expects an array."
    );
    expect(() => buildFilter(Book, { author: { $exists: "yes" } })).toThrow(
      "$exists on 'author' expects a boolean."
    );
  });

  it("rejects unknown attributes and operators", () => {
    expect(() => buildFilter(Book, { isbn: "123" })).toThrow("Unknown attribute 'isbn' for Book.");
    expect(() => buildFilter(Book, { pages: { $between: [1, 2] } })).toThrow(ModelError);
  });

  it("has no filter for empty criteria", () => {
    expect(buildFilter(Book, {})).toBeUndefined();
  });

  it("leaves out criteria set to undefined", () => {
    expect(buildFilter(Book, { author: "Herbert", pages: undefined })).toEqual({
      "custom_object_fields.author_name": { $eq: "Herbert" },
    });
    expect(buildFilter(Book, { pages: undefined })).toBeUndefined();
    expect(buildFilter(Book, { pages: null })).toEqual({ "custom_object_fields.pages": { $eq: null } });
  });
});

describe("buildSort", () => {
  it("maps attributes and keeps the direction", () => {
    expect(buildSort(Book, "pages")).toBe("custom_object_fields.pages");
    expect(buildSort(Book, "-releasedAt")).toBe("-custom_object_fields.released_at");
    expect(buildSort(Book, "-updated_at")).toBe("-updated_at");
  });
});
