import { ZendeskApiError } from "../core/errors.js";
import { expectPayload } from "../core/payload.js";
import { AttachmentFile } from "../files/attachment.js";
import {
  CreateRecordError,
  FieldTypeError,
  ModelError,
  UniqueConstraintError,
  UnsavedRecordError,
  UpdateRecordError,
} from "./errors.js";
import type { AnyField, InputOf, ValueOf, WireFields } from "./fields.js";
import type { CustomObjectModel, FieldMap } from "./model.js";
import { RecordResponseSchema, type RecordPayload } from "./payloads.js";

/** Name sent for a record without one. */
export const UNNAMED_RECORD = "Unnamed Object";

const UNIQUE_NAME_VIOLATION = "Name already exists";

/** Custom attribute values of a record, keyed by attribute name. */
export type RecordValues<F extends FieldMap> = { [K in keyof F]: ValueOf<F[K]> | null };

/** What `build()` and `create()` accept. */
export type RecordInput<F extends FieldMap> = { [K in keyof F]?: InputOf<F[K]> | null } & {
  name?: string | null;
  externalId?: string | null;
};

export interface StandardAttributes {
  id: string | null;
  name: string | null;
  externalId: string | null;
  createdAt: string | null;
  updatedAt: string | null;
  createdByUserId: string | null;
  updatedByUserId: string | null;
}

/** Record attribute names that fields may not use. */
export const STANDARD_ATTRIBUTES: ReadonlyArray<keyof StandardAttributes> = [
  "id",
  "name",
  "externalId",
  "createdAt",
  "updatedAt",
  "createdByUserId",
  "updatedByUserId",
];

/**
 * One record of a custom object.
 *
 * Custom attribute values are validated by their field on assignment; the
 * standard attributes mirror what Zendesk returned on the last save or read.
 */
export class CustomObjectRecord<F extends FieldMap> implements StandardAttributes {
  readonly model: CustomObjectModel<F>;

  id: string | null = null;
  externalId: string | null = null;
  createdAt: string | null = null;
  updatedAt: string | null = null;
  createdByUserId: string | null = null;
  updatedByUserId: string | null = null;

  private _name: string | null = null;
  private readonly store = new Map<string, unknown>();

  constructor(model: CustomObjectModel<F>) {
    this.model = model;
    for (const [attribute] of model.fieldEntries()) {
      this.store.set(attribute, null);
    }
  }

  /**
   * Record decoded from an API payload.
   */
  static fromPayload<F extends FieldMap>(
    model: CustomObjectModel<F>,
    payload: RecordPayload
  ): CustomObjectRecord<F> {
    const record = new CustomObjectRecord(model);
    for (const [attribute, field] of model.fieldEntries()) {
      record.store.set(attribute, field.fromWire(payload.custom_object_fields));
    }
    record.hydrate(payload);
    return record;
  }

  get name(): string | null {
    return this._name;
  }

  set name(value: string | null) {
    if (value !== null && typeof value !== "string") {
      throw new FieldTypeError("name", "string");
    }
    this._name = value;
  }

  get<K extends keyof F & string>(attribute: K): ValueOf<F[K]> | null;
  get(attribute: string): unknown {
    this.fieldOf(attribute);
    return this.store.get(attribute) ?? null;
  }

  set<K extends keyof F & string>(attribute: K, value: InputOf<F[K]> | null): this;
  set(attribute: string, value: unknown): this {
    this.store.set(attribute, this.fieldOf(attribute).clean(value));
    return this;
  }

  /**
   * Assigns several values at once; `name` and `externalId` are accepted
   * alongside field attributes.
   */
  assign(values: RecordInput<F>): this {
    const entries: Array<[string, unknown]> = Object.entries(values);
    for (const [attribute, value] of entries) {
      if (value === undefined) {
        continue;
      }
      if (attribute === "name") {
        this.name = this.model.nameField ? this.model.nameField.clean(value) : checkString("name", value);
      } else if (attribute === "externalId") {
        this.externalId = checkString("externalId", value);
      } else {
        this.store.set(attribute, this.fieldOf(attribute).clean(value));
      }
    }
    return this;
  }

  /** Snapshot of the custom attribute values; every attribute is present. */
  get values(): Partial<RecordValues<F>> {
    const values: Partial<RecordValues<F>> = {};
    for (const attribute of this.store.keys()) {
      if (this.model.hasAttribute(attribute)) {
        this.copyValue(values, attribute);
      }
    }
    return values;
  }

  /**
   * Creates the record when it has no id, updates it otherwise. Unsaved
   * attachments are uploaded first.
   */
  async save(): Promise<this> {
    const creating = this.id === null;
    const client = this.model.client;
    try {
      await this.uploadAttachments();
      const body = { custom_object_record: this.toPayload() };
      const response = creating
        ? await client.post(this.model.recordsPath, { body })
        : await client.patch(`${this.model.recordsPath}/${this.id ?? ""}`, { body });
      const { custom_object_record } = expectPayload(
        RecordResponseSchema,
        response.data,
        "custom object record"
      );
      this.hydrate(custom_object_record);
    } catch (error) {
      throw this.saveError(error, creating);
    }
    return this;
  }

  /**
   * Deletes the record remotely. Its id is cleared, so a later save creates a
   * new record.
   */
  async delete(): Promise<void> {
    if (this.id === null) {
      throw new UnsavedRecordError("Cannot delete a record that has not been saved.");
    }
    await this.model.objects.delete(this.id);
    this.id = null;
  }

  /** `custom_object_record` body of a create or update. */
  toPayload(): Record<string, unknown> {
    const fields: WireFields = {};
    for (const [attribute, field] of this.model.fieldEntries()) {
      Object.assign(fields, field.toWire(this.store.get(attribute) ?? null));
    }

    const payload: Record<string, unknown> = { custom_object_fields: fields };
    if (!this.model.isNameAutoincrement) {
      payload.name = this._name || UNNAMED_RECORD;
    }
    payload.external_id = this.externalId;
    return payload;
  }

  /** Custom values plus the standard attributes that are set. */
  toDict(): Record<string, unknown> {
    return { ...this.standardEntries(), ...Object.fromEntries(this.store) };
  }

  /**
   * As toDict(), with choices as `{ value, label }` and attachments as
   * `{ id, filename, url, size }`.
   */
  toRepresentation(): Record<string, unknown> {
    const represented: Record<string, unknown> = this.standardEntries();
    for (const [attribute, field] of this.model.fieldEntries()) {
      represented[attribute] = field.represent(this.store.get(attribute) ?? null);
    }
    return represented;
  }

  toString(): string {
    return this.model.title;
  }

  private fieldOf(attribute: string): AnyField {
    const field = this.model.fieldFor(attribute);
    if (!field) {
      throw new ModelError(`${this.model.title} has no attribute '${attribute}'.`);
    }
    return field;
  }

  private copyValue<K extends keyof F & string>(target: Partial<RecordValues<F>>, attribute: K): void {
    target[attribute] = this.get(attribute);
  }

  private standardEntries(): Record<string, unknown> {
    const entries: Record<string, unknown> = {};
    for (const attribute of STANDARD_ATTRIBUTES) {
      const value = this[attribute];
      if (value !== null) {
        entries[attribute] = value;
      }
    }
    return entries;
  }

  private hydrate(payload: RecordPayload): void {
    this.id = payload.id;
    this._name = payload.name;
    this.externalId = payload.external_id;
    this.createdAt = payload.created_at;
    this.updatedAt = payload.updated_at;
    this.createdByUserId = payload.created_by_user_id;
    this.updatedByUserId = payload.updated_by_user_id;
  }

  private async uploadAttachments(): Promise<void> {
    for (const value of this.store.values()) {
      if (value instanceof AttachmentFile && value.present && !value.saved) {
        await value.save(this.model.fileManager);
      }
    }
  }

  private saveError(error: unknown, creating: boolean): unknown {
    if (!(error instanceof ZendeskApiError)) {
      return error;
    }
    const violations = [error.message, ...error.detailDescriptions()];
    if (violations.some((text) => text.includes(UNIQUE_NAME_VIOLATION))) {
      return new UniqueConstraintError(this._name, error);
    }
    return creating
      ? new CreateRecordError(`Error creating ${this.model.title} record: ${error.message}`, error)
      : new UpdateRecordError(`Error updating ${this.model.title} record: ${error.message}`, error);
  }
}

function checkString(attribute: string, value: unknown): string | null {
  if (value === null || typeof value === "string") {
    return value;
  }
  throw new FieldTypeError(attribute, "string");
}
