/**
 * Field definitions
 *
 * A field validates values assigned to a record attribute and knows how the
 * value travels over the wire: which remote custom object fields hold it and
 * how it is encoded into and decoded from `custom_object_fields`.
 */

import { z } from "zod";
import { AttachmentFile } from "../files/attachment.js";
import {
  FieldTypeError,
  InvalidChoiceError,
  InvalidDateFormatError,
  InvalidRegexError,
  ModelError,
  RegexCompileError,
  UnsavedRecordError,
} from "./errors.js";

export const REMOTE_FIELD_TYPES = [
  "text",
  "textarea",
  "checkbox",
  "date",
  "integer",
  "decimal",
  "regexp",
  "dropdown",
  "lookup",
  "multiselect",
] as const;

export type RemoteFieldType = (typeof REMOTE_FIELD_TYPES)[number];

export function isRemoteFieldType(value: string): value is RemoteFieldType {
  return REMOTE_FIELD_TYPES.some((type) => type === value);
}

export interface RemoteFieldOption {
  name: string;
  raw_name: string;
  value: string;
}

/** A custom object field as Zendesk defines it. */
export interface RemoteFieldDefinition {
  key: string;
  title: string;
  type: RemoteFieldType;
  description?: string;
  custom_field_options?: RemoteFieldOption[];
  relationship_target_type?: string;
  regexp_for_validation?: string;
}

/** The `custom_object_fields` object of a record payload. */
export type WireFields = Record<string, unknown>;

export interface FieldOptions {
  /** Remote field key; defaults to the attribute name. */
  key?: string;
  /** Remote field title; defaults to the attribute name in words. */
  title?: string;
  description?: string;
}

/** "releasedAt" and "released_at" both become "Released at". */
export function humanize(value: string): string {
  const words = value.replace(/([a-z0-9])([A-Z])/g, "$1 $2").replace(/_+/g, " ").trim().toLowerCase();
  return words.charAt(0).toUpperCase() + words.slice(1);
}

/**
 * Choice key for a label: accents stripped, lower case, spaces as underscores.
 */
export function slugifyChoice(label: string): string {
  return label
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/ /g, "_");
}

export abstract class Field<TValue, TInput = TValue> {
  /** Type-level only: what `set()` accepts besides TValue. */
  declare readonly inputType?: TInput;

  /** Whether the field can appear in a filter. */
  readonly filterable: boolean = true;

  protected readonly options: FieldOptions;
  private boundAttribute: string | undefined;

  protected abstract readonly schema: z.ZodType<TValue>;
  /** Type name reported by FieldTypeError. */
  protected abstract readonly expected: string;

  constructor(options: FieldOptions = {}) {
    this.options = options;
  }

  /**
   * Attaches the field to a model attribute. A field instance belongs to one
   * attribute only.
   */
  bind(attribute: string): void {
    if (this.boundAttribute !== undefined && this.boundAttribute !== attribute) {
      throw new ModelError(
        `Field is already bound to '${this.boundAttribute}' and cannot be reused for '${attribute}'.`
      );
    }
    this.boundAttribute = attribute;
  }

  get attribute(): string {
    if (this.boundAttribute === undefined) {
      throw new ModelError("Field is not part of a model definition.");
    }
    return this.boundAttribute;
  }

  get key(): string {
    return this.options.key ?? this.attribute;
  }

  get title(): string {
    return this.options.title ?? humanize(this.attribute);
  }

  /**
   * Validates an assigned value. null and undefined both mean "no value".
   */
  clean(value: unknown): TValue | null {
    if (value === null || value === undefined) {
      return null;
    }
    const parsed = this.schema.safeParse(this.prepare(value));
    if (!parsed.success) {
      throw new FieldTypeError(this.key, this.expected);
    }
    this.check(parsed.data);
    return parsed.data;
  }

  /** Normalizes accepted input before type validation. */
  protected prepare(value: unknown): unknown {
    return value;
  }

  /** Value checks beyond the type. */
  protected check(_value: TValue): void {}

  /** Wire value for a clean value. */
  protected encode(value: TValue): unknown {
    return value;
  }

  /** Clean-able value from a wire value. */
  protected decode(raw: unknown): unknown {
    return raw;
  }

  abstract toRemoteFields(): RemoteFieldDefinition[];

  wireKeys(): string[] {
    return this.toRemoteFields().map((definition) => definition.key);
  }

  toWire(value: TValue | null): WireFields {
    return { [this.key]: value === null ? null : this.encode(value) };
  }

  fromWire(fields: WireFields): TValue | null {
    return this.clean(this.decode(fields[this.key]));
  }

  /** Wire value for one operand of a filter condition. */
  toFilterValue(value: unknown): unknown {
    if (!this.filterable) {
      throw new ModelError(`Field '${this.attribute}' cannot be used in filters.`);
    }
    const cleaned = this.clean(value);
    return cleaned === null ? null : this.encode(cleaned);
  }

  represent(value: TValue | null): unknown {
    return value;
  }

  protected remote(type: RemoteFieldType, extra: Partial<RemoteFieldDefinition> = {}): RemoteFieldDefinition {
    const definition: RemoteFieldDefinition = { key: this.key, title: this.title, type, ...extra };
    if (this.options.description !== undefined) {
      definition.description = this.options.description;
    }
    return definition;
  }
}

/** Any field, whatever its value type. */
export type AnyField = Field<unknown, unknown>;

/** Value type of a field. */
export type ValueOf<F> = F extends Field<infer V, unknown> ? V : never;

/** Accepted input of a field. */
export type InputOf<F> = F extends Field<infer V, infer I> ? V | I : never;

// ============================================================================
// Scalar fields
// ============================================================================

export class TextField extends Field<string> {
  protected readonly schema = z.string();
  protected readonly expected = "string";

  toRemoteFields(): RemoteFieldDefinition[] {
    return [this.remote("text")];
  }
}

export class TextareaField extends Field<string> {
  protected readonly schema = z.string();
  protected readonly expected = "string";

  toRemoteFields(): RemoteFieldDefinition[] {
    return [this.remote("textarea")];
  }
}

export class CheckboxField extends Field<boolean> {
  protected readonly schema = z.boolean();
  protected readonly expected = "boolean";

  toRemoteFields(): RemoteFieldDefinition[] {
    return [this.remote("checkbox")];
  }
}

function numericString(raw: unknown): unknown {
  if (typeof raw === "string" && raw.trim() !== "" && !isNaN(Number(raw))) {
    return Number(raw);
  }
  return raw;
}

export class IntegerField extends Field<number> {
  protected readonly schema = z.number().int();
  protected readonly expected = "integer";

  protected override decode(raw: unknown): unknown {
    return numericString(raw);
  }

  toRemoteFields(): RemoteFieldDefinition[] {
    return [this.remote("integer")];
  }
}

export class DecimalField extends Field<number> {
  protected readonly schema = z.number().finite();
  protected readonly expected = "number";

  protected override decode(raw: unknown): unknown {
    return numericString(raw);
  }

  toRemoteFields(): RemoteFieldDefinition[] {
    return [this.remote("decimal")];
  }
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * A calendar date held as `YYYY-MM-DD`. A time part (anything from `T` on)
 * is dropped on assignment; a Date is taken at its UTC day.
 */
export class DateField extends Field<string, Date> {
  protected readonly schema = z.string();
  protected readonly expected = "string";

  protected override prepare(value: unknown): unknown {
    if (value instanceof Date) {
      return isNaN(value.getTime()) ? value : value.toISOString().slice(0, 10);
    }
    if (typeof value === "string") {
      return value.split("T")[0];
    }
    return value;
  }

  protected override check(value: string): void {
    if (!DATE_PATTERN.test(value)) {
      throw new InvalidDateFormatError(this.key);
    }
  }

  toRemoteFields(): RemoteFieldDefinition[] {
    return [this.remote("date")];
  }
}

const TIME_SUFFIX = "_time";

/**
 * A UTC instant stored in two remote fields: a date field `<key>` and a text
 * field `<key>_time` holding `HH:MM:SS.mmm+00:00`.
 */
export class DateTimeField extends Field<Date, string> {
  protected readonly schema = z.date();
  protected readonly expected = "Date";

  get timeKey(): string {
    return `${this.key}${TIME_SUFFIX}`;
  }

  protected override prepare(value: unknown): unknown {
    if (typeof value === "string") {
      return new Date(value);
    }
    return value;
  }

  toRemoteFields(): RemoteFieldDefinition[] {
    return [
      this.remote("date"),
      {
        key: this.timeKey,
        title: `${this.title} time`,
        type: "text",
      },
    ];
  }

  override toWire(value: Date | null): WireFields {
    if (value === null) {
      return { [this.key]: null, [this.timeKey]: null };
    }
    const iso = value.toISOString();
    return {
      [this.key]: iso.slice(0, 10),
      [this.timeKey]: `${iso.slice(11, 23)}+00:00`,
    };
  }

  override fromWire(fields: WireFields): Date | null {
    const date = fields[this.key];
    if (typeof date !== "string" || date === "") {
      return null;
    }
    const day = date.split("T")[0] ?? date;
    const time = fields[this.timeKey];
    if (typeof time !== "string" || time === "") {
      return this.clean(`${day}T00:00:00.000Z`);
    }
    // Date keeps milliseconds only
    const trimmed = time.trim().replace(/\.(\d{3})\d+/, ".$1");
    const zoned = /(Z|[+-]\d{2}:?\d{2})$/.test(trimmed) ? trimmed : `${trimmed}Z`;
    return this.clean(`${day}T${zoned}`);
  }

  /** Filters compare the date part. */
  override toFilterValue(value: unknown): unknown {
    const cleaned = this.clean(value);
    return cleaned === null ? null : cleaned.toISOString().slice(0, 10);
  }
}

export interface RegexpFieldOptions extends FieldOptions {
  pattern: string;
}

/**
 * Text validated by a regular expression, matched from the start of the value.
 */
export class RegexpField extends Field<string> {
  protected readonly schema = z.string();
  protected readonly expected = "string";
  readonly pattern: string;
  private readonly regex: RegExp;

  constructor(options: RegexpFieldOptions) {
    super(options);
    this.pattern = options.pattern;
    try {
      this.regex = new RegExp(`^(?:${options.pattern})`);
    } catch (error) {
      throw new RegexCompileError(options.key ?? options.title ?? options.pattern, error);
    }
  }

  protected override check(value: string): void {
    if (!this.regex.test(value)) {
      throw new InvalidRegexError(this.key, value);
    }
  }

  toRemoteFields(): RemoteFieldDefinition[] {
    return [this.remote("regexp", { regexp_for_validation: this.pattern })];
  }
}

// ============================================================================
// Choice fields
// ============================================================================

/** A label (its key is derived) or an explicit `[key, label]` pair. */
export type Choice = string | readonly [key: string, label: string];

export interface ChoiceFieldOptions extends FieldOptions {
  choices: readonly Choice[];
}

class ChoiceSet {
  readonly keys: string[] = [];
  readonly labels = new Map<string, string>();
  readonly options: RemoteFieldOption[] = [];

  constructor(choices: readonly Choice[]) {
    for (const choice of choices) {
      const [key, label] = typeof choice === "string" ? [slugifyChoice(choice), choice] : choice;
      this.keys.push(key);
      this.labels.set(key, label);
      this.options.push({ name: label, raw_name: label, value: key });
    }
  }

  /** An empty choice list accepts any key. */
  accepts(key: string): boolean {
    return this.keys.length === 0 || this.labels.has(key);
  }

  represent(key: string): { value: string; label: string } {
    return { value: key, label: this.labels.get(key) ?? key };
  }
}

export class DropdownField extends Field<string> {
  protected readonly schema = z.string();
  protected readonly expected = "string";
  private readonly choiceSet: ChoiceSet;

  constructor(options: ChoiceFieldOptions) {
    super(options);
    this.choiceSet = new ChoiceSet(options.choices);
  }

  get choices(): readonly string[] {
    return this.choiceSet.keys;
  }

  protected override check(value: string): void {
    if (!this.choiceSet.accepts(value)) {
      throw new InvalidChoiceError(this.key, value);
    }
  }

  toRemoteFields(): RemoteFieldDefinition[] {
    return [this.remote("dropdown", { custom_field_options: this.choiceSet.options })];
  }

  override represent(value: string | null): { value: string; label: string } | null {
    return value === null ? null : this.choiceSet.represent(value);
  }
}

export class MultiselectField extends Field<string[]> {
  protected readonly schema = z.array(z.string());
  protected readonly expected = "string[]";
  private readonly choiceSet: ChoiceSet;

  constructor(options: ChoiceFieldOptions) {
    super(options);
    this.choiceSet = new ChoiceSet(options.choices);
  }

  get choices(): readonly string[] {
    return this.choiceSet.keys;
  }

  protected override check(value: string[]): void {
    for (const item of value) {
      if (!this.choiceSet.accepts(item)) {
        throw new InvalidChoiceError(this.key, item);
      }
    }
  }

  /** A single key is a valid operand (e.g. for `$contains`). */
  override toFilterValue(value: unknown): unknown {
    if (typeof value === "string") {
      this.check([value]);
      return value;
    }
    return super.toFilterValue(value);
  }

  toRemoteFields(): RemoteFieldDefinition[] {
    return [this.remote("multiselect", { custom_field_options: this.choiceSet.options })];
  }

  override represent(value: string[] | null): Array<{ value: string; label: string }> | null {
    return value === null ? null : value.map((item) => this.choiceSet.represent(item));
  }
}

// ============================================================================
// Relations
// ============================================================================

/** Anything with a (possibly unsaved) id, such as a record. */
export interface Identifiable {
  readonly id: string | number | null;
}

/**
 * Lookup target: a custom object model (or anything with its `key`), a custom
 * object key, or a standard target such as `zen:user`, `zen:ticket` or
 * `zen:organization`.
 */
export type LookupTarget = string | { readonly key: string };

export interface LookupFieldOptions extends FieldOptions {
  target: LookupTarget;
}

export class LookupField extends Field<string, number | Identifiable> {
  protected readonly schema = z.string().min(1);
  protected readonly expected = "record or record id";
  private readonly target: LookupTarget;

  constructor(options: LookupFieldOptions) {
    super(options);
    this.target = options.target;
  }

  get relationshipTargetType(): string {
    const key = typeof this.target === "string" ? this.target : this.target.key;
    return key.startsWith("zen:") ? key : `zen:custom_object:${key}`;
  }

  protected override prepare(value: unknown): unknown {
    if (typeof value === "number") {
      return String(value);
    }
    if (typeof value === "object" && value !== null && "id" in value) {
      const id = value.id;
      if (id === null || id === undefined) {
        throw new UnsavedRecordError(
          `Cannot link an unsaved record through field '${this.key}'; save it first.`
        );
      }
      return typeof id === "number" ? String(id) : id;
    }
    return value;
  }

  protected override decode(raw: unknown): unknown {
    return raw === "" ? null : raw;
  }

  toRemoteFields(): RemoteFieldDefinition[] {
    return [this.remote("lookup", { relationship_target_type: this.relationshipTargetType })];
  }
}

// ============================================================================
// Attachments
// ============================================================================

const ATTACHMENT_SUFFIXES = {
  id: "_id",
  url: "_url",
  filename: "_filename",
  size: "_size",
} as const;

export interface AttachmentRepresentation {
  id: string | null;
  filename: string;
  url: string | null;
  size: number | null;
}

/**
 * A file attachment, stored in four remote fields: `<key>_id`, `<key>_url`,
 * `<key>_filename` (text) and `<key>_size` (integer).
 */
export class AttachmentField extends Field<AttachmentFile> {
  override readonly filterable = false;
  protected readonly schema = z.instanceof(AttachmentFile);
  protected readonly expected = "AttachmentFile";

  private wireKey(part: keyof typeof ATTACHMENT_SUFFIXES): string {
    return `${this.key}${ATTACHMENT_SUFFIXES[part]}`;
  }

  toRemoteFields(): RemoteFieldDefinition[] {
    return [
      { key: this.wireKey("id"), title: `${this.title} id`, type: "text" },
      { key: this.wireKey("url"), title: `${this.title} url`, type: "text" },
      { key: this.wireKey("filename"), title: `${this.title} filename`, type: "text" },
      { key: this.wireKey("size"), title: `${this.title} size`, type: "integer" },
    ];
  }

  /** A file with neither an id nor content is written as no attachment. */
  override toWire(value: AttachmentFile | null): WireFields {
    const file = value?.present ? value : null;
    return {
      [this.wireKey("id")]: file?.id ?? null,
      [this.wireKey("url")]: file?.url ?? null,
      [this.wireKey("filename")]: file ? file.filename : null,
      [this.wireKey("size")]: file?.size ?? null,
    };
  }

  override fromWire(fields: WireFields): AttachmentFile | null {
    const id = fields[this.wireKey("id")];
    if ((typeof id !== "string" && typeof id !== "number") || id === "") {
      return null;
    }
    const url = fields[this.wireKey("url")];
    const filename = fields[this.wireKey("filename")];
    const size = numericString(fields[this.wireKey("size")]);
    return new AttachmentFile({
      id: String(id),
      url: typeof url === "string" ? url : null,
      filename: typeof filename === "string" ? filename : null,
      size: typeof size === "number" ? size : null,
    });
  }

  override represent(value: AttachmentFile | null): AttachmentRepresentation | null {
    if (value === null) {
      return null;
    }
    return { id: value.id, filename: value.filename, url: value.url, size: value.size };
  }
}

// ============================================================================
// Standard name field
// ============================================================================

export interface NameFieldOptions {
  unique?: boolean;
  autoincrementEnabled?: boolean;
  autoincrementPrefix?: string;
  /** Digits of the generated number, 0-9. */
  autoincrementPadding?: number;
  /** Next sequence number, at least 1. */
  autoincrementNextSequence?: number;
}

/**
 * Settings of the standard `name` field. It is never created as a custom
 * field; its settings are applied to `standard::name`.
 */
export class NameField {
  readonly unique: boolean;
  readonly autoincrementEnabled: boolean;
  readonly autoincrementPrefix: string;
  readonly autoincrementPadding: number;
  readonly autoincrementNextSequence: number;

  constructor(options: NameFieldOptions = {}) {
    this.unique = options.unique ?? false;
    this.autoincrementEnabled = options.autoincrementEnabled ?? false;
    this.autoincrementPrefix = options.autoincrementPrefix ?? "";
    this.autoincrementPadding = options.autoincrementPadding ?? 0;
    this.autoincrementNextSequence = options.autoincrementNextSequence ?? 1;

    const problems: string[] = [];
    if (!Number.isInteger(this.autoincrementPadding) || this.autoincrementPadding < 0 || this.autoincrementPadding > 9) {
      problems.push("autoincrementPadding must be an integer from 0 to 9");
    }
    if (!Number.isInteger(this.autoincrementNextSequence) || this.autoincrementNextSequence < 1) {
      problems.push("autoincrementNextSequence must be an integer of at least 1");
    }
    if (problems.length > 0) {
      throw new ModelError(`Invalid NameField: ${problems.join("; ")}.`);
    }
  }

  clean(value: unknown): string | null {
    if (value === null || value === undefined) {
      return null;
    }
    if (typeof value !== "string") {
      throw new FieldTypeError("name", "string");
    }
    return value;
  }

  /** Body of the `standard::name` field update. */
  toSettings(): Record<string, unknown> {
    return {
      custom_object_field: {
        properties: {
          is_unique: this.unique,
          autoincrement_enabled: this.autoincrementEnabled,
          autoincrement_prefix: this.autoincrementPrefix,
          autoincrement_padding: this.autoincrementPadding,
          autoincrement_next_sequence: this.autoincrementNextSequence,
        },
      },
    };
  }
}
