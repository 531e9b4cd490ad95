import { ZendeskClient, type ZendeskHttpClient } from "../client.js";
import { FileManager } from "../files/file-manager.js";
import { ModelError } from "./errors.js";
import type { AnyField, NameField, RemoteFieldDefinition } from "./fields.js";
import { RecordManager } from "./manager.js";
import type { QueryTarget } from "./query.js";
import { CustomObjectRecord, STANDARD_ATTRIBUTES, type RecordInput } from "./record.js";

/** Attribute name → field. */
export type FieldMap = Record<string, AnyField>;

export interface CustomObjectDefinition<F extends FieldMap> {
  /** Custom object key; defaults to the title in lower case. */
  key?: string;
  title: string;
  description?: string;
  /** Settings of the standard name field. */
  name?: NameField;
  fields: F;
}

export interface ModelOptions {
  /** Defaults to a client configured from the environment, created on first use. */
  client?: ZendeskHttpClient;
  fileManager?: FileManager;
}

const KEY_PATTERN = /^[a-z][a-z0-9_]*$/;

function keyFromTitle(title: string): string {
  return title
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_")
    .replace(/[^a-z0-9_]/g, "");
}

export class CustomObjectModel<F extends FieldMap> implements QueryTarget {
  readonly key: string;
  readonly title: string;
  readonly description: string | undefined;
  readonly nameField: NameField | undefined;
  readonly fields: F;
  readonly objects: RecordManager<F>;

  private readonly entries: Array<[string, AnyField]>;
  private readonly byAttribute: Map<string, AnyField>;
  private clientInstance: ZendeskHttpClient | undefined;
  private fileManagerInstance: FileManager | undefined;

  constructor(definition: CustomObjectDefinition<F>, options: ModelOptions = {}) {
    this.title = definition.title;
    this.key = definition.key ?? keyFromTitle(definition.title);
    this.description = definition.description;
    this.nameField = definition.name;
    this.fields = definition.fields;
    this.clientInstance = options.client;
    this.fileManagerInstance = options.fileManager;

    this.entries = Object.entries(definition.fields);
    this.validate();
    this.byAttribute = new Map(this.entries);
    this.objects = new RecordManager(this);
  }

  private validate(): void {
    const problems: string[] = [];

    if (!this.title.trim()) {
      problems.push("title is required");
    }
    if (!KEY_PATTERN.test(this.key)) {
      problems.push(
        `key '${this.key}' must start with a lowercase letter and contain only lowercase letters, digits and underscores`
      );
    }

    const seenKeys = new Set<string>();
    for (const [attribute, field] of this.entries) {
      if (STANDARD_ATTRIBUTES.some((standard) => standard === attribute)) {
        problems.push(`attribute '${attribute}' is reserved for a standard record field`);
        continue;
      }
      // key and wireKeys() need the attribute
      field.bind(attribute);
      if (field.key === "name") {
        problems.push(`field '${attribute}' cannot use the key 'name'; use the name option instead`);
      }
      for (const wireKey of field.wireKeys()) {
        if (seenKeys.has(wireKey)) {
          problems.push(`remote field key '${wireKey}' is used more than once`);
        }
        seenKeys.add(wireKey);
      }
    }

    if (problems.length > 0) {
      throw new ModelError(`Invalid custom object '${this.title}':\n  - ${problems.join("\n  - ")}`);
    }
  }

  get client(): ZendeskHttpClient {
    this.clientInstance ??= ZendeskClient.fromEnv();
    return this.clientInstance;
  }

  get fileManager(): FileManager {
    this.fileManagerInstance ??= new FileManager(this.client);
    return this.fileManagerInstance;
  }

  get recordsPath(): string {
    return `/custom_objects/${this.key}/records`;
  }

  get isNameAutoincrement(): boolean {
    return this.nameField?.autoincrementEnabled ?? false;
  }

  fieldEntries(): ReadonlyArray<[string, AnyField]> {
    return this.entries;
  }

  hasAttribute(attribute: string): attribute is keyof F & string {
    return this.byAttribute.has(attribute);
  }

  fieldFor(attribute: string): AnyField | undefined {
    return this.byAttribute.get(attribute);
  }

  /** Remote fields backing the model, composite fields expanded. */
  remoteFields(): RemoteFieldDefinition[] {
    return this.entries.flatMap(([, field]) => field.toRemoteFields());
  }

  build(values: RecordInput<F> = {}): CustomObjectRecord<F> {
    return new CustomObjectRecord(this).assign(values);
  }

  toString(): string {
    return this.title;
  }
}

/**
 * Declares a custom object model.
 *
 * @example
 * const Book = defineCustomObject({
 *   title: "Book",
 *   fields: {
 *     summary: new TextareaField(),
 *     pages: new IntegerField(),
 *     genre: new DropdownField({ choices: ["Science fiction", "Poetry"] }),
 *   },
 * });
 * const dune = await Book.objects.create({ name: "Dune", pages: 412, genre: "science_fiction" });
 */
export function defineCustomObject<F extends FieldMap>(
  definition: CustomObjectDefinition<F>,
  options: ModelOptions = {}
): CustomObjectModel<F> {
  return new CustomObjectModel(definition, options);
}
