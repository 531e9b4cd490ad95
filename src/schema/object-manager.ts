import { ZendeskClient, type ZendeskHttpClient } from "../client.js";
import { expectPayload } from "../core/payload.js";
import {
  REMOTE_FIELD_TYPES,
  isRemoteFieldType,
  type RemoteFieldDefinition,
} from "../orm/fields.js";
import type { CustomObjectModel, FieldMap } from "../orm/model.js";
import {
  CustomObjectFieldListResponseSchema,
  CustomObjectFieldResponseSchema,
  CustomObjectListResponseSchema,
  CustomObjectResponseSchema,
  type RemoteCustomObject,
  type RemoteCustomObjectField,
} from "../orm/payloads.js";
import { DriftDetector, type SchemaDrift } from "./drift-detector.js";

/** A field definition whose type has not been checked yet. */
export type FieldDefinitionInput = Omit<RemoteFieldDefinition, "type"> & { type: string };

const NAME_FIELD_KEY = "name";
const STANDARD_NAME_FIELD = "standard::name";

/**
 * Creates and inspects custom objects and their fields.
 */
export class CustomObjectSchemaManager {
  private readonly client: ZendeskHttpClient;
  private readonly driftDetector = new DriftDetector();

  constructor(client: ZendeskHttpClient) {
    this.client = client;
  }

  static fromEnv(): CustomObjectSchemaManager {
    return new CustomObjectSchemaManager(ZendeskClient.fromEnv());
  }

  async listCustomObjects(): Promise<RemoteCustomObject[]> {
    const response = await this.client.get("/custom_objects");
    return expectPayload(CustomObjectListResponseSchema, response.data, "custom objects").custom_objects;
  }

  /** The custom object with this key, or null. */
  async getCustomObject(key: string): Promise<RemoteCustomObject | null> {
    const objects = await this.listCustomObjects();
    return objects.find((object) => object.key === key) ?? null;
  }

  async createCustomObject(key: string, title: string, description = ""): Promise<RemoteCustomObject> {
    const response = await this.client.post("/custom_objects", {
      body: {
        custom_object: {
          key,
          title,
          title_pluralized: `${title}s`,
          description,
          include_in_list_view: true,
        },
      },
    });
    return expectPayload(CustomObjectResponseSchema, response.data, "custom object").custom_object;
  }

  async getOrCreateCustomObject(
    key: string,
    title: string,
    description = ""
  ): Promise<[RemoteCustomObject, boolean]> {
    const existing = await this.getCustomObject(key);
    if (existing) {
      return [existing, false];
    }
    return [await this.createCustomObject(key, title, description), true];
  }

  async listRemoteFields(objectKey: string): Promise<RemoteCustomObjectField[]> {
    const response = await this.client.get(`/custom_objects/${objectKey}/fields`);
    return expectPayload(CustomObjectFieldListResponseSchema, response.data, "custom object fields")
      .custom_object_fields;
  }

  /** Keys of the fields the custom object has. */
  async listCustomObjectFields(objectKey: string): Promise<string[]> {
    const fields = await this.listRemoteFields(objectKey);
    return fields.map((field) => field.key);
  }

  /**
   * Creates one field. The standard `name` field is never created here;
   * null is returned for it.
   */
  async createCustomObjectField(
    objectKey: string,
    definition: FieldDefinitionInput
  ): Promise<RemoteCustomObjectField | null> {
    if (definition.key === NAME_FIELD_KEY) {
      return null;
    }
    if (!isRemoteFieldType(definition.type)) {
      throw new Error(
        `Invalid field type '${definition.type}'. Must be one of ${REMOTE_FIELD_TYPES.join(", ")}.`
      );
    }

    const response = await this.client.post(`/custom_objects/${objectKey}/fields`, {
      body: { custom_object_field: definition },
    });
    return expectPayload(CustomObjectFieldResponseSchema, response.data, "custom object field")
      .custom_object_field;
  }

  /**
   * Creates the custom object of a model with all of its fields.
   */
  async createCustomObjectFromModel<F extends FieldMap>(
    model: CustomObjectModel<F>
  ): Promise<[RemoteCustomObject, boolean]> {
    const object = await this.createCustomObject(model.key, model.title, this.descriptionOf(model));
    await this.syncFields(model);
    return [object, true];
  }

  /**
   * Creates the custom object of a model unless it exists, then creates
   * whichever of its fields are missing.
   */
  async getOrCreateCustomObjectFromModel<F extends FieldMap>(
    model: CustomObjectModel<F>
  ): Promise<[RemoteCustomObject, boolean]> {
    const result = await this.getOrCreateCustomObject(model.key, model.title, this.descriptionOf(model));
    await this.syncFields(model);
    return result;
  }

  /**
   * Differences between the model's fields and the remote ones.
   */
  async detectDrift<F extends FieldMap>(model: CustomObjectModel<F>): Promise<SchemaDrift[]> {
    const remote = await this.listRemoteFields(model.key);
    return this.driftDetector.detect(model.remoteFields(), remote);
  }

  private descriptionOf<F extends FieldMap>(model: CustomObjectModel<F>): string {
    return model.description ?? `Custom Object for ${model.title}`;
  }

  private async syncFields<F extends FieldMap>(model: CustomObjectModel<F>): Promise<void> {
    const existing = new Set(await this.listCustomObjectFields(model.key));

    for (const definition of model.remoteFields()) {
      if (existing.has(definition.key)) {
        continue;
      }
      await this.createCustomObjectField(model.key, definition);
      this.client.logInfo(`Field '${definition.key}' created for Custom Object '${model.key}'.`, {
        objectKey: model.key,
        fieldKey: definition.key,
        type: definition.type,
      });
    }

    if (model.nameField) {
      await this.client.patch(`/custom_objects/${model.key}/fields/${STANDARD_NAME_FIELD}`, {
        body: model.nameField.toSettings(),
      });
    }
  }
}
