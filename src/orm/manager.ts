import type { QueryValue, RequestOptions } from "../core/types.js";
import { ZendeskApiError } from "../core/errors.js";
import { expectPayload } from "../core/payload.js";
import {
  BadRequestError,
  DeleteRecordError,
  MultipleRecordsReturnedError,
  RecordNotFoundError,
} from "./errors.js";
import type { CustomObjectModel, FieldMap } from "./model.js";
import {
  RecordCountResponseSchema,
  RecordListResponseSchema,
  RecordResponseSchema,
} from "./payloads.js";
import { buildFilter, buildSort, type StandardField } from "./query.js";
import { CustomObjectRecord, type RecordInput } from "./record.js";

/** Records requested per page when listing or searching. */
export const PAGE_SIZE = 100;

/** Filter criteria over a model's attributes and the standard fields. */
export type FilterCriteria<F extends FieldMap> = {
  [K in (keyof F & string) | StandardField]?: unknown;
};

export interface ListOptions<F extends FieldMap> {
  /** Attribute or standard field, `-` prefixed for descending order. */
  orderBy?: `${"" | "-"}${(keyof F & string) | StandardField}`;
}

export interface RecordIdLookup {
  id: string | number;
}

function isIdLookup<C>(lookup: RecordIdLookup | C): lookup is RecordIdLookup {
  return typeof lookup === "object" && lookup !== null && "id" in lookup;
}

/**
 * Record operations of one custom object model, available as
 * `model.objects`.
 */
export class RecordManager<F extends FieldMap> {
  private readonly model: CustomObjectModel<F>;

  constructor(model: CustomObjectModel<F>) {
    this.model = model;
  }

  async create(values: RecordInput<F>): Promise<CustomObjectRecord<F>> {
    return this.model.build(values).save();
  }

  /**
   * One record, by id or by criteria. Criteria must match exactly one record.
   */
  async get(lookup: RecordIdLookup | FilterCriteria<F>): Promise<CustomObjectRecord<F>> {
    if (isIdLookup(lookup)) {
      return this.getById(String(lookup.id));
    }

    const records = await this.filter(lookup);
    const [record] = records;
    if (!record) {
      throw new RecordNotFoundError(this.model.title);
    }
    if (records.length > 1) {
      throw new MultipleRecordsReturnedError(this.model.title, records.length);
    }
    return record;
  }

  async all(options: ListOptions<F> = {}): Promise<Array<CustomObjectRecord<F>>> {
    return this.collect(this.iterate(undefined, options));
  }

  /**
   * Records matching every criterion. Empty criteria list all records.
   */
  async filter(
    criteria: FilterCriteria<F>,
    options: ListOptions<F> = {}
  ): Promise<Array<CustomObjectRecord<F>>> {
    return this.collect(this.iterate(criteria, options));
  }

  /**
   * Yields records page by page, through the search endpoint when there are
   * criteria and the listing endpoint otherwise.
   */
  async *iterate(
    criteria?: FilterCriteria<F>,
    options: ListOptions<F> = {}
  ): AsyncGenerator<CustomObjectRecord<F>> {
    const query: Record<string, QueryValue> = { "page[size]": PAGE_SIZE };
    if (options.orderBy) {
      query.sort = buildSort(this.model, options.orderBy);
    }

    const filter = criteria ? buildFilter(this.model, criteria) : undefined;
    const [endpoint, request]: [string, RequestOptions] = filter
      ? [`${this.model.recordsPath}/search`, { method: "POST", query, body: { filter } }]
      : [this.model.recordsPath, { method: "GET", query }];

    for await (const page of this.model.client.paginate(endpoint, request)) {
      const { custom_object_records } = expectPayload(
        RecordListResponseSchema,
        page.data,
        "custom object records"
      );
      for (const payload of custom_object_records) {
        yield CustomObjectRecord.fromPayload(this.model, payload);
      }
    }
  }

  async delete(id: string | number): Promise<void> {
    try {
      await this.model.client.delete(`${this.model.recordsPath}/${id}`);
    } catch (error) {
      if (error instanceof ZendeskApiError) {
        throw new DeleteRecordError(
          `Error deleting ${this.model.title} record '${id}': ${error.message}`,
          error
        );
      }
      throw error;
    }
  }

  /** The most recently updated record, or null when there is none. */
  async last(): Promise<CustomObjectRecord<F> | null> {
    const response = await this.model.client.get(this.model.recordsPath, {
      query: { sort: "-updated_at", "page[size]": 1 },
    });
    const { custom_object_records } = expectPayload(
      RecordListResponseSchema,
      response.data,
      "custom object records"
    );
    const [payload] = custom_object_records;
    return payload ? CustomObjectRecord.fromPayload(this.model, payload) : null;
  }

  async count(): Promise<number> {
    const response = await this.model.client.get(`${this.model.recordsPath}/count`);
    return expectPayload(RecordCountResponseSchema, response.data, "record count").count.value;
  }

  private async getById(id: string): Promise<CustomObjectRecord<F>> {
    let data: unknown;
    try {
      data = (await this.model.client.get(`${this.model.recordsPath}/${id}`)).data;
    } catch (error) {
      if (error instanceof ZendeskApiError && error.status === 400) {
        throw new BadRequestError(error.message, { cause: error });
      }
      if (error instanceof ZendeskApiError && error.status === 404) {
        throw new RecordNotFoundError(this.model.title, id, error);
      }
      throw error;
    }
    const { custom_object_record } = expectPayload(RecordResponseSchema, data, "custom object record");
    return CustomObjectRecord.fromPayload(this.model, custom_object_record);
  }

  private async collect(
    records: AsyncIterable<CustomObjectRecord<F>>
  ): Promise<Array<CustomObjectRecord<F>>> {
    const collected: Array<CustomObjectRecord<F>> = [];
    for await (const record of records) {
      collected.push(record);
    }
    return collected;
  }
}
