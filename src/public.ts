/**
 * Public API surface: the stable contract for consumers.
 *
 * src/index.ts re-exports this and adds the lower-level building blocks
 * (adapter, pipeline, sanitizers). Everything else is internal.
 */

// HTTP client
export { ZendeskClient, MAX_PAGES } from "./client.js";
export type { ZendeskHttpClient } from "./client.js";
export { loadConfig } from "./config/env.js";
export type { Environment } from "./config/env.js";

// Core types - consumer contracts
export type {
  ClientConfig,
  AuthConfig,
  NormalizedResponse,
  ResponseMeta,
  PaginationInfo,
  RateLimitInfo,
  RequestOptions,
  HttpMethod,
  QueryValue,
  FetchLike,
} from "./core/types.js";

// Errors
export { ZendeskApiError, ConfigurationError } from "./core/errors.js";
export type { ZendeskErrorCategory } from "./core/types.js";
export {
  ModelError,
  FieldTypeError,
  InvalidChoiceError,
  InvalidDateFormatError,
  InvalidRegexError,
  RegexCompileError,
  UniqueConstraintError,
  CreateRecordError,
  UpdateRecordError,
  DeleteRecordError,
  BadRequestError,
  RecordNotFoundError,
  MultipleRecordsReturnedError,
  UnsavedRecordError,
} from "./orm/errors.js";

// Observability extension point
export type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "./core/types.js";

// Built-in observability adapters
export { ConsoleObservability } from "./observability/console.js";
export { NoOpObservability } from "./observability/noop.js";

// Models
export { defineCustomObject, CustomObjectModel } from "./orm/model.js";
export type { CustomObjectDefinition, FieldMap, ModelOptions } from "./orm/model.js";
export { CustomObjectRecord } from "./orm/record.js";
export type { RecordInput, RecordValues, StandardAttributes } from "./orm/record.js";
export { RecordManager } from "./orm/manager.js";
export type { FilterCriteria, ListOptions, RecordIdLookup } from "./orm/manager.js";
export type { FilterOperator } from "./orm/query.js";

// Fields
export {
  Field,
  NameField,
  TextField,
  TextareaField,
  CheckboxField,
  DateField,
  DateTimeField,
  IntegerField,
  DecimalField,
  RegexpField,
  DropdownField,
  MultiselectField,
  LookupField,
  AttachmentField,
} from "./orm/fields.js";
export type {
  Choice,
  FieldOptions,
  RemoteFieldDefinition,
  RemoteFieldType,
  ValueOf,
  InputOf,
} from "./orm/fields.js";

// Schema management
export { CustomObjectSchemaManager } from "./schema/object-manager.js";
export type { FieldDefinitionInput } from "./schema/object-manager.js";
export type { SchemaDrift, SchemaDriftType } from "./schema/drift-detector.js";

// Attachments
export { FileManager } from "./files/file-manager.js";
export type { AttachmentDetails, UploadResult } from "./files/file-manager.js";
export { AttachmentFile } from "./files/attachment.js";
