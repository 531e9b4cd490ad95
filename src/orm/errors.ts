/**
 * Errors raised by model definitions, field validation and record operations.
 * HTTP failures stay ZendeskApiError; these wrap them where a record
 * operation gives them meaning (kept as `cause`).
 */

export class ModelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FieldTypeError extends ModelError {
  readonly field: string;
  readonly expected: string;

  constructor(field: string, expected: string) {
    super(`Field '${field}' expects a value of type ${expected}.`);
    this.field = field;
    this.expected = expected;
  }
}

export class InvalidChoiceError extends ModelError {
  readonly field: string;
  readonly value: string;

  constructor(field: string, value: string) {
    super(`'${value}' is not a valid choice for field '${field}'.`);
    this.field = field;
    this.value = value;
  }
}

export class InvalidDateFormatError extends ModelError {
  readonly field: string;

  constructor(field: string) {
    super(`Field '${field}' expects a date in YYYY-MM-DD format.`);
    this.field = field;
  }
}

export class InvalidRegexError extends ModelError {
  readonly field: string;
  readonly value: string;

  constructor(field: string, value: string) {
    super(`Value '${value}' does not match the pattern of field '${field}'.`);
    this.field = field;
    this.value = value;
  }
}

export class RegexCompileError extends ModelError {
  readonly field: string;

  constructor(field: string, cause?: unknown) {
    super(`The pattern of field '${field}' is not a valid regular expression.`, { cause });
    this.field = field;
  }
}

export class UniqueConstraintError extends ModelError {
  readonly value: string | null;

  constructor(value: string | null, cause?: unknown) {
    super(`A record named '${value ?? ""}' already exists.`, { cause });
    this.value = value;
  }
}

export class CreateRecordError extends ModelError {
  constructor(message = "Error creating record", cause?: unknown) {
    super(message, { cause });
  }
}

export class UpdateRecordError extends ModelError {
  constructor(message = "Error updating record", cause?: unknown) {
    super(message, { cause });
  }
}

export class DeleteRecordError extends ModelError {
  constructor(message = "Error deleting record", cause?: unknown) {
    super(message, { cause });
  }
}

export class BadRequestError extends ModelError {}

export class RecordNotFoundError extends ModelError {
  readonly model: string;
  readonly recordId: string | undefined;

  constructor(model: string, recordId?: string, cause?: unknown) {
    super(
      recordId === undefined
        ? `${model} matching query does not exist.`
        : `${model} record '${recordId}' does not exist.`,
      { cause }
    );
    this.model = model;
    this.recordId = recordId;
  }
}

export class MultipleRecordsReturnedError extends ModelError {
  readonly model: string;
  readonly count: number;

  constructor(model: string, count: number) {
    super(`Multiple ${model} records returned (${count}); expected exactly one.`);
    this.model = model;
    this.count = count;
  }
}

export class UnsavedRecordError extends ModelError {
  constructor(message = "The record has not been saved yet and has no id.") {
    super(message);
  }
}
