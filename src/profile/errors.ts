export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}

export class UnknownFieldError extends Error {
  constructor(readonly fieldId: string) {
    super(`Unknown profile field: ${fieldId}`);
    this.name = "UnknownFieldError";
  }
}

export class UnsupportedFieldTypeError extends Error {
  constructor(
    readonly fieldId: string,
    readonly fieldType: string,
    readonly valueKind: string
  ) {
    super(`Field ${fieldId} (${fieldType}) cannot normalize a ${valueKind} value`);
    this.name = "UnsupportedFieldTypeError";
  }
}

export class DuplicatePersonError extends Error {
  constructor(readonly personId: string) {
    super(`Person ${personId} appears more than once`);
    this.name = "DuplicatePersonError";
  }
}
