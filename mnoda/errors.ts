
export class MnodaError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised while decoding or validating a document. Never recovered internally:
 * one bad record or relationship aborts the whole decode.
 */
export class SchemaError extends MnodaError {}

export class MissingFieldError extends SchemaError {
  constructor(
    readonly fieldName: string,
    readonly typeName: string
  ) {
    super(`The required field '${fieldName}' is missing from ${typeName}.`);
  }
}

export class InvalidFieldTypeError extends SchemaError {
  constructor(
    readonly fieldName: string,
    readonly typeName: string,
    readonly expected: string,
    readonly actual: string
  ) {
    super(`The field '${fieldName}' of ${typeName} must be ${expected}. Found '${actual}' instead.`);
  }
}

export class EmptyFieldError extends SchemaError {
  constructor(
    readonly fieldName: string,
    readonly typeName: string
  ) {
    super(`The field '${fieldName}' of ${typeName} must not be empty.`);
  }
}

export class DocumentSyntaxError extends SchemaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Document is not valid JSON: ${message}`, options);
  }
}

export type DocumentOperation = 'load' | 'save';

export class DocumentIOError extends MnodaError {
  constructor(
    readonly path: string,
    readonly operation: DocumentOperation,
    cause: unknown
  ) {
    super(`Failed to ${operation} document '${path}': ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}
