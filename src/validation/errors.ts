/**
 * Kinds of user-facing conversion failures. Every kind except `UnknownMember`
 * aborts the whole conversion call.
 */
export type ConversionErrorKind =
  | 'SchemaConflict'
  | 'MissingRequiredField'
  | 'MissingRequiredAttribute'
  | 'ArraySizeMismatch'
  | 'TypeConversionFailure'
  | 'UnknownMember'
  | 'RootElementMismatch';

/**
 * Base class of every expected data or schema error raised by the transforms.
 */
export class XmlBindingError extends Error {
  public readonly kind: ConversionErrorKind;
  public readonly path: string;

  constructor(kind: ConversionErrorKind, path: string, message: string) {
    super(`${message} [${path}]`);
    this.name = 'XmlBindingError';
    this.kind = kind;
    this.path = path;
    Object.setPrototypeOf(this, XmlBindingError.prototype);
  }
}

/**
 * Two fields of one record type resolve to the same qualified name.
 */
export class SchemaConflictError extends XmlBindingError {
  public readonly recordName: string;
  public readonly localName: string;

  constructor(path: string, recordName: string, localName: string) {
    super('SchemaConflict', path, `Duplicate field '${localName}' in record '${recordName}'`);
    this.name = 'SchemaConflictError';
    this.recordName = recordName;
    this.localName = localName;
    Object.setPrototypeOf(this, SchemaConflictError.prototype);
  }
}

export class MissingRequiredFieldError extends XmlBindingError {
  public readonly fieldName: string;
  public readonly recordName: string;

  constructor(path: string, recordName: string, fieldName: string) {
    super(
      'MissingRequiredField',
      path,
      `Required field '${fieldName}' of record '${recordName}' not present in XML`,
    );
    this.name = 'MissingRequiredFieldError';
    this.fieldName = fieldName;
    this.recordName = recordName;
    Object.setPrototypeOf(this, MissingRequiredFieldError.prototype);
  }
}

export class MissingRequiredAttributeError extends XmlBindingError {
  public readonly fieldName: string;
  public readonly recordName: string;

  constructor(path: string, recordName: string, fieldName: string) {
    super(
      'MissingRequiredAttribute',
      path,
      `Required attribute '${fieldName}' of record '${recordName}' not present in XML`,
    );
    this.name = 'MissingRequiredAttributeError';
    this.fieldName = fieldName;
    this.recordName = recordName;
    Object.setPrototypeOf(this, MissingRequiredAttributeError.prototype);
  }
}

export class ArraySizeMismatchError extends XmlBindingError {
  public readonly fieldName: string;
  public readonly expected: number;
  public readonly actual: number;

  constructor(path: string, fieldName: string, expected: number, actual: number) {
    super(
      'ArraySizeMismatch',
      path,
      `Array field '${fieldName}' expects ${expected} element(s) but received ${actual}`,
    );
    this.name = 'ArraySizeMismatchError';
    this.fieldName = fieldName;
    this.expected = expected;
    this.actual = actual;
    Object.setPrototypeOf(this, ArraySizeMismatchError.prototype);
  }
}

/**
 * A value could not be coerced to the expected type, or no union member matched.
 */
export class TypeConversionError extends XmlBindingError {
  constructor(path: string, message: string) {
    super('TypeConversionFailure', path, message);
    this.name = 'TypeConversionError';
    Object.setPrototypeOf(this, TypeConversionError.prototype);
  }
}

/**
 * Raised only when the unknown-element policy is `'error'`.
 */
export class UnknownMemberError extends XmlBindingError {
  public readonly localName: string;

  constructor(path: string, localName: string) {
    super('UnknownMember', path, `Element '${localName}' is not declared in the schema`);
    this.name = 'UnknownMemberError';
    this.localName = localName;
    Object.setPrototypeOf(this, UnknownMemberError.prototype);
  }
}

export class RootElementMismatchError extends XmlBindingError {
  constructor(path: string, message: string) {
    super('RootElementMismatch', path, message);
    this.name = 'RootElementMismatchError';
    Object.setPrototypeOf(this, RootElementMismatchError.prototype);
  }
}

/**
 * A programming-contract violation inside the library. Never expected at run time.
 */
export class InternalError extends Error {
  constructor(message: string) {
    super(`Internal error: ${message}`);
    this.name = 'InternalError';
    Object.setPrototypeOf(this, InternalError.prototype);
  }
}

/**
 * Represents a single validation issue found in a record (strict mode).
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Thrown when a record violates its schema before rendering (strict mode).
 */
export class RecordValidationError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues.map((i) => `  [${i.path}] ${i.message}`).join('\n');
    super(`Record validation against schema failed:\n${summary}`);
    this.name = 'RecordValidationError';
    this.issues = issues;
    Object.setPrototypeOf(this, RecordValidationError.prototype);
  }
}

/**
 * Thrown when the XML input is not well-formed or uses an undeclared prefix.
 */
export class XmlParseError extends Error {
  public readonly line?: number;
  public readonly column?: number;

  constructor(message: string, line?: number, column?: number) {
    super(line === undefined ? message : `${message} (line ${line}, column ${column ?? 0})`);
    this.name = 'XmlParseError';
    this.line = line;
    this.column = column;
    Object.setPrototypeOf(this, XmlParseError.prototype);
  }
}

/**
 * Thrown when a document-shaped mapping cannot be written as XML.
 */
export class XmlRenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'XmlRenderError';
    Object.setPrototypeOf(this, XmlRenderError.prototype);
  }
}

/**
 * Thrown when the XSD file cannot be read or parsed.
 */
export class XsdParseError extends Error {
  // Explicit declaration needed as Error.cause requires lib ES2022+.
  public readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'XsdParseError';
    this.cause = cause;
    Object.setPrototypeOf(this, XsdParseError.prototype);
  }
}

/**
 * Thrown when a JSON schema descriptor does not describe a valid schema.
 */
export class SchemaDescriptorError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const summary = issues.map((i) => `  [${i.path}] ${i.message}`).join('\n');
    super(`Invalid schema descriptor:\n${summary}`);
    this.name = 'SchemaDescriptorError';
    this.issues = issues;
    Object.setPrototypeOf(this, SchemaDescriptorError.prototype);
  }
}
