/**
 * Codec error taxonomy
 *
 * Every decode/encode failure in this package is one of these. They are
 * input or programmer errors, never transient: nothing here is retried.
 */

export type CodecErrorCode =
  | "MALFORMED_FIELD"
  | "MALFORMED_VERSION_NUMBER"
  | "INVALID_FACET_OPERATION"
  | "INVALID_FACET_VALUE"
  | "CONFLICTING_FIELD_ADJUSTMENT"
  | "UNSUPPORTED_ALGORITHM";

export class CodecError extends Error {
  public readonly code: CodecErrorCode;

  constructor(message: string, code: CodecErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CodecError";
    this.code = code;
  }
}

/**
 * A required key is missing, a null appears where the schema forbids it,
 * or a value does not match its schema.
 */
export class MalformedFieldError extends CodecError {
  /** Dotted path of the offending value, e.g. `project.license.id` */
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`Malformed field "${path}": ${message}`, "MALFORMED_FIELD", options);
    this.name = "MalformedFieldError";
    this.path = path;
  }
}

export class MalformedVersionNumberError extends CodecError {
  public readonly input: string;
  public readonly reason: string;
  /** Dotted path of the key holding the version number, when decoded from an object */
  public readonly path: string | undefined;

  constructor(input: string, reason: string, path?: string) {
    const at = path ? ` at "${path}"` : "";
    super(`Malformed version number "${input}"${at}: ${reason}`, "MALFORMED_VERSION_NUMBER");
    this.name = "MalformedVersionNumberError";
    this.input = input;
    this.reason = reason;
    this.path = path;
  }
}

export class InvalidFacetOperationError extends CodecError {
  public readonly field: string;
  public readonly operation: string;

  constructor(field: string, operation: string, allowed: readonly string[]) {
    super(
      `Operation "${operation}" is not allowed on facet "${field}" (allowed: ${allowed.join(" ")})`,
      "INVALID_FACET_OPERATION"
    );
    this.name = "InvalidFacetOperationError";
    this.field = field;
    this.operation = operation;
  }
}

export class InvalidFacetValueError extends CodecError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid value for facet "${field}": ${message}`, "INVALID_FACET_VALUE");
    this.name = "InvalidFacetValueError";
    this.field = field;
  }
}

export class ConflictingFieldAdjustmentError extends CodecError {
  public readonly field: string;

  constructor(field: string) {
    super(
      `Cannot simultaneously set \`${field}\` and adjust it (with \`add_${field}\` or \`remove_${field}\`)`,
      "CONFLICTING_FIELD_ADJUSTMENT"
    );
    this.name = "ConflictingFieldAdjustmentError";
    this.field = field;
  }
}

export class UnsupportedAlgorithmError extends CodecError {
  public readonly algorithm: string;

  constructor(algorithm: string) {
    super(`Unsupported hash algorithm: ${algorithm}`, "UNSUPPORTED_ALGORITHM");
    this.name = "UnsupportedAlgorithmError";
    this.algorithm = algorithm;
  }
}

export function isCodecError(error: unknown): error is CodecError {
  return error instanceof CodecError;
}
