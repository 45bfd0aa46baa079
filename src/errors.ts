/**
 * Classification of a decode failure.
 */
export type DecodeFailure =
  | "truncated-stream"
  | "unknown-wire-type"
  | "invalid-encoding"
  | "malformed-varint"
  | "invalid-tag"
  | "unsupported-group";

/**
 * Base error class for wire codec errors.
 */
export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CodecError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends CodecError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends CodecError {
  constructor(
    message: string,
    public readonly reason: DecodeFailure
  ) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when the input ends before a value is complete.
 */
export class BufferUnderflowError extends DecodeError {
  constructor(needed: number, available: number) {
    super(`Buffer underflow: needed ${needed} bytes, only ${available} available`, "truncated-stream");
    this.name = "BufferUnderflowError";
  }
}

/**
 * Error thrown when a tag carries an unassigned wire type.
 */
export class UnknownWireTypeError extends DecodeError {
  constructor(public readonly wireType: number) {
    super(`Unknown wire type: ${wireType}`, "unknown-wire-type");
    this.name = "UnknownWireTypeError";
  }
}

/**
 * Error thrown when a string payload is not valid UTF-8.
 */
export class InvalidStringError extends DecodeError {
  constructor(length: number) {
    super(`Invalid UTF-8 in ${length}-byte string payload`, "invalid-encoding");
    this.name = "InvalidStringError";
  }
}

/**
 * Codes of the generator's fatal errors.
 */
export enum GeneratorErrorCode {
  SCHEMA_NOT_FOUND = "SCHEMA_NOT_FOUND",
  ORACLE_FAILED = "ORACLE_FAILED",
  MALFORMED_ORACLE_OUTPUT = "MALFORMED_ORACLE_OUTPUT",
  UNSUPPORTED_FIELD_KIND = "UNSUPPORTED_FIELD_KIND",
  NON_CANONICAL_ENCODING = "NON_CANONICAL_ENCODING",
  INVALID_CORPUS = "INVALID_CORPUS",
  ARTIFACT_STALE = "ARTIFACT_STALE",
  INVALID_CONFIG = "INVALID_CONFIG",
}

/**
 * Where a generator error happened.
 */
export interface ErrorContext {
  /** Failing operation, e.g. "oracle.encode" */
  operation: string;
  /** Field or case being processed */
  field?: string;
  details?: Record<string, unknown>;
}

/**
 * Base class for errors that abort a generation run.
 */
export class GeneratorError extends Error {
  public readonly operation: string;
  public readonly field?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    public readonly code: GeneratorErrorCode,
    message: string,
    context: ErrorContext
  ) {
    super(context.field ? `${context.operation} [${context.field}]: ${message}` : `${context.operation}: ${message}`);
    this.name = "GeneratorError";
    this.operation = context.operation;
    this.field = context.field;
    this.details = context.details;
  }
}

export class SchemaNotFoundError extends GeneratorError {
  constructor(public readonly schemaPath: string, context: ErrorContext) {
    super(GeneratorErrorCode.SCHEMA_NOT_FOUND, `schema file not found: ${schemaPath}`, context);
    this.name = "SchemaNotFoundError";
  }
}

export class OracleInvocationError extends GeneratorError {
  constructor(message: string, context: ErrorContext) {
    super(GeneratorErrorCode.ORACLE_FAILED, message, context);
    this.name = "OracleInvocationError";
  }
}

export class MalformedOracleOutputError extends GeneratorError {
  constructor(message: string, context: ErrorContext) {
    super(GeneratorErrorCode.MALFORMED_ORACLE_OUTPUT, message, context);
    this.name = "MalformedOracleOutputError";
  }
}

export class UnsupportedFieldKindError extends GeneratorError {
  constructor(kind: string, context: ErrorContext) {
    super(GeneratorErrorCode.UNSUPPORTED_FIELD_KIND, `unsupported field kind: ${kind}`, context);
    this.name = "UnsupportedFieldKindError";
  }
}

/**
 * Re-encoding a canonical value did not reproduce the oracle bytes.
 */
export class NonCanonicalEncodingError extends GeneratorError {
  constructor(message: string, context: ErrorContext) {
    super(GeneratorErrorCode.NON_CANONICAL_ENCODING, message, context);
    this.name = "NonCanonicalEncodingError";
  }
}

export class CorpusError extends GeneratorError {
  constructor(message: string, context: ErrorContext) {
    super(GeneratorErrorCode.INVALID_CORPUS, message, context);
    this.name = "CorpusError";
  }
}

/**
 * Check mode found artifacts that differ from a fresh render.
 */
export class ArtifactStaleError extends GeneratorError {
  constructor(public readonly paths: string[]) {
    super(GeneratorErrorCode.ARTIFACT_STALE, `stale artifacts: ${paths.join(", ")}`, {
      operation: "artifact.check",
    });
    this.name = "ArtifactStaleError";
  }
}

export class ConfigError extends GeneratorError {
  constructor(public readonly issues: string[]) {
    super(GeneratorErrorCode.INVALID_CONFIG, issues.join("; "), { operation: "config.load" });
    this.name = "ConfigError";
  }
}
