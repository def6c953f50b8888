export type ExtractionErrorCode =
  | "NOT_FOUND"
  | "CORRUPT_DOCUMENT"
  | "TRANSPORT"
  | "UPSTREAM"
  | "MALFORMED_OUTPUT"
  | "SCHEMA_MISMATCH"
  | "CONFIGURATION";

/** Base class for every failure the pipeline surfaces to its caller. */
export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;

  constructor(code: ExtractionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends ExtractionError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super("NOT_FOUND", `PDF not found: ${path}`, options);
    this.path = path;
  }
}

export class CorruptDocumentError extends ExtractionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CORRUPT_DOCUMENT", message, options);
  }
}

export type TransportFailure = "network" | "timeout";

export class TransportError extends ExtractionError {
  readonly reason: TransportFailure;

  constructor(reason: TransportFailure, message: string, options?: { cause?: unknown }) {
    super("TRANSPORT", message, options);
    this.reason = reason;
  }
}

export class UpstreamError extends ExtractionError {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super("UPSTREAM", message, options);
    this.status = status;
  }
}

export class MalformedOutputError extends ExtractionError {
  /** Model text exactly as received. */
  readonly raw: string;

  constructor(raw: string) {
    super("MALFORMED_OUTPUT", `Model did not return valid JSON. Raw output:\n${raw}`);
    this.raw = raw;
  }
}

export class SchemaMismatchError extends ExtractionError {
  readonly keys: string[];

  constructor(message: string, keys: string[]) {
    super("SCHEMA_MISMATCH", message);
    this.keys = keys;
  }
}

export class ConfigurationError extends ExtractionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION", message, options);
  }
}

export function isExtractionError(e: unknown): e is ExtractionError {
  return e instanceof ExtractionError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
