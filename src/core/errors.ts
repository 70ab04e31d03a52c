export type ErrorCode = "CONFIGURATION" | "BOOKMARK" | "UNSUPPORTED_KEY" | "SOURCE" | "SINK";

export class TapError extends Error {
  code: ErrorCode;
  details?: unknown;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown; details?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.details = options?.details;
  }
}

/** Missing or invalid config, catalog, metadata or state input. */
export class ConfigurationError extends TapError {
  constructor(message: string, details?: unknown) {
    super("CONFIGURATION", message, { details });
  }
}

/** A stored bookmark value/type pair that cannot be turned back into a query bound. */
export class BookmarkError extends TapError {
  constructor(message: string, cause?: unknown) {
    super("BOOKMARK", message, { cause });
  }
}

export class UnsupportedKeyTypeError extends TapError {
  constructor(typeName: string) {
    super("UNSUPPORTED_KEY", `${typeName} is not a supported replication key type`);
  }
}

export class SourceError extends TapError {
  constructor(message: string, cause?: unknown) {
    super("SOURCE", message, { cause });
  }
}

export class SinkError extends TapError {
  constructor(message: string, cause?: unknown) {
    super("SINK", message, { cause });
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
