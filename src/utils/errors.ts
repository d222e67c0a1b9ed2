export type ErrorKind =
  | "input_validation"
  | "index_store_transient"
  | "index_store_fatal"
  | "upstream_fetch"
  | "data_integrity"
  | "unexpected";

export class InputValidationError extends Error {
  readonly code = "INPUT_VALIDATION";

  constructor(message: string) {
    super(message);
    this.name = "InputValidationError";
  }
}

export class IndexStoreTransientError extends Error {
  readonly code = "INDEX_STORE_UNAVAILABLE";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IndexStoreTransientError";
  }
}

export class IndexStoreFatalError extends Error {
  readonly code = "INDEX_STORE_FATAL";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IndexStoreFatalError";
  }
}

export class UpstreamFetchError extends Error {
  readonly code = "UPSTREAM_FETCH";
  readonly stationId: number;
  readonly status: number | null;

  constructor(stationId: number, message: string, status: number | null = null) {
    super(`Arrivals for station ${stationId} failed: ${message}`);
    this.name = "UpstreamFetchError";
    this.stationId = stationId;
    this.status = status;
  }
}

export class DataIntegrityError extends Error {
  readonly code = "DATA_INTEGRITY";

  constructor(message: string) {
    super(message);
    this.name = "DataIntegrityError";
  }
}

export function classifyError(error: unknown): ErrorKind {
  if (error instanceof InputValidationError) return "input_validation";
  if (error instanceof IndexStoreTransientError) return "index_store_transient";
  if (error instanceof IndexStoreFatalError) return "index_store_fatal";
  if (error instanceof UpstreamFetchError) return "upstream_fetch";
  if (error instanceof DataIntegrityError) return "data_integrity";
  return "unexpected";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
