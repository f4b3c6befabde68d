export type PipelineErrorKind =
  | "malformed-record"
  | "detail-unavailable"
  | "service-unavailable"
  | "configuration-invalid"
  | "storage-unavailable";

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** A card whose text does not have the title/company/location layout. */
export class MalformedRecordError extends PipelineError {
  constructor(message: string) {
    super("malformed-record", message);
  }
}

export class DetailUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("detail-unavailable", message, options);
  }
}

/** Model service or navigation session failed at the transport level. */
export class ServiceUnavailableError extends PipelineError {
  readonly service: "model" | "navigation";

  constructor(service: "model" | "navigation", message: string, options?: { cause?: unknown }) {
    super("service-unavailable", message, options);
    this.service = service;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super("configuration-invalid", message);
  }
}

export class StorageUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("storage-unavailable", message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
