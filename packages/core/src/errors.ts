export type StoreErrorCode =
  | "bad_request"
  | "unknown_method"
  | "invalid_params"
  | "io_error"
  | "internal";

export class StoreError extends Error {
  readonly code: StoreErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: StoreErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "StoreError";
    this.code = code;
    this.details = details;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function toStoreError(e: unknown): StoreError {
  if (e instanceof StoreError) return e;
  return new StoreError("internal", errorMessage(e));
}
