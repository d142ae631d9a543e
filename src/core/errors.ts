export type LookupErrorCode =
  | "DICTIONARY_LOAD"
  | "CONFIG"
  | "INVALID_STATE"
  | "CANCELLED"
  | "BACKEND_TRANSIENT"
  | "INVALID_ARGUMENT";

export interface FieldError {
  path: string;
  message: string;
}

export abstract class LookupError extends Error {
  abstract readonly code: LookupErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Dictionary or frequency source could not be read. Fatal at startup. */
export class DictionaryLoadError extends LookupError {
  readonly code = "DICTIONARY_LOAD";

  constructor(readonly source: string, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, options);
  }
}

export class ConfigError extends LookupError {
  readonly code = "CONFIG";

  constructor(readonly file: string | undefined, readonly errors: FieldError[], options?: { cause?: unknown }) {
    super(`invalid configuration${file ? ` in ${file}` : ""}: ${errors.map((e) => `${e.path} ${e.message}`).join("; ")}`, options);
  }
}

export class InvalidStateError extends LookupError {
  readonly code = "INVALID_STATE";

  constructor(readonly state: string, readonly request: string) {
    super(`${request} is not allowed while the session is ${state}`);
  }
}

export class RequestCancelledError extends LookupError {
  readonly code = "CANCELLED";

  constructor(message = "request cancelled") {
    super(message);
  }
}

/** A live query against the on-disk store failed; only that request is affected. */
export class BackendTransientError extends LookupError {
  readonly code = "BACKEND_TRANSIENT";
}

export class InvalidArgumentError extends LookupError {
  readonly code = "INVALID_ARGUMENT";
}

export function isLookupError(e: unknown): e is LookupError {
  return e instanceof LookupError;
}
