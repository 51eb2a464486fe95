/**
 * errors.ts - Error taxonomy shared by the pipeline, search, and entry points
 *
 * Every failure that crosses a public boundary (CLI command, MCP tool) is one
 * of four kinds. The kind is stable and machine-readable; the message is for
 * humans.
 *
 * - UNAVAILABLE: a dependency (vector index, object store, database, model)
 *   failed to initialize. Never retried automatically.
 * - NOT_FOUND: a referenced image or row does not exist in a store.
 * - INVALID_ARGUMENT: conflicting or missing parameters, rejected before I/O.
 * - INTERNAL: anything else.
 *
 * Item-level failures inside batch loops are not thrown as these errors;
 * they are collected as ItemFailure records on the run result.
 */

export type ErrorKind =
  | "UNAVAILABLE"
  | "NOT_FOUND"
  | "INVALID_ARGUMENT"
  | "INTERNAL";

/**
 * Base class for all errors this project raises on purpose.
 */
export class ImageScoutError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class UnavailableError extends ImageScoutError {
  /** Name of the dependency that could not be initialized (e.g. "vector index") */
  readonly dependency: string;

  constructor(dependency: string, reason: string, options?: { cause?: unknown }) {
    super("UNAVAILABLE", `${dependency} is unavailable: ${reason}`, options);
    this.dependency = dependency;
  }
}

export class NotFoundError extends ImageScoutError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("NOT_FOUND", message, options);
  }
}

export class InvalidArgumentError extends ImageScoutError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export class InternalError extends ImageScoutError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INTERNAL", message, options);
  }
}

/**
 * One item that failed inside a batch loop (fetch, decode, embed, or update).
 * The loop records it and moves on; the item is retried on the next run.
 */
export interface ItemFailure {
  key: string;
  message: string;
}

/**
 * The structured error shape synchronous callers receive.
 */
export interface ErrorResponse {
  kind: ErrorKind;
  message: string;
}

/**
 * Extracts a message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Converts any thrown value into an ErrorResponse.
 * Errors that did not come from this project are reported as INTERNAL.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ImageScoutError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: "INTERNAL", message: errorMessage(error) };
}
