// Swing Coach - Error taxonomy
//
// Transient and connectivity errors are absorbed by the pipeline (retry or
// pause). Content rejection and validation failure end a session in FAILED.
// Local storage errors surface immediately and leave the session where it was.

export type PipelineErrorKind =
  | "transient"
  | "connectivity"
  | "content_rejected"
  | "validation_failure"
  | "local_storage";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransientError extends PipelineError {
  readonly kind = "transient";
}

export class ConnectivityError extends PipelineError {
  readonly kind = "connectivity";
}

export class ContentRejectedError extends PipelineError {
  readonly kind = "content_rejected";
}

export class ValidationFailureError extends PipelineError {
  readonly kind = "validation_failure";

  constructor(
    message: string,
    readonly rawPayload: string,
  ) {
    super(message);
  }
}

export class LocalStorageError extends PipelineError {
  readonly kind = "local_storage";
}

// ─── Classification helpers ─────────────────────────────────────────────────────

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

/** Statuses worth retrying: rate limits and server-side trouble. */
const TRANSIENT_HTTP_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) return undefined;
  return Reflect.get(value, key);
}

/** HTTP status carried by an SDK error (`status` or `code`), if any. */
export function httpStatusOf(err: unknown): number | undefined {
  for (const key of ["status", "code"]) {
    const value = readProperty(err, key);
    if (typeof value === "number" && value >= 100 && value < 600) return value;
  }
  return undefined;
}

/** True for socket-level failures, including ones wrapped as `cause`. */
export function isNetworkError(err: unknown): boolean {
  let current: unknown = err;
  for (let depth = 0; depth < 4 && current !== undefined; depth++) {
    const code = readProperty(current, "code");
    if (typeof code === "string" && NETWORK_ERROR_CODES.has(code)) return true;
    if (current instanceof TypeError && current.message === "fetch failed") return true;
    current = readProperty(current, "cause");
  }
  return false;
}

export function isTransientHttpStatus(status: number): boolean {
  return TRANSIENT_HTTP_STATUSES.has(status);
}

/**
 * Map an error thrown by a remote call onto the taxonomy. Errors already in
 * the taxonomy pass through; unknown errors are treated as transient.
 */
export function classifyRemoteError(err: unknown, context: string): PipelineError {
  if (err instanceof PipelineError) return err;
  if (isAbortError(err)) return new TransientError(`${context}: aborted`, { cause: err });
  if (isNetworkError(err)) {
    return new ConnectivityError(`${context}: ${errorMessage(err)}`, { cause: err });
  }
  const status = httpStatusOf(err);
  if (status !== undefined && !isTransientHttpStatus(status) && status >= 400 && status < 500) {
    return new ContentRejectedError(`${context}: rejected (${status}) ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return new TransientError(`${context}: ${errorMessage(err)}`, { cause: err });
}

/** Transient and connectivity failures are worth another attempt. */
export function isRetryable(err: PipelineError): boolean {
  return err instanceof TransientError || err instanceof ConnectivityError;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

// ─── Request errors (orchestrator API) ──────────────────────────────────────────

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
    this.name = "SessionNotFoundError";
  }
}

export class InvalidSessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSessionStateError";
  }
}
