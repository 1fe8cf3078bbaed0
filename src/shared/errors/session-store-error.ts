/**
 * Raised when the session store cannot answer. Liveness is unknown in that case,
 * so callers must fail the request closed.
 */
export class SessionStoreUnavailableError extends Error {
  public readonly code = "SESSION_STORE_UNAVAILABLE";

  public constructor(operation: string, cause: unknown) {
    super(`Session store ${operation} failed`, { cause });
    this.name = "SessionStoreUnavailableError";
  }
}
