export type DataAccessErrorKind = "ConnectionFailed" | "QueryFailed" | "WriteFailed";

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "57P03", // cannot_connect_now
]);

/**
 * Failure raised by the data access layer. `kind` tells the tool boundary
 * whether the database was unreachable or the statement itself failed.
 */
export class DataAccessError extends Error {
  readonly kind: DataAccessErrorKind;
  readonly operation: string;
  /** SQLSTATE or errno code of the underlying error, when there is one. */
  readonly code?: string;

  constructor(kind: DataAccessErrorKind, operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed: ${detail}`, { cause });
    this.name = "DataAccessError";
    this.kind = kind;
    this.operation = operation;
    this.code = errorCode(cause);
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}

/** True for errors raised before a statement could reach the server. */
export function isConnectionError(err: unknown): boolean {
  const code = errorCode(err);
  if (code) {
    // SQLSTATE class 08: connection exception
    return CONNECTION_ERROR_CODES.has(code) || code.startsWith("08");
  }
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  return msg.includes("connection terminated") || msg.includes("connect timeout");
}
