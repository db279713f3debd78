/** A unique constraint on a user's name or email was violated. */
export class DuplicateIdentityError extends Error {
  constructor(message = "user with same name or email already exists") {
    super(message);
    this.name = "DuplicateIdentityError";
  }
}

const PG_UNIQUE_VIOLATION = "23505";

// Socket-level failures raised by the pg client before a query reaches the server
const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "EPIPE",
]);

// admin_shutdown, crash_shutdown, cannot_connect_now
const PG_SHUTDOWN_CODES = new Set(["57P01", "57P02", "57P03"]);

// Class 08: connection exception
const PG_CONNECTION_CLASS = "08";

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return errorCode(error) === PG_UNIQUE_VIOLATION;
}

/** True when the error means the database could not be reached, not that the query failed. */
export function isConnectionFailure(error: unknown): boolean {
  const code = errorCode(error);
  if (code === undefined) return false;
  return (
    NETWORK_ERROR_CODES.has(code) ||
    PG_SHUTDOWN_CODES.has(code) ||
    (code.length === 5 && code.startsWith(PG_CONNECTION_CLASS))
  );
}
