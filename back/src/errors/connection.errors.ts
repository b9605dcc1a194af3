const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
]);

// admin_shutdown, crash_shutdown, cannot_connect_now, too_many_connections
const SERVER_UNAVAILABLE_CODES = new Set(["57P01", "57P02", "57P03", "53300"]);

const CONNECTION_MESSAGE_PATTERN = /connection terminated|timeout expired/i;

/**
 * Tells whether an error thrown by `pg` means the database could not be
 * reached right now, as opposed to a query, auth or schema problem.
 */
export function isTransientConnectionError(error: unknown): boolean {
  if (error instanceof AggregateError) {
    return error.errors.some(isTransientConnectionError);
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const code =
    "code" in error && typeof error.code === "string" ? error.code : null;
  if (code !== null) {
    // SQLSTATE class 08: connection exception
    if (
      NETWORK_ERROR_CODES.has(code) ||
      SERVER_UNAVAILABLE_CODES.has(code) ||
      /^08[0-9A-Z]{3}$/.test(code)
    ) {
      return true;
    }
    return false;
  }

  return CONNECTION_MESSAGE_PATTERN.test(error.message);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
