/**
 * Store Module - Error Types
 */

export type PersistenceError =
  | {
      readonly type: "WRITE_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "READ_FAILED";
      readonly operation: string;
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a WRITE_FAILED error.
 */
export function writeFailed(message: string, cause?: Error): PersistenceError {
  if (cause) {
    return { type: "WRITE_FAILED", message, cause };
  }
  return { type: "WRITE_FAILED", message };
}

/**
 * Create a READ_FAILED error.
 */
export function readFailed(
  operation: string,
  message: string,
  cause?: Error,
): PersistenceError {
  if (cause) {
    return { type: "READ_FAILED", operation, message, cause };
  }
  return { type: "READ_FAILED", operation, message };
}

/**
 * Format a PersistenceError for logging.
 */
export function formatPersistenceError(error: PersistenceError): string {
  switch (error.type) {
    case "WRITE_FAILED":
      return `Write failed: ${error.message}`;
    case "READ_FAILED":
      return `Read failed (${error.operation}): ${error.message}`;
  }
}
