/**
 * Codec Module - Error Types
 *
 * Inbound payloads that cannot be turned into a Reading.
 */

export type DecodeError =
  | {
      readonly type: "MALFORMED_PAYLOAD";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "MISSING_REQUIRED_FIELD";
      readonly message: string;
      readonly received: string;
    };

/**
 * Create a MALFORMED_PAYLOAD error.
 */
export function malformedPayload(message: string, cause?: Error): DecodeError {
  if (cause) {
    return { type: "MALFORMED_PAYLOAD", message, cause };
  }
  return { type: "MALFORMED_PAYLOAD", message };
}

/**
 * Create a MISSING_REQUIRED_FIELD error.
 */
export function missingRequiredField(
  message: string,
  received: string,
): DecodeError {
  return { type: "MISSING_REQUIRED_FIELD", message, received };
}

/**
 * Format a DecodeError for logging.
 */
export function formatDecodeError(error: DecodeError): string {
  switch (error.type) {
    case "MALFORMED_PAYLOAD":
      return `Malformed payload: ${error.message}`;
    case "MISSING_REQUIRED_FIELD":
      return `Not a reading (${error.received}): ${error.message}`;
  }
}
