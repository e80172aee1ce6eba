/**
 * Control Module - Error Types
 */

export type ControlError =
  | {
      readonly type: "UNAUTHORIZED";
      readonly role: string;
      readonly message: string;
    }
  | {
      readonly type: "INVALID_DEVICE";
      readonly device: string;
      readonly message: string;
    }
  | {
      readonly type: "VALIDATION_FAILED";
      readonly message: string;
      readonly issues: ReadonlyArray<string>;
    };

/**
 * Create an UNAUTHORIZED error.
 */
export function unauthorized(role: string): ControlError {
  return {
    type: "UNAUTHORIZED",
    role,
    message: `Role "${role}" may not control devices`,
  };
}

/**
 * Create an INVALID_DEVICE error.
 */
export function invalidDevice(device: string): ControlError {
  return {
    type: "INVALID_DEVICE",
    device,
    message: `Unknown device "${device}"`,
  };
}

/**
 * Create a VALIDATION_FAILED error.
 */
export function validationFailed(
  message: string,
  issues: ReadonlyArray<string> = [],
): ControlError {
  return { type: "VALIDATION_FAILED", message, issues };
}

/**
 * Format a ControlError for logging and API responses.
 */
export function formatControlError(error: ControlError): string {
  switch (error.type) {
    case "UNAUTHORIZED":
      return `Unauthorized: ${error.message}`;
    case "INVALID_DEVICE":
      return `Invalid device: ${error.message}`;
    case "VALIDATION_FAILED":
      return error.issues.length > 0
        ? `Validation failed: ${error.message} (${error.issues.join("; ")})`
        : `Validation failed: ${error.message}`;
  }
}
