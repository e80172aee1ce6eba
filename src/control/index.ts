/**
 * Control Module - Public API
 */

// Types
export type {
  Actor,
  CommandPublisher,
  ControlDispatcher,
  ControlRequest,
} from "./schema.js";
export type { ControlError } from "./errors.js";

// Schemas
export { ControlRequestSchema } from "./schema.js";

// Error utilities
export { formatControlError, validationFailed } from "./errors.js";

// Service functions
export { createControlDispatcher } from "./service.js";
