/**
 * Codec Module - Public API
 */

// Types
export type {
  Channel,
  ControlAck,
  ControlCommand,
  DeviceName,
  DeviceStatus,
  Reading,
  SensorMessage,
  SensorPayload,
} from "./schema.js";
export type { DecodeError } from "./errors.js";

export {
  CHANNELS,
  DEFAULT_STATUS,
  DEVICE_NAMES,
  EMPTY_READING,
  INITIAL_DEVICE_STATUS,
  isDeviceName,
} from "./schema.js";

// Error utilities
export { formatDecodeError } from "./errors.js";

// Pure transformations
export {
  decodeReading,
  decodeSensorMessage,
  encodeCommand,
  encodeReading,
  parseTimestamp,
} from "./transform.js";
