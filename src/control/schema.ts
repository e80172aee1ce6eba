/**
 * Control Module - Schemas and Types
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { ControlCommand } from "../codec/index.js";
import type { ControlError } from "./errors.js";

/**
 * Operator issuing a command, as established by the auth collaborator.
 */
export type Actor = Readonly<{
  role: string;
  id?: string;
}>;

/**
 * Request body of POST /api/control.
 * The device is a free string here so unknown devices surface as
 * INVALID_DEVICE rather than a schema failure.
 */
export const ControlRequestSchema = z.object({
  device: z.string().trim().min(1).describe("Device name (fan, light, buzzer)"),
  state: z.boolean().describe("Requested on/off state"),
});

export type ControlRequest = z.infer<typeof ControlRequestSchema>;

/**
 * Outbound side of the subscriber. Must not block.
 */
export type CommandPublisher = Readonly<{
  publish: (topic: string, payload: Buffer) => void;
}>;

export type ControlDispatcher = Readonly<{
  issue: (
    device: string,
    state: boolean,
    actor: Actor,
  ) => Result<ControlCommand, ControlError>;
}>;
