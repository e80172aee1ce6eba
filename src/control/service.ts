/**
 * Control Module - Service Layer
 *
 * Authorizes and validates operator commands, applies them to the cache
 * optimistically and hands the encoded command to the publisher. The
 * device echo on the sensor topic later confirms or corrects the state.
 */
import { type Result, err, ok } from "neverthrow";

import type { LatestStateCache } from "../cache/index.js";
import type { ControlCommand } from "../codec/index.js";
import { encodeCommand, isDeviceName } from "../codec/index.js";
import { createLogger } from "../logger.js";
import type { ControlError } from "./errors.js";
import { formatControlError, invalidDevice, unauthorized } from "./errors.js";
import type { Actor, CommandPublisher, ControlDispatcher } from "./schema.js";

const log = createLogger("control");

const ANONYMOUS = "anonymous";

export type ControlDispatcherOptions = Readonly<{
  cache: LatestStateCache;
  publisher: CommandPublisher;
  controlTopic: string;
  privilegedRoles: ReadonlyArray<string>;
  now?: () => number;
}>;

export function createControlDispatcher(
  options: ControlDispatcherOptions,
): ControlDispatcher {
  const { cache, publisher, controlTopic } = options;
  const privileged = new Set(options.privilegedRoles);
  const now = options.now ?? Date.now;

  function reject(error: ControlError, actor: Actor): Result<ControlCommand, ControlError> {
    log.warn(
      { role: actor.role, actorId: actor.id ?? ANONYMOUS, errorType: error.type },
      formatControlError(error),
    );
    return err(error);
  }

  return {
    issue: (device, state, actor) => {
      if (!privileged.has(actor.role)) {
        return reject(unauthorized(actor.role), actor);
      }

      if (!isDeviceName(device)) {
        return reject(invalidDevice(device), actor);
      }

      const command: ControlCommand = {
        device,
        state,
        issuedAt: now(),
        issuedBy: actor.id ?? actor.role,
      };

      cache.setDeviceState(device, state);
      publisher.publish(controlTopic, encodeCommand(command));

      log.info(
        { device, state, issuedBy: command.issuedBy, topic: controlTopic },
        `${device} switched ${state ? "on" : "off"}`,
      );

      return ok(command);
    },
  };
}
