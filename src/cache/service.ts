/**
 * Cache Module - Service Layer
 *
 * In-memory holder of the latest reading and device states.
 *
 * The whole snapshot is replaced in one assignment, so readers either see
 * the pair before a write or the pair after it. Nothing here awaits.
 */
import type { DeviceName, DeviceStatus, Reading } from "../codec/index.js";
import { DEVICE_NAMES } from "../codec/index.js";
import { createLogger } from "../logger.js";
import type {
  LatestSnapshot,
  SnapshotChange,
  SnapshotListener,
} from "./schema.js";
import { INITIAL_SNAPSHOT } from "./schema.js";

const log = createLogger("cache");

export type LatestStateCache = Readonly<{
  get: () => LatestSnapshot;
  setReading: (reading: Reading) => void;
  setDeviceState: (device: DeviceName, state: boolean) => void;
  applyDeviceStatus: (devices: Partial<Record<DeviceName, boolean>>) => void;
  subscribe: (listener: SnapshotListener) => () => void;
}>;

/**
 * Create a cache holding the initial (empty) snapshot.
 */
export function createLatestStateCache(
  initial: LatestSnapshot = INITIAL_SNAPSHOT,
): LatestStateCache {
  let snapshot: LatestSnapshot = Object.freeze({ ...initial });
  const listeners = new Set<SnapshotListener>();

  function commit(next: Omit<LatestSnapshot, "version">, change: SnapshotChange): void {
    snapshot = Object.freeze({ ...next, version: snapshot.version + 1 });

    for (const listener of listeners) {
      try {
        listener(snapshot, change);
      } catch (error) {
        log.error(
          { change, error: error instanceof Error ? error.message : String(error) },
          "Snapshot listener failed",
        );
      }
    }
  }

  return {
    get: () => snapshot,

    setReading: (reading) => {
      commit({ reading, devices: snapshot.devices }, "reading");
    },

    setDeviceState: (device, state) => {
      const devices: DeviceStatus = { ...snapshot.devices, [device]: state };
      commit({ reading: snapshot.reading, devices }, "devices");
    },

    applyDeviceStatus: (update) => {
      const devices: Record<DeviceName, boolean> = { ...snapshot.devices };
      let changed = false;

      for (const name of DEVICE_NAMES) {
        const state = update[name];
        if (state !== undefined && state !== devices[name]) {
          devices[name] = state;
          changed = true;
        }
      }

      if (!changed) {
        log.debug({ devices }, "Device echo matches cached state");
        return;
      }

      log.info({ devices }, "Device status corrected from echo");
      commit({ reading: snapshot.reading, devices }, "devices");
    },

    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
