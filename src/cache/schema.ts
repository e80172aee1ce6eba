/**
 * Cache Module - Schemas and Types
 */
import type { DeviceStatus, Reading } from "../codec/index.js";
import { EMPTY_READING, INITIAL_DEVICE_STATUS } from "../codec/index.js";

/**
 * Point-in-time pair of the latest reading and device states.
 * Snapshots are never mutated; every write produces a new one.
 */
export type LatestSnapshot = Readonly<{
  reading: Reading;
  devices: DeviceStatus;
  /** Bumped on every write */
  version: number;
}>;

export const INITIAL_SNAPSHOT: LatestSnapshot = {
  reading: EMPTY_READING,
  devices: INITIAL_DEVICE_STATUS,
  version: 0,
};

/**
 * What a write changed.
 */
export type SnapshotChange = "reading" | "devices";

export type SnapshotListener = (
  snapshot: LatestSnapshot,
  change: SnapshotChange,
) => void;
