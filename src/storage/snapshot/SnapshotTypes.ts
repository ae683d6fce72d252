/**
 * Snapshot Type Definitions
 *
 * On-disk layout (big-endian):
 *   header : magic u32 | version u16 | createdAt u64 | count u32
 *   record : keyLen u32 | key | valueLen u32 | value | flags u8 | [expiresAt u64]
 *   footer : sequence u64 | crc32 u32
 *
 * The checksum covers every byte before it.
 */

import { Entry } from '../../common/Types';

export interface Snapshot {
  readonly sequence: number;
  readonly createdAt: number;
  readonly entries: ReadonlyArray<Readonly<Entry>>;
}

export enum SnapshotLifecycle {
  PENDING = 'pending',
  RESTORING = 'restoring',
  READY = 'ready',
}

export enum CaptureState {
  IDLE = 'idle',
  CAPTURING = 'capturing',
}

export type CaptureStatus = 'written' | 'skipped';

export interface CaptureResult {
  readonly status: CaptureStatus;
  readonly sequence: number;
  readonly entryCount: number;
  readonly bytes: number;
  readonly durationMs: number;
}

export interface RestoreResult {
  readonly restored: number;
  readonly skippedExpired: number;
  readonly sequence: number;
  readonly fromFile: boolean;
}

export interface SnapshotStats {
  readonly lifecycle: SnapshotLifecycle;
  readonly captureState: CaptureState;
  readonly totalCaptures: number;
  readonly failedCaptures: number;
  readonly lastPersistedSequence: number;
  readonly lastCaptureTime: number | null;
  readonly lastError: string | null;
}

export const SNAPSHOT_MAGIC = 0x4B56534E;
export const SNAPSHOT_VERSION = 1;

export const HEADER_SIZE = 4 + 2 + 8 + 4;
export const FOOTER_SIZE = 8 + 4;

export const FLAG_HAS_EXPIRY = 0x01;
