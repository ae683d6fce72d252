import { CaptureResult, RestoreResult, SnapshotStats } from './SnapshotTypes';

/**
 * Interface for snapshot persistence.
 *
 * Lifecycle:
 * 1. restore() - Load the latest snapshot into an empty keyspace (once)
 * 2. start() - Begin periodic captures
 * 3. capture() - On-demand capture; concurrent calls share one run
 * 4. stop() - Cancel the timer, drain, optionally write a final snapshot
 */
export interface ISnapshotManager {
  restore(): Promise<RestoreResult>;

  start(): void;

  capture(): Promise<CaptureResult>;

  captureIfChanged(): Promise<CaptureResult | null>;

  stop(): Promise<void>;

  isCapturing(): boolean;

  getStats(): SnapshotStats;
}
