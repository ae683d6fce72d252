export type {
  Snapshot,
  CaptureStatus,
  CaptureResult,
  RestoreResult,
  SnapshotStats,
} from './SnapshotTypes';
export {
  SnapshotLifecycle,
  CaptureState,
  SNAPSHOT_MAGIC,
  SNAPSHOT_VERSION,
} from './SnapshotTypes';

export type { ISnapshotManager } from './ISnapshotManager';

export { SnapshotSerializer } from './SnapshotSerializer';
export { SnapshotManager } from './SnapshotManager';
export type { SnapshotManagerConfig, SnapshotManagerDependencies } from './SnapshotManager';
