import * as fs from 'fs/promises';
import * as path from 'path';
import { IKeyspaceStore } from '../../interfaces/Keyspace';
import { Clock, systemClock } from '../../common/Types';
import { SnapshotError, errorMessage } from '../../common/Errors';
import { ISnapshotManager } from './ISnapshotManager';
import { SnapshotSerializer } from './SnapshotSerializer';
import {
  Snapshot,
  SnapshotLifecycle,
  CaptureState,
  CaptureResult,
  RestoreResult,
  SnapshotStats,
} from './SnapshotTypes';

export interface SnapshotManagerConfig {
  readonly snapshotPath: string;
  /** 0 disables the periodic timer. */
  readonly intervalMs: number;
  readonly snapshotOnShutdown: boolean;
  readonly restoreFallbackEmpty: boolean;
}

export interface SnapshotManagerDependencies {
  readonly store: IKeyspaceStore;
  readonly clock?: Clock;
}

export class SnapshotManager implements ISnapshotManager {
  private readonly store: IKeyspaceStore;
  private readonly clock: Clock;
  private readonly config: SnapshotManagerConfig;
  private readonly snapshotPath: string;
  private readonly tempPath: string;

  private lifecycle: SnapshotLifecycle = SnapshotLifecycle.PENDING;
  private captureState: CaptureState = CaptureState.IDLE;
  private currentCapture: Promise<CaptureResult> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private stopping: boolean = false;

  private totalCaptures: number = 0;
  private failedCaptures: number = 0;
  private lastPersistedSequence: number = 0;
  private lastCaptureTime: number | null = null;
  private lastError: string | null = null;

  constructor(dependencies: SnapshotManagerDependencies, config: SnapshotManagerConfig) {
    this.store = dependencies.store;
    this.clock = dependencies.clock ?? systemClock;
    this.config = config;
    this.snapshotPath = config.snapshotPath;
    this.tempPath = `${config.snapshotPath}.tmp`;
  }

  /**
   * Repopulate the keyspace from the latest snapshot.
   *
   * The file is fully read and verified before the first set(), so a
   * corrupt snapshot never leaves partial data behind.
   */
  public async restore(): Promise<RestoreResult> {
    if (this.lifecycle !== SnapshotLifecycle.PENDING) {
      throw new SnapshotError(`Restore already performed (state: ${this.lifecycle})`);
    }
    if (this.store.getSequence() !== 0 || this.store.size() !== 0) {
      throw new SnapshotError('Restore requires an empty keyspace');
    }

    this.lifecycle = SnapshotLifecycle.RESTORING;

    let snapshot: Snapshot | null;
    try {
      snapshot = await this.readSnapshot();
    } catch (error) {
      if (!this.config.restoreFallbackEmpty) {
        this.lifecycle = SnapshotLifecycle.PENDING;
        throw error;
      }
      console.error(`SnapshotManager: Restore failed, starting with an empty keyspace: ${errorMessage(error)}`);
      snapshot = null;
    }

    const result = snapshot === null
      ? { restored: 0, skippedExpired: 0, sequence: 0, fromFile: false }
      : this.applySnapshot(snapshot);

    this.lastPersistedSequence = this.store.getSequence();
    this.lifecycle = SnapshotLifecycle.READY;

    if (result.fromFile) {
      console.log(
        `SnapshotManager: Restored ${result.restored} keys from sequence ${result.sequence}` +
        ` (${result.skippedExpired} expired skipped)`
      );
    }

    return result;
  }

  public start(): void {
    this.ensureReady();

    if (this.timer !== null || this.config.intervalMs === 0) {
      return;
    }

    this.timer = setInterval(() => {
      this.checkAndTrigger();
    }, this.config.intervalMs);
    this.timer.unref();

    console.log(`SnapshotManager: Started (interval=${this.config.intervalMs}ms, path=${this.snapshotPath})`);
  }

  public capture(): Promise<CaptureResult> {
    return this.startCapture(false);
  }

  public async captureIfChanged(): Promise<CaptureResult | null> {
    if (!this.hasUnpersistedChanges()) {
      return null;
    }
    return this.capture();
  }

  public async stop(): Promise<void> {
    if (this.stopping) {
      return;
    }

    this.stopping = true;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (this.currentCapture) {
      try {
        await this.currentCapture;
      } catch (error) {
        console.error(`SnapshotManager: In-flight capture failed during shutdown: ${errorMessage(error)}`);
      }
    }

    if (this.config.snapshotOnShutdown && this.hasUnpersistedChanges()) {
      try {
        const result = await this.startCapture(true);
        console.log(`SnapshotManager: Final snapshot written at sequence ${result.sequence}`);
      } catch (error) {
        console.error(`SnapshotManager: Final snapshot failed: ${errorMessage(error)}`);
      }
    }

    console.log('SnapshotManager: Stopped');
  }

  public isCapturing(): boolean {
    return this.captureState === CaptureState.CAPTURING;
  }

  public getStats(): SnapshotStats {
    return {
      lifecycle: this.lifecycle,
      captureState: this.captureState,
      totalCaptures: this.totalCaptures,
      failedCaptures: this.failedCaptures,
      lastPersistedSequence: this.lastPersistedSequence,
      lastCaptureTime: this.lastCaptureTime,
      lastError: this.lastError,
    };
  }

  private checkAndTrigger(): void {
    if (this.stopping || this.isCapturing() || !this.hasUnpersistedChanges()) {
      return;
    }

    this.capture().catch((error) => {
      console.error(`SnapshotManager: Background capture failed: ${errorMessage(error)}`);
    });
  }

  private hasUnpersistedChanges(): boolean {
    return this.lifecycle === SnapshotLifecycle.READY &&
      this.store.getSequence() !== this.lastPersistedSequence;
  }

  private startCapture(duringShutdown: boolean): Promise<CaptureResult> {
    this.ensureReady();

    if (this.currentCapture) {
      return this.currentCapture;
    }

    this.captureState = CaptureState.CAPTURING;
    const run = this.executeCapture(duringShutdown).finally(() => {
      this.currentCapture = null;
      this.captureState = CaptureState.IDLE;
    });
    this.currentCapture = run;

    return run;
  }

  /**
   * 1. Take the consistent view (synchronous; the only critical section)
   * 2. Serialize the copied entries
   * 3. Write to the temp file and fsync it
   * 4. Rename over the previous snapshot
   */
  private async executeCapture(duringShutdown: boolean): Promise<CaptureResult> {
    const startTime = this.clock();

    if (this.stopping && !duringShutdown) {
      return {
        status: 'skipped',
        sequence: this.lastPersistedSequence,
        entryCount: 0,
        bytes: 0,
        durationMs: 0,
      };
    }

    const view = this.store.snapshotView();

    try {
      const buffer = SnapshotSerializer.serialize({
        sequence: view.sequence,
        createdAt: view.capturedAt,
        entries: view.entries,
      });

      await this.writeAtomically(buffer);

      this.totalCaptures++;
      this.lastPersistedSequence = view.sequence;
      this.lastCaptureTime = this.clock();
      this.lastError = null;

      return {
        status: 'written',
        sequence: view.sequence,
        entryCount: view.entries.length,
        bytes: buffer.length,
        durationMs: this.clock() - startTime,
      };
    } catch (error) {
      this.failedCaptures++;
      this.lastError = errorMessage(error);
      await this.removeTempFile();
      throw error;
    }
  }

  private async writeAtomically(buffer: Buffer): Promise<void> {
    await fs.mkdir(path.dirname(this.snapshotPath), { recursive: true });

    const handle = await fs.open(this.tempPath, 'w');
    try {
      await handle.writeFile(buffer);
      await handle.sync();
    } finally {
      await handle.close();
    }

    await fs.rename(this.tempPath, this.snapshotPath);
  }

  private async removeTempFile(): Promise<void> {
    try {
      await fs.unlink(this.tempPath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        console.warn(`SnapshotManager: Could not remove ${this.tempPath}: ${errorMessage(error)}`);
      }
    }
  }

  private async readSnapshot(): Promise<Snapshot | null> {
    let content: Buffer;
    try {
      content = await fs.readFile(this.snapshotPath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        console.log('SnapshotManager: No existing snapshot found, starting fresh');
        return null;
      }
      throw error;
    }

    return SnapshotSerializer.deserialize(content);
  }

  private applySnapshot(snapshot: Snapshot): RestoreResult {
    const now = this.clock();
    let restored = 0;
    let skippedExpired = 0;

    for (const entry of snapshot.entries) {
      if (entry.expiresAt !== null && now >= entry.expiresAt) {
        skippedExpired++;
        continue;
      }
      this.store.set(entry.key, entry.value, { expiresAt: entry.expiresAt });
      restored++;
    }

    return { restored, skippedExpired, sequence: snapshot.sequence, fromFile: true };
  }

  private ensureReady(): void {
    if (this.lifecycle !== SnapshotLifecycle.READY) {
      throw new SnapshotError('Snapshot manager not ready. Call restore() first.');
    }
  }
}
