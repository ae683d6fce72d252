/**
 * ExpirationSweeper - periodic reclamation of expired entries.
 *
 * Reads already treat expired entries as absent, so this only frees memory
 * held by keys nobody touches again. Each pass is bounded by sampleSize to
 * keep its critical section short.
 */

import { IKeyspaceStore } from '../../interfaces/Keyspace';
import { Clock, systemClock } from '../../common/Types';
import { IExpirationSweeper, SweeperStats } from './IExpirationSweeper';

export interface ExpirationSweeperConfig {
  /** 0 disables the timer; runOnce() still works. */
  readonly intervalMs: number;
  readonly sampleSize: number;
}

export interface ExpirationSweeperDependencies {
  readonly store: IKeyspaceStore;
  readonly clock?: Clock;
}

export class ExpirationSweeper implements IExpirationSweeper {
  private readonly store: IKeyspaceStore;
  private readonly clock: Clock;
  private readonly config: ExpirationSweeperConfig;

  private timer: ReturnType<typeof setInterval> | null = null;
  private totalSweeps: number = 0;
  private totalRemoved: number = 0;
  private lastSweepTime: number | null = null;

  constructor(dependencies: ExpirationSweeperDependencies, config: ExpirationSweeperConfig) {
    this.store = dependencies.store;
    this.clock = dependencies.clock ?? systemClock;
    this.config = config;
  }

  public start(): void {
    if (this.timer !== null || this.config.intervalMs === 0) {
      return;
    }

    this.timer = setInterval(() => {
      this.runOnce();
    }, this.config.intervalMs);
    this.timer.unref();

    console.log(`ExpirationSweeper: Started (interval=${this.config.intervalMs}ms, sample=${this.config.sampleSize})`);
  }

  public stop(): void {
    if (this.timer === null) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;
    console.log('ExpirationSweeper: Stopped');
  }

  public runOnce(): number {
    const removed = this.store.sweepExpired(this.config.sampleSize);

    this.totalSweeps++;
    this.totalRemoved += removed;
    this.lastSweepTime = this.clock();

    return removed;
  }

  public getStats(): SweeperStats {
    return {
      totalSweeps: this.totalSweeps,
      totalRemoved: this.totalRemoved,
      lastSweepTime: this.lastSweepTime,
      running: this.timer !== null,
    };
  }
}
