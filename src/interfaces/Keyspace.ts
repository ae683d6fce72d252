import { Entry } from '../common/Types';

export interface SetOptions {
  /** Relative time-to-live in milliseconds. */
  ttlMs?: number;
  /** Absolute expiry in epoch milliseconds; used when restoring a snapshot. */
  expiresAt?: number | null;
}

/**
 * Point-in-time copy of every live entry, tagged with the mutation
 * sequence at the instant it was taken.
 */
export interface KeyspaceView {
  readonly entries: ReadonlyArray<Readonly<Entry>>;
  readonly sequence: number;
  readonly capturedAt: number;
}

/**
 * Keys and values are byte strings (one char code per byte).
 */
export interface IKeyspaceStore {
  /** @returns whether a live entry was replaced */
  set(key: string, value: string, options?: SetOptions): boolean;
  get(key: string): string | null;
  /** @returns whether a live entry was removed */
  delete(key: string): boolean;
  exists(key: string): boolean;
  snapshotView(): KeyspaceView;

  /** @returns number of live entries removed */
  flush(): number;
  size(): number;
  getSequence(): number;

  /**
   * Physically remove up to `limit` expired entries.
   * Never changes what any read observes.
   */
  sweepExpired(limit?: number): number;
}
