/**
 * KeyspaceStore - the single shared mutable keyspace.
 *
 * Every public method is synchronous and runs to completion on the event
 * loop, so each call is its own critical section: no other call can observe
 * a half-applied mutation, and no call ever waits on I/O or a client.
 *
 * Expiration is lazy. An entry past its expiresAt is treated as absent by the
 * same call that reads it, and removed right there.
 */

import { Clock, Entry, systemClock } from '../../common/Types';
import { IKeyspaceStore, KeyspaceView, SetOptions } from '../../interfaces/Keyspace';
import { KeyspaceEntry, isExpired } from './KeyspaceEntry';

export interface KeyspaceStoreDependencies {
  clock?: Clock;
}

export class KeyspaceStore implements IKeyspaceStore {
  private readonly data = new Map<string, KeyspaceEntry>();
  private readonly clock: Clock;
  private sequence: number = 0;

  constructor(dependencies?: KeyspaceStoreDependencies) {
    this.clock = dependencies?.clock ?? systemClock;
  }

  set(key: string, value: string, options?: SetOptions): boolean {
    const now = this.clock();
    const previous = this.data.get(key);
    const previousExisted = previous !== undefined && !isExpired(previous, now);

    this.data.set(key, {
      value,
      expiresAt: this.resolveExpiry(now, options),
    });
    this.sequence++;

    return previousExisted;
  }

  get(key: string): string | null {
    const entry = this.readLive(key);
    return entry === null ? null : entry.value;
  }

  delete(key: string): boolean {
    const entry = this.data.get(key);
    if (entry === undefined) {
      return false;
    }

    this.data.delete(key);

    // An expired entry was already absent; removing it is not a write.
    if (isExpired(entry, this.clock())) {
      return false;
    }

    this.sequence++;
    return true;
  }

  exists(key: string): boolean {
    return this.readLive(key) !== null;
  }

  snapshotView(): KeyspaceView {
    const now = this.clock();
    const entries: Entry[] = [];

    for (const [key, entry] of this.data) {
      if (!isExpired(entry, now)) {
        entries.push({ key, value: entry.value, expiresAt: entry.expiresAt });
      }
    }

    return {
      entries,
      sequence: this.sequence,
      capturedAt: now,
    };
  }

  flush(): number {
    const removed = this.size();
    this.data.clear();

    if (removed > 0) {
      this.sequence++;
    }
    return removed;
  }

  size(): number {
    const now = this.clock();
    let live = 0;
    for (const entry of this.data.values()) {
      if (!isExpired(entry, now)) {
        live++;
      }
    }
    return live;
  }

  getSequence(): number {
    return this.sequence;
  }

  sweepExpired(limit: number = Number.POSITIVE_INFINITY): number {
    const now = this.clock();
    let removed = 0;

    for (const [key, entry] of this.data) {
      if (removed >= limit) {
        break;
      }
      if (isExpired(entry, now)) {
        this.data.delete(key);
        removed++;
      }
    }

    return removed;
  }

  private readLive(key: string): KeyspaceEntry | null {
    const entry = this.data.get(key);
    if (entry === undefined) {
      return null;
    }

    if (isExpired(entry, this.clock())) {
      this.data.delete(key);
      return null;
    }

    return entry;
  }

  private resolveExpiry(now: number, options?: SetOptions): number | null {
    if (options?.expiresAt !== undefined) {
      return options.expiresAt;
    }
    if (options?.ttlMs !== undefined) {
      return now + options.ttlMs;
    }
    return null;
  }
}
