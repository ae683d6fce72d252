/**
 * Common type definitions for the KV server.
 * These types are shared by the keyspace, the snapshot layer and the API layers.
 */

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export interface KVPair {
  key: string;
  value: string;
}

export interface EntryMetadata {
  /** Absolute epoch milliseconds; null means the entry never expires. */
  expiresAt: number | null;
}

export interface Entry extends KVPair, EntryMetadata {}
