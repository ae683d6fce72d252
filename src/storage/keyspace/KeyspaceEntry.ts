/**
 * Keyspace entry type.
 *
 * Entries are replaced, never mutated, so a reference handed to a
 * snapshot view can't change under it.
 */

export interface KeyspaceEntry {
  readonly value: string;
  readonly expiresAt: number | null;
}

export function isExpired(entry: KeyspaceEntry, now: number): boolean {
  return entry.expiresAt !== null && now >= entry.expiresAt;
}
