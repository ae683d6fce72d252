import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { SnapshotManager, SnapshotManagerConfig } from '../../src/storage/snapshot';
import { KeyspaceStore } from '../../src/storage/keyspace';
import { SnapshotCorruptError, SnapshotError } from '../../src/common/Errors';

describe('SnapshotManager', () => {
  let dir: string;
  let snapshotPath: string;
  let now: number;
  const clock = (): number => now;

  function createManager(
    store: KeyspaceStore,
    overrides: Partial<SnapshotManagerConfig> = {},
  ): SnapshotManager {
    return new SnapshotManager({ store, clock }, {
      snapshotPath,
      intervalMs: 0,
      snapshotOnShutdown: false,
      restoreFallbackEmpty: false,
      ...overrides,
    });
  }

  async function restoreInto(): Promise<KeyspaceStore> {
    const store = new KeyspaceStore({ clock });
    await createManager(store).restore();
    return store;
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'snapkv-snapshot-'));
    snapshotPath = path.join(dir, 'nested', 'dump.snap');
    now = 1_000_000;
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('restore', () => {
    it('starts empty when no snapshot exists', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store);

      await expect(manager.restore()).resolves.toEqual({
        restored: 0,
        skippedExpired: 0,
        sequence: 0,
        fromFile: false,
      });
      expect(manager.getStats().lifecycle).toBe('ready');
    });

    it('can only run once', async () => {
      const manager = createManager(new KeyspaceStore({ clock }));
      await manager.restore();

      await expect(manager.restore()).rejects.toThrow('Restore already performed (state: ready)');
    });

    it('refuses a keyspace that already holds data', async () => {
      const store = new KeyspaceStore({ clock });
      store.set('k', 'v');

      await expect(createManager(store).restore()).rejects.toThrow('Restore requires an empty keyspace');
    });

    it('refuses to start from a corrupt snapshot', async () => {
      await fs.mkdir(path.dirname(snapshotPath), { recursive: true });
      await fs.writeFile(snapshotPath, 'not a snapshot at all, definitely');
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store);

      await expect(manager.restore()).rejects.toThrow(SnapshotCorruptError);
      expect(manager.getStats().lifecycle).toBe('pending');
      expect(store.size()).toBe(0);
    });

    it('falls back to an empty keyspace when configured', async () => {
      await fs.mkdir(path.dirname(snapshotPath), { recursive: true });
      await fs.writeFile(snapshotPath, 'not a snapshot at all, definitely');
      const manager = createManager(new KeyspaceStore({ clock }), { restoreFallbackEmpty: true });

      await expect(manager.restore()).resolves.toEqual({
        restored: 0,
        skippedExpired: 0,
        sequence: 0,
        fromFile: false,
      });
      expect(manager.getStats().lifecycle).toBe('ready');
    });
  });

  describe('capture', () => {
    it('requires restore first', () => {
      const manager = createManager(new KeyspaceStore({ clock }));

      expect(() => manager.capture()).toThrow(SnapshotError);
      expect(() => manager.capture()).toThrow('Snapshot manager not ready. Call restore() first.');
    });

    it('writes a snapshot that restores to the same live keyspace', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store);
      await manager.restore();

      store.set('a', '1');
      store.set('b', '2', { ttlMs: 1_000 });
      store.set('c', '3');
      store.delete('c');

      const result = await manager.capture();
      expect(result).toMatchObject({ status: 'written', sequence: 4, entryCount: 2 });

      const restoredStore = new KeyspaceStore({ clock });
      await expect(createManager(restoredStore).restore()).resolves.toEqual({
        restored: 2,
        skippedExpired: 0,
        sequence: 4,
        fromFile: true,
      });
      expect(restoredStore.snapshotView().entries).toEqual([
        { key: 'a', value: '1', expiresAt: null },
        { key: 'b', value: '2', expiresAt: 1_001_000 },
      ]);
      expect(restoredStore.get('c')).toBeNull();
    });

    it('restores keys and values that are not valid UTF-8 unchanged', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store);
      await manager.restore();

      store.set('\xff\xfe', '\xff\xfe\x00\x80');
      await manager.capture();

      const restoredStore = await restoreInto();
      expect(restoredStore.get('\xff\xfe')).toBe('\xff\xfe\x00\x80');
    });

    it('skips entries that expired between capture and restore', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store);
      await manager.restore();

      store.set('x', '1', { ttlMs: 10 });
      store.set('y', '2', { ttlMs: 500 });
      now += 10;

      await expect(manager.capture()).resolves.toMatchObject({ entryCount: 1 });

      now += 500;
      const restoredStore = new KeyspaceStore({ clock });
      await expect(createManager(restoredStore).restore()).resolves.toMatchObject({
        restored: 0,
        skippedExpired: 1,
      });
      expect(restoredStore.size()).toBe(0);
    });

    it('collapses concurrent requests into one capture', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store);
      await manager.restore();
      store.set('k', 'v');

      const first = manager.capture();
      const second = manager.capture();

      expect(second).toBe(first);
      expect(manager.isCapturing()).toBe(true);

      await first;
      expect(manager.isCapturing()).toBe(false);
      expect(manager.getStats().totalCaptures).toBe(1);
    });

    it('persists the state as of the moment the capture began', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store);
      await manager.restore();
      store.set('k', 'before');

      const capture = manager.capture();
      store.set('k', 'after');
      await capture;

      const restoredStore = await restoreInto();
      expect(restoredStore.get('k')).toBe('before');
    });

    it('keeps the previous snapshot when a capture fails', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store);
      await manager.restore();

      store.set('k', 'v1');
      await manager.capture();

      store.set('k', 'v2');
      // a directory where the temp file should go makes open() fail
      await fs.mkdir(`${snapshotPath}.tmp`);

      await expect(manager.capture()).rejects.toThrow();
      expect(manager.getStats()).toMatchObject({
        captureState: 'idle',
        totalCaptures: 1,
        failedCaptures: 1,
        lastPersistedSequence: 1,
      });
      expect(manager.getStats().lastError).not.toBeNull();
      expect((await restoreInto()).get('k')).toBe('v1');

      await fs.rm(`${snapshotPath}.tmp`, { recursive: true });
      await expect(manager.capture()).resolves.toMatchObject({ status: 'written', sequence: 2 });
      expect(manager.getStats().lastError).toBeNull();
      expect((await restoreInto()).get('k')).toBe('v2');
    });
  });

  describe('captureIfChanged', () => {
    it('only writes when the sequence moved since the last snapshot', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store);
      await manager.restore();

      await expect(manager.captureIfChanged()).resolves.toBeNull();

      store.set('k', 'v');
      await expect(manager.captureIfChanged()).resolves.toMatchObject({ status: 'written', sequence: 1 });
      await expect(manager.captureIfChanged()).resolves.toBeNull();
    });

    it('treats the restored state as already persisted', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store);
      await manager.restore();
      store.set('k', 'v');
      await manager.capture();

      const restoredStore = new KeyspaceStore({ clock });
      const restoredManager = createManager(restoredStore);
      await restoredManager.restore();

      await expect(restoredManager.captureIfChanged()).resolves.toBeNull();
    });
  });

  describe('periodic captures', () => {
    it('captures on the timer when the keyspace changed', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store, { intervalMs: 20 });
      await manager.restore();
      manager.start();

      store.set('k', 'v');

      await vi.waitFor(() => {
        expect(manager.getStats().totalCaptures).toBe(1);
      });
      await manager.stop();
      expect((await restoreInto()).get('k')).toBe('v');
    });
  });

  describe('stop', () => {
    it('writes a final snapshot when configured and there are changes', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store, { snapshotOnShutdown: true });
      await manager.restore();
      store.set('k', 'v');

      await manager.stop();

      expect(manager.getStats().totalCaptures).toBe(1);
      expect((await restoreInto()).get('k')).toBe('v');
    });

    it('does not write when snapshotOnShutdown is off', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store);
      await manager.restore();
      store.set('k', 'v');

      await manager.stop();

      await expect(fs.access(snapshotPath)).rejects.toThrow();
    });

    it('waits for an in-flight capture', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store);
      await manager.restore();
      store.set('k', 'v');

      const capture = manager.capture();
      await manager.stop();

      expect(manager.isCapturing()).toBe(false);
      await expect(capture).resolves.toMatchObject({ status: 'written' });
    });

    it('skips captures requested after shutdown began', async () => {
      const store = new KeyspaceStore({ clock });
      const manager = createManager(store);
      await manager.restore();
      store.set('k', 'v');

      await manager.stop();

      await expect(manager.capture()).resolves.toEqual({
        status: 'skipped',
        sequence: 0,
        entryCount: 0,
        bytes: 0,
        durationMs: 0,
      });
    });
  });
});
