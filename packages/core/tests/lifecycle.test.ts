import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  type ManifestEntry,
  AlreadyInstalledError,
  ExecutionError,
  IncompatibleVersionError,
  NoNewVersionError,
  NotFoundInIndexError,
  RepoUnreachableError,
  SourceNotFoundError,
  VersionParseError,
} from '@bindery/shared';
import {
  REPO_URL,
  FakeHandle,
  createHarness,
  deferred,
  descriptor,
  manifestEntry,
  stubIndex,
} from './helpers.js';

describe('SourceLifecycle', () => {
  let entries: ManifestEntry[] = [];

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    entries = [];
  });

  describe('install', () => {
    it('loads a compatible package and registers it', async () => {
      entries = [manifestEntry({ id: 1, name: 'foo' })];
      stubIndex(() => entries);
      const { lifecycle, registry, runtime } = createHarness();

      const info = await lifecycle.install(REPO_URL, 1);

      expect(info).toEqual(descriptor({ id: 1, name: 'foo' }));
      expect(registry.exists(1)).toBe(true);
      expect(runtime.loads).toHaveLength(1);
    });

    it('fails AlreadyInstalled on a second install and keeps the first version', async () => {
      entries = [manifestEntry({ id: 1 })];
      const mockFetch = stubIndex(() => entries);
      const { lifecycle, registry, runtime } = createHarness();
      await lifecycle.install(REPO_URL, 1);

      entries = [manifestEntry({ id: 1, version: '3.0.0' })];
      await expect(lifecycle.install(REPO_URL, 1)).rejects.toThrow(AlreadyInstalledError);

      expect(registry.exists(1)).toBe(true);
      expect(registry.getSourceInfo(1).version).toBe('1.0.0');
      expect(runtime.loads).toHaveLength(1);
      // the repeat is rejected before the index is fetched
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('fails NotFoundInIndex when the repository lacks the id', async () => {
      entries = [manifestEntry({ id: 2 })];
      stubIndex(() => entries);
      const { lifecycle, registry } = createHarness();

      await expect(lifecycle.install(REPO_URL, 1)).rejects.toThrow(NotFoundInIndexError);
      expect(registry.exists(1)).toBe(false);
    });

    it('refuses an ABI mismatch without loading anything', async () => {
      entries = [manifestEntry({ id: 1, abi_tag: 'node-abi-0' })];
      stubIndex(() => entries);
      const { lifecycle, registry, runtime } = createHarness();

      await expect(lifecycle.install(REPO_URL, 1)).rejects.toThrow(IncompatibleVersionError);
      expect(registry.exists(1)).toBe(false);
      expect(runtime.loads).toHaveLength(0);
    });

    it('refuses a contract version mismatch', async () => {
      entries = [manifestEntry({ id: 1, contract_version: 'Y2' })];
      stubIndex(() => entries);
      const { lifecycle, registry } = createHarness();

      await expect(lifecycle.install(REPO_URL, 1)).rejects.toThrow('incompatible version, update the server');
      expect(registry.exists(1)).toBe(false);
    });

    it('wraps a load failure as ExecutionError and stays absent', async () => {
      entries = [manifestEntry({ id: 1, name: 'broken' })];
      stubIndex(() => entries);
      const { lifecycle, registry, runtime } = createHarness();
      runtime.failLoadFor.add('broken');

      await expect(lifecycle.install(REPO_URL, 1)).rejects.toThrow('extension error: load broken: cannot load broken');
      expect(registry.exists(1)).toBe(false);
    });

    it('propagates an unreachable repository', async () => {
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('ECONNREFUSED')));
      const { lifecycle, registry } = createHarness();

      await expect(lifecycle.install(REPO_URL, 1)).rejects.toThrow(RepoUnreachableError);
      expect(registry.exists(1)).toBe(false);
    });

    it('lets exactly one of two concurrent installs succeed', async () => {
      entries = [manifestEntry({ id: 1 })];
      stubIndex(() => entries);
      const { lifecycle, registry, runtime } = createHarness();

      const results = await Promise.allSettled([
        lifecycle.install(REPO_URL, 1),
        lifecycle.install(REPO_URL, 1),
      ]);

      expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(AlreadyInstalledError);
      expect(runtime.live()).toHaveLength(1);
      expect(registry.list()).toHaveLength(1);
    });

    it('installs different ids concurrently', async () => {
      entries = [manifestEntry({ id: 1 }), manifestEntry({ id: 2 })];
      stubIndex(() => entries);
      const { lifecycle, registry } = createHarness();

      await Promise.all([lifecycle.install(REPO_URL, 2), lifecycle.install(REPO_URL, 1)]);

      expect(registry.list().map(s => s.id)).toEqual([1, 2]);
    });
  });

  describe('update', () => {
    it('replaces the package when the remote is newer', async () => {
      entries = [manifestEntry({ id: 1, version: '1.0.0' })];
      stubIndex(() => entries);
      const { lifecycle, registry, runtime } = createHarness();
      await lifecycle.install(REPO_URL, 1);

      entries = [manifestEntry({ id: 1, version: '1.1.0' })];
      const info = await lifecycle.update(REPO_URL, 1);

      expect(info.version).toBe('1.1.0');
      expect(registry.getSourceInfo(1).version).toBe('1.1.0');
      expect(runtime.unloads.map(h => h.version)).toEqual(['1.0.0']);
      expect(runtime.live().map(h => h.version)).toEqual(['1.1.0']);
    });

    it('fails NoNewVersion for an equal version and changes nothing', async () => {
      entries = [manifestEntry({ id: 1, version: '1.0.0' })];
      stubIndex(() => entries);
      const { lifecycle, registry, runtime } = createHarness();
      await lifecycle.install(REPO_URL, 1);

      await expect(lifecycle.update(REPO_URL, 1)).rejects.toThrow(NoNewVersionError);
      expect(registry.getSourceInfo(1).version).toBe('1.0.0');
      expect(runtime.unloads).toHaveLength(0);
    });

    it('fails NoNewVersion when the remote is older', async () => {
      entries = [manifestEntry({ id: 1, version: '2.0.0' })];
      stubIndex(() => entries);
      const { lifecycle } = createHarness();
      await lifecycle.install(REPO_URL, 1);

      entries = [manifestEntry({ id: 1, version: '1.5.0' })];
      await expect(lifecycle.update(REPO_URL, 1)).rejects.toThrow('no new version');
    });

    it('fails VersionParseError on an unparsable remote version', async () => {
      entries = [manifestEntry({ id: 1 })];
      stubIndex(() => entries);
      const { lifecycle, registry } = createHarness();
      await lifecycle.install(REPO_URL, 1);

      entries = [manifestEntry({ id: 1, version: 'tomorrow' })];
      await expect(lifecycle.update(REPO_URL, 1)).rejects.toThrow(VersionParseError);
      expect(registry.getSourceInfo(1).version).toBe('1.0.0');
    });

    it('fails NotFound when the source is not installed', async () => {
      const mockFetch = stubIndex(() => [manifestEntry({ id: 1 })]);
      const { lifecycle } = createHarness();

      await expect(lifecycle.update(REPO_URL, 1)).rejects.toThrow(SourceNotFoundError);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('fails NotFoundInIndex when the repository dropped the source', async () => {
      entries = [manifestEntry({ id: 1 })];
      stubIndex(() => entries);
      const { lifecycle, registry } = createHarness();
      await lifecycle.install(REPO_URL, 1);

      entries = [];
      await expect(lifecycle.update(REPO_URL, 1)).rejects.toThrow(NotFoundInIndexError);
      expect(registry.exists(1)).toBe(true);
    });

    it('refuses a newer but incompatible package and keeps the old one', async () => {
      entries = [manifestEntry({ id: 1 })];
      stubIndex(() => entries);
      const { lifecycle, registry } = createHarness();
      await lifecycle.install(REPO_URL, 1);

      entries = [manifestEntry({ id: 1, version: '2.0.0', contract_version: 'Z' })];
      await expect(lifecycle.update(REPO_URL, 1)).rejects.toThrow(IncompatibleVersionError);
      expect(registry.getSourceInfo(1).version).toBe('1.0.0');
    });

    it('leaves the source absent when reloading fails under the replace strategy', async () => {
      entries = [manifestEntry({ id: 1, name: 'foo' })];
      stubIndex(() => entries);
      const { lifecycle, registry, runtime } = createHarness({ updateStrategy: 'replace' });
      await lifecycle.install(REPO_URL, 1);

      entries = [manifestEntry({ id: 1, name: 'foo-next', version: '1.1.0' })];
      runtime.failLoadFor.add('foo-next');

      await expect(lifecycle.update(REPO_URL, 1)).rejects.toThrow(ExecutionError);
      expect(registry.exists(1)).toBe(false);
    });

    it('keeps the old version when reloading fails under the stage strategy', async () => {
      entries = [manifestEntry({ id: 1, name: 'foo' })];
      stubIndex(() => entries);
      const { lifecycle, registry, runtime } = createHarness({ updateStrategy: 'stage' });
      await lifecycle.install(REPO_URL, 1);

      entries = [manifestEntry({ id: 1, name: 'foo-next', version: '1.1.0' })];
      runtime.failLoadFor.add('foo-next');

      await expect(lifecycle.update(REPO_URL, 1)).rejects.toThrow(ExecutionError);
      expect(registry.getSourceInfo(1).version).toBe('1.0.0');
      expect(runtime.unloads).toHaveLength(0);
    });

    it('reports a staged update as done when releasing the old version fails', async () => {
      entries = [manifestEntry({ id: 1, name: 'foo' })];
      stubIndex(() => entries);
      const { lifecycle, registry, runtime } = createHarness({ updateStrategy: 'stage' });
      await lifecycle.install(REPO_URL, 1);
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      runtime.unload = async () => {
        throw new Error('busy');
      };

      entries = [manifestEntry({ id: 1, name: 'foo', version: '1.1.0' })];
      const info = await lifecycle.update(REPO_URL, 1);

      expect(info.version).toBe('1.1.0');
      expect(registry.getSourceInfo(1).version).toBe('1.1.0');
      expect(warn).toHaveBeenCalledWith('[sources] failed to release foo: busy');
    });

    it('keeps serving the old version while a staged update loads', async () => {
      entries = [manifestEntry({ id: 1 })];
      const mockFetch = stubIndex(() => entries);
      const { lifecycle, registry, runtime } = createHarness({ updateStrategy: 'stage' });
      await lifecycle.install(REPO_URL, 1);
      const original = runtime.loads[0];

      entries = [manifestEntry({ id: 1, version: '1.1.0' })];
      const gate = deferred();
      runtime.loadGate = gate.promise;
      const pending = lifecycle.update(REPO_URL, 1);

      await vi.waitFor(() => expect(mockFetch).toHaveBeenCalledTimes(2));
      await registry.dispatchPopular(1, 1);
      expect(runtime.getPopularManga.mock.calls[0][0]).toBe(original);
      expect(registry.getSourceInfo(1).version).toBe('1.0.0');

      gate.resolve();
      await pending;
      expect(registry.getSourceInfo(1).version).toBe('1.1.0');
    });
  });

  describe('uninstall', () => {
    it('removes an installed source', async () => {
      entries = [manifestEntry({ id: 1 })];
      stubIndex(() => entries);
      const { lifecycle, registry, runtime } = createHarness();
      await lifecycle.install(REPO_URL, 1);

      await lifecycle.uninstall(1);

      expect(registry.exists(1)).toBe(false);
      expect(runtime.live()).toHaveLength(0);
      await expect(registry.dispatchPopular(1, 1)).rejects.toThrow(SourceNotFoundError);
    });

    it('fails NotFound when already absent', async () => {
      const { lifecycle } = createHarness();
      await expect(lifecycle.uninstall(1)).rejects.toThrow(SourceNotFoundError);
    });
  });

  describe('available', () => {
    it('lists only entries that are not installed, without updates', async () => {
      entries = [manifestEntry({ id: 3 }), manifestEntry({ id: 1 }), manifestEntry({ id: 2 })];
      stubIndex(() => entries);
      const { lifecycle } = createHarness();
      await lifecycle.install(REPO_URL, 1);

      entries = [manifestEntry({ id: 3 }), manifestEntry({ id: 1, version: '5.0.0' }), manifestEntry({ id: 2 })];
      const available = await lifecycle.available(REPO_URL);

      expect(available.map(s => s.id)).toEqual([3, 2]);
      expect(available.every(s => s.hasUpdate === false)).toBe(true);
    });
  });

  describe('installedWithUpdates', () => {
    it('flags sources whose remote version is newer', async () => {
      entries = [manifestEntry({ id: 1 }), manifestEntry({ id: 2 }), manifestEntry({ id: 3 })];
      stubIndex(() => entries);
      const { lifecycle } = createHarness();
      await lifecycle.install(REPO_URL, 2);
      await lifecycle.install(REPO_URL, 1);
      await lifecycle.install(REPO_URL, 3);

      entries = [manifestEntry({ id: 1, version: '1.0.1' }), manifestEntry({ id: 2 })];
      const installed = await lifecycle.installedWithUpdates(REPO_URL);

      expect(installed.map(s => [s.id, s.hasUpdate])).toEqual([[1, true], [2, false], [3, false]]);
    });
  });

  describe('installedWithUpdates with an unparsable remote version', () => {
    it('reports no update for that entry only', async () => {
      entries = [manifestEntry({ id: 1 }), manifestEntry({ id: 2 })];
      stubIndex(() => entries);
      const { lifecycle } = createHarness();
      await lifecycle.install(REPO_URL, 1);
      await lifecycle.install(REPO_URL, 2);
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      entries = [manifestEntry({ id: 1, version: 'soon' }), manifestEntry({ id: 2, version: '1.2.0' })];
      const installed = await lifecycle.installedWithUpdates(REPO_URL);

      expect(installed.map(s => [s.id, s.hasUpdate])).toEqual([[1, false], [2, true]]);
      expect(warn).toHaveBeenCalledWith('[sources] cannot compare versions of source-1: invalid version: soon');
    });
  });

  describe('restore', () => {
    it('registers compatible packages and releases the rest', async () => {
      const { lifecycle, registry, runtime } = createHarness();
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const good = new FakeHandle(2, 'good', '1.0.0');
      const stale = new FakeHandle(1, 'stale', '0.9.0');
      runtime.restorable = [
        { handle: good, descriptor: descriptor({ id: 2, name: 'good' }) },
        { handle: stale, descriptor: descriptor({ id: 1, name: 'stale', version: '0.9.0', abiTag: 'old' }) },
      ];

      const count = await lifecycle.restore();

      expect(count).toBe(1);
      expect(registry.list().map(s => s.name)).toEqual(['good']);
      expect(runtime.unloads).toEqual([stale]);
      expect(warn).toHaveBeenCalledWith(
        '[sources] skipping stale@0.9.0: built for old/Y, host is X/Y',
      );
    });
  });
});
