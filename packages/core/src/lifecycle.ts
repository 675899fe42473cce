import {
  type HostCompatibility,
  type RemoteSourceDescriptor,
  type Source,
  type SourceInfo,
  type UpdateStrategy,
  HOST_COMPATIBILITY,
  AlreadyInstalledError,
  BinderyError,
  ExecutionError,
  IncompatibleVersionError,
  NoNewVersionError,
  VersionParseError,
  errorMessage,
} from '@bindery/shared';
import { hasNewer, isCompatible } from './compatibility.js';
import { findDescriptor, type RemoteIndexClient } from './index-client.js';
import type { ExtensionRegistry } from './extension-registry.js';
import type { ExtensionHandle, ExtensionRuntime } from './runtime.js';
import { KeyedLock } from './keyed-lock.js';

export interface LifecycleOptions {
  host?: HostCompatibility;
  updateStrategy?: UpdateStrategy;
  /** Suppress progress lines on stdout */
  quiet?: boolean;
}

/**
 * Install, update and uninstall against a remote repository.
 *
 * Mutations for one source id are serialized; the registry is only touched
 * after every check has passed.
 */
export class SourceLifecycle {
  private locks = new KeyedLock<number>();
  private host: HostCompatibility;
  private updateStrategy: UpdateStrategy;
  private quiet: boolean;

  constructor(
    private readonly registry: ExtensionRegistry,
    private readonly runtime: ExtensionRuntime,
    private readonly index: RemoteIndexClient,
    options: LifecycleOptions = {},
  ) {
    this.host = options.host ?? HOST_COMPATIBILITY;
    this.updateStrategy = options.updateStrategy ?? 'replace';
    this.quiet = options.quiet ?? false;
  }

  async install(repoUrl: string, id: number): Promise<SourceInfo> {
    return this.locks.withLock(id, async () => {
      if (this.registry.exists(id)) {
        throw new AlreadyInstalledError(id);
      }

      const descriptor = findDescriptor(await this.index.fetchIndex(repoUrl), id);
      this.assertCompatible(descriptor);

      const handle = await this.materialize(repoUrl, descriptor);
      this.registry.register(id, handle, descriptor);

      this.log(`installed ${descriptor.name}@${descriptor.version} (id ${id})`);
      return this.registry.getSourceInfo(id);
    });
  }

  /**
   * With the `replace` strategy the old package is unregistered before the new
   * one is loaded: if loading fails, the source ends up uninstalled.
   * `stage` loads first and swaps, so a failed load keeps the old version and
   * a failed release of the old handle does not fail the update.
   */
  async update(repoUrl: string, id: number): Promise<SourceInfo> {
    return this.locks.withLock(id, async () => {
      const installed = this.registry.getSourceInfo(id);

      const descriptor = findDescriptor(await this.index.fetchIndex(repoUrl), id);
      if (!hasNewer(installed.version, descriptor.version)) {
        throw new NoNewVersionError(id, installed.version, descriptor.version);
      }
      this.assertCompatible(descriptor);

      if (this.updateStrategy === 'stage') {
        const handle = await this.materialize(repoUrl, descriptor);
        // The new version is live from here on; a failed release only warns
        await this.discard(this.registry.swap(id, handle, descriptor));
      } else {
        await this.registry.unregister(id);
        const handle = await this.materialize(repoUrl, descriptor);
        this.registry.register(id, handle, descriptor);
      }

      this.log(`updated ${descriptor.name} ${installed.version} -> ${descriptor.version} (id ${id})`);
      return this.registry.getSourceInfo(id);
    });
  }

  async uninstall(id: number): Promise<void> {
    await this.locks.withLock(id, async () => {
      await this.registry.unregister(id);
      this.log(`uninstalled id ${id}`);
    });
  }

  /** Repository entries that are not installed. */
  async available(repoUrl: string): Promise<Source[]> {
    const index = await this.index.fetchIndex(repoUrl);
    return index
      .filter(d => !this.registry.exists(d.id))
      .map(d => ({ ...d, hasUpdate: false }));
  }

  /** Installed sources, each compared against a fresh copy of the index. */
  async installedWithUpdates(repoUrl: string): Promise<Source[]> {
    const index = await this.index.fetchIndex(repoUrl);
    const remote = new Map(index.map(d => [d.id, d]));

    return this.registry.list().map((info) => {
      const descriptor = remote.get(info.id);
      return {
        ...info,
        hasUpdate: descriptor ? this.updateAvailable(info, descriptor) : false,
      };
    });
  }

  /**
   * Register the packages the runtime kept from a previous run. Packages that
   * no longer match the host are released instead. Returns how many were registered.
   */
  async restore(): Promise<number> {
    const restored = await this.runtime.restore();
    let registered = 0;

    for (const { handle, descriptor } of restored) {
      await this.locks.withLock(descriptor.id, async () => {
        if (!isCompatible(descriptor, this.host)) {
          console.warn(
            `[sources] skipping ${descriptor.name}@${descriptor.version}: built for ` +
            `${descriptor.abiTag}/${descriptor.contractVersion}, host is ${this.host.abiTag}/${this.host.contractVersion}`,
          );
          await this.discard(handle);
          return;
        }
        if (this.registry.exists(descriptor.id)) {
          console.warn(`[sources] skipping duplicate package for id ${descriptor.id}: ${descriptor.name}`);
          await this.discard(handle);
          return;
        }
        this.registry.register(descriptor.id, handle, descriptor);
        registered++;
      });
    }

    if (registered > 0) {
      this.log(`restored ${registered} source(s)`);
    }
    return registered;
  }

  /** One unparsable version marks only its own entry as having no update. */
  private updateAvailable(installed: SourceInfo, remote: RemoteSourceDescriptor): boolean {
    try {
      return hasNewer(installed.version, remote.version);
    } catch (err) {
      if (!(err instanceof VersionParseError)) throw err;
      console.warn(`[sources] cannot compare versions of ${installed.name}: ${err.message}`);
      return false;
    }
  }

  private assertCompatible(descriptor: RemoteSourceDescriptor): void {
    if (!isCompatible(descriptor, this.host)) {
      throw new IncompatibleVersionError(descriptor.id, descriptor.abiTag, descriptor.contractVersion);
    }
  }

  private async materialize(repoUrl: string, descriptor: RemoteSourceDescriptor): Promise<ExtensionHandle> {
    try {
      return await this.runtime.load(repoUrl, descriptor);
    } catch (err) {
      if (err instanceof BinderyError) throw err;
      throw new ExecutionError(descriptor.id, `load ${descriptor.name}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async discard(handle: ExtensionHandle): Promise<void> {
    try {
      await this.runtime.unload(handle);
    } catch (err) {
      console.warn(`[sources] failed to release ${handle.name}: ${errorMessage(err)}`);
    }
  }

  private log(message: string): void {
    if (!this.quiet) {
      console.log(`[sources] ${message}`);
    }
  }
}
