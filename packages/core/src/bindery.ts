import { type BinderyConfigOverrides, type HostCompatibility, HOST_COMPATIBILITY } from '@bindery/shared';
import { ConfigManager } from './config-manager.js';
import { ExtensionRegistry } from './extension-registry.js';
import { RemoteIndexClient } from './index-client.js';
import { SourceLifecycle } from './lifecycle.js';
import { ModuleRuntime } from './module-runtime.js';
import type { ExtensionRuntime } from './runtime.js';
import { SourceService } from './source-service.js';

export interface BinderyOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Execution engine; defaults to {@link ModuleRuntime} over `extensions.dir` */
  runtime?: ExtensionRuntime;
  host?: HostCompatibility;
  /** Re-register packages kept by the runtime (default true) */
  restore?: boolean;
}

/**
 * Composition root. Builds one registry and hands it to every component
 * that needs it.
 */
export class Bindery {
  private constructor(
    readonly config: ConfigManager,
    readonly host: HostCompatibility,
    readonly runtime: ExtensionRuntime,
    readonly registry: ExtensionRegistry,
    readonly index: RemoteIndexClient,
    readonly lifecycle: SourceLifecycle,
    readonly sources: SourceService,
  ) {}

  static async create(overrides?: BinderyConfigOverrides, options: BinderyOptions = {}): Promise<Bindery> {
    const config = new ConfigManager();
    await config.load({ configPath: options.configPath, env: options.env });
    if (overrides) {
      config.set(overrides);
    }

    const extensions = config.get('extensions');
    const level = config.get('logging').level;

    const host = options.host ?? HOST_COMPATIBILITY;
    const runtime = options.runtime ?? new ModuleRuntime(extensions.dir);
    const registry = new ExtensionRegistry(runtime);
    const index = new RemoteIndexClient({ timeoutMs: extensions.indexTimeoutMs });
    const lifecycle = new SourceLifecycle(registry, runtime, index, {
      host,
      updateStrategy: extensions.updateStrategy,
      quiet: level === 'warn' || level === 'error',
    });
    const sources = new SourceService(registry, lifecycle, { repository: extensions.repository });

    const bindery = new Bindery(config, host, runtime, registry, index, lifecycle, sources);
    if (options.restore ?? true) {
      await lifecycle.restore();
    }
    return bindery;
  }
}
