export { Bindery } from './bindery.js';
export type { BinderyOptions } from './bindery.js';
export { ConfigManager, loadEnvVars } from './config-manager.js';
export type { ConfigLoadOptions } from './config-manager.js';
export { parseVersion, isCompatible, hasNewer } from './compatibility.js';
export { RemoteIndexClient, findDescriptor, indexUrl } from './index-client.js';
export type { RemoteIndexClientOptions } from './index-client.js';
export { ExtensionRegistry } from './extension-registry.js';
export { SourceLifecycle } from './lifecycle.js';
export type { LifecycleOptions } from './lifecycle.js';
export { SourceService } from './source-service.js';
export type { SourceServiceOptions, InstalledSourcesOptions } from './source-service.js';
export { KeyedLock } from './keyed-lock.js';
export {
  ModuleRuntime, ModuleHandle, loadExtensionFromFile, isSourceExtension, packageFileName,
} from './module-runtime.js';
export type { SourceExtension } from './module-runtime.js';
export type {
  ExtensionRuntime, ExtensionHandle, RestoredExtension, DispatchOptions,
} from './runtime.js';
