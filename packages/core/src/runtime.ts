import type { RemoteSourceDescriptor, SearchFilter } from '@bindery/shared';

/**
 * Opaque reference to one loaded extension instance. The core never looks
 * inside; it only hands the handle back to the runtime that produced it.
 */
export interface ExtensionHandle {
  readonly sourceId: number;
  readonly name: string;
}

export interface RestoredExtension {
  handle: ExtensionHandle;
  descriptor: RemoteSourceDescriptor;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

/**
 * Execution engine that materializes and runs extension packages.
 *
 * Catalog calls resolve to plugin-native values; the registry validates them.
 * Bounding the runtime of a single call is up to the implementation.
 */
export interface ExtensionRuntime {
  load(repoUrl: string, descriptor: RemoteSourceDescriptor): Promise<ExtensionHandle>;
  unload(handle: ExtensionHandle): Promise<void>;
  /** Packages already present from a previous run. */
  restore(): Promise<RestoredExtension[]>;

  getPopularManga(handle: ExtensionHandle, page: number, options?: DispatchOptions): Promise<unknown>;
  getLatestManga(handle: ExtensionHandle, page: number, options?: DispatchOptions): Promise<unknown>;
  searchManga(
    handle: ExtensionHandle,
    page: number,
    query: string | undefined,
    filters: SearchFilter[] | undefined,
    options?: DispatchOptions,
  ): Promise<unknown>;
  getMangaDetail(handle: ExtensionHandle, path: string, options?: DispatchOptions): Promise<unknown>;
  getChapters(handle: ExtensionHandle, path: string, options?: DispatchOptions): Promise<unknown>;
  getPages(handle: ExtensionHandle, path: string, options?: DispatchOptions): Promise<unknown>;
}
