import {
  type Chapter,
  type Manga,
  type SearchFilter,
  type Source,
  chapterFromNative,
  mangaFromNative,
  ConfigError,
} from '@bindery/shared';
import type { ExtensionRegistry } from './extension-registry.js';
import type { SourceLifecycle } from './lifecycle.js';
import type { DispatchOptions } from './runtime.js';

export interface SourceServiceOptions {
  /** Repository used when a call does not name one */
  repository?: string;
}

export interface InstalledSourcesOptions {
  checkUpdates?: boolean;
  repoUrl?: string;
}

/**
 * Entry point for the presentation layer. Lifecycle calls go to
 * {@link SourceLifecycle}; catalog reads go through the registry and are
 * mapped to host records in the order the extension returned them.
 */
export class SourceService {
  private repository?: string;

  constructor(
    private readonly registry: ExtensionRegistry,
    private readonly lifecycle: SourceLifecycle,
    options: SourceServiceOptions = {},
  ) {
    this.repository = options.repository;
  }

  async installedSources(options: InstalledSourcesOptions = {}): Promise<Source[]> {
    if (options.checkUpdates) {
      return this.lifecycle.installedWithUpdates(this.repoUrl(options.repoUrl));
    }
    return this.registry.list().map(info => ({ ...info, hasUpdate: false }));
  }

  async availableSources(repoUrl?: string): Promise<Source[]> {
    return this.lifecycle.available(this.repoUrl(repoUrl));
  }

  async getSourceById(id: number): Promise<Source> {
    return { ...this.registry.getSourceInfo(id), hasUpdate: false };
  }

  async installSource(id: number, repoUrl?: string): Promise<Source> {
    const info = await this.lifecycle.install(this.repoUrl(repoUrl), id);
    return { ...info, hasUpdate: false };
  }

  async updateSource(id: number, repoUrl?: string): Promise<Source> {
    const info = await this.lifecycle.update(this.repoUrl(repoUrl), id);
    return { ...info, hasUpdate: false };
  }

  async uninstallSource(id: number): Promise<void> {
    await this.lifecycle.uninstall(id);
  }

  async getPopularManga(sourceId: number, page: number, options?: DispatchOptions): Promise<Manga[]> {
    const native = await this.registry.dispatchPopular(sourceId, page, options);
    return native.map(mangaFromNative);
  }

  async getLatestManga(sourceId: number, page: number, options?: DispatchOptions): Promise<Manga[]> {
    const native = await this.registry.dispatchLatest(sourceId, page, options);
    return native.map(mangaFromNative);
  }

  async searchManga(
    sourceId: number,
    page: number,
    query?: string,
    filters?: SearchFilter[],
    options?: DispatchOptions,
  ): Promise<Manga[]> {
    const native = await this.registry.dispatchSearch(sourceId, page, query, filters, options);
    return native.map(mangaFromNative);
  }

  async getMangaBySourcePath(sourceId: number, path: string, options?: DispatchOptions): Promise<Manga> {
    return mangaFromNative(await this.registry.dispatchDetail(sourceId, path, options));
  }

  async getChaptersBySourcePath(sourceId: number, path: string, options?: DispatchOptions): Promise<Chapter[]> {
    const native = await this.registry.dispatchChapters(sourceId, path, options);
    return native.map(chapterFromNative);
  }

  async getPagesBySourcePath(sourceId: number, path: string, options?: DispatchOptions): Promise<string[]> {
    return this.registry.dispatchPages(sourceId, path, options);
  }

  private repoUrl(explicit?: string): string {
    const url = explicit ?? this.repository;
    if (!url) {
      throw new ConfigError('extensions.repository is not configured');
    }
    return url;
  }
}
