import type { ZodType, ZodTypeDef } from 'zod';
import {
  type SourceInfo,
  type SearchFilter,
  type NativeManga,
  type NativeChapter,
  nativeMangaSchema,
  nativeMangaListSchema,
  nativeChapterListSchema,
  nativePageListSchema,
  SourceNotFoundError,
  AlreadyInstalledError,
  ExecutionError,
  ProtocolError,
  errorMessage,
} from '@bindery/shared';
import type { DispatchOptions, ExtensionHandle, ExtensionRuntime } from './runtime.js';

interface RegistryEntry {
  readonly handle: ExtensionHandle;
  readonly info: Readonly<SourceInfo>;
}

/**
 * The bus: holds the loaded extensions keyed by source id and forwards
 * catalog calls to the runtime that owns each handle.
 *
 * Entries are replaced by a single map assignment, so a concurrent reader
 * sees the old entry, no entry, or the new one.
 */
export class ExtensionRegistry {
  private entries = new Map<number, RegistryEntry>();

  constructor(private readonly runtime: ExtensionRuntime) {}

  get size(): number {
    return this.entries.size;
  }

  /** Installed sources, ascending by id. */
  list(): SourceInfo[] {
    return Array.from(this.entries.values())
      .map(e => ({ ...e.info }))
      .sort((a, b) => a.id - b.id);
  }

  exists(id: number): boolean {
    return this.entries.has(id);
  }

  getSourceInfo(id: number): SourceInfo {
    return { ...this.resolve(id).info };
  }

  register(id: number, handle: ExtensionHandle, metadata: SourceInfo): void {
    if (this.entries.has(id)) {
      throw new AlreadyInstalledError(id);
    }
    this.entries.set(id, Object.freeze({ handle, info: Object.freeze({ ...metadata, id }) }));
  }

  /**
   * Replace a live entry in one step. Returns the handle it held; releasing
   * it is up to the caller, since the new entry is already serving.
   */
  swap(id: number, handle: ExtensionHandle, metadata: SourceInfo): ExtensionHandle {
    const previous = this.resolve(id);
    this.entries.set(id, Object.freeze({ handle, info: Object.freeze({ ...metadata, id }) }));
    return previous.handle;
  }

  /**
   * Remove the entry, then release its handle. The id is absent from the
   * moment this is called, even if the release fails.
   */
  async unregister(id: number): Promise<void> {
    const entry = this.resolve(id);
    this.entries.delete(id);
    await this.release(id, entry.handle);
  }

  dispatchPopular(id: number, page: number, options?: DispatchOptions): Promise<NativeManga[]> {
    return this.dispatch(id, 'getPopularManga', nativeMangaListSchema, options,
      handle => this.runtime.getPopularManga(handle, page, options));
  }

  dispatchLatest(id: number, page: number, options?: DispatchOptions): Promise<NativeManga[]> {
    return this.dispatch(id, 'getLatestManga', nativeMangaListSchema, options,
      handle => this.runtime.getLatestManga(handle, page, options));
  }

  dispatchSearch(
    id: number,
    page: number,
    query: string | undefined,
    filters: SearchFilter[] | undefined,
    options?: DispatchOptions,
  ): Promise<NativeManga[]> {
    return this.dispatch(id, 'searchManga', nativeMangaListSchema, options,
      handle => this.runtime.searchManga(handle, page, query, filters, options));
  }

  dispatchDetail(id: number, path: string, options?: DispatchOptions): Promise<NativeManga> {
    return this.dispatch(id, 'getMangaDetail', nativeMangaSchema, options,
      handle => this.runtime.getMangaDetail(handle, path, options));
  }

  dispatchChapters(id: number, path: string, options?: DispatchOptions): Promise<NativeChapter[]> {
    return this.dispatch(id, 'getChapters', nativeChapterListSchema, options,
      handle => this.runtime.getChapters(handle, path, options));
  }

  dispatchPages(id: number, path: string, options?: DispatchOptions): Promise<string[]> {
    return this.dispatch(id, 'getPages', nativePageListSchema, options,
      handle => this.runtime.getPages(handle, path, options));
  }

  private resolve(id: number): RegistryEntry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new SourceNotFoundError(id);
    }
    return entry;
  }

  private async dispatch<T>(
    id: number,
    operation: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: DispatchOptions | undefined,
    call: (handle: ExtensionHandle) => Promise<unknown>,
  ): Promise<T> {
    const { handle } = this.resolve(id);
    const signal = options?.signal;
    if (signal?.aborted) {
      throw new ExecutionError(id, `${operation}: request aborted`, { cause: signal.reason });
    }

    let raw: unknown;
    try {
      raw = await call(handle);
    } catch (err) {
      throw new ExecutionError(id, `${operation}: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new ProtocolError(id, `${operation}${where}: ${issue.message}`);
    }
    return parsed.data;
  }

  private async release(id: number, handle: ExtensionHandle): Promise<void> {
    try {
      await this.runtime.unload(handle);
    } catch (err) {
      throw new ExecutionError(id, `unload: ${errorMessage(err)}`, { cause: err });
    }
  }
}
