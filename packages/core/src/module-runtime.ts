import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { existsSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import {
  type RemoteSourceDescriptor,
  type SearchFilter,
  LIBRARY_DIR,
  manifestEntrySchema,
  descriptorFromManifest,
  descriptorToManifest,
  errorMessage,
  isoNow,
} from '@bindery/shared';
import type { DispatchOptions, ExtensionHandle, ExtensionRuntime, RestoredExtension } from './runtime.js';

const INSTALLED_FILE = 'installed.json';

/** What an extension module provides, via its default export or a factory. */
export interface SourceExtension {
  getPopularManga(page: number, options?: DispatchOptions): unknown;
  getLatestManga(page: number, options?: DispatchOptions): unknown;
  searchManga(page: number, query: string | undefined, filters: SearchFilter[] | undefined, options?: DispatchOptions): unknown;
  getMangaDetail(path: string, options?: DispatchOptions): unknown;
  getChapters(path: string, options?: DispatchOptions): unknown;
  getPages(path: string, options?: DispatchOptions): unknown;
}

const EXTENSION_METHODS = [
  'getPopularManga',
  'getLatestManga',
  'searchManga',
  'getMangaDetail',
  'getChapters',
  'getPages',
] as const;

const installedRecordSchema = z.object({
  descriptor: manifestEntrySchema,
  file: z.string().min(1),
  installedAt: z.string(),
});

type InstalledRecord = z.infer<typeof installedRecordSchema>;

export class ModuleHandle implements ExtensionHandle {
  constructor(
    readonly sourceId: number,
    readonly name: string,
    readonly file: string,
    readonly extension: SourceExtension,
  ) {}
}

export function isSourceExtension(value: unknown): value is SourceExtension {
  if (typeof value !== 'object' || value === null) return false;
  return EXTENSION_METHODS.every(method => typeof Reflect.get(value, method) === 'function');
}

/**
 * Import an extension module. Accepts `export const extension`, a default
 * export object, or a default export factory returning one.
 */
export async function loadExtensionFromFile(filePath: string, cacheKey?: string): Promise<SourceExtension> {
  // import() caches by URL; a new query string forces a fresh evaluation
  const href = pathToFileURL(filePath).href + (cacheKey ? `?v=${encodeURIComponent(cacheKey)}` : '');
  const mod: unknown = await import(href);

  const named: unknown = typeof mod === 'object' && mod !== null ? Reflect.get(mod, 'extension') : undefined;
  if (isSourceExtension(named)) return named;

  const exported: unknown = typeof mod === 'object' && mod !== null ? Reflect.get(mod, 'default') : undefined;
  if (isSourceExtension(exported)) return exported;

  if (typeof exported === 'function') {
    const produced: unknown = await exported();
    if (isSourceExtension(produced)) return produced;
  }

  throw new Error(`Invalid extension format: ${filePath}`);
}

/** One file per source id and version; names from the index are not unique. */
export function packageFileName(descriptor: Pick<RemoteSourceDescriptor, 'id' | 'name' | 'version'>): string {
  const safe = (s: string) => s.replace(/[^a-zA-Z0-9._-]/g, '_');
  return `${descriptor.id}-${safe(descriptor.name)}-${safe(descriptor.version)}.mjs`;
}

/**
 * Runs extensions as ES modules downloaded from `<repo>/library/<name>.mjs`.
 * Each loaded version gets its own file, so a staged update can hold two
 * versions of one source at once.
 */
export class ModuleRuntime implements ExtensionRuntime {
  private extensionsDir: string;
  private installed: InstalledRecord[] = [];
  private loaded = false;
  private loadCount = 0;
  private writing: Promise<void> = Promise.resolve();

  constructor(extensionsDir?: string) {
    this.extensionsDir = extensionsDir ?? path.join(process.cwd(), '.bindery', 'extensions');
  }

  private async ensureDir(): Promise<void> {
    await fs.mkdir(this.extensionsDir, { recursive: true });
  }

  private async ensureLoaded(): Promise<void> {
    if (this.loaded) return;
    await this.ensureDir();

    let content: string | null = null;
    try {
      content = await fs.readFile(path.join(this.extensionsDir, INSTALLED_FILE), 'utf-8');
    } catch (err) {
      if (!isMissingFile(err)) throw err;
    }

    if (content !== null) {
      const parsed = z.array(installedRecordSchema).safeParse(safeJsonParse(content));
      if (parsed.success) {
        this.installed = parsed.data;
      } else {
        console.warn(`[runtime] ignoring unreadable ${INSTALLED_FILE} in ${this.extensionsDir}`);
      }
    }
    this.loaded = true;
  }

  private saveInstalled(): Promise<void> {
    // Writes are chained so the file always ends with the latest state
    const next = this.writing.then(async () => {
      await this.ensureDir();
      await fs.writeFile(
        path.join(this.extensionsDir, INSTALLED_FILE),
        JSON.stringify(this.installed, null, 2),
        'utf-8',
      );
    });
    this.writing = next.catch(() => undefined);
    return next;
  }

  async load(repoUrl: string, descriptor: RemoteSourceDescriptor): Promise<ExtensionHandle> {
    await this.ensureLoaded();

    const packageUrl = `${repoUrl.replace(/\/+$/, '')}/${LIBRARY_DIR}/${encodeURIComponent(descriptor.name)}.mjs`;
    const res = await fetch(packageUrl);
    if (!res.ok) {
      throw new Error(`GET ${packageUrl} returned ${res.status}`);
    }
    const source = await res.text();

    const file = packageFileName(descriptor);
    const filePath = path.join(this.extensionsDir, file);
    await fs.writeFile(filePath, source, 'utf-8');

    let extension: SourceExtension;
    try {
      extension = await loadExtensionFromFile(filePath, String(++this.loadCount));
    } catch (err) {
      await fs.rm(filePath, { force: true });
      throw err;
    }

    this.installed = this.installed.filter(r => r.file !== file);
    this.installed.push({ descriptor: descriptorToManifest(descriptor), file, installedAt: isoNow() });
    await this.saveInstalled();

    return new ModuleHandle(descriptor.id, descriptor.name, file, extension);
  }

  async unload(handle: ExtensionHandle): Promise<void> {
    await this.ensureLoaded();
    const { file } = this.moduleHandle(handle);

    await fs.rm(path.join(this.extensionsDir, file), { force: true });
    this.installed = this.installed.filter(r => r.file !== file);
    await this.saveInstalled();
  }

  async restore(): Promise<RestoredExtension[]> {
    await this.ensureLoaded();
    const restored: RestoredExtension[] = [];

    for (const record of this.installed) {
      const filePath = path.join(this.extensionsDir, record.file);
      if (!existsSync(filePath)) {
        console.warn(`[runtime] missing package file ${record.file}, skipping`);
        continue;
      }

      try {
        const extension = await loadExtensionFromFile(filePath, String(++this.loadCount));
        restored.push({
          handle: new ModuleHandle(record.descriptor.id, record.descriptor.name, record.file, extension),
          descriptor: descriptorFromManifest(record.descriptor),
        });
      } catch (err) {
        console.warn(`[runtime] failed to load ${record.file}: ${errorMessage(err)}`);
      }
    }

    return restored;
  }

  /** Installed package records, as persisted. */
  async list(): Promise<InstalledRecord[]> {
    await this.ensureLoaded();
    return [...this.installed];
  }

  async getPopularManga(handle: ExtensionHandle, page: number, options?: DispatchOptions): Promise<unknown> {
    return this.moduleHandle(handle).extension.getPopularManga(page, options);
  }

  async getLatestManga(handle: ExtensionHandle, page: number, options?: DispatchOptions): Promise<unknown> {
    return this.moduleHandle(handle).extension.getLatestManga(page, options);
  }

  async searchManga(
    handle: ExtensionHandle,
    page: number,
    query: string | undefined,
    filters: SearchFilter[] | undefined,
    options?: DispatchOptions,
  ): Promise<unknown> {
    return this.moduleHandle(handle).extension.searchManga(page, query, filters, options);
  }

  async getMangaDetail(handle: ExtensionHandle, mangaPath: string, options?: DispatchOptions): Promise<unknown> {
    return this.moduleHandle(handle).extension.getMangaDetail(mangaPath, options);
  }

  async getChapters(handle: ExtensionHandle, mangaPath: string, options?: DispatchOptions): Promise<unknown> {
    return this.moduleHandle(handle).extension.getChapters(mangaPath, options);
  }

  async getPages(handle: ExtensionHandle, chapterPath: string, options?: DispatchOptions): Promise<unknown> {
    return this.moduleHandle(handle).extension.getPages(chapterPath, options);
  }

  private moduleHandle(handle: ExtensionHandle): ModuleHandle {
    if (!(handle instanceof ModuleHandle)) {
      throw new Error(`Handle for ${handle.name} was not created by this runtime`);
    }
    return handle;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function safeJsonParse(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return undefined;
  }
}
