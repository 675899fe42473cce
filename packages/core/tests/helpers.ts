import { vi } from 'vitest';
import {
  type Chapter,
  type HostCompatibility,
  type ManifestEntry,
  type Manga,
  type RemoteSourceDescriptor,
  type SearchFilter,
  chapterToNative,
  mangaToNative,
} from '@bindery/shared';
import type { DispatchOptions, ExtensionHandle, ExtensionRuntime, RestoredExtension } from '../src/runtime.js';
import { ExtensionRegistry } from '../src/extension-registry.js';
import { RemoteIndexClient } from '../src/index-client.js';
import { SourceLifecycle, type LifecycleOptions } from '../src/lifecycle.js';
import { SourceService } from '../src/source-service.js';

export const TEST_HOST: HostCompatibility = { abiTag: 'X', contractVersion: 'Y' };
export const REPO_URL = 'https://repo.test/extensions';

export function manifestEntry(overrides: Partial<ManifestEntry> = {}): ManifestEntry {
  const id = overrides.id ?? 1;
  return {
    id,
    name: `source-${id}`,
    url: `https://source-${id}.test`,
    version: '1.0.0',
    abi_tag: 'X',
    contract_version: 'Y',
    icon: `https://source-${id}.test/icon.png`,
    ...overrides,
  };
}

export function descriptor(overrides: Partial<RemoteSourceDescriptor> = {}): RemoteSourceDescriptor {
  const id = overrides.id ?? 1;
  return {
    id,
    name: `source-${id}`,
    url: `https://source-${id}.test`,
    version: '1.0.0',
    abiTag: 'X',
    contractVersion: 'Y',
    icon: `https://source-${id}.test/icon.png`,
    ...overrides,
  };
}

/** Serve `entries` as the repository index through a stubbed global fetch. */
export function stubIndex(entries: () => unknown) {
  const mockFetch = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
    new Response(JSON.stringify(entries()), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    }),
  );
  vi.stubGlobal('fetch', mockFetch);
  return mockFetch;
}

export const sampleManga: Manga[] = [
  {
    sourceId: 1,
    title: 'Zeta Line',
    author: ['Second Author', 'First Author'],
    genre: ['Action', 'Drama'],
    status: 'Ongoing',
    description: 'A story.',
    path: '/manga/zeta',
    coverUrl: 'https://img.test/zeta.jpg',
  },
  {
    sourceId: 1,
    title: 'Alpha Road',
    author: [],
    genre: [],
    path: '/manga/alpha',
    coverUrl: 'https://img.test/alpha.jpg',
  },
];

export const sampleChapters: Chapter[] = [
  { sourceId: 1, title: 'Chapter 2', path: '/c/2', number: 2, uploaded: 1_700_000_100 },
  { sourceId: 1, title: 'Chapter 1', path: '/c/1', number: 1, scanlator: 'team', uploaded: 1_700_000_000 },
];

export class FakeHandle implements ExtensionHandle {
  constructor(
    readonly sourceId: number,
    readonly name: string,
    readonly version: string,
  ) {}
}

/** In-process runtime that records what the core asks of it. */
export class FakeRuntime implements ExtensionRuntime {
  loads: FakeHandle[] = [];
  unloads: FakeHandle[] = [];
  restorable: RestoredExtension[] = [];
  failLoadFor = new Set<string>();
  /** When set, `load` waits for this before resolving */
  loadGate?: Promise<void>;

  getPopularManga = vi.fn(async (_handle: ExtensionHandle, _page: number, _options?: DispatchOptions): Promise<unknown> =>
    sampleManga.map(mangaToNative));

  getLatestManga = vi.fn(async (_handle: ExtensionHandle, _page: number, _options?: DispatchOptions): Promise<unknown> =>
    [...sampleManga].reverse().map(mangaToNative));

  searchManga = vi.fn(async (
    _handle: ExtensionHandle,
    _page: number,
    query: string | undefined,
    _filters: SearchFilter[] | undefined,
    _options?: DispatchOptions,
  ): Promise<unknown> =>
    sampleManga.filter(m => !query || m.title.toLowerCase().includes(query.toLowerCase())).map(mangaToNative));

  getMangaDetail = vi.fn(async (_handle: ExtensionHandle, path: string, _options?: DispatchOptions): Promise<unknown> => {
    const manga = sampleManga.find(m => m.path === path);
    if (!manga) throw new Error(`no manga at ${path}`);
    return mangaToNative(manga);
  });

  getChapters = vi.fn(async (_handle: ExtensionHandle, _path: string, _options?: DispatchOptions): Promise<unknown> =>
    sampleChapters.map(chapterToNative));

  getPages = vi.fn(async (_handle: ExtensionHandle, path: string, _options?: DispatchOptions): Promise<unknown> =>
    [`https://img.test${path}/1.jpg`, `https://img.test${path}/2.jpg`]);

  async load(_repoUrl: string, d: RemoteSourceDescriptor): Promise<ExtensionHandle> {
    if (this.loadGate) await this.loadGate;
    if (this.failLoadFor.has(d.name)) {
      throw new Error(`cannot load ${d.name}`);
    }
    const handle = new FakeHandle(d.id, d.name, d.version);
    this.loads.push(handle);
    return handle;
  }

  async unload(handle: ExtensionHandle): Promise<void> {
    if (handle instanceof FakeHandle) {
      this.unloads.push(handle);
    }
  }

  async restore(): Promise<RestoredExtension[]> {
    return this.restorable;
  }

  /** Handles loaded and not yet unloaded. */
  live(): FakeHandle[] {
    return this.loads.filter(h => !this.unloads.includes(h));
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function createHarness(options: LifecycleOptions = {}) {
  const runtime = new FakeRuntime();
  const registry = new ExtensionRegistry(runtime);
  const index = new RemoteIndexClient();
  const lifecycle = new SourceLifecycle(registry, runtime, index, { host: TEST_HOST, quiet: true, ...options });
  const service = new SourceService(registry, lifecycle, { repository: REPO_URL });
  return { runtime, registry, index, lifecycle, service };
}
