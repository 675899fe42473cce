// ── Types ────────────────────────────────────────────────────────
export type {
  SourceInfo, Source, RemoteSourceDescriptor, HostCompatibility, UpdateStrategy,
} from './types/source.js';
export type { Manga, Chapter, SearchFilter, SearchFilterValue } from './types/catalog.js';
export type {
  BinderyConfig, BinderyConfigOverrides, ExtensionsConfig, ServerConfig, LoggingConfig, LogLevel,
} from './types/config.js';

// ── Schemas ──────────────────────────────────────────────────────
export {
  manifestEntrySchema, sourceIndexSchema, descriptorFromManifest, descriptorToManifest,
} from './schemas/source.schema.js';
export type { ManifestEntry } from './schemas/source.schema.js';
export {
  nativeMangaSchema, nativeChapterSchema,
  nativeMangaListSchema, nativeChapterListSchema, nativePageListSchema,
  mangaFromNative, mangaToNative, chapterFromNative, chapterToNative,
  searchFilterSchema,
} from './schemas/catalog.schema.js';
export type { NativeManga, NativeChapter } from './schemas/catalog.schema.js';
export {
  sourceIdParamSchema, pageQuerySchema, pathQuerySchema, installedQuerySchema, searchRequestSchema,
} from './schemas/request.schema.js';
export {
  binderyConfigSchema, extensionsConfigSchema, serverConfigSchema, loggingConfigSchema,
} from './schemas/config.schema.js';

// ── Constants & utils ────────────────────────────────────────────
export {
  HOST_ABI_TAG, HOST_CONTRACT_VERSION, HOST_COMPATIBILITY,
  INDEX_FILE, LIBRARY_DIR, BINDERY_VERSION, DEFAULT_CONFIG,
} from './constants.js';
export * from './utils/index.js';
