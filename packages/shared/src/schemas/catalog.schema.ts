import { z } from 'zod';
import type { Chapter, Manga } from '../types/catalog.js';

// Plugin-native records use snake_case keys. Each record type is described
// once here, together with its mapping to and from the host shape.

export const nativeMangaSchema = z.object({
  source_id: z.number().int(),
  title: z.string(),
  author: z.array(z.string()),
  genre: z.array(z.string()),
  status: z.string().nullish(),
  description: z.string().nullish(),
  path: z.string(),
  cover_url: z.string(),
});

export type NativeManga = z.infer<typeof nativeMangaSchema>;

export function mangaFromNative(native: NativeManga): Manga {
  return {
    sourceId: native.source_id,
    title: native.title,
    author: [...native.author],
    genre: [...native.genre],
    status: native.status ?? undefined,
    description: native.description ?? undefined,
    path: native.path,
    coverUrl: native.cover_url,
  };
}

export function mangaToNative(manga: Manga): NativeManga {
  return {
    source_id: manga.sourceId,
    title: manga.title,
    author: [...manga.author],
    genre: [...manga.genre],
    status: manga.status ?? null,
    description: manga.description ?? null,
    path: manga.path,
    cover_url: manga.coverUrl,
  };
}

export const nativeChapterSchema = z.object({
  source_id: z.number().int(),
  title: z.string(),
  path: z.string(),
  number: z.number(),
  scanlator: z.string().nullish(),
  uploaded: z.number().int(),
});

export type NativeChapter = z.infer<typeof nativeChapterSchema>;

export function chapterFromNative(native: NativeChapter): Chapter {
  return {
    sourceId: native.source_id,
    title: native.title,
    path: native.path,
    number: native.number,
    scanlator: native.scanlator ?? undefined,
    uploaded: native.uploaded,
  };
}

export function chapterToNative(chapter: Chapter): NativeChapter {
  return {
    source_id: chapter.sourceId,
    title: chapter.title,
    path: chapter.path,
    number: chapter.number,
    scanlator: chapter.scanlator ?? null,
    uploaded: chapter.uploaded,
  };
}

export const nativeMangaListSchema = z.array(nativeMangaSchema);
export const nativeChapterListSchema = z.array(nativeChapterSchema);
export const nativePageListSchema = z.array(z.string());

export const searchFilterSchema = z.object({
  name: z.string().min(1),
  value: z.union([z.string(), z.number(), z.boolean(), z.array(z.string()), z.null()]),
});
