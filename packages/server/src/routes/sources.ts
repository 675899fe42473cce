import { Hono, type MiddlewareHandler } from 'hono';
import {
  installedQuerySchema,
  pageQuerySchema,
  pathQuerySchema,
  searchRequestSchema,
  sourceIdParamSchema,
} from '@bindery/shared';
import type { Bindery } from '@bindery/core';
import { parse, readJsonBody } from '../validate.js';

export function sourcesRoutes(bindery: Bindery, guard: MiddlewareHandler) {
  const router = new Hono();
  const service = bindery.sources;

  router.get('/installed', async (c) => {
    const { check_update } = parse(installedQuerySchema, c.req.query());
    return c.json(await service.installedSources({ checkUpdates: check_update }));
  });

  router.get('/available', async (c) => {
    return c.json(await service.availableSources());
  });

  router.get('/:sourceId', async (c) => {
    const { sourceId } = parse(sourceIdParamSchema, c.req.param());
    return c.json(await service.getSourceById(sourceId));
  });

  router.post('/:sourceId/install', guard, async (c) => {
    const { sourceId } = parse(sourceIdParamSchema, c.req.param());
    return c.json(await service.installSource(sourceId), 201);
  });

  router.put('/:sourceId/update', guard, async (c) => {
    const { sourceId } = parse(sourceIdParamSchema, c.req.param());
    return c.json(await service.updateSource(sourceId));
  });

  router.delete('/:sourceId/uninstall', guard, async (c) => {
    const { sourceId } = parse(sourceIdParamSchema, c.req.param());
    await service.uninstallSource(sourceId);
    return c.body(null, 204);
  });

  // Catalog reads are cancelled when the client goes away
  router.get('/:sourceId/popular', async (c) => {
    const { sourceId } = parse(sourceIdParamSchema, c.req.param());
    const { page } = parse(pageQuerySchema, c.req.query());
    return c.json(await service.getPopularManga(sourceId, page, { signal: c.req.raw.signal }));
  });

  router.get('/:sourceId/latest', async (c) => {
    const { sourceId } = parse(sourceIdParamSchema, c.req.param());
    const { page } = parse(pageQuerySchema, c.req.query());
    return c.json(await service.getLatestManga(sourceId, page, { signal: c.req.raw.signal }));
  });

  router.post('/:sourceId/search', async (c) => {
    const { sourceId } = parse(sourceIdParamSchema, c.req.param());
    const { page } = parse(pageQuerySchema, c.req.query());
    const { query, filters } = parse(searchRequestSchema, await readJsonBody(c));
    return c.json(await service.searchManga(sourceId, page, query, filters, { signal: c.req.raw.signal }));
  });

  router.get('/:sourceId/manga', async (c) => {
    const { sourceId } = parse(sourceIdParamSchema, c.req.param());
    const { path } = parse(pathQuerySchema, c.req.query());
    return c.json(await service.getMangaBySourcePath(sourceId, path, { signal: c.req.raw.signal }));
  });

  router.get('/:sourceId/chapters', async (c) => {
    const { sourceId } = parse(sourceIdParamSchema, c.req.param());
    const { path } = parse(pathQuerySchema, c.req.query());
    return c.json(await service.getChaptersBySourcePath(sourceId, path, { signal: c.req.raw.signal }));
  });

  router.get('/:sourceId/pages', async (c) => {
    const { sourceId } = parse(sourceIdParamSchema, c.req.param());
    const { path } = parse(pathQuerySchema, c.req.query());
    return c.json(await service.getPagesBySourcePath(sourceId, path, { signal: c.req.raw.signal }));
  });

  return router;
}
