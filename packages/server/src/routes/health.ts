import { Hono } from 'hono';
import { BINDERY_VERSION } from '@bindery/shared';
import type { Bindery } from '@bindery/core';

export function healthRoutes(bindery: Bindery) {
  const router = new Hono();

  router.get('/', (c) => {
    return c.json({
      status: 'ok',
      version: BINDERY_VERSION,
      sources: bindery.registry.size,
      host: bindery.host,
      updateStrategy: bindery.config.get('extensions').updateStrategy,
    });
  });

  router.get('/metrics', (c) => {
    return c.json({
      uptime: process.uptime(),
      memory: process.memoryUsage(),
      version: BINDERY_VERSION,
    });
  });

  return router;
}
