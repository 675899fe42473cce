import { Hono, type MiddlewareHandler } from 'hono';
import { cors } from 'hono/cors';
import { serve, type ServerType } from '@hono/node-server';
import type { Bindery } from '@bindery/core';
import { sourcesRoutes } from './routes/sources.js';
import { healthRoutes } from './routes/health.js';
import { toErrorResponse } from './errors.js';

/** Rejects requests without `Authorization: Bearer <apiKey>`. No-op when no key is set. */
export function apiKeyMiddleware(apiKey: string | undefined): MiddlewareHandler {
  return async (c, next) => {
    if (apiKey) {
      if (c.req.header('Authorization') !== `Bearer ${apiKey}`) {
        return c.json({ error: 'Unauthorized', message: 'missing or invalid API key' }, 401);
      }
    }
    await next();
  };
}

export function createApp(bindery: Bindery) {
  const app = new Hono();
  const level = bindery.config.get('logging').level;

  app.use('*', cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'PUT', 'DELETE'],
    allowHeaders: ['Content-Type', 'Authorization'],
  }));

  // Request logging
  if (level === 'debug' || level === 'info') {
    app.use('*', async (c, next) => {
      const start = Date.now();
      await next();
      const ms = Date.now() - start;
      console.log(`${c.req.method} ${c.req.path} ${c.res.status} ${ms}ms`);
    });
  }

  app.onError((err, c) => {
    const { status, body } = toErrorResponse(err);
    if (status === 500) {
      console.error('Server error:', err);
    }
    return c.json(body, status);
  });

  app.notFound((c) => c.json({ error: 'NotFound', message: `no route for ${c.req.method} ${c.req.path}` }, 404));

  const guard = apiKeyMiddleware(bindery.config.get('server').apiKey);
  app.route('/api/source', sourcesRoutes(bindery, guard));
  app.route('/health', healthRoutes(bindery));

  return app;
}

export function startServer(bindery: Bindery): ServerType {
  const { port, host } = bindery.config.get('server');
  const app = createApp(bindery);

  console.log('Starting Bindery server...');
  return serve({ fetch: app.fetch, port, hostname: host }, () => {
    console.log(`Bindery server listening on http://${host}:${port}`);
    console.log('');
    console.log('Endpoints:');
    console.log('  GET    /api/source/installed           - Installed sources');
    console.log('  GET    /api/source/available           - Sources in the repository');
    console.log('  POST   /api/source/:id/install         - Install a source');
    console.log('  PUT    /api/source/:id/update          - Update a source');
    console.log('  DELETE /api/source/:id/uninstall       - Uninstall a source');
    console.log('  GET    /api/source/:id/popular|latest  - Browse titles');
    console.log('  POST   /api/source/:id/search          - Search titles');
    console.log('  GET    /api/source/:id/manga|chapters|pages?path= - Title details');
    console.log('  GET    /health                         - Health check');
  });
}
