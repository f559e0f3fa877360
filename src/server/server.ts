import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type { OperatorResolver } from '../resolver/resolver.js';
import type { DefinitionStore } from '../store/types.js';
import type { AuditLog } from '../audit/log.js';
import { createOperatorApi } from './api.js';

export const SERVER_VERSION = '0.1.0';

interface ServerDeps {
  resolver: OperatorResolver;
  store: DefinitionStore;
  audit?: AuditLog;
}

export function createServer(deps: ServerDeps): Hono {
  const app = new Hono();

  // Health check
  app.get('/health', (c) => c.json({ ok: true, version: SERVER_VERSION }));

  // Mount operator API
  app.route('/api/v1', createOperatorApi(deps));

  return app;
}

export function startServer(deps: ServerDeps, port: number): void {
  const app = createServer(deps);

  serve({
    fetch: app.fetch,
    hostname: '127.0.0.1',
    port,
  });

  console.log(`opsmith server listening on http://127.0.0.1:${port}`);
}
