/**
 * Hono web server: the HTTP request boundary for the suggestion pipeline.
 *
 * Configured with CORS for localhost development and a health check that
 * reports whether the knowledge store has finished building.
 *
 * @module web/server
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';

import type { KnowledgeStore } from '../knowledge/knowledge-store.js';
import type { Orchestrator } from '../pipeline/orchestrator.js';
import { debug } from '../shared/debug.js';
import type { HealthLogRepository } from '../storage/health-logs.js';
import type { SuggestionRepository } from '../storage/suggestions.js';
import { apiRoutes, type AppEnv } from './routes/api.js';

export const DEFAULT_PORT = 37820;

export interface WebServerDeps {
  logs: HealthLogRepository;
  suggestions: SuggestionRepository;
  orchestrator: Orchestrator;
  store: KnowledgeStore;
}

/**
 * Creates a configured Hono app with middleware and route registration.
 */
export function createWebServer(deps: WebServerDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // CORS middleware for localhost development
  app.use(
    '*',
    cors({
      origin: (origin) => {
        if (!origin) return '*';
        if (origin.startsWith('http://localhost:') || origin.startsWith('http://127.0.0.1:')) {
          return origin;
        }
        return null;
      },
    }),
  );

  // Make repositories and the orchestrator available to all route handlers
  app.use('*', async (c, next) => {
    c.set('logs', deps.logs);
    c.set('suggestions', deps.suggestions);
    c.set('orchestrator', deps.orchestrator);
    await next();
  });

  app.get('/api/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: Date.now(),
      knowledge: { ready: deps.store.isFrozen(), chunks: deps.store.size },
    });
  });

  app.route('/api', apiRoutes);

  app.notFound((c) => c.json({ error: { stage: 'request', reason: 'Not found', transient: false } }, 404));

  app.onError((err, c) => {
    debug('web', 'Unhandled route error', { path: c.req.path, error: err.message });
    return c.json({ error: { stage: 'request', reason: 'Internal error', transient: false } }, 500);
  });

  return app;
}

/**
 * Maximum number of alternate ports to try when the primary port is in use.
 */
const MAX_PORT_RETRIES = 10;

/**
 * Starts the Hono web server on the specified port.
 *
 * If the port is already in use (EADDRINUSE), tries incrementing ports up to
 * MAX_PORT_RETRIES times. If all ports fail, logs and continues without the
 * web server -- the MCP server keeps running.
 *
 * @returns The Node.js HTTP server instance
 */
export function startWebServer(
  app: Hono<AppEnv>,
  port: number = DEFAULT_PORT,
): ReturnType<typeof serve> {
  debug('web', `Starting web server on port ${port}`);

  function tryListen(attemptPort: number, retries: number): ReturnType<typeof serve> {
    const server = serve({
      fetch: app.fetch,
      port: attemptPort,
    });

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE' && retries > 0) {
        server.close();
        const nextPort = attemptPort + 1;
        debug('web', `Port ${attemptPort} in use, trying ${nextPort}`);
        tryListen(nextPort, retries - 1);
      } else if (err.code === 'EADDRINUSE') {
        server.close();
        debug('web', `Web server disabled: all ports ${port}-${attemptPort} in use`);
      } else {
        debug('web', `Web server error: ${err.message}`);
      }
    });

    server.on('listening', () => {
      const addr = server.address();
      const actualPort = typeof addr === 'object' && addr ? addr.port : attemptPort;
      debug('web', `Web server listening on http://localhost:${actualPort}`);
    });

    return server;
  }

  return tryListen(port, MAX_PORT_RETRIES);
}
