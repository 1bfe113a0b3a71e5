#!/usr/bin/env node

// Health coach entry point: MCP server on stdio plus the HTTP API

import { createCoachApp } from './app.js';
import { createServer, startServer } from './mcp/server.js';
import { registerExploreOntology } from './mcp/tools/explore-ontology.js';
import { registerGetSuggestions } from './mcp/tools/get-suggestions.js';
import { debug, errorMessage } from './shared/debug.js';
import { createWebServer, DEFAULT_PORT, startWebServer } from './web/server.js';

const app = await createCoachApp().catch((err: unknown) => {
  process.stderr.write(`health-coach: failed to start: ${errorMessage(err)}\n`);
  process.exit(1);
});

// ---------------------------------------------------------------------------
// MCP server setup
// ---------------------------------------------------------------------------

const server = createServer();
registerGetSuggestions(server, app.orchestrator, app.suggestions);
registerExploreOntology(server, app.ontology);

startServer(server).catch((err: unknown) => {
  debug('mcp', 'Fatal: failed to start server', { error: errorMessage(err) });
  app.close();
  process.exit(1);
});

// ---------------------------------------------------------------------------
// HTTP API (runs alongside the MCP server)
// ---------------------------------------------------------------------------

const parsedPort = Number.parseInt(process.env.HEALTH_COACH_PORT ?? '', 10);
const webPort = Number.isFinite(parsedPort) && parsedPort > 0 ? parsedPort : DEFAULT_PORT;
const webApp = createWebServer({
  logs: app.logs,
  suggestions: app.suggestions,
  orchestrator: app.orchestrator,
  store: app.store,
});
const httpServer = startWebServer(webApp, webPort);

// ---------------------------------------------------------------------------
// Shutdown handlers
// ---------------------------------------------------------------------------

function shutdown(code: number): never {
  httpServer.close();
  app.close();
  process.exit(code);
}

process.on('SIGINT', () => shutdown(0));
process.on('SIGTERM', () => shutdown(0));
process.on('uncaughtException', (err) => {
  debug('mcp', 'Uncaught exception', { error: err.message });
  shutdown(1);
});
