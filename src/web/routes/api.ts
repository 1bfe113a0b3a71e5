/**
 * REST API routes for health logs and suggestions.
 *
 * Repositories and the orchestrator are set on the Hono context by the
 * server middleware. Pipeline failures map to 502 (504 when a call timed
 * out) with `{ error: { stage, reason, transient } }`; malformed input to
 * 400.
 *
 * @module web/routes/api
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { Orchestrator } from '../../pipeline/orchestrator.js';
import { debug } from '../../shared/debug.js';
import { TimeoutError, type StageFailure } from '../../shared/errors.js';
import { HealthLogInsertSchema } from '../../shared/types.js';
import type { HealthLogRepository } from '../../storage/health-logs.js';
import type { SuggestionRepository } from '../../storage/suggestions.js';
import { DEFAULT_QUERY } from '../../mcp/tools/get-suggestions.js';

export type AppEnv = {
  Variables: {
    logs: HealthLogRepository;
    suggestions: SuggestionRepository;
    orchestrator: Orchestrator;
  };
};

const SuggestionRequestSchema = z.object({
  userId: z.string().min(1).max(200),
  query: z.string().trim().min(1).max(2000).optional(),
});

const DEFAULT_LIST_LIMIT = 20;
const MAX_LIST_LIMIT = 200;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseLimit(raw: string | undefined): number {
  const n = raw === undefined ? NaN : Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n < 1) return DEFAULT_LIST_LIMIT;
  return Math.min(n, MAX_LIST_LIMIT);
}

function validationBody(reason: string, issues: string[] = []) {
  return { error: { stage: 'request', reason, transient: false, issues } };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

function causedByTimeout(err: unknown): boolean {
  for (let e = err; e instanceof Error; e = e.cause) {
    if (e instanceof TimeoutError) return true;
    if (e.cause === e) break;
  }
  return false;
}

function failureStatus(failure: StageFailure): 502 | 504 {
  return causedByTimeout(failure.cause) ? 504 : 502;
}

async function readJson(req: { json: () => Promise<unknown> }): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    return { ok: true, body: await req.json() };
  } catch {
    return { ok: false };
  }
}

// ---------------------------------------------------------------------------
// Route group
// ---------------------------------------------------------------------------

export const apiRoutes = new Hono<AppEnv>();

/**
 * POST /api/logs
 *
 * Records one health log entry. Missing timestamp means now.
 */
apiRoutes.post('/logs', async (c) => {
  const json = await readJson(c.req);
  if (!json.ok) {
    return c.json(validationBody('Request body must be JSON'), 400);
  }

  const parsed = HealthLogInsertSchema.safeParse(json.body);
  if (!parsed.success) {
    return c.json(validationBody('Invalid health log', formatIssues(parsed.error)), 400);
  }

  const entry = c.get('logs').insert(parsed.data);
  return c.json({ log: entry }, 201);
});

/**
 * GET /api/logs/:userId?limit=N
 *
 * Most recent logs for a user, newest first.
 */
apiRoutes.get('/logs/:userId', (c) => {
  const userId = c.req.param('userId');
  const limit = parseLimit(c.req.query('limit'));
  const logs = c.get('logs').fetchRecentLogs(userId, limit);
  return c.json({ logs });
});

/**
 * POST /api/suggestions
 *
 * Body: `{ userId, query? }`. Runs the pipeline and stores the result.
 * A client disconnect cancels the request.
 */
apiRoutes.post('/suggestions', async (c) => {
  const json = await readJson(c.req);
  if (!json.ok) {
    return c.json(validationBody('Request body must be JSON'), 400);
  }

  const parsed = SuggestionRequestSchema.safeParse(json.body);
  if (!parsed.success) {
    return c.json(validationBody('Invalid suggestion request', formatIssues(parsed.error)), 400);
  }

  const { userId } = parsed.data;
  const query = parsed.data.query ?? DEFAULT_QUERY;
  const outcome = await c.get('orchestrator').suggest({ userId, query }, { signal: c.req.raw.signal });

  if (!outcome.ok) {
    const { failure } = outcome;
    debug('web', 'Suggestion request failed', failure.toJSON());
    return c.json(
      { error: { stage: failure.stage, reason: failure.reason, transient: failure.transient } },
      failureStatus(failure),
    );
  }

  c.get('suggestions').saveAll(userId, query, outcome.suggestions);
  return c.json({
    userId,
    query,
    summary: outcome.summary.digest,
    suggestions: outcome.suggestions,
  });
});

/**
 * GET /api/suggestions/:userId?limit=N
 *
 * Suggestion history, newest first.
 */
apiRoutes.get('/suggestions/:userId', (c) => {
  const userId = c.req.param('userId');
  const limit = parseLimit(c.req.query('limit'));
  return c.json({ suggestions: c.get('suggestions').listForUser(userId, limit) });
});
