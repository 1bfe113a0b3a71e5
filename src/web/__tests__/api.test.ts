import { describe, it, expect, afterEach } from 'vitest';

import { TableEngine, inMemoryCoach, testConfig, type InMemoryCoach } from '../../pipeline/__tests__/fakes.js';
import type { OrchestratorDeps } from '../../pipeline/orchestrator.js';
import { InvalidQueryError } from '../../shared/errors.js';
import { createWebServer } from '../server.js';

let coach: InMemoryCoach | undefined;

function setup(overrides: Partial<OrchestratorDeps> = {}) {
  coach = inMemoryCoach(overrides);
  return { coach, app: createWebServer(coach) };
}

function post(body: unknown): RequestInit {
  return {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  };
}

afterEach(() => {
  coach?.db.close();
  coach = undefined;
});

describe('GET /api/health', () => {
  it('reports the knowledge store state', async () => {
    const { app } = setup();

    const res = await app.request('/api/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', knowledge: { ready: true, chunks: 2 } });
  });
});

describe('logs routes', () => {
  it('records a log and returns it', async () => {
    const { app } = setup();

    const res = await app.request(
      '/api/logs',
      post({ userId: 'user-1', timestamp: '2024-03-09T08:00:00Z', sleepHours: 6.5, mood: 'Tired' }),
    );

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      log: {
        userId: 'user-1',
        timestamp: '2024-03-09T08:00:00.000Z',
        activityMinutes: null,
        sleepHours: 6.5,
        waterIntakeMl: null,
        steps: null,
        heartRate: null,
        calories: null,
        mood: 'tired',
      },
    });
  });

  it('rejects a body that is not JSON', async () => {
    const { app } = setup();

    const res = await app.request('/api/logs', post('{ not json'));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { stage: 'request', reason: 'Request body must be JSON', transient: false, issues: [] },
    });
  });

  it('rejects an out-of-range metric with the field named', async () => {
    const { app } = setup();

    const res = await app.request('/api/logs', post({ userId: 'user-1', sleepHours: 30 }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        stage: 'request',
        reason: 'Invalid health log',
        transient: false,
        issues: ['sleepHours: Number must be less than or equal to 24'],
      },
    });
  });

  it('lists recent logs newest first, honouring the limit', async () => {
    const { app, coach } = setup();
    coach.logs.insert({ userId: 'user-1', timestamp: '2024-03-01T08:00:00Z', steps: 1 });
    coach.logs.insert({ userId: 'user-1', timestamp: '2024-03-02T08:00:00Z', steps: 2 });

    const res = await app.request('/api/logs/user-1?limit=1');

    expect(await res.json()).toMatchObject({ logs: [{ steps: 2 }] });
  });
});

describe('suggestions routes', () => {
  it('runs the pipeline and stores the suggestions', async () => {
    const { app, coach } = setup();
    coach.logs.insert({ userId: 'user-1', timestamp: '2024-03-09T08:00:00Z', sleepHours: 6 });

    const res = await app.request('/api/suggestions', post({ userId: 'user-1', query: 'sleep' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      userId: 'user-1',
      query: 'sleep',
      suggestions: [{ id: 'fixed-bedtime' }, { id: 'daily-walk' }, { id: 'water-bottle' }],
    });
    expect(coach.suggestions.listForUser('user-1')).toHaveLength(3);

    const history = await app.request('/api/suggestions/user-1?limit=2');
    expect(await history.json()).toMatchObject({ suggestions: [{ userId: 'user-1' }, { userId: 'user-1' }] });
  });

  it('uses the default question when none is given', async () => {
    const { app } = setup();

    const res = await app.request('/api/suggestions', post({ userId: 'user-1' }));

    expect(await res.json()).toMatchObject({ query: 'Give me personalized health recommendations' });
  });

  it('rejects a request without a user id', async () => {
    const { app } = setup();

    const res = await app.request('/api/suggestions', post({ query: 'sleep' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { stage: 'request', reason: 'Invalid suggestion request' } });
  });

  it('maps a pipeline failure to 502 with the failing stage', async () => {
    const engine = new TableEngine([1, 0, 0, 0]);
    engine.failures.push(new InvalidQueryError('bad embedding'));
    const { app, coach } = setup({ engine });

    const res = await app.request('/api/suggestions', post({ userId: 'user-1', query: 'sleep' }));

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: { stage: 'retrieving', reason: 'bad embedding', transient: false } });
    expect(coach.suggestions.listForUser('user-1')).toEqual([]);
  });

  it('maps a timed-out external call to 504', async () => {
    class SilentEngine extends TableEngine {
      override async embed(): Promise<Float32Array> {
        return new Promise<Float32Array>(() => {});
      }
    }
    const config = testConfig({ topK: 2, requestTimeoutMs: 20 });
    config.retry.maxAttempts = 1;
    const { app } = setup({ engine: new SilentEngine([1, 0, 0, 0]), config });

    const res = await app.request('/api/suggestions', post({ userId: 'user-1', query: 'sleep' }));

    expect(res.status).toBe(504);
    expect(await res.json()).toEqual({
      error: { stage: 'retrieving', reason: 'Query embedding failed: embed timed out after 20ms', transient: true },
    });
  });
});

describe('unknown routes', () => {
  it('returns a JSON 404', async () => {
    const { app } = setup();

    const res = await app.request('/api/nothing-here');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { stage: 'request', reason: 'Not found', transient: false } });
  });
});
