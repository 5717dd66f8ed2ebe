/**
 * API Controller Tests
 *
 * Builds the Express app on a fresh in-memory session registry and drives it
 * with supertest. Sessions run on the real engine and simulated adapters.
 */

import { jest, describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import request from 'supertest';

import { buildApp } from '../app.js';
import { SessionRegistry } from '../services/session-registry.js';

// ─── Test harness ─────────────────────────────────────────────────────────────

let app: ReturnType<typeof buildApp>;
let registry: SessionRegistry;
const previousLogLevel = process.env['LOG_LEVEL'];

beforeAll(() => {
  process.env['LOG_LEVEL'] = 'silent';
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  registry = SessionRegistry.init();
  app = buildApp();
});

afterAll(() => {
  if (previousLogLevel === undefined) delete process.env['LOG_LEVEL'];
  else process.env['LOG_LEVEL'] = previousLogLevel;
  jest.restoreAllMocks();
});

async function createSession(body: object): Promise<string> {
  const res = await request(app).post('/api/sessions').send(body).expect(202);
  const id: unknown = res.body.id;
  if (typeof id !== 'string') throw new Error('session id missing from response');
  return id;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Health Check
// ═══════════════════════════════════════════════════════════════════════════════

describe('GET /healthz', () => {
  it('returns status ok', async () => {
    const res = await request(app).get('/healthz').expect(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.ts).toBeDefined();
    expect(typeof res.body.sessions).toBe('number');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Scenario Routes
// ═══════════════════════════════════════════════════════════════════════════════

describe('GET /api/scenarios', () => {
  it('lists the catalogue', async () => {
    const res = await request(app).get('/api/scenarios').expect(200);
    expect(res.body.data).toHaveLength(5);
    expect(res.body.data[0].id).toBe('dos-flood');
  });

  it('returns one scenario', async () => {
    const res = await request(app).get('/api/scenarios/replay').expect(200);
    expect(res.body.steps).toHaveLength(3);
  });

  it('returns 404 for an unknown scenario', async () => {
    const res = await request(app).get('/api/scenarios/nope').expect(404);
    expect(res.body).toEqual({ error: 'scenario not found' });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Session Routes
// ═══════════════════════════════════════════════════════════════════════════════

describe('POST /api/sessions', () => {
  it('runs a session to completion in the background', async () => {
    const id = await createSession({ durationSeconds: 10, anomalyKinds: ['power_anomaly'], anomalyOnsetSeconds: 0 });
    await registry.get(id).completion;

    const res = await request(app).get(`/api/sessions/${id}`).expect(200);
    expect(res.body.state).toBe('stopped');
    expect(res.body.statistics.ticks).toBe(9);
    expect(res.body.statistics.anomalies.by_kind.power_anomaly).toBe(1);
    expect(res.body.summary.reason).toBe('duration_elapsed');
    expect(res.body.error).toBeNull();
  });

  it('lists created sessions', async () => {
    const id = await createSession({ durationSeconds: 2 });
    await registry.get(id).completion;
    const res = await request(app).get('/api/sessions').expect(200);
    const ids: unknown[] = res.body.data.map((s: { id: unknown }) => s.id);
    expect(ids).toContain(id);
  });

  it('returns 400 on a malformed body', async () => {
    const res = await request(app).post('/api/sessions').send({ durationSeconds: -1 }).expect(400);
    expect(res.body.error).toBe('validation_error');
  });

  it('returns 400 on an unknown anomaly kind', async () => {
    const res = await request(app)
      .post('/api/sessions')
      .send({ durationSeconds: 10, anomalyKinds: ['meltdown'] })
      .expect(400);
    expect(res.body.error).toBe('validation_error');
  });

  it('returns 400 with details on inconsistent physics', async () => {
    const res = await request(app)
      .post('/api/sessions')
      .send({ durationSeconds: 10, config: { thermal: { derateThresholdC: 100 } } })
      .expect(400);
    expect(res.body).toEqual({
      error: 'Invalid session configuration',
      details: ['thermal.derateThresholdC: must be below criticalThresholdC'],
    });
  });
});

describe('POST /api/sessions with a coarse tick', () => {
  it('returns 400 before any session starts', async () => {
    const before = registry.size;
    const res = await request(app)
      .post('/api/sessions')
      .send({ durationSeconds: 600, config: { tickIntervalMs: 60_000 } })
      .expect(400);
    expect(res.body).toEqual({
      error: 'Invalid session configuration',
      details: ['tickIntervalMs: must be below 48000 ms for k=2.5 W/°C and C=120 J/°C'],
    });
    expect(registry.size).toBe(before);
  });
});

describe('GET /api/sessions/:sessionId', () => {
  it('returns 404 for an unknown session', async () => {
    const res = await request(app).get('/api/sessions/unknown').expect(404);
    expect(res.body.error).toBe('Session unknown not found');
  });
});

describe('live session control', () => {
  let id: string;

  beforeAll(async () => {
    // ten simulated seconds per wall second keeps the session alive between requests
    id = await createSession({ durationSeconds: 3_600, speedFactor: 10 });
  });

  it('injects an anomaly from a preset', async () => {
    const res = await request(app)
      .post(`/api/sessions/${id}/anomalies`)
      .send({ kind: 'spoofing', targetProtocol: 'control', preset: 'HIGH' })
      .expect(201);
    expect(res.body.id).toBe('spoofing_0');
    expect(res.body.severity).toBe(0.9);

    const active = await request(app).get(`/api/sessions/${id}/anomalies`).expect(200);
    expect(active.body.data).toHaveLength(1);
  });

  it('rejects severity together with a preset', async () => {
    await request(app)
      .post(`/api/sessions/${id}/anomalies`)
      .send({ kind: 'spoofing', severity: 0.2, preset: 'LOW' })
      .expect(400);
  });

  it('removes an anomaly once', async () => {
    const first = await request(app).delete(`/api/sessions/${id}/anomalies/spoofing_0`).expect(200);
    expect(first.body).toEqual({ removed: true });
    const second = await request(app).delete(`/api/sessions/${id}/anomalies/spoofing_0`).expect(200);
    expect(second.body).toEqual({ removed: false });
  });

  it('starts a scenario', async () => {
    const res = await request(app).post(`/api/sessions/${id}/scenarios/dos-flood/run`).expect(202);
    expect(res.body).toEqual({ sessionId: id, scenarioId: 'dos-flood', steps: 2 });
  });

  it('returns 404 for an unknown scenario', async () => {
    await request(app).post(`/api/sessions/${id}/scenarios/nope/run`).expect(404);
  });

  it('stops the session and then refuses new anomalies', async () => {
    const res = await request(app).post(`/api/sessions/${id}/stop`).expect(202);
    expect(res.body.accepted).toBe(true);

    const summary = await registry.get(id).completion;
    expect(summary?.reason).toBe('stop_requested');

    await request(app).post(`/api/sessions/${id}/anomalies`).send({ kind: 'spoofing' }).expect(409);
  });
});
