import request from 'supertest';
import { describe, expect, it, vi } from 'vitest';
import { createStatusApp } from '../../src/api/router.js';
import type { StatusSource } from '../../src/api/handlers/status.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  scrubSensitiveText: (text: string) => text.replace('test-secret', '[REDACTED]'),
}));

const source: StatusSource = {
  status: () => ({
    dryRun: false,
    counters: {
      '/in': {
        eventsSeen: 3,
        actionsRun: 0,
        successes: 0,
        failures: 0,
        lastError: null,
        lastActivityAt: '2024-05-01T10:00:00.000Z',
      },
      '/in.images': {
        eventsSeen: 0,
        actionsRun: 3,
        successes: 2,
        failures: 1,
        lastError: "Command 'convert' exited with code 1.",
        lastActivityAt: '2024-05-01T10:00:00.000Z',
      },
    },
    workers: [{ path: '/in', state: 'idle', cycles: 12, lastScanError: null }],
  }),
};

describe('status API', () => {
  const app = createStatusApp({ source });

  it('GET /health reports liveness and the number of watches', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
    expect(res.body.data).toMatchObject({ status: 'ok', watches: 1, dryRun: false });
    expect(typeof res.body.data.uptimeSec).toBe('number');
    expect(typeof res.body.correlationId).toBe('string');
    expect(typeof res.body.timestamp).toBe('string');
  });

  it('GET /status returns counters keyed by watch and action plus worker state', async () => {
    const res = await request(app).get('/status');

    expect(res.status).toBe(200);
    expect(res.body.data.counters['/in.images']).toEqual({
      eventsSeen: 0,
      actionsRun: 3,
      successes: 2,
      failures: 1,
      lastError: "Command 'convert' exited with code 1.",
      lastActivityAt: '2024-05-01T10:00:00.000Z',
    });
    expect(res.body.data.workers).toEqual([{ path: '/in', state: 'idle', cycles: 12, lastScanError: null }]);
  });

  it('answers unknown routes with a 404 envelope', async () => {
    const res = await request(app).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ ok: false, error: 'Route not found: GET /nope' });
    expect(typeof res.body.correlationId).toBe('string');
  });

  it('maps a failing source to a 500 envelope with scrubbed text', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const broken = createStatusApp({
      source: {
        status: () => {
          throw new Error('token test-secret leaked');
        },
      },
    });

    const res = await request(broken).get('/status');

    expect(res.status).toBe(500);
    expect(res.body).toMatchObject({ ok: false, error: 'token [REDACTED] leaked' });
  });
});
