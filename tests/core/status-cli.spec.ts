import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { formatStatusReport, handleStatusCli, parseStatusEnvelope } from '../../src/core/status-cli.js';

const envelope = {
  ok: true,
  data: {
    dryRun: true,
    counters: {
      '/in.images': {
        eventsSeen: 0,
        actionsRun: 2,
        successes: 1,
        failures: 1,
        lastError: 'exited with code 1',
        lastActivityAt: '2024-05-01T10:00:00.000Z',
      },
      '/in': {
        eventsSeen: 2,
        actionsRun: 0,
        successes: 0,
        failures: 0,
        lastError: null,
        lastActivityAt: null,
      },
      '/broken': { eventsSeen: 'many' },
    },
    workers: [{ path: '/in', state: 'scanning', cycles: 4, lastScanError: null }, { path: 7 }],
  },
  correlationId: 'test-correlation',
  timestamp: '2024-05-01T10:00:01.000Z',
};

describe('parseStatusEnvelope', () => {
  it('keeps well-formed entries and drops malformed ones', () => {
    const status = parseStatusEnvelope(envelope);
    expect(Object.keys(status.counters).sort()).toEqual(['/in', '/in.images']);
    expect(status.workers).toEqual([{ path: '/in', state: 'scanning', cycles: 4, lastScanError: null }]);
    expect(status.dryRun).toBe(true);
  });

  it('surfaces an error envelope', () => {
    expect(() => parseStatusEnvelope({ ok: false, error: 'Route not found: GET /status' })).toThrow(
      'Status API reported an error: Route not found: GET /status',
    );
  });
});

describe('formatStatusReport', () => {
  it('prints workers then counters sorted by key', () => {
    expect(formatStatusReport(parseStatusEnvelope(envelope)).split('\n')).toEqual([
      'dirwatch status (dry-run)',
      '══════════════════════════════════════',
      '  /in  [scanning]  cycles=4',
      '──────────────────────────────────────',
      '  /in  events=2  runs=0  ok=0  failed=0',
      '  /in.images  events=0  runs=2  ok=1  failed=1  last=2024-05-01T10:00:00.000Z  error=exited with code 1',
    ]);
  });
});

describe('handleStatusCli', () => {
  let output: string[] = [];
  let errors: string[] = [];

  beforeEach(() => {
    output = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((...args) => {
      output.push(args.join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...args) => {
      errors.push(args.join(' '));
    });
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('ignores other commands', async () => {
    expect(await handleStatusCli(['logs'])).toBe(false);
  });

  it('queries the configured host and port', async () => {
    const fetchImpl = vi.fn(async (_url: string) => ({ ok: true, status: 200, json: async (): Promise<unknown> => envelope }));

    expect(await handleStatusCli(['status', '--host', '10.0.0.5', '--port', '9000'], fetchImpl)).toBe(true);

    expect(fetchImpl).toHaveBeenCalledWith('http://10.0.0.5:9000/status');
    expect(output[0]).toBe(formatStatusReport(parseStatusEnvelope(envelope)));
    expect(process.exitCode).toBe(0);
  });

  it('defaults to the local status port and fails when nothing answers', async () => {
    const fetchImpl = vi.fn(async (_url: string): Promise<{ ok: boolean; status: number; json(): Promise<unknown> }> => {
      throw new Error('fetch failed');
    });

    await handleStatusCli(['status'], fetchImpl);

    expect(fetchImpl).toHaveBeenCalledWith('http://127.0.0.1:18790/status');
    expect(errors[0]).toBe('[StatusAPI] Could not read status from http://127.0.0.1:18790/status: fetch failed');
    expect(process.exitCode).toBe(1);
  });
});
