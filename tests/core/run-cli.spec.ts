import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { handleRunCli, runDaemon } from '../../src/core/run-cli.js';
import type { WatcherConfig } from '../../src/types/config.js';
import { execAction, makeWatch } from '../harness/fixtures.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  logSystemCommand: vi.fn().mockResolvedValue(undefined),
  scrubSensitiveText: (text: string) => text,
}));

describe('run command', () => {
  let tempDir = '';
  let errors: string[] = [];

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'dirwatch-run-cli-'));
    errors = [];
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation((...args) => {
      errors.push(args.join(' '));
    });
    process.exitCode = undefined;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(tempDir, { recursive: true, force: true });
  });

  it('only handles run, flags or an empty argv', async () => {
    expect(await handleRunCli(['validate'])).toBe(false);
    expect(await handleRunCli(['status', '--port', '1'])).toBe(false);
  });

  it('exits with 1 and lists issues when the config is invalid', async () => {
    const target = path.join(tempDir, 'dirwatch.json');
    await writeFile(target, JSON.stringify({ watches: [] }));

    expect(await handleRunCli(['run', '--config', target])).toBe(true);

    expect(process.exitCode).toBe(1);
    expect(errors).toEqual([
      '[Config] Configuration is invalid (1 issue).',
      '  - watches: at least one watch must be defined',
    ]);
  });

  it('returns once the shared signal is aborted', async () => {
    const config: WatcherConfig = {
      global: {
        scanIntervalMs: 10,
        debounceMs: 0,
        dryRun: false,
        defaultOverwrite: false,
        defaultTimeoutMs: 1_000,
        defaultRetryDelayMs: 0,
      },
      status: { enabled: false, host: '127.0.0.1', port: 18790 },
      watches: [makeWatch({ path: tempDir, scanIntervalMs: 10, actions: [execAction('noop')] })],
    };
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 30);

    await expect(runDaemon(config, { dryRun: true, signal: controller.signal })).resolves.toBeUndefined();
  });
});
