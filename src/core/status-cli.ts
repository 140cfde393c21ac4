import { CONFIG_DEFAULTS } from '../config/config-schema.js';
import type { StatusData, StatusWorkerData } from '../types/api.js';
import type { Counters } from '../types/watch.js';
import { errorMessage } from '../utils/errors.js';
import { readOption } from './cli.js';

type Fetch = (url: string) => Promise<{ ok: boolean; status: number; json(): Promise<unknown> }>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCounters(value: unknown): Counters | null {
  if (!isRecord(value)) return null;
  const { eventsSeen, actionsRun, successes, failures, lastError, lastActivityAt } = value;
  if (
    typeof eventsSeen !== 'number' ||
    typeof actionsRun !== 'number' ||
    typeof successes !== 'number' ||
    typeof failures !== 'number'
  ) {
    return null;
  }
  return {
    eventsSeen,
    actionsRun,
    successes,
    failures,
    lastError: typeof lastError === 'string' ? lastError : null,
    lastActivityAt: typeof lastActivityAt === 'string' ? lastActivityAt : null,
  };
}

function toWorker(value: unknown): StatusWorkerData | null {
  if (!isRecord(value)) return null;
  const { path, state, cycles, lastScanError } = value;
  if (typeof path !== 'string' || typeof cycles !== 'number') return null;
  switch (state) {
    case 'idle':
    case 'scanning':
    case 'diffing':
    case 'dispatching':
    case 'stopped':
      return { path, state, cycles, lastScanError: typeof lastScanError === 'string' ? lastScanError : null };
    default:
      return null;
  }
}

/** Validate the `data` field of a `GET /status` envelope. */
export function parseStatusEnvelope(body: unknown): StatusData {
  if (!isRecord(body)) {
    throw new Error('Status API returned a non-object body.');
  }
  if (body.ok !== true) {
    const reason = typeof body.error === 'string' ? body.error : 'unknown error';
    throw new Error(`Status API reported an error: ${reason}`);
  }
  const data = body.data;
  if (!isRecord(data) || !isRecord(data.counters) || !Array.isArray(data.workers)) {
    throw new Error('Status API response is missing counters or workers.');
  }

  const counters: Record<string, Counters> = {};
  for (const [key, raw] of Object.entries(data.counters)) {
    const entry = toCounters(raw);
    if (entry) counters[key] = entry;
  }
  const workers: StatusWorkerData[] = [];
  for (const raw of data.workers) {
    const worker = toWorker(raw);
    if (worker) workers.push(worker);
  }
  return { dryRun: data.dryRun === true, counters, workers };
}

/** Human-readable counters table, one row per key, sorted by key. */
export function formatStatusReport(status: StatusData): string {
  const lines: string[] = [];
  lines.push(`dirwatch status${status.dryRun ? ' (dry-run)' : ''}`);
  lines.push('══════════════════════════════════════');

  for (const worker of status.workers) {
    const scan = worker.lastScanError ? `  last scan error: ${worker.lastScanError}` : '';
    lines.push(`  ${worker.path}  [${worker.state}]  cycles=${worker.cycles}${scan}`);
  }

  lines.push('──────────────────────────────────────');
  const keys = Object.keys(status.counters).sort();
  if (keys.length === 0) {
    lines.push('  no activity recorded yet');
  }
  for (const key of keys) {
    const entry = status.counters[key];
    const parts = [
      `events=${entry.eventsSeen}`,
      `runs=${entry.actionsRun}`,
      `ok=${entry.successes}`,
      `failed=${entry.failures}`,
    ];
    if (entry.lastActivityAt) parts.push(`last=${entry.lastActivityAt}`);
    if (entry.lastError) parts.push(`error=${entry.lastError}`);
    lines.push(`  ${key}  ${parts.join('  ')}`);
  }
  return lines.join('\n');
}

/**
 * Handle the `status` command.
 * Queries a running daemon's status API and prints its counters.
 */
export async function handleStatusCli(argv: string[], fetchImpl: Fetch = fetch): Promise<boolean> {
  if (argv[0] !== 'status') return false;

  const host = readOption(argv, '--host') ?? CONFIG_DEFAULTS.statusHost;
  const port = readOption(argv, '--port') ?? String(CONFIG_DEFAULTS.statusPort);
  const url = `http://${host}:${port}/status`;

  try {
    const response = await fetchImpl(url);
    const body = await response.json();
    console.log(formatStatusReport(parseStatusEnvelope(body)));
    process.exitCode = 0;
  } catch (error) {
    console.error(`[StatusAPI] Could not read status from ${url}: ${errorMessage(error)}`);
    console.error('Is the daemon running with "status": { "enabled": true }?');
    process.exitCode = 1;
  }

  return true;
}
