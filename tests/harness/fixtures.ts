import path from 'node:path';
import { compilePattern } from '../../src/config/config-loader.js';
import type {
  ActionFilter,
  ExecActionSpec,
  TransferActionSpec,
  WatchConfig,
  WebhookActionSpec,
} from '../../src/types/config.js';
import type { ChangeEvent, ChangeKind, FileRecord } from '../../src/types/watch.js';

export const ROOT = path.resolve('/watch');

export function makeRecord(relativePath: string, overrides: Partial<FileRecord> = {}): FileRecord {
  const mtimeMs = overrides.mtimeMs ?? 1_700_000_000_000;
  return {
    path: path.join(ROOT, relativePath),
    size: 10,
    mtimeMs,
    mtimeNs: BigInt(mtimeMs) * 1_000_000n,
    mode: 0o100644,
    isDirectory: false,
    ...overrides,
  };
}

export function makeEvent(kind: ChangeKind, relativePath: string, overrides: Partial<ChangeEvent> = {}): ChangeEvent {
  const record = overrides.record ?? makeRecord(relativePath);
  return {
    kind,
    path: record.path,
    relativePath,
    record,
    ageMs: 0,
    ...overrides,
  };
}

export interface FilterInput {
  include?: string[];
  exclude?: string[];
  events?: ChangeKind[];
  minSizeBytes?: number;
  maxSizeBytes?: number;
  minAgeMs?: number;
  maxAgeMs?: number;
  onlyFiles?: boolean;
  onlyDirs?: boolean;
  ignoreHidden?: boolean;
}

export function makeFilter(input: FilterInput = {}): ActionFilter {
  return {
    include: (input.include ?? []).map(compilePattern),
    exclude: (input.exclude ?? []).map(compilePattern),
    events: new Set(input.events ?? ['create', 'modify']),
    minSizeBytes: input.minSizeBytes,
    maxSizeBytes: input.maxSizeBytes,
    minAgeMs: input.minAgeMs,
    maxAgeMs: input.maxAgeMs,
    onlyFiles: input.onlyFiles ?? false,
    onlyDirs: input.onlyDirs ?? false,
    ignoreHidden: input.ignoreHidden ?? true,
  };
}

interface BaseInput {
  name?: string;
  filter?: FilterInput;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
}

function base(input: BaseInput, fallbackName: string) {
  return {
    name: input.name ?? fallbackName,
    filter: makeFilter(input.filter),
    timeoutMs: input.timeoutMs ?? 5_000,
    retries: input.retries ?? 0,
    retryDelayMs: input.retryDelayMs ?? 0,
  };
}

export function execAction(
  command: string,
  input: BaseInput & { env?: Record<string, string>; cwd?: string } = {},
): ExecActionSpec {
  return { ...base(input, 'exec'), kind: 'exec', command, env: input.env ?? {}, cwd: input.cwd };
}

export function transferAction(
  kind: TransferActionSpec['kind'],
  dest: string,
  input: BaseInput & { overwrite?: boolean } = {},
): TransferActionSpec {
  return { ...base(input, kind), kind, dest, overwrite: input.overwrite ?? false };
}

export function webhookAction(url: string, input: BaseInput = {}): WebhookActionSpec {
  return { ...base(input, 'webhook'), kind: 'webhook', url };
}

export function makeWatch(overrides: Partial<WatchConfig> = {}): WatchConfig {
  return {
    path: ROOT,
    recursive: true,
    scanIntervalMs: 1_000,
    debounceMs: 0,
    stopOnFirstMatch: false,
    actions: [],
    ...overrides,
  };
}
