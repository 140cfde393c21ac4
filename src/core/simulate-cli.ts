import path from 'node:path';
import { getConfigPath, loadConfig, parseDuration } from '../config/config-loader.js';
import { ActionExecutor } from '../services/action-executor.js';
import { ActionMatcher, relativeToWatch } from '../services/action-matcher.js';
import type { WatchConfig, WatcherConfig } from '../types/config.js';
import { CHANGE_KINDS } from '../types/watch.js';
import type { ChangeEvent, ChangeKind } from '../types/watch.js';
import { errorMessage } from '../utils/errors.js';
import { hasFlag, readOption } from './cli.js';

export interface SimulateOptions {
  file: string;
  watch?: string;
  event: ChangeKind;
  size: number;
  ageMs: number;
  execute: boolean;
}

export interface SimulateResult {
  lines: string[];
  failed: boolean;
}

function isChangeKind(value: string): value is ChangeKind {
  return CHANGE_KINDS.some((kind) => kind === value);
}

/** `--watch` selects by path; without it the first configured watch is used. */
export function pickWatch(config: WatcherConfig, watchPath?: string): WatchConfig | undefined {
  if (!watchPath) return config.watches[0];
  const wanted = path.resolve(watchPath);
  return config.watches.find((watch) => path.resolve(watch.path) === wanted);
}

/** Build the synthetic event `simulate` feeds to the matcher. */
export function buildSyntheticEvent(watch: WatchConfig, options: SimulateOptions, now = Date.now()): ChangeEvent {
  const filePath = path.resolve(options.file);
  const mtimeMs = now - options.ageMs;
  return {
    kind: options.event,
    path: filePath,
    relativePath: relativeToWatch(watch.path, filePath),
    record: {
      path: filePath,
      size: options.size,
      mtimeMs,
      mtimeNs: BigInt(mtimeMs) * 1_000_000n,
      mode: 0o644,
      isDirectory: false,
    },
    ageMs: options.ageMs,
  };
}

/** Match the synthetic event and run (or dry-run) every selected action. */
export async function simulateEvent(
  config: WatcherConfig,
  options: SimulateOptions,
  executor: ActionExecutor = new ActionExecutor({ dryRun: !options.execute }),
): Promise<SimulateResult> {
  const watch = pickWatch(config, options.watch);
  if (!watch) {
    return { lines: [`watch not found: ${options.watch ?? '(none configured)'}`], failed: true };
  }

  const event = buildSyntheticEvent(watch, options);
  const selected = new ActionMatcher().match(event, watch);
  if (selected.length === 0) {
    return { lines: ['no actions matched'], failed: false };
  }

  const lines: string[] = [];
  let failed = false;
  for (const action of selected) {
    const outcome = await executor.execute(event, action);
    if (!outcome.ok) {
      failed = true;
      lines.push(`action ${action.name} error: ${outcome.error ?? 'unknown error'}`);
    } else if (outcome.dryRun) {
      lines.push(`action ${action.name} (dry-run): ${outcome.detail ?? action.kind}`);
    } else {
      lines.push(`action ${action.name} executed`);
    }
  }
  return { lines, failed };
}

/** Parse `simulate` flags; returns an error message instead of options when they are unusable. */
export function parseSimulateArgs(argv: string[]): SimulateOptions | string {
  const file = readOption(argv, '--file');
  if (!file) return '--file is required';

  const event = readOption(argv, '--event') ?? 'create';
  if (!isChangeKind(event)) {
    return `unknown event '${event}' (expected one of: ${CHANGE_KINDS.join(', ')})`;
  }

  const rawSize = readOption(argv, '--size') ?? '0';
  const size = Number(rawSize);
  if (!Number.isInteger(size) || size < 0) {
    return `invalid --size '${rawSize}'`;
  }

  const rawAge = readOption(argv, '--age') ?? '0';
  const ageMs = parseDuration(rawAge);
  if (ageMs === null || ageMs < 0) {
    return `invalid --age '${rawAge}'`;
  }

  return {
    file,
    watch: readOption(argv, '--watch'),
    event,
    size,
    ageMs,
    execute: hasFlag(argv, '--execute'),
  };
}

/**
 * Handle the `simulate` command.
 * Dry-runs by default; `--execute` performs the selected actions.
 */
export async function handleSimulateCli(argv: string[]): Promise<boolean> {
  if (argv[0] !== 'simulate') return false;

  const parsed = parseSimulateArgs(argv);
  if (typeof parsed === 'string') {
    console.error(`[dirwatch] simulate: ${parsed}`);
    process.exitCode = 1;
    return true;
  }

  try {
    const config = await loadConfig(getConfigPath(readOption(argv, '--config')));
    const result = await simulateEvent(config, parsed);
    for (const line of result.lines) {
      console.log(line);
    }
    process.exitCode = result.failed ? 1 : 0;
  } catch (error) {
    console.error(`[dirwatch] simulate failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  }

  return true;
}
