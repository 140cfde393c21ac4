import { formatConfigIssues, getConfigPath, loadConfig } from '../config/config-loader.js';
import type { ActionSpec, WatcherConfig } from '../types/config.js';
import { ConfigValidationError, errorMessage } from '../utils/errors.js';
import { readOption } from './cli.js';

function describeAction(action: ActionSpec): string {
  const events = [...action.filter.events].join(',');
  switch (action.kind) {
    case 'exec':
      return `${action.name} [exec] on ${events}: ${action.command}`;
    case 'copy':
    case 'move':
    case 'rename':
      return `${action.name} [${action.kind}] on ${events}: -> ${action.dest}`;
    case 'webhook':
      return `${action.name} [webhook] on ${events}: POST ${action.url}`;
  }
}

/** One line per watch plus an indented line per action. */
export function formatConfigSummary(config: WatcherConfig): string[] {
  const lines: string[] = [];
  for (const watch of config.watches) {
    lines.push(
      `${watch.path} (interval ${watch.scanIntervalMs}ms, debounce ${watch.debounceMs}ms, ` +
        `${watch.recursive ? 'recursive' : 'top-level only'}, ${watch.actions.length} action(s))`,
    );
    for (const action of watch.actions) {
      lines.push(`  - ${describeAction(action)}`);
    }
  }
  return lines;
}

/**
 * Handle the `validate` command.
 * Prints `config OK` and a summary, or every issue found with exit code 1.
 */
export async function handleValidateCli(argv: string[]): Promise<boolean> {
  if (argv[0] !== 'validate') return false;

  const configPath = getConfigPath(readOption(argv, '--config'));
  try {
    const config = await loadConfig(configPath);
    console.log('config OK');
    for (const line of formatConfigSummary(config)) {
      console.log(line);
    }
    process.exitCode = 0;
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(`[Config] ${configPath}: ${error.message}`);
      for (const line of formatConfigIssues(error.issues)) {
        console.error(`  - ${line}`);
      }
    } else {
      console.error(`[Config] ${errorMessage(error)}`);
    }
    process.exitCode = 1;
  }

  return true;
}
