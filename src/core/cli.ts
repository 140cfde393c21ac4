// ── Help text ────────────────────────────────────────────────────────────────

export const HELP_TEXT = `
Usage: dirwatch [command] [options]

Commands:
  run                 Watch the configured directories (default)
  validate            Load and validate the configuration file
  init                Write a sample configuration file
  simulate            Run one synthetic event through the matcher and executor
  status              Print counters from a running daemon's status API
  logs                Print today's log file

Options:
  --config <path>     Configuration file (default: $DIRWATCH_CONFIG_PATH or ./dirwatch.json)
  --dry-run           Evaluate actions without performing them (run only)
  --force             Overwrite an existing configuration file (init only)
  --file <path>       File to simulate an event for (simulate only)
  --watch <dir>       Watch directory the file belongs to (simulate only)
  --event <kind>      create | modify | delete | move (simulate, default: create)
  --size <bytes>      Override the simulated file size (simulate only)
  --age <duration>    Override the simulated file age, e.g. 2h (simulate only)
  --execute           Perform the selected actions instead of a dry run (simulate only)
  --host <host>       Status API host (status only)
  --port <port>       Status API port (status only)
  --follow, -f        Keep printing new log entries (logs only)
  --help, -h          Show this help message

Examples:
  dirwatch init
  dirwatch validate --config ./dirwatch.json
  dirwatch run --dry-run
  dirwatch simulate --file ./incoming/photo.jpg --event create
  dirwatch status --port 18790
`.trim();

export const KNOWN_COMMANDS: ReadonlySet<string> = new Set([
  'run',
  'validate',
  'init',
  'simulate',
  'status',
  'logs',
]);

// ── Argument helpers ─────────────────────────────────────────────────────────

/** Value following `name` in argv, e.g. `--config ./x.json`. */
export function readOption(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) return undefined;
  return value;
}

export function hasFlag(argv: string[], ...names: string[]): boolean {
  return names.some((name) => argv.includes(name));
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!hasFlag(argv, '--help', '-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Flags fall through so that `dirwatch --dry-run` still means `run --dry-run`.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  if (argv.length === 0) return false;

  const command = argv[0];
  if (KNOWN_COMMANDS.has(command) || command.startsWith('-')) {
    return false;
  }

  console.error(`[dirwatch] Unknown command: '${command}'`);
  console.error(`Run 'dirwatch --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}
