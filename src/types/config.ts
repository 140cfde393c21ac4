import type { ChangeKind } from './watch.js';

export type ActionKind = 'exec' | 'copy' | 'move' | 'rename' | 'webhook';

export const ACTION_KINDS: readonly ActionKind[] = ['exec', 'copy', 'move', 'rename', 'webhook'];

/** A glob compiled once at load time. */
export interface CompiledPattern {
    source: string;
    test: (relativePath: string) => boolean;
}

/** Filter half of an action: decides whether an event selects it. */
export interface ActionFilter {
    include: readonly CompiledPattern[];
    exclude: readonly CompiledPattern[];
    events: ReadonlySet<ChangeKind>;
    minSizeBytes?: number;
    maxSizeBytes?: number;
    minAgeMs?: number;
    maxAgeMs?: number;
    onlyFiles: boolean;
    onlyDirs: boolean;
    /** Skip paths with any component starting with `.`. */
    ignoreHidden: boolean;
}

interface ActionSpecBase {
    /** Unique within its watch. */
    name: string;
    filter: ActionFilter;
    timeoutMs: number;
    /** Additional attempts after the first failure. */
    retries: number;
    retryDelayMs: number;
}

export interface ExecActionSpec extends ActionSpecBase {
    kind: 'exec';
    command: string;
    env: Readonly<Record<string, string>>;
    cwd?: string;
}

export interface TransferActionSpec extends ActionSpecBase {
    kind: 'copy' | 'move' | 'rename';
    dest: string;
    overwrite: boolean;
}

export interface WebhookActionSpec extends ActionSpecBase {
    kind: 'webhook';
    url: string;
}

export type ActionSpec = ExecActionSpec | TransferActionSpec | WebhookActionSpec;

/** Fully resolved configuration of one watched directory. */
export interface WatchConfig {
    /** Absolute path of the watch root. */
    path: string;
    recursive: boolean;
    scanIntervalMs: number;
    debounceMs: number;
    stopOnFirstMatch: boolean;
    actions: readonly ActionSpec[];
}

export interface GlobalConfig {
    scanIntervalMs: number;
    debounceMs: number;
    dryRun: boolean;
    defaultOverwrite: boolean;
    defaultTimeoutMs: number;
    defaultRetryDelayMs: number;
}

export interface StatusServerConfig {
    enabled: boolean;
    host: string;
    port: number;
}

/** Immutable configuration consumed by the supervisor for the process lifetime. */
export interface WatcherConfig {
    global: GlobalConfig;
    status: StatusServerConfig;
    watches: readonly WatchConfig[];
}
