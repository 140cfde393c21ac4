import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import picomatch from 'picomatch';
import { ACTION_KINDS } from '../types/config.js';
import type {
    ActionFilter,
    ActionKind,
    ActionSpec,
    CompiledPattern,
    GlobalConfig,
    StatusServerConfig,
    WatchConfig,
    WatcherConfig,
} from '../types/config.js';
import { CHANGE_KINDS } from '../types/watch.js';
import type { ChangeKind } from '../types/watch.js';
import { ConfigValidationError, errorMessage } from '../utils/errors.js';
import { CONFIG_DEFAULTS, DEFAULT_CONFIG_FILENAME } from './config-schema.js';
import type { ConfigIssue } from './config-schema.js';

type RawObject = Record<string, unknown>;

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;
const DURATION_PART = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;
const DURATION_STRING = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h))+$/;
const UNIT_MS: Record<string, number> = { ms: 1, s: 1000, m: 60_000, h: 3_600_000 };
/** Largest delay a Node timer honours; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export interface ResolveConfigOptions {
    /** Base directory for relative watch paths. Defaults to `process.cwd()`. */
    cwd?: string;
}

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.DIRWATCH_CONFIG_PATH) {
        return path.resolve(process.env.DIRWATCH_CONFIG_PATH);
    }
    return path.resolve(DEFAULT_CONFIG_FILENAME);
}

/** Replace `${VAR}` and `$VAR` with environment values; unset variables become empty. */
export function expandEnv(text: string, env: NodeJS.ProcessEnv = process.env): string {
    return text.replace(ENV_REFERENCE, (_match, braced: string | undefined, bare: string | undefined) => {
        const name = braced ?? bare ?? '';
        return env[name] ?? '';
    });
}

/**
 * Parse a duration given as integer milliseconds or as a string such as
 * `"250ms"`, `"10s"` or `"1h30m"`. Returns `null` when the value is not a duration.
 */
export function parseDuration(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? Math.floor(value) : null;
    }
    if (typeof value !== 'string') return null;

    const trimmed = value.trim();
    if (/^-?\d+$/.test(trimmed)) {
        return Number(trimmed);
    }
    if (!DURATION_STRING.test(trimmed)) return null;

    let total = 0;
    for (const [, amount, unit] of trimmed.matchAll(DURATION_PART)) {
        total += Number(amount) * UNIT_MS[unit];
    }
    return Math.floor(total);
}

export function compilePattern(source: string): CompiledPattern {
    const matcher = picomatch(source, { dot: true });
    return {
        source,
        test: (relativePath: string) => matcher(relativePath.split(path.sep).join('/')),
    };
}

function isRecord(value: unknown): value is RawObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toChangeKind(value: unknown): ChangeKind | undefined {
    return CHANGE_KINDS.find((kind) => kind === value);
}

function toActionKind(value: unknown): ActionKind | undefined {
    return ACTION_KINDS.find((kind) => kind === value);
}

function at(where: string, key: string | number): string {
    if (typeof key === 'number') return `${where}[${key}]`;
    return where ? `${where}.${key}` : key;
}

/** Typed field access over the raw document that records every problem it meets. */
class ConfigReader {
    readonly issues: ConfigIssue[] = [];

    report(where: string, message: string): void {
        this.issues.push({ path: where, message });
    }

    object(obj: RawObject, key: string, where: string): RawObject | undefined {
        const value = obj[key];
        if (value === undefined || value === null) return undefined;
        if (!isRecord(value)) {
            this.report(at(where, key), 'must be an object');
            return undefined;
        }
        return value;
    }

    string(obj: RawObject, key: string, where: string): string | undefined {
        const value = obj[key];
        if (value === undefined || value === null) return undefined;
        if (typeof value !== 'string') {
            this.report(at(where, key), 'must be a string');
            return undefined;
        }
        return value;
    }

    boolean(obj: RawObject, key: string, where: string): boolean | undefined {
        const value = obj[key];
        if (value === undefined || value === null) return undefined;
        if (typeof value !== 'boolean') {
            this.report(at(where, key), 'must be true or false');
            return undefined;
        }
        return value;
    }

    integer(obj: RawObject, key: string, where: string): number | undefined {
        const value = obj[key];
        if (value === undefined || value === null) return undefined;
        if (typeof value !== 'number' || !Number.isInteger(value)) {
            this.report(at(where, key), 'must be an integer');
            return undefined;
        }
        return value;
    }

    duration(obj: RawObject, key: string, where: string): number | undefined {
        const value = obj[key];
        if (value === undefined || value === null) return undefined;
        const parsed = parseDuration(value);
        if (parsed === null) {
            this.report(at(where, key), `invalid duration ${JSON.stringify(value)}`);
            return undefined;
        }
        return parsed;
    }

    /** A duration that ends up as a timer delay. */
    timerDuration(obj: RawObject, key: string, where: string): number | undefined {
        const parsed = this.duration(obj, key, where);
        if (parsed !== undefined && parsed > MAX_TIMER_MS) {
            this.report(at(where, key), `must be <= ${MAX_TIMER_MS}ms`);
            return undefined;
        }
        return parsed;
    }

    stringList(obj: RawObject, key: string, where: string): string[] | undefined {
        const value = obj[key];
        if (value === undefined || value === null) return undefined;
        if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
            this.report(at(where, key), 'must be a list of strings');
            return undefined;
        }
        return value;
    }

    stringMap(obj: RawObject, key: string, where: string): Record<string, string> | undefined {
        const value = this.object(obj, key, where);
        if (!value) return undefined;
        const out: Record<string, string> = {};
        for (const [name, entry] of Object.entries(value)) {
            if (typeof entry !== 'string') {
                this.report(at(at(where, key), name), 'must be a string');
                continue;
            }
            out[name] = entry;
        }
        return out;
    }
}

function resolveGlobal(reader: ConfigReader, raw: RawObject): GlobalConfig {
    const global = reader.object(raw, 'global', '') ?? {};
    const defaults = reader.object(global, 'defaults', 'global') ?? {};

    const scanIntervalMs = reader.timerDuration(global, 'scan_interval_ms', 'global') ?? CONFIG_DEFAULTS.scanIntervalMs;
    if (scanIntervalMs <= 0) {
        reader.report('global.scan_interval_ms', 'must be > 0');
    }
    const debounceMs = reader.duration(global, 'debounce_ms', 'global') ?? CONFIG_DEFAULTS.debounceMs;
    if (debounceMs < 0) {
        reader.report('global.debounce_ms', 'must be >= 0');
    }
    const defaultTimeoutMs = reader.timerDuration(defaults, 'timeout_ms', 'global.defaults') ?? CONFIG_DEFAULTS.timeoutMs;
    if (defaultTimeoutMs <= 0) {
        reader.report('global.defaults.timeout_ms', 'must be > 0');
    }

    return {
        scanIntervalMs,
        debounceMs,
        dryRun: reader.boolean(global, 'dry_run', 'global') ?? CONFIG_DEFAULTS.dryRun,
        defaultOverwrite: reader.boolean(defaults, 'overwrite', 'global.defaults') ?? CONFIG_DEFAULTS.overwrite,
        defaultTimeoutMs,
        defaultRetryDelayMs:
            reader.timerDuration(defaults, 'retry_delay_ms', 'global.defaults') ?? CONFIG_DEFAULTS.retryDelayMs,
    };
}

function resolveStatus(reader: ConfigReader, raw: RawObject): StatusServerConfig {
    const status = reader.object(raw, 'status', '') ?? {};
    const port = reader.integer(status, 'port', 'status') ?? CONFIG_DEFAULTS.statusPort;
    if (port < 1 || port > 65535) {
        reader.report('status.port', 'must be in range 1-65535');
    }
    return {
        enabled: reader.boolean(status, 'enabled', 'status') ?? false,
        host: reader.string(status, 'host', 'status') ?? CONFIG_DEFAULTS.statusHost,
        port,
    };
}

function resolvePatterns(reader: ConfigReader, sources: string[], where: string): CompiledPattern[] {
    const compiled: CompiledPattern[] = [];
    sources.forEach((source, index) => {
        try {
            compiled.push(compilePattern(source));
        } catch (err) {
            reader.report(at(where, index), `invalid glob: ${errorMessage(err)}`);
        }
    });
    return compiled;
}

function resolveFilter(reader: ConfigReader, action: RawObject, where: string): ActionFilter {
    const condition = reader.object(action, 'condition', where) ?? {};
    const conditionAt = at(where, 'condition');

    const events = new Set<ChangeKind>();
    const rawEvents: string[] = reader.stringList(action, 'events', where) ?? [...CONFIG_DEFAULTS.events];
    rawEvents.forEach((name, index) => {
        const kind = toChangeKind(name);
        if (!kind) {
            reader.report(at(at(where, 'events'), index), `unknown event "${name}"`);
            return;
        }
        events.add(kind);
    });
    if (rawEvents.length === 0) {
        for (const kind of CONFIG_DEFAULTS.events) events.add(kind);
    }

    const bound = (key: string, read: 'integer' | 'duration'): number | undefined => {
        const value = read === 'integer'
            ? reader.integer(condition, key, conditionAt)
            : reader.duration(condition, key, conditionAt);
        if (value !== undefined && value < 0) {
            reader.report(at(conditionAt, key), 'must be >= 0');
            return undefined;
        }
        return value;
    };

    const onlyFiles = reader.boolean(condition, 'only_files', conditionAt) ?? false;
    const onlyDirs = reader.boolean(condition, 'only_dirs', conditionAt) ?? false;
    if (onlyFiles && onlyDirs) {
        reader.report(conditionAt, 'cannot set both only_dirs and only_files');
    }

    return {
        include: resolvePatterns(reader, reader.stringList(action, 'include', where) ?? [], at(where, 'include')),
        exclude: resolvePatterns(reader, reader.stringList(action, 'exclude', where) ?? [], at(where, 'exclude')),
        events,
        minSizeBytes: bound('min_size_bytes', 'integer'),
        maxSizeBytes: bound('max_size_bytes', 'integer'),
        minAgeMs: bound('min_age_ms', 'duration'),
        maxAgeMs: bound('max_age_ms', 'duration'),
        onlyFiles,
        onlyDirs,
        ignoreHidden: reader.boolean(condition, 'ignore_hidden', conditionAt) ?? CONFIG_DEFAULTS.ignoreHidden,
    };
}

function resolveAction(
    reader: ConfigReader,
    action: RawObject,
    where: string,
    global: GlobalConfig,
    cwd: string,
): ActionSpec | undefined {
    const name = (reader.string(action, 'name', where) ?? '').trim();
    if (!name) {
        reader.report(at(where, 'name'), 'name required');
    }

    const rawType = action.type;
    const kind = toActionKind(rawType);
    if (!kind) {
        reader.report(at(where, 'type'), `unknown action type ${JSON.stringify(rawType ?? '')}`);
    }

    const filter = resolveFilter(reader, action, where);
    const timeoutMs = reader.timerDuration(action, 'timeout_ms', where) ?? global.defaultTimeoutMs;
    if (timeoutMs <= 0) {
        reader.report(at(where, 'timeout_ms'), 'must be > 0');
    }
    const retries = Math.max(0, reader.integer(action, 'retries', where) ?? CONFIG_DEFAULTS.retries);
    const retryDelayMs = reader.timerDuration(action, 'retry_delay_ms', where) ?? global.defaultRetryDelayMs;
    const base = { name, filter, timeoutMs, retries, retryDelayMs };

    const required = (key: string, message: string): string => {
        const value = (reader.string(action, key, where) ?? '').trim();
        if (!value) reader.report(at(where, key), message);
        return value;
    };

    switch (kind) {
        case 'exec': {
            const cwdValue = reader.string(action, 'cwd', where);
            return {
                ...base,
                kind,
                command: required('cmd', 'exec action requires cmd'),
                env: reader.stringMap(action, 'env', where) ?? {},
                cwd: cwdValue ? path.resolve(cwd, cwdValue) : undefined,
            };
        }
        case 'copy':
        case 'move':
        case 'rename':
            return {
                ...base,
                kind,
                dest: required('dest', `${kind} action requires dest`),
                overwrite: reader.boolean(action, 'overwrite', where) ?? global.defaultOverwrite,
            };
        case 'webhook': {
            const url = required('url', 'webhook action requires url');
            if (url && !/^https?:\/\//i.test(url)) {
                reader.report(at(where, 'url'), 'url must start with http:// or https://');
            }
            return { ...base, kind, url };
        }
        default:
            return undefined;
    }
}

async function resolveWatch(
    reader: ConfigReader,
    watch: RawObject,
    where: string,
    global: GlobalConfig,
    cwd: string,
): Promise<WatchConfig> {
    const rawPath = (reader.string(watch, 'path', where) ?? '').trim();
    const watchPath = rawPath ? path.resolve(cwd, rawPath) : '';
    if (!rawPath) {
        reader.report(at(where, 'path'), 'path is required');
    } else {
        try {
            const info = await stat(watchPath);
            if (!info.isDirectory()) {
                reader.report(at(where, 'path'), `${watchPath} is not a directory`);
            }
        } catch (err) {
            reader.report(at(where, 'path'), `path error: ${errorMessage(err)}`);
        }
    }

    const scanIntervalMs = reader.timerDuration(watch, 'scan_interval_ms', where) ?? global.scanIntervalMs;
    if (scanIntervalMs <= 0) {
        reader.report(at(where, 'scan_interval_ms'), 'must be > 0');
    }
    const debounceMs = reader.duration(watch, 'debounce_ms', where) ?? global.debounceMs;
    if (debounceMs < 0) {
        reader.report(at(where, 'debounce_ms'), 'must be >= 0');
    }

    const rawActions = watch.actions;
    const actions: ActionSpec[] = [];
    if (!Array.isArray(rawActions) || rawActions.length === 0) {
        reader.report(at(where, 'actions'), 'at least one action is required');
    } else {
        const names = new Set<string>();
        rawActions.forEach((rawAction: unknown, index) => {
            const actionAt = at(at(where, 'actions'), index);
            if (!isRecord(rawAction)) {
                reader.report(actionAt, 'must be an object');
                return;
            }
            const action = resolveAction(reader, rawAction, actionAt, global, cwd);
            if (!action) return;
            if (action.name && names.has(action.name)) {
                reader.report(at(actionAt, 'name'), `duplicate action name ${action.name}`);
            }
            names.add(action.name);
            actions.push(action);
        });
    }

    return {
        path: watchPath,
        recursive: reader.boolean(watch, 'recursive', where) ?? false,
        scanIntervalMs,
        debounceMs,
        stopOnFirstMatch: reader.boolean(watch, 'stop_on_first_match', where) ?? false,
        actions,
    };
}

/**
 * Turn a parsed document into an immutable {@link WatcherConfig}.
 *
 * Every problem is collected; if any exist a {@link ConfigValidationError}
 * listing all of them is thrown and nothing is returned.
 */
export async function resolveConfig(raw: unknown, options: ResolveConfigOptions = {}): Promise<WatcherConfig> {
    const cwd = options.cwd ?? process.cwd();
    const reader = new ConfigReader();

    if (!isRecord(raw)) {
        reader.report('', 'configuration must be a JSON object');
        throw new ConfigValidationError(reader.issues);
    }

    const global = resolveGlobal(reader, raw);
    const status = resolveStatus(reader, raw);

    const watches: WatchConfig[] = [];
    const rawWatches = raw.watches;
    if (!Array.isArray(rawWatches) || rawWatches.length === 0) {
        reader.report('watches', 'at least one watch must be defined');
    } else {
        for (const [index, rawWatch] of rawWatches.entries()) {
            const where = at('watches', index);
            if (!isRecord(rawWatch)) {
                reader.report(where, 'must be an object');
                continue;
            }
            watches.push(await resolveWatch(reader, rawWatch, where, global, cwd));
        }
    }

    if (reader.issues.length > 0) {
        throw new ConfigValidationError(reader.issues);
    }

    return { global, status, watches };
}

/** Read, env-expand, parse and resolve the config file at `configPath`. */
export async function loadConfig(configPath: string, options: ResolveConfigOptions = {}): Promise<WatcherConfig> {
    let rawText: string;
    try {
        rawText = await readFile(configPath, 'utf8');
    } catch (err) {
        throw new Error(`Failed to read config file at ${configPath}: ${errorMessage(err)}`, { cause: err });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(expandEnv(rawText));
    } catch (err) {
        throw new Error(`Failed to parse config file at ${configPath}: ${errorMessage(err)}`, { cause: err });
    }

    return resolveConfig(parsed, options);
}

export function formatConfigIssues(issues: ConfigIssue[]): string[] {
    return issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message));
}
