import { setTimeout as delay } from 'node:timers/promises';
import type { ActionExecutor } from '../services/action-executor.js';
import type { ActionMatcher } from '../services/action-matcher.js';
import { PathDebouncer } from '../services/path-debounce.js';
import { SnapshotBuilder } from '../services/snapshot-builder.js';
import { diffSnapshots } from '../services/snapshot-differ.js';
import type { StatusTracker } from '../services/status-tracker.js';
import type { WatchConfig } from '../types/config.js';
import type { ChangeEvent, ExecutionOutcome, Snapshot, WorkerSnapshot, WorkerState } from '../types/watch.js';
import { errorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';

export interface WatchWorkerDeps {
    matcher: ActionMatcher;
    executor: ActionExecutor;
    tracker: StatusTracker;
    builder?: SnapshotBuilder;
    now?: () => number;
}

export interface DispatchRecord {
    event: ChangeEvent;
    action: string;
    outcome: ExecutionOutcome;
}

/** What one scan-diff-dispatch pass did. */
export interface CycleResult {
    /** `true` when this pass only recorded the baseline snapshot. */
    baseline: boolean;
    scanError: string | null;
    events: ChangeEvent[];
    /** Events that passed debounce, in dispatch order. */
    accepted: ChangeEvent[];
    dispatches: DispatchRecord[];
}

/**
 * Owns the poll loop of one watched directory.
 *
 * Each pass runs `scanning → diffing → dispatching → idle` to completion
 * before the interval timer is armed again, so two passes for the same
 * directory never overlap. The previous snapshot and the debounce table
 * belong to this worker alone.
 */
export class WatchWorker {
    readonly #watch: WatchConfig;
    readonly #deps: WatchWorkerDeps;
    readonly #builder: SnapshotBuilder;
    readonly #debouncer: PathDebouncer;
    readonly #now: () => number;
    #previous: Snapshot | null = null;
    #state: WorkerState = 'idle';
    #cycles = 0;
    #lastScanError: string | null = null;

    constructor(watch: WatchConfig, deps: WatchWorkerDeps) {
        this.#watch = watch;
        this.#deps = deps;
        this.#builder = deps.builder ?? new SnapshotBuilder();
        this.#now = deps.now ?? (() => Date.now());
        this.#debouncer = new PathDebouncer({ windowMs: watch.debounceMs, now: this.#now });
    }

    get path(): string {
        return this.#watch.path;
    }

    get state(): WorkerState {
        return this.#state;
    }

    get cycles(): number {
        return this.#cycles;
    }

    snapshot(): WorkerSnapshot {
        return {
            path: this.#watch.path,
            state: this.#state,
            cycles: this.#cycles,
            lastScanError: this.#lastScanError,
        };
    }

    /** Poll until `signal` aborts. The first pass only records a baseline. */
    async run(signal: AbortSignal): Promise<void> {
        await logThought(
            `[Worker] Watching ${this.#watch.path} every ${this.#watch.scanIntervalMs}ms ` +
                `(recursive=${this.#watch.recursive}, debounce=${this.#watch.debounceMs}ms).`,
        );

        while (!signal.aborted) {
            await this.runCycle(signal);
            if (signal.aborted) break;
            try {
                await delay(this.#watch.scanIntervalMs, undefined, { signal });
            } catch (err) {
                if (!signal.aborted) throw err;
            }
        }

        this.#state = 'stopped';
        await logThought(`[Worker] Stopped watching ${this.#watch.path}.`);
    }

    /** One scan-diff-dispatch pass. */
    async runCycle(signal?: AbortSignal): Promise<CycleResult> {
        const result: CycleResult = { baseline: false, scanError: null, events: [], accepted: [], dispatches: [] };

        this.#state = 'scanning';
        let current: Snapshot;
        try {
            current = await this.#builder.build(this.#watch.path, this.#watch.recursive);
        } catch (err) {
            const message = errorMessage(err);
            this.#lastScanError = message;
            this.#state = 'idle';
            console.error(`[Worker] Scan of ${this.#watch.path} failed, skipping cycle: ${message}`);
            await logThought(`[Worker] Scan error on ${this.#watch.path}: ${message}`);
            return { ...result, scanError: message };
        }
        this.#lastScanError = null;

        if (this.#previous === null) {
            this.#previous = current;
            this.#state = 'idle';
            return { ...result, baseline: true };
        }

        this.#state = 'diffing';
        const events = diffSnapshots(this.#watch.path, this.#previous, current, this.#now());
        this.#previous = current;
        result.events = events;

        this.#state = 'dispatching';
        for (const event of events) {
            if (signal?.aborted) break;
            if (!this.#admit(event)) continue;
            result.accepted.push(event);
            result.dispatches.push(...(await this.#dispatch(event, signal)));
        }

        this.#cycles += 1;
        this.#state = 'idle';
        return result;
    }

    #admit(event: ChangeEvent): boolean {
        const accepted = this.#debouncer.accept(event.path);
        if (event.kind === 'delete') {
            this.#debouncer.forget(event.path);
        }
        return accepted;
    }

    async #dispatch(event: ChangeEvent, signal?: AbortSignal): Promise<DispatchRecord[]> {
        const { tracker, matcher, executor } = this.#deps;
        tracker.recordEvent(this.#watch.path);

        const records: DispatchRecord[] = [];
        for (const action of matcher.match(event, this.#watch)) {
            const outcome = await executor.execute(event, action, signal);
            tracker.recordAction(this.#watch.path, action.name, outcome.ok, outcome.error);
            records.push({ event, action: action.name, outcome });

            const label = `[Worker] ${this.#watch.path} ${action.name} ${event.kind} ${event.relativePath}`;
            if (outcome.dryRun) {
                await logThought(`${label}: dry-run (${outcome.detail ?? action.kind})`);
            } else if (outcome.ok) {
                await logThought(`${label}: ok after ${outcome.attempts} attempt(s)`);
            } else {
                console.error(`${label}: failed after ${outcome.attempts} attempt(s): ${outcome.error ?? 'unknown error'}`);
                await logThought(`${label}: failed: ${outcome.error ?? 'unknown error'}`);
            }
        }
        return records;
    }
}
