import { ActionExecutor } from '../services/action-executor.js';
import { ActionMatcher } from '../services/action-matcher.js';
import type { SnapshotBuilder } from '../services/snapshot-builder.js';
import { StatusTracker } from '../services/status-tracker.js';
import type { WatcherConfig } from '../types/config.js';
import type { Counters, WorkerSnapshot } from '../types/watch.js';
import { errorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import { WatchWorker } from './watch-worker.js';

export interface SupervisorOptions {
    /** Overrides `global.dryRun`; `true` from `run --dry-run`. */
    dryRun?: boolean;
    executor?: ActionExecutor;
    matcher?: ActionMatcher;
    tracker?: StatusTracker;
    builder?: SnapshotBuilder;
    now?: () => number;
}

export interface SupervisorStatus {
    dryRun: boolean;
    counters: Record<string, Counters>;
    workers: WorkerSnapshot[];
}

/**
 * Runs one {@link WatchWorker} per configured directory. All workers share
 * one matcher, one executor and one counters store.
 */
export class Supervisor {
    readonly #config: WatcherConfig;
    readonly #executor: ActionExecutor;
    readonly #tracker: StatusTracker;
    readonly #workers: WatchWorker[];
    #running = false;

    constructor(config: WatcherConfig, options: SupervisorOptions = {}) {
        this.#config = config;
        this.#executor = options.executor
            ?? new ActionExecutor({ dryRun: options.dryRun === true || config.global.dryRun });
        this.#tracker = options.tracker ?? new StatusTracker();
        const matcher = options.matcher ?? new ActionMatcher();

        this.#workers = config.watches.map((watch) => new WatchWorker(watch, {
            matcher,
            executor: this.#executor,
            tracker: this.#tracker,
            builder: options.builder,
            now: options.now,
        }));
    }

    get dryRun(): boolean {
        return this.#executor.dryRun;
    }

    get workers(): readonly WatchWorker[] {
        return this.#workers;
    }

    /**
     * Start every worker and resolve once all of them observed `signal`.
     * Throws synchronously when a worker cannot be started at all.
     */
    run(signal: AbortSignal): Promise<void> {
        if (this.#running) {
            throw new Error('Supervisor is already running.');
        }
        for (const watch of this.#config.watches) {
            if (!Number.isFinite(watch.scanIntervalMs) || watch.scanIntervalMs <= 0) {
                throw new Error(`Cannot start worker for ${watch.path}: scan interval must be positive.`);
            }
        }
        this.#running = true;

        console.log(
            `[Supervisor] Starting ${this.#workers.length} worker(s)${this.#executor.dryRun ? ' in dry-run mode' : ''}.`,
        );

        const runs = this.#workers.map(async (worker) => {
            try {
                await worker.run(signal);
            } catch (err) {
                const message = errorMessage(err);
                console.error(`[Supervisor] Worker for ${worker.path} stopped unexpectedly: ${message}`);
                await logThought(`[Supervisor] Worker for ${worker.path} crashed: ${message}`);
            }
        });

        return Promise.all(runs).then(async () => {
            this.#running = false;
            console.log('[Supervisor] All workers stopped.');
            await logThought('[Supervisor] All workers stopped.');
        });
    }

    /** Read-only copy of the counters plus each worker's loop state. */
    status(): SupervisorStatus {
        return {
            dryRun: this.#executor.dryRun,
            counters: this.#tracker.snapshot(),
            workers: this.#workers.map((worker) => worker.snapshot()),
        };
    }
}
