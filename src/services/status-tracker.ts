import type { Counters } from '../types/watch.js';

function emptyCounters(): Counters {
    return {
        eventsSeen: 0,
        actionsRun: 0,
        successes: 0,
        failures: 0,
        lastError: null,
        lastActivityAt: null,
    };
}

/** Counter key for one action of one watch. */
export function actionKey(watchPath: string, actionName: string): string {
    return `${watchPath}.${actionName}`;
}

/**
 * Process-wide outcome counters shared by every worker.
 *
 * Each update is a single synchronous method call, so it runs to completion
 * on the event loop before any other worker or a status read can observe the
 * entry. Reads return copies; callers never hold a live reference.
 */
export class StatusTracker {
    readonly #counters: Map<string, Counters> = new Map();
    readonly #now: () => Date;

    constructor(now: () => Date = () => new Date()) {
        this.#now = now;
    }

    /** Count an accepted event for a watch directory. */
    recordEvent(watchPath: string): void {
        const entry = this.#ensure(watchPath);
        entry.eventsSeen += 1;
        entry.lastActivityAt = this.#now().toISOString();
    }

    /** Count one dispatched action under `<watch>.<action>`. */
    recordAction(watchPath: string, actionName: string, ok: boolean, error?: string): void {
        const entry = this.#ensure(actionKey(watchPath, actionName));
        entry.actionsRun += 1;
        if (ok) {
            entry.successes += 1;
        } else {
            entry.failures += 1;
            entry.lastError = error ?? 'unknown error';
        }
        entry.lastActivityAt = this.#now().toISOString();
    }

    get(key: string): Counters | undefined {
        const entry = this.#counters.get(key);
        return entry ? { ...entry } : undefined;
    }

    /** Copy of every counter, keyed by `<watch>` or `<watch>.<action>`. */
    snapshot(): Record<string, Counters> {
        const out: Record<string, Counters> = {};
        for (const [key, entry] of this.#counters) {
            out[key] = { ...entry };
        }
        return out;
    }

    #ensure(key: string): Counters {
        let entry = this.#counters.get(key);
        if (!entry) {
            entry = emptyCounters();
            this.#counters.set(key, entry);
        }
        return entry;
    }
}
