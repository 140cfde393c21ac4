export interface PathDebouncerOptions {
    windowMs: number;
    now?: () => number;
}

/**
 * Per-path suppression of repeat dispatches within a time window.
 *
 * Owned by a single worker; not shared.
 */
export class PathDebouncer {
    readonly #windowMs: number;
    readonly #now: () => number;
    readonly #lastAccepted: Map<string, number> = new Map();

    constructor(options: PathDebouncerOptions) {
        this.#windowMs = Math.max(0, Math.floor(options.windowMs));
        this.#now = options.now ?? (() => Date.now());
    }

    /**
     * Returns `false` when `path` was accepted less than `windowMs` ago;
     * otherwise records now as its last accepted trigger and returns `true`.
     * A zero window accepts everything and records nothing.
     */
    accept(path: string): boolean {
        if (this.#windowMs <= 0) return true;

        const now = this.#now();
        const last = this.#lastAccepted.get(path);
        if (last !== undefined && now - last < this.#windowMs) {
            return false;
        }
        this.#lastAccepted.set(path, now);
        return true;
    }

    /** Drop the entry so a later create at the same path is not held back. */
    forget(path: string): void {
        this.#lastAccepted.delete(path);
    }

    getTrackedCount(): number {
        return this.#lastAccepted.size;
    }
}
