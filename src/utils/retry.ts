import { logThought } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
    /** Label used in log messages for traceability. */
    label?: string;
    /** Stops further attempts (and any pending back-off) once aborted. */
    signal?: AbortSignal;
}

/** Result of a retried operation. */
export interface RetryResult<T> {
    ok: boolean;
    value?: T;
    error?: string;
    attempts: number;
    totalDurationMs: number;
}

const DEFAULTS: Required<Omit<RetryOptions, 'label' | 'signal'>> = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
};

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * - Retries up to `maxAttempts` times on failure.
 * - Delay doubles after each attempt (capped at `maxDelayMs`); a base delay of 0 retries immediately.
 * - An aborted `signal` ends the loop with the last observed error.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   (attempt) => runner.run(context, action, signal),
 *   { maxAttempts: action.retries + 1, baseDelayMs: 0, label: 'incoming.images' },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const label = options.label ?? 'unnamed';
    const signal = options.signal;

    const start = Date.now();
    let lastError: unknown;
    let attempts = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (signal?.aborted) break;

        attempts = attempt;
        try {
            const value = await fn(attempt);
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                void logThought(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastError = err;
            const message = describe(err);

            if (attempt < maxAttempts && !signal?.aborted) {
                const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
                void logThought(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${message}. Retrying in ${delay}ms.`,
                );
                if (delay > 0) {
                    await sleep(delay, signal);
                }
            } else {
                void logThought(
                    `[Retry] ${label} gave up after ${attempt}/${maxAttempts} attempts. Last error: ${message}.`,
                );
            }
        }
    }

    return {
        ok: false,
        error: lastError === undefined ? 'Operation was cancelled before it could run.' : describe(lastError),
        attempts,
        totalDurationMs: Date.now() - start,
    };
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        const timer = setTimeout(done, ms);
        function done(): void {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        }
        signal?.addEventListener('abort', done, { once: true });
    });
}
