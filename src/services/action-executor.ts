import type {
    ActionSpec,
    ExecActionSpec,
    TransferActionSpec,
    WebhookActionSpec,
} from '../types/config.js';
import type { ChangeEvent, ExecutionOutcome } from '../types/watch.js';
import { ActionFailedError } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { ExecRunner } from './actions/exec-runner.js';
import { FileTransferRunner } from './actions/file-transfer-runner.js';
import { contextFromEvent } from './actions/types.js';
import type { ActionContext, ActionRunner } from './actions/types.js';
import { WebhookRunner } from './actions/webhook-runner.js';

/** One runner per action kind. */
export interface ActionRunners {
    exec: ActionRunner<ExecActionSpec>;
    copy: ActionRunner<TransferActionSpec>;
    move: ActionRunner<TransferActionSpec>;
    rename: ActionRunner<TransferActionSpec>;
    webhook: ActionRunner<WebhookActionSpec>;
}

export interface ActionExecutorOptions {
    /** Process-wide; fixed for the executor's lifetime. */
    dryRun: boolean;
    /** Override individual runners (tests, custom transports). */
    runners?: Partial<ActionRunners>;
}

interface BoundAction {
    describe: () => string;
    run: (signal: AbortSignal) => Promise<void>;
}

export function createDefaultRunners(): ActionRunners {
    const transfer = new FileTransferRunner();
    return {
        exec: new ExecRunner(),
        copy: transfer,
        move: transfer,
        rename: transfer,
        webhook: new WebhookRunner(),
    };
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
    return new Promise((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
}

/**
 * Runs selected actions with templating, a per-attempt timeout, bounded
 * retries and dry-run.
 *
 * Shared by all workers. Apart from the dry-run flag it holds no state, so
 * concurrent `execute` calls from different watches do not interact.
 */
export class ActionExecutor {
    readonly #dryRun: boolean;
    readonly #runners: ActionRunners;

    constructor(options: ActionExecutorOptions) {
        this.#dryRun = options.dryRun;
        this.#runners = { ...createDefaultRunners(), ...options.runners };
    }

    get dryRun(): boolean {
        return this.#dryRun;
    }

    /**
     * Dispatch `action` for `event`. Never throws: every failure, including a
     * timeout or cancellation via `signal`, is reported in the outcome.
     */
    async execute(event: ChangeEvent, action: ActionSpec, signal?: AbortSignal): Promise<ExecutionOutcome> {
        const context = contextFromEvent(event);
        const bound = this.#bind(action, context);
        const detail = bound.describe();

        if (this.#dryRun) {
            await logThought(`[ActionExecutor] dry-run ${action.name}: ${detail}`);
            return { ok: true, attempts: 0, dryRun: true, detail, durationMs: 0 };
        }

        const result = await withRetry(
            () => this.#attempt(bound, action.timeoutMs, signal),
            {
                maxAttempts: action.retries + 1,
                baseDelayMs: action.retryDelayMs,
                label: `${action.name} (${event.relativePath})`,
                signal,
            },
        );

        if (result.ok) {
            return { ok: true, attempts: result.attempts, dryRun: false, detail, durationMs: result.totalDurationMs };
        }
        return {
            ok: false,
            error: result.error,
            attempts: result.attempts,
            dryRun: false,
            detail,
            durationMs: result.totalDurationMs,
        };
    }

    #bind(action: ActionSpec, context: ActionContext): BoundAction {
        switch (action.kind) {
            case 'exec': {
                const runner = this.#runners.exec;
                const spec = action;
                return {
                    describe: () => runner.describe(context, spec),
                    run: (signal) => runner.run(context, spec, signal),
                };
            }
            case 'copy':
            case 'move':
            case 'rename': {
                const runner = this.#runners[action.kind];
                const spec = action;
                return {
                    describe: () => runner.describe(context, spec),
                    run: (signal) => runner.run(context, spec, signal),
                };
            }
            case 'webhook': {
                const runner = this.#runners.webhook;
                const spec = action;
                return {
                    describe: () => runner.describe(context, spec),
                    run: (signal) => runner.run(context, spec, signal),
                };
            }
        }
    }

    async #attempt(bound: BoundAction, timeoutMs: number, parent?: AbortSignal): Promise<void> {
        if (parent?.aborted) {
            throw new ActionFailedError('cancelled', 'Action cancelled before it started.');
        }

        const controller = new AbortController();
        const onParentAbort = (): void => {
            controller.abort(new ActionFailedError('cancelled', 'Action cancelled by shutdown.'));
        };
        parent?.addEventListener('abort', onParentAbort, { once: true });
        const timer = setTimeout(() => {
            controller.abort(new ActionFailedError('timeout', `Attempt timed out after ${timeoutMs}ms.`));
        }, timeoutMs);

        try {
            await Promise.race([bound.run(controller.signal), rejectOnAbort(controller.signal)]);
        } finally {
            clearTimeout(timer);
            parent?.removeEventListener('abort', onParentAbort);
        }
    }
}
