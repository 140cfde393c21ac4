import type { ActionSpec } from '../../types/config.js';
import type { ChangeEvent } from '../../types/watch.js';
import type { TemplateContext } from '../../utils/template.js';

/** Everything a runner may read about the triggering event. */
export interface ActionContext extends TemplateContext {
    isDirectory: boolean;
}

export function contextFromEvent(event: ChangeEvent): ActionContext {
    return {
        path: event.path,
        relativePath: event.relativePath,
        previousPath: event.previousPath,
        kind: event.kind,
        size: event.record.size,
        mtimeMs: event.record.mtimeMs,
        ageMs: event.ageMs,
        isDirectory: event.record.isDirectory,
    };
}

/**
 * Performs one kind of action. `run` is a single attempt: retries, timeouts
 * and dry-run are applied around it by the executor.
 */
export interface ActionRunner<A extends ActionSpec> {
    /** Describe the side effect without performing it. */
    describe(context: ActionContext, action: A): string;
    /** Perform the side effect once; rejects on failure. */
    run(context: ActionContext, action: A, signal: AbortSignal): Promise<void>;
}
