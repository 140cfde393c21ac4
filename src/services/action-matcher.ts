import path from 'node:path';
import type { ActionFilter, ActionSpec, WatchConfig } from '../types/config.js';
import type { ChangeEvent } from '../types/watch.js';

const HIDDEN_MARKER = '.';

/** True when any component of a relative path starts with `.`. */
export function isHiddenPath(relativePath: string): boolean {
    return relativePath
        .split(/[\\/]/)
        .some((part) => part !== '' && part !== '.' && part !== '..' && part.startsWith(HIDDEN_MARKER));
}

/** Checks one event against one action's filter, in the configured order of checks. */
export function filterAccepts(filter: ActionFilter, event: ChangeEvent): boolean {
    if (!filter.events.has(event.kind)) return false;

    const relativePath = event.relativePath;
    if (filter.include.length > 0 && !filter.include.some((pattern) => pattern.test(relativePath))) {
        return false;
    }
    if (filter.exclude.some((pattern) => pattern.test(relativePath))) return false;

    const { size, isDirectory } = event.record;
    if (filter.minSizeBytes !== undefined && size < filter.minSizeBytes) return false;
    if (filter.maxSizeBytes !== undefined && size > filter.maxSizeBytes) return false;
    if (filter.minAgeMs !== undefined && event.ageMs < filter.minAgeMs) return false;
    if (filter.maxAgeMs !== undefined && event.ageMs > filter.maxAgeMs) return false;

    if (filter.onlyFiles && isDirectory) return false;
    if (filter.onlyDirs && !isDirectory) return false;

    if (filter.ignoreHidden && isHiddenPath(relativePath)) return false;

    return true;
}

/**
 * Selects the actions of a watch that an event should trigger.
 *
 * Stateless; one instance is shared by every worker. Result order follows
 * the watch's action list, cut to the first hit when `stopOnFirstMatch` is set.
 */
export class ActionMatcher {
    match(event: ChangeEvent, watch: WatchConfig): ActionSpec[] {
        const selected: ActionSpec[] = [];
        for (const action of watch.actions) {
            if (!filterAccepts(action.filter, event)) continue;
            selected.push(action);
            if (watch.stopOnFirstMatch) break;
        }
        return selected;
    }
}

/** Relative path of `target` under `root`, used when building synthetic events. */
export function relativeToWatch(root: string, target: string): string {
    return path.relative(root, target) || target;
}
