import type { ConfigIssue } from '../config/config-schema.js';

/** Raised when a watch root cannot be fully walked; the partial walk is discarded. */
export class SnapshotScanError extends Error {
    readonly root: string;
    readonly path: string;

    constructor(root: string, path: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to scan '${path}' under '${root}': ${reason}`, { cause });
        this.name = 'SnapshotScanError';
        this.root = root;
        this.path = path;
    }
}

export class ConfigValidationError extends Error {
    readonly issues: ConfigIssue[];

    constructor(issues: ConfigIssue[]) {
        super(`Configuration is invalid (${issues.length} issue${issues.length === 1 ? '' : 's'}).`);
        this.name = 'ConfigValidationError';
        this.issues = issues;
    }
}

export type ActionFailureCode =
    | 'destination_exists'
    | 'empty_destination'
    | 'empty_command'
    | 'exit_code'
    | 'spawn_failed'
    | 'http_status'
    | 'timeout'
    | 'cancelled'
    | 'transfer_failed'
    | 'move_fallback_partial';

/** A dispatch attempt that failed for a reason the runner could name. */
export class ActionFailedError extends Error {
    readonly code: ActionFailureCode;

    constructor(code: ActionFailureCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ActionFailedError';
        this.code = code;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
