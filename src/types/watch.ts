/** Kinds of change the differ can report. */
export type ChangeKind = 'create' | 'modify' | 'delete' | 'move';

export const CHANGE_KINDS: readonly ChangeKind[] = ['create', 'modify', 'delete', 'move'];

/** One tracked filesystem entry inside a snapshot. */
export interface FileRecord {
    /** Absolute path of the entry. */
    path: string;
    size: number;
    /** Modification time in milliseconds since the epoch. */
    mtimeMs: number;
    /** Modification time in nanoseconds, used for move signatures. */
    mtimeNs: bigint;
    /** Permission and file-type bits as reported by `lstat`. */
    mode: number;
    isDirectory: boolean;
}

/**
 * Point-in-time state of one watched root, keyed by absolute path.
 * Produced once per poll and never mutated afterwards.
 */
export type Snapshot = ReadonlyMap<string, FileRecord>;

/** A single change detected between two snapshots of the same root. */
export interface ChangeEvent {
    kind: ChangeKind;
    /** Absolute path of the entry after the change. */
    path: string;
    /** Path relative to the watch root, using the platform separator. */
    relativePath: string;
    /** Only set for `move`: where the entry lived in the previous snapshot. */
    previousPath?: string;
    /** Current record, or the last known record for `delete`. */
    record: FileRecord;
    /** Milliseconds between the record's modification time and detection. */
    ageMs: number;
}

/** Result of dispatching one action for one event. */
export interface ExecutionOutcome {
    ok: boolean;
    error?: string;
    /** Attempts consumed; zero in dry-run. */
    attempts: number;
    dryRun: boolean;
    /** Human-readable description of the side effect (performed or planned). */
    detail?: string;
    durationMs: number;
}

/** Running totals for one watch directory or one `<directory>.<action>` pair. */
export interface Counters {
    eventsSeen: number;
    actionsRun: number;
    successes: number;
    failures: number;
    lastError: string | null;
    /** ISO-8601 timestamp of the last recorded activity. */
    lastActivityAt: string | null;
}

/** Lifecycle states of a watch worker. */
export type WorkerState = 'idle' | 'scanning' | 'diffing' | 'dispatching' | 'stopped';

export interface WorkerSnapshot {
    path: string;
    state: WorkerState;
    cycles: number;
    lastScanError: string | null;
}
