import path from 'node:path';
import type { ChangeEvent, FileRecord, Snapshot } from '../types/watch.js';

/** Cheap identity used to pair a vanished path with a newly appeared one. */
export function recordSignature(record: FileRecord): string {
    return `${record.size}-${record.mtimeNs}-${record.mode.toString(8)}`;
}

export function hasChanged(previous: FileRecord, current: FileRecord): boolean {
    return (
        previous.size !== current.size ||
        previous.mtimeNs !== current.mtimeNs ||
        previous.mode !== current.mode
    );
}

function relativeTo(root: string, target: string): string {
    const relative = path.relative(root, target);
    return relative || target;
}

function ageOf(record: FileRecord, now: number): number {
    if (record.mtimeMs <= 0) return 0;
    return Math.max(0, now - record.mtimeMs);
}

function byPath(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

/**
 * Compare two snapshots of the same root.
 *
 * Events come out grouped as modifies, moves, creates, deletes; each group is
 * sorted by path. A new path whose signature matches an unclaimed deleted
 * path becomes a move. When several deleted paths share that signature the
 * lexicographically smallest one is taken, and each is claimed at most once.
 */
export function diffSnapshots(
    root: string,
    previous: Snapshot,
    current: Snapshot,
    now: number = Date.now(),
): ChangeEvent[] {
    const modifies: ChangeEvent[] = [];
    const moves: ChangeEvent[] = [];
    const creates: ChangeEvent[] = [];
    const deletes: ChangeEvent[] = [];

    const deleteCandidates = new Map<string, string[]>();
    const claimed = new Set<string>();
    for (const previousPath of [...previous.keys()].sort(byPath)) {
        if (current.has(previousPath)) continue;
        const record = previous.get(previousPath);
        if (!record) continue;
        const signature = recordSignature(record);
        const bucket = deleteCandidates.get(signature);
        if (bucket) {
            bucket.push(previousPath);
        } else {
            deleteCandidates.set(signature, [previousPath]);
        }
    }

    for (const currentPath of [...current.keys()].sort(byPath)) {
        const record = current.get(currentPath);
        if (!record) continue;
        const base = {
            path: currentPath,
            relativePath: relativeTo(root, currentPath),
            record,
            ageMs: ageOf(record, now),
        };

        const before = previous.get(currentPath);
        if (before) {
            if (hasChanged(before, record)) {
                modifies.push({ ...base, kind: 'modify' });
            }
            continue;
        }

        const bucket = deleteCandidates.get(recordSignature(record));
        const previousPath = bucket?.find((candidate) => candidate !== currentPath && !claimed.has(candidate));
        if (previousPath) {
            claimed.add(previousPath);
            moves.push({ ...base, kind: 'move', previousPath });
        } else {
            creates.push({ ...base, kind: 'create' });
        }
    }

    for (const bucket of deleteCandidates.values()) {
        for (const previousPath of bucket) {
            if (claimed.has(previousPath)) continue;
            const record = previous.get(previousPath);
            if (!record) continue;
            deletes.push({
                kind: 'delete',
                path: previousPath,
                relativePath: relativeTo(root, previousPath),
                record,
                ageMs: ageOf(record, now),
            });
        }
    }
    deletes.sort((a, b) => byPath(a.path, b.path));

    return [...modifies, ...moves, ...creates, ...deletes];
}
