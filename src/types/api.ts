import type { Counters, WorkerSnapshot } from './watch.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok';
    uptimeSec: number;
    watches: number;
    dryRun: boolean;
}

// ── Status ──────────────────────────────────────────────────────────────────

export interface StatusWorkerData {
    path: string;
    state: WorkerSnapshot['state'];
    cycles: number;
    lastScanError: string | null;
}

export interface StatusData {
    dryRun: boolean;
    counters: Record<string, Counters>;
    workers: StatusWorkerData[];
}
