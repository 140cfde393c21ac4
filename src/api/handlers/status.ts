import type { Request, Response } from 'express';
import type { SupervisorStatus } from '../../core/supervisor.js';
import type { StatusData } from '../../types/api.js';
import { sendOk } from '../shared.js';

/** Anything that can report counters and worker state; the supervisor in production. */
export interface StatusSource {
    status(): SupervisorStatus;
}

export interface StatusDeps {
    source: StatusSource;
}

/** GET /status — counters keyed by `<dir>` and `<dir>.<action>`, plus worker loop state. */
export function handleStatus(deps: StatusDeps) {
    return (_req: Request, res: Response): void => {
        const status = deps.source.status();
        const data: StatusData = {
            dryRun: status.dryRun,
            counters: status.counters,
            workers: status.workers.map((worker) => ({
                path: worker.path,
                state: worker.state,
                cycles: worker.cycles,
                lastScanError: worker.lastScanError,
            })),
        };
        sendOk(res, data);
    };
}
