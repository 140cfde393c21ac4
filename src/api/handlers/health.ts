import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import { sendOk } from '../shared.js';
import type { StatusSource } from './status.js';

const startTime = Date.now();

export interface HealthDeps {
    source: StatusSource;
}

/** GET /health — liveness plus the number of configured watches. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const status = deps.source.status();
        const data: HealthData = {
            status: 'ok',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            watches: status.workers.length,
            dryRun: status.dryRun,
        };
        sendOk(res, data);
    };
}
