import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { EngineStatus } from '../../services/forwarding-engine.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    engine: { status(): EngineStatus };
}

/** GET /health: Process, dispatcher and persistence summary. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const status = deps.engine.status();

        const data: HealthData = {
            status: status.halted !== null
                ? 'halted'
                : !status.persistence.healthy || !status.running
                    ? 'degraded'
                    : 'ok',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
            mode: status.mode,
            dispatcher: { running: status.running },
            persistence: status.persistence,
            queue: {
                size: status.queue.size,
                capacity: status.queue.capacity,
                inFlight: status.queue.inFlight,
            },
            jobs: status.jobs.map((job) => ({
                id: job.id,
                status: job.status,
                lastRunAt: job.lastRunAt?.toISOString() ?? null,
                lastError: job.lastError,
                runCount: job.runCount,
            })),
        };

        sendOk(res, data);
    };
}
