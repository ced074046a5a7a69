import type { ControlResponse } from '../core/control-commands.js';
import type { DispatchMode, QueueItem, QueueStatusSnapshot } from './queue.js';
import type { JobStatus } from './scheduler.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded' | 'halted';
    uptimeSec: number;
    memoryUsageMb: number;
    mode: DispatchMode;
    dispatcher: { running: boolean };
    persistence: {
        healthy: boolean;
        store: string;
        lastSavedAt: string | null;
        error: string | null;
    };
    queue: {
        size: number;
        capacity: number;
        inFlight: number;
    };
    jobs: Array<{
        id: string;
        status: JobStatus;
        lastRunAt: string | null;
        lastError: string | null;
        runCount: number;
    }>;
}

// ── Queue ───────────────────────────────────────────────────────────────────

export interface QueueStatusData {
    mode: DispatchMode;
    running: boolean;
    halted: string | null;
    queue: QueueStatusSnapshot;
}

export type SubmitItemData =
    | { mode: 'queued'; item: QueueItem }
    | { mode: 'immediate'; delivered: true };

export type ControlData = ControlResponse;
