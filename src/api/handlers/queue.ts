import type { Request, Response } from 'express';
import {
    executeControlCommand,
    parseDispatchMode,
    type ControlCommand,
    type ControlTarget,
} from '../../core/control-commands.js';
import type { SubmitResult } from '../../services/mode-controller.js';
import { parsePayload } from '../../services/queue-store.js';
import type { EngineStatus } from '../../services/forwarding-engine.js';
import type { QueueStatusData, SubmitItemData } from '../../types/api.js';
import { EnqueueRejectedError } from '../../types/errors.js';
import type { MediaPayload } from '../../types/queue.js';
import { logThought } from '../../utils/logger.js';
import { mapError, sendError, sendOk } from '../shared.js';

/** The engine surface the queue routes drive. */
export interface QueueEngine extends ControlTarget {
    status(): EngineStatus;
    submit(payload: MediaPayload, priority?: number): Promise<SubmitResult>;
}

export interface QueueDeps {
    engine: QueueEngine;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** GET /queue/status: Queue size, per-status counts, totals and dispatcher state. */
export function handleQueueStatus(deps: QueueDeps) {
    return (_req: Request, res: Response): void => {
        const status = deps.engine.status();
        const data: QueueStatusData = {
            mode: status.mode,
            running: status.running,
            halted: status.halted,
            queue: status.queue,
        };
        sendOk(res, data);
    };
}

/**
 * POST /queue/items: Hand over a payload whose media is downloaded.
 *
 * Body: `{ files?: [{ path, type }], text?: string, priority?: number,
 * sourceMessageId?, channelTitle?, groupId? }`.
 */
export function handleSubmitItem(deps: QueueDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const body: unknown = req.body;
        if (!isRecord(body)) {
            sendError(res, 'Request body must be a JSON object.', 400);
            return;
        }

        let payload: MediaPayload;
        try {
            payload = parsePayload({ ...body, files: body.files ?? [], text: body.text ?? '' });
        } catch (err) {
            sendError(res, `Invalid payload: ${err instanceof Error ? err.message : String(err)}`, 400);
            return;
        }
        if (payload.files.length === 0 && payload.text.trim().length === 0) {
            sendError(res, 'Payload needs at least one file or some text.', 400);
            return;
        }

        const priority = body.priority ?? 0;
        if (typeof priority !== 'number' || !Number.isInteger(priority)) {
            sendError(res, "'priority' must be an integer.", 400);
            return;
        }

        try {
            const result = await deps.engine.submit(payload, priority);
            switch (result.kind) {
                case 'queued': {
                    const data: SubmitItemData = { mode: 'queued', item: result.item };
                    sendOk(res, data, 202);
                    return;
                }
                case 'sent': {
                    const data: SubmitItemData = { mode: 'immediate', delivered: true };
                    sendOk(res, data);
                    return;
                }
                case 'rejected':
                    throw new EnqueueRejectedError(result.reason, result.message);
                case 'failed':
                    sendError(res, `Delivery failed: ${result.reason}`, 502);
                    return;
            }
        } catch (err) {
            const { status, message } = mapError(err);
            void logThought(`[API] Item submission failed (${status}): ${message}`);
            sendError(res, message, status);
        }
    };
}

function controlHandler(deps: QueueDeps, resolve: (req: Request) => ControlCommand | string) {
    return async (req: Request, res: Response): Promise<void> => {
        const command = resolve(req);
        if (typeof command === 'string') {
            sendError(res, command, 400);
            return;
        }

        try {
            const response = await executeControlCommand(deps.engine, command);
            if (response.ok) {
                sendOk(res, response);
            } else {
                sendError(res, response.message, 409);
            }
        } catch (err) {
            const { status, message } = mapError(err);
            sendError(res, message, status);
        }
    };
}

/** POST /queue/clear: Drop every queued item that is not in flight. */
export function handleQueueClear(deps: QueueDeps) {
    return controlHandler(deps, () => ({ name: 'clear' }));
}

/** POST /queue/history/clear: Forget sent and dead-lettered items. */
export function handleHistoryClear(deps: QueueDeps) {
    return controlHandler(deps, () => ({ name: 'clear_history' }));
}

/** POST /queue/start: Begin dispatching due items. */
export function handleQueueStart(deps: QueueDeps) {
    return controlHandler(deps, () => ({ name: 'start' }));
}

/** POST /queue/stop: Stop dispatching once the in-flight item settles. */
export function handleQueueStop(deps: QueueDeps) {
    return controlHandler(deps, () => ({ name: 'stop' }));
}

/** POST /queue/mode: Body `{ mode: 'immediate' | 'queued' }`. */
export function handleQueueMode(deps: QueueDeps) {
    return controlHandler(deps, (req) => {
        const body: unknown = req.body;
        const raw = isRecord(body) ? body.mode : undefined;
        const mode = typeof raw === 'string' ? parseDispatchMode(raw) : null;
        return mode ? { name: 'mode', mode } : "Invalid mode. Expected one of: immediate, queued.";
    });
}
