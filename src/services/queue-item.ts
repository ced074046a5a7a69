import { InvalidTransitionError } from '../types/errors.js';
import { TERMINAL_STATUSES, type MediaPayload, type QueueItem, type QueueItemStatus } from '../types/queue.js';

const ALLOWED_TRANSITIONS: Record<QueueItemStatus, readonly QueueItemStatus[]> = {
    pending: ['scheduled'],
    scheduled: ['due'],
    due: ['dispatching'],
    dispatching: ['sent', 'retrying', 'dead_letter'],
    retrying: ['due'],
    sent: [],
    dead_letter: [],
};

export function isTerminal(status: QueueItemStatus): boolean {
    return TERMINAL_STATUSES.has(status);
}

export function canTransition(from: QueueItemStatus, to: QueueItemStatus): boolean {
    return ALLOWED_TRANSITIONS[from].includes(to);
}

/** Move an item along the lifecycle chain, rejecting any step outside it. */
export function transition(item: QueueItem, to: QueueItemStatus): void {
    if (!canTransition(item.status, to)) {
        throw new InvalidTransitionError(item.id, item.status, to);
    }
    item.status = to;
}

export function clonePayload(payload: MediaPayload): MediaPayload {
    return { ...payload, files: payload.files.map((file) => ({ ...file })) };
}

export function cloneItem(item: QueueItem): QueueItem {
    return { ...item, payload: clonePayload(item.payload) };
}

/** Due order: scheduled time ascending, priority descending, arrival ascending, then id. */
export function compareDueOrder(left: QueueItem, right: QueueItem): number {
    if (left.scheduledTime !== right.scheduledTime) {
        return left.scheduledTime - right.scheduledTime;
    }
    if (left.priority !== right.priority) {
        return right.priority - left.priority;
    }
    if (left.arrivalTime !== right.arrivalTime) {
        return left.arrivalTime - right.arrivalTime;
    }
    return left.id < right.id ? -1 : left.id > right.id ? 1 : 0;
}
