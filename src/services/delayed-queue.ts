import { randomUUID } from 'node:crypto';
import { logThought } from '../utils/logger.js';
import type {
    EnqueueResult,
    MediaPayload,
    OverduePolicy,
    QueueItem,
    QueueItemStatus,
    QueueState,
    QueueStatusSnapshot,
    QueueTotals,
} from '../types/queue.js';
import type { DelayPolicy } from './delay-policy.js';
import { cloneItem, clonePayload, compareDueOrder, isTerminal, transition } from './queue-item.js';

export type QueueChangeReason =
    | 'enqueue'
    | 'pop'
    | 'sent'
    | 'retry'
    | 'dead_letter'
    | 'clear'
    | 'clear_history'
    | 'restore';

export type QueueChangeListener = (reason: QueueChangeReason) => void;

export interface DelayedQueueOptions {
    /** Maximum number of non-terminal items. */
    capacity: number;
    maxAttempts: number;
    /** Terminal items kept for status reporting and persistence. */
    historyLimit: number;
    policy: DelayPolicy;
    now?: () => number;
    generateId?: () => string;
}

export interface EnqueueOptions {
    priority?: number;
    /** Attempts already spent on this payload before it reached the queue. */
    attempts?: number;
    lastError?: string;
}

export interface RestoreOptions {
    overduePolicy?: OverduePolicy;
}

export interface RestoreReport {
    restored: number;
    rearmed: number;
    rescheduled: number;
    deadLettered: number;
    skippedDuplicates: string[];
}

function emptyTotals(): QueueTotals {
    return { queued: 0, sent: 0, failed: 0, deadLettered: 0 };
}

/**
 * Owns every queued item and the due-order index over them.
 *
 * Every mutation is synchronous, so each operation is atomic with respect to
 * the event loop: concurrent enqueue calls and the dispatch tick never see a
 * half-applied change. Callers only ever receive copies of items.
 */
export class DelayedQueue {
    readonly #capacity: number;
    readonly #maxAttempts: number;
    readonly #historyLimit: number;
    readonly #policy: DelayPolicy;
    readonly #now: () => number;
    readonly #generateId: () => string;
    readonly #live: Map<string, QueueItem> = new Map();
    /** Items waiting for their release time, kept in due order. */
    #dueIndex: QueueItem[] = [];
    #history: QueueItem[] = [];
    #totals: QueueTotals = emptyTotals();
    #haltReason: string | null = null;
    readonly #listeners: Set<QueueChangeListener> = new Set();

    constructor(options: DelayedQueueOptions) {
        this.#capacity = options.capacity;
        this.#maxAttempts = options.maxAttempts;
        this.#historyLimit = Math.max(0, options.historyLimit);
        this.#policy = options.policy;
        this.#now = options.now ?? (() => Date.now());
        this.#generateId = options.generateId ?? (() => randomUUID());
    }

    get capacity(): number {
        return this.#capacity;
    }

    get maxAttempts(): number {
        return this.#maxAttempts;
    }

    get size(): number {
        return this.#live.size;
    }

    get haltReason(): string | null {
        return this.#haltReason;
    }

    enqueue(payload: MediaPayload, options: EnqueueOptions = {}): EnqueueResult {
        if (this.#haltReason !== null) {
            return {
                ok: false,
                reason: 'persistence_halted',
                message: `Queue is halted: ${this.#haltReason}`,
            };
        }
        if (this.#live.size >= this.#capacity) {
            void logThought(`[DelayedQueue] Rejected item: queue is at capacity (${this.#capacity}).`);
            return {
                ok: false,
                reason: 'capacity_exceeded',
                message: `Queue is full (${this.#live.size}/${this.#capacity}).`,
            };
        }

        const now = this.#now();
        const item: QueueItem = {
            id: this.#nextId(),
            payload: clonePayload(payload),
            arrivalTime: now,
            scheduledTime: now,
            priority: options.priority ?? 0,
            attempts: options.attempts ?? 0,
            status: 'pending',
        };
        if (options.lastError !== undefined) {
            item.lastError = options.lastError;
        }

        const decision = this.#policy.schedule(now);
        item.scheduledTime = Math.max(decision.scheduledTime, now);
        if (decision.batchId !== undefined) {
            item.batchId = decision.batchId;
        }
        transition(item, 'scheduled');

        this.#live.set(item.id, item);
        this.#insertDue(item);
        this.#totals.queued += 1;

        void logThought(
            `[DelayedQueue] Queued ${item.id} for ${new Date(item.scheduledTime).toISOString()}` +
            `${item.batchId ? ` (${item.batchId})` : ''}; ${this.#live.size}/${this.#capacity} in queue.`,
        );
        this.#emit('enqueue');
        return { ok: true, item: cloneItem(item) };
    }

    /**
     * Hand out items whose release time has passed, in due order. Returned
     * items are already `dispatching` and will not be returned again until
     * they are re-armed by {@link markRetry}.
     */
    popDue(now: number = this.#now(), limit = Number.POSITIVE_INFINITY): QueueItem[] {
        const popped: QueueItem[] = [];

        while (popped.length < limit) {
            const head = this.#dueIndex[0];
            if (!head || head.scheduledTime > now) break;

            this.#dueIndex.shift();
            transition(head, 'due');
            transition(head, 'dispatching');
            popped.push(cloneItem(head));
        }

        if (popped.length > 0) {
            this.#emit('pop');
        }
        return popped;
    }

    markSent(id: string): QueueItem | undefined {
        const item = this.#requireInFlight(id, 'sent');
        if (!item) return undefined;

        item.attempts += 1;
        transition(item, 'sent');
        delete item.lastError;
        this.#retire(item);
        this.#totals.sent += 1;
        this.#emit('sent');
        return cloneItem(item);
    }

    /**
     * Re-arm an in-flight item for another attempt at `scheduledTime`. When the
     * attempt just recorded was the last one allowed, the item is dead-lettered
     * instead.
     */
    markRetry(id: string, scheduledTime: number, error: string): QueueItem | undefined {
        const item = this.#requireInFlight(id, 'retrying');
        if (!item) return undefined;

        if (item.attempts + 1 >= this.#maxAttempts) {
            return this.markDeadLetter(id, error);
        }

        item.attempts += 1;
        item.lastError = error;
        item.scheduledTime = Math.max(scheduledTime, item.arrivalTime);
        transition(item, 'retrying');
        this.#insertDue(item);
        this.#totals.failed += 1;
        this.#emit('retry');
        return cloneItem(item);
    }

    markDeadLetter(id: string, error: string): QueueItem | undefined {
        const item = this.#requireInFlight(id, 'dead_letter');
        if (!item) return undefined;

        item.attempts = Math.min(item.attempts + 1, this.#maxAttempts);
        item.lastError = error;
        transition(item, 'dead_letter');
        this.#retire(item);
        this.#totals.failed += 1;
        this.#totals.deadLettered += 1;
        this.#emit('dead_letter');
        return cloneItem(item);
    }

    /** Remove every queued item that is not currently being dispatched. */
    clear(): number {
        let removed = 0;
        for (const [id, item] of this.#live) {
            if (item.status === 'dispatching') continue;
            this.#live.delete(id);
            removed += 1;
        }
        this.#dueIndex = [];

        void logThought(`[DelayedQueue] Cleared ${removed} queued item(s).`);
        this.#emit('clear');
        return removed;
    }

    clearHistory(): number {
        const removed = this.#history.length;
        this.#history = [];
        this.#emit('clear_history');
        return removed;
    }

    /** Look up a live or recently finished item by id. */
    get(id: string): QueueItem | undefined {
        const item = this.#live.get(id) ?? this.#history.find((entry) => entry.id === id);
        return item ? cloneItem(item) : undefined;
    }

    list(): QueueItem[] {
        return [...this.#live.values()].sort(compareDueOrder).map(cloneItem);
    }

    history(): QueueItem[] {
        return this.#history.map(cloneItem);
    }

    status(now: number = this.#now()): QueueStatusSnapshot {
        const byStatus: Record<QueueItemStatus, number> = {
            pending: 0,
            scheduled: 0,
            due: 0,
            dispatching: 0,
            sent: 0,
            retrying: 0,
            dead_letter: 0,
        };
        let oldestArrival: number | null = null;

        for (const item of this.#live.values()) {
            byStatus[item.status] += 1;
            if (oldestArrival === null || item.arrivalTime < oldestArrival) {
                oldestArrival = item.arrivalTime;
            }
        }
        for (const item of this.#history) {
            byStatus[item.status] += 1;
        }

        return {
            size: this.#live.size,
            capacity: this.#capacity,
            byStatus,
            nextDueAt: this.#dueIndex[0]?.scheduledTime ?? null,
            oldestItemAgeMs: oldestArrival === null ? null : Math.max(0, now - oldestArrival),
            inFlight: byStatus.dispatching,
            historySize: this.#history.length,
            totals: { ...this.#totals },
        };
    }

    snapshot(): QueueState {
        return {
            items: this.list(),
            history: this.history(),
            totals: { ...this.#totals },
            policyState: this.#policy.exportState(),
        };
    }

    /**
     * Replace the in-memory state with a persisted one. Items keep their stored
     * release time unless `overduePolicy` is `reschedule`. Items caught
     * mid-dispatch by a crash are re-armed as `scheduled`.
     */
    restore(state: QueueState, options: RestoreOptions = {}): RestoreReport {
        const now = this.#now();
        const report: RestoreReport = {
            restored: 0,
            rearmed: 0,
            rescheduled: 0,
            deadLettered: 0,
            skippedDuplicates: [],
        };

        this.#live.clear();
        this.#dueIndex = [];
        this.#history = [];
        this.#totals = { ...emptyTotals(), ...state.totals };
        this.#policy.restoreState(state.policyState);

        const seen = new Set<string>();
        for (const stored of state.history) {
            if (seen.has(stored.id) || !isTerminal(stored.status)) continue;
            seen.add(stored.id);
            this.#history.push(cloneItem(stored));
        }

        for (const stored of state.items) {
            if (seen.has(stored.id)) {
                report.skippedDuplicates.push(stored.id);
                continue;
            }
            seen.add(stored.id);
            const item = cloneItem(stored);

            if (isTerminal(item.status)) {
                this.#history.push(item);
                continue;
            }
            if (item.attempts >= this.#maxAttempts) {
                item.attempts = this.#maxAttempts;
                item.status = 'dead_letter';
                item.completedAt = now;
                this.#history.push(item);
                this.#totals.deadLettered += 1;
                report.deadLettered += 1;
                continue;
            }
            if (item.status !== 'scheduled' && item.status !== 'retrying') {
                item.status = 'scheduled';
                report.rearmed += 1;
            }
            if (options.overduePolicy === 'reschedule' && item.scheduledTime <= now) {
                const decision = this.#policy.schedule(now);
                item.scheduledTime = Math.max(decision.scheduledTime, item.arrivalTime);
                if (decision.batchId !== undefined) {
                    item.batchId = decision.batchId;
                }
                report.rescheduled += 1;
            }

            this.#live.set(item.id, item);
            this.#insertDue(item);
            report.restored += 1;
        }

        this.#trimHistory();
        if (this.#live.size > this.#capacity) {
            console.warn(
                `[DelayedQueue] Restored ${this.#live.size} items, above capacity ${this.#capacity}; new items are rejected until it drains.`,
            );
        }
        if (report.skippedDuplicates.length > 0) {
            console.warn(`[DelayedQueue] Skipped duplicate persisted ids: ${report.skippedDuplicates.join(', ')}`);
        }

        this.#emit('restore');
        return report;
    }

    /** Refuse further enqueues; used when state can no longer be persisted. */
    halt(reason: string): void {
        this.#haltReason = reason;
    }

    resume(): void {
        this.#haltReason = null;
    }

    /** Subscribe to state changes. Returns an unsubscribe function. */
    onChange(listener: QueueChangeListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #nextId(): string {
        let id = this.#generateId();
        while (this.#live.has(id) || this.#history.some((item) => item.id === id)) {
            id = this.#generateId();
        }
        return id;
    }

    #requireInFlight(id: string, target: QueueItemStatus): QueueItem | undefined {
        const item = this.#live.get(id);
        if (!item) {
            console.warn(`[DelayedQueue] Cannot mark unknown item ${id} as '${target}'.`);
            return undefined;
        }
        if (item.status !== 'dispatching') {
            console.warn(`[DelayedQueue] Item ${id} is '${item.status}', not in flight; ignoring '${target}'.`);
            return undefined;
        }
        return item;
    }

    #insertDue(item: QueueItem): void {
        let low = 0;
        let high = this.#dueIndex.length;
        while (low < high) {
            const mid = (low + high) >>> 1;
            if (compareDueOrder(this.#dueIndex[mid], item) <= 0) {
                low = mid + 1;
            } else {
                high = mid;
            }
        }
        this.#dueIndex.splice(low, 0, item);
    }

    #retire(item: QueueItem): void {
        item.completedAt = this.#now();
        this.#live.delete(item.id);
        this.#history.push(item);
        this.#trimHistory();
    }

    #trimHistory(): void {
        if (this.#history.length > this.#historyLimit) {
            this.#history.splice(0, this.#history.length - this.#historyLimit);
        }
    }

    #emit(reason: QueueChangeReason): void {
        for (const listener of this.#listeners) {
            try {
                listener(reason);
            } catch (listenerErr) {
                console.error('[DelayedQueue] Change listener threw an error:', listenerErr);
            }
        }
    }
}
