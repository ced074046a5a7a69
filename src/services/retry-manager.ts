import { DispatchPermanentError } from '../types/errors.js';
import type { DispatchOutcome, DispatchSink, MediaPayload, QueueItem } from '../types/queue.js';
import { logThought } from '../utils/logger.js';
import { computeBackoffDelay, type BackoffPolicy } from '../utils/retry.js';
import type { DelayedQueue } from './delayed-queue.js';
import { isTerminal } from './queue-item.js';

export type DispatchEventType = 'item:sent' | 'item:retry' | 'item:dead_letter';

export interface DispatchEvent {
    type: DispatchEventType;
    item: QueueItem;
    error?: string;
}

export type DispatchEventListener = (event: DispatchEvent) => void | Promise<void>;

export interface RetryManagerOptions {
    queue: DelayedQueue;
    sink: DispatchSink;
    backoff: BackoffPolicy;
    dispatchTimeoutMs: number;
    now?: () => number;
}

/**
 * Wraps each send attempt with a timeout and turns its outcome into the
 * item's next state: sent, re-armed after a backoff, or dead-lettered.
 */
export class RetryManager {
    readonly #queue: DelayedQueue;
    readonly #sink: DispatchSink;
    readonly #backoff: BackoffPolicy;
    readonly #timeoutMs: number;
    readonly #now: () => number;
    readonly #listeners: Map<DispatchEventType, Set<DispatchEventListener>> = new Map();

    constructor(options: RetryManagerOptions) {
        this.#queue = options.queue;
        this.#sink = options.sink;
        this.#backoff = options.backoff;
        this.#timeoutMs = options.dispatchTimeoutMs;
        this.#now = options.now ?? (() => Date.now());
    }

    /**
     * Attempt delivery of an item that {@link DelayedQueue.popDue} handed out.
     * Items already sent or dead-lettered are left untouched.
     */
    async dispatch(item: QueueItem): Promise<QueueItem | undefined> {
        const current = this.#queue.get(item.id);
        if (!current || isTerminal(current.status)) {
            return current;
        }
        if (current.status !== 'dispatching') {
            console.warn(`[RetryManager] Item ${item.id} is '${current.status}'; only in-flight items are dispatched.`);
            return current;
        }

        const outcome = await this.attempt(current.payload);

        switch (outcome.kind) {
            case 'success': {
                const sent = this.#queue.markSent(current.id);
                if (sent) {
                    await logThought(`[RetryManager] Sent ${sent.id} on attempt ${sent.attempts}.`);
                    await this.#emit({ type: 'item:sent', item: sent });
                }
                return sent;
            }
            case 'transient': {
                const delay = computeBackoffDelay(this.#backoff, current.attempts + 1);
                const next = this.#queue.markRetry(current.id, this.#now() + delay, outcome.reason);
                if (!next) return undefined;

                if (next.status === 'dead_letter') {
                    await this.#deadLettered(next, outcome.reason);
                } else {
                    await logThought(
                        `[RetryManager] Attempt ${next.attempts} for ${next.id} failed: ${outcome.reason}. ` +
                        `Retrying in ${Math.round(delay / 1000)}s.`,
                    );
                    await this.#emit({ type: 'item:retry', item: next, error: outcome.reason });
                }
                return next;
            }
            case 'permanent': {
                const dead = this.#queue.markDeadLetter(current.id, outcome.reason);
                if (dead) {
                    await this.#deadLettered(dead, outcome.reason);
                }
                return dead;
            }
        }
    }

    /** One send through the sink, bounded by the dispatch timeout. */
    async attempt(payload: MediaPayload): Promise<DispatchOutcome> {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<DispatchOutcome>((resolve) => {
            timer = setTimeout(() => {
                resolve({ kind: 'transient', reason: `Dispatch timed out after ${this.#timeoutMs}ms.` });
            }, this.#timeoutMs);
        });

        try {
            return await Promise.race([this.#invokeSink(payload), timeout]);
        } finally {
            clearTimeout(timer);
        }
    }

    /** Subscribe to delivery events. Returns an unsubscribe function. */
    on(eventType: DispatchEventType, listener: DispatchEventListener): () => void {
        let set = this.#listeners.get(eventType);
        if (!set) {
            set = new Set();
            this.#listeners.set(eventType, set);
        }
        set.add(listener);

        return () => {
            set?.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #invokeSink(payload: MediaPayload): Promise<DispatchOutcome> {
        try {
            return await this.#sink.dispatch(payload);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            if (err instanceof DispatchPermanentError) {
                return { kind: 'permanent', reason: message };
            }
            return { kind: 'transient', reason: message };
        }
    }

    async #deadLettered(item: QueueItem, reason: string): Promise<void> {
        console.error(`[RetryManager] Item ${item.id} dead-lettered after ${item.attempts} attempt(s): ${reason}`);
        await logThought(`[RetryManager] Item ${item.id} dead-lettered after ${item.attempts} attempt(s): ${reason}`);
        await this.#emit({ type: 'item:dead_letter', item, error: reason });
    }

    async #emit(event: DispatchEvent): Promise<void> {
        const listeners = this.#listeners.get(event.type);
        if (!listeners) return;

        for (const listener of listeners) {
            try {
                await listener(event);
            } catch (listenerErr) {
                console.error(`[RetryManager] '${event.type}' listener threw an error:`, listenerErr);
            }
        }
    }
}
