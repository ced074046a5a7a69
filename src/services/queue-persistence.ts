import { PersistenceFailureError } from '../types/errors.js';
import type { OverduePolicy } from '../types/queue.js';
import { intervalToCron } from '../utils/cron.js';
import { logThought } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { DelayedQueue, RestoreReport } from './delayed-queue.js';
import type { JobScheduler } from './job-scheduler.js';
import type { LoadResult, QueueStore } from './queue-store.js';

const SAVE_JOB_ID = 'queue-save';

export interface QueuePersistenceOptions {
    store: QueueStore;
    queue: DelayedQueue;
    scheduler: JobScheduler;
    /** Save after every queue change instead of on a timer. */
    autoSave: boolean;
    saveIntervalSec: number;
    /** Attempts per save before the failure is treated as fatal. */
    maxAttempts: number;
    retryBaseDelayMs?: number;
    sleep?: (ms: number) => Promise<void>;
}

export type PersistenceFatalListener = (error: PersistenceFailureError) => void;

export interface PersistenceLoadReport extends RestoreReport {
    corruptEntries: number;
    savedAt: string | null;
}

/**
 * Keeps the durable store in step with the queue.
 *
 * Only one write runs at a time. Changes that arrive while a write is in
 * progress mark the state dirty and are folded into a single follow-up write.
 * When a save still fails after every retry the queue is halted and the
 * `persistence:fatal` listeners are told.
 */
export class QueuePersistence {
    readonly #store: QueueStore;
    readonly #queue: DelayedQueue;
    readonly #scheduler: JobScheduler;
    readonly #options: QueuePersistenceOptions;
    readonly #fatalListeners: Set<PersistenceFatalListener> = new Set();

    #dirty = false;
    #changedSinceSave = false;
    #writing: Promise<void> | null = null;
    #failure: PersistenceFailureError | null = null;
    #lastSavedAt: Date | null = null;
    #unsubscribe: (() => void) | null = null;

    constructor(options: QueuePersistenceOptions) {
        this.#store = options.store;
        this.#queue = options.queue;
        this.#scheduler = options.scheduler;
        this.#options = options;
    }

    get store(): QueueStore {
        return this.#store;
    }

    get healthy(): boolean {
        return this.#failure === null;
    }

    get failure(): PersistenceFailureError | null {
        return this.#failure;
    }

    get lastSavedAt(): Date | null {
        return this.#lastSavedAt;
    }

    /** Load persisted state into the queue. Throws when the stored document itself is unusable. */
    async restore(overduePolicy: OverduePolicy): Promise<PersistenceLoadReport> {
        const loaded: LoadResult = await this.#store.load();
        const report = this.#queue.restore(loaded.state, { overduePolicy });

        await logThought(
            `[QueuePersistence] Restored ${report.restored} item(s) from ${this.#store.description} ` +
            `(rearmed ${report.rearmed}, rescheduled ${report.rescheduled}, dead-lettered ${report.deadLettered}, ` +
            `corrupt ${loaded.corrupt.length}).`,
        );
        return { ...report, corruptEntries: loaded.corrupt.length, savedAt: loaded.savedAt };
    }

    /** Begin following queue changes. */
    start(): void {
        if (this.#unsubscribe) return;

        this.#unsubscribe = this.#queue.onChange(() => {
            if (this.#options.autoSave) {
                void this.requestSave();
            } else {
                this.#changedSinceSave = true;
            }
        });

        if (!this.#options.autoSave) {
            const cronExpression = intervalToCron(this.#options.saveIntervalSec);
            if (cronExpression === null) {
                throw new Error(
                    `[QueuePersistence] save_interval of ${this.#options.saveIntervalSec}s cannot be scheduled.`,
                );
            }
            this.#scheduler.register({
                id: SAVE_JOB_ID,
                cronExpression,
                description: 'Write queue state to the durable store',
                quiet: true,
                handler: async () => {
                    if (!this.#changedSinceSave) return;
                    await this.requestSave();
                },
            });
        }
    }

    /** Stop following changes. Does not write; call {@link flush} for a final save. */
    stop(): void {
        this.#unsubscribe?.();
        this.#unsubscribe = null;
        this.#scheduler.unregister(SAVE_JOB_ID);
    }

    /**
     * Ask for the current state to be written. Resolves once a write covering
     * this request has finished. Never rejects; a fatal failure is reported
     * through {@link onFatal}.
     */
    requestSave(): Promise<void> {
        if (this.#failure) return Promise.resolve();

        this.#dirty = true;
        this.#changedSinceSave = false;
        if (!this.#writing) {
            this.#writing = this.#drain();
        }
        return this.#writing;
    }

    /** Write the current state now, throwing if persistence has failed. */
    async flush(): Promise<void> {
        await this.requestSave();
        if (this.#failure) {
            throw this.#failure;
        }
    }

    onFatal(listener: PersistenceFatalListener): () => void {
        this.#fatalListeners.add(listener);
        return () => {
            this.#fatalListeners.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #drain(): Promise<void> {
        try {
            while (this.#dirty && this.#failure === null) {
                this.#dirty = false;
                const state = this.#queue.snapshot();
                const result = await withRetry(() => this.#store.save(state), {
                    maxAttempts: this.#options.maxAttempts,
                    baseDelayMs: this.#options.retryBaseDelayMs ?? 500,
                    label: 'queue:save',
                    sleep: this.#options.sleep,
                });

                if (result.ok) {
                    this.#lastSavedAt = new Date();
                } else {
                    await this.#fail(
                        new PersistenceFailureError(
                            `Queue state could not be saved to ${this.#store.description} after ${result.attempts} attempt(s): ${result.error ?? 'unknown error'}`,
                            result.attempts,
                        ),
                    );
                }
            }
        } finally {
            this.#writing = null;
        }
    }

    async #fail(error: PersistenceFailureError): Promise<void> {
        this.#failure = error;
        this.#queue.halt(error.message);

        console.error(`[QueuePersistence] FATAL: ${error.message} New items are refused until restart.`);
        await logThought(`[QueuePersistence] FATAL: ${error.message}`);

        for (const listener of this.#fatalListeners) {
            try {
                listener(error);
            } catch (listenerErr) {
                console.error('[QueuePersistence] Fatal listener threw an error:', listenerErr);
            }
        }
    }
}
