import { intervalToCron } from '../utils/cron.js';
import { logThought } from '../utils/logger.js';
import type { DelayedQueue } from './delayed-queue.js';
import type { JobScheduler } from './job-scheduler.js';
import type { RetryManager } from './retry-manager.js';

export const DISPATCH_JOB_ID = 'queue-dispatch';

export interface DispatchSchedulerOptions {
    queue: DelayedQueue;
    retryManager: RetryManager;
    scheduler: JobScheduler;
    checkIntervalSec: number;
    now?: () => number;
}

/**
 * Drives delivery: every `checkIntervalSec` it pops due items one at a time
 * and hands each to the retry manager. A tick that fires while another is
 * running is folded into one follow-up pass instead of running alongside it.
 */
export class DispatchScheduler {
    readonly #queue: DelayedQueue;
    readonly #retryManager: RetryManager;
    readonly #scheduler: JobScheduler;
    readonly #checkIntervalSec: number;
    readonly #now: () => number;

    #tick: Promise<number> | null = null;
    #pendingTick = false;
    #stopping = false;

    constructor(options: DispatchSchedulerOptions) {
        this.#queue = options.queue;
        this.#retryManager = options.retryManager;
        this.#scheduler = options.scheduler;
        this.#checkIntervalSec = options.checkIntervalSec;
        this.#now = options.now ?? (() => Date.now());
    }

    get running(): boolean {
        return this.#scheduler.has(DISPATCH_JOB_ID);
    }

    /** True while a pass over due items is in progress. */
    get busy(): boolean {
        return this.#tick !== null;
    }

    /** Register the periodic tick. Returns false when the queue is halted. */
    start(): boolean {
        if (this.#queue.haltReason !== null) {
            console.error(`[DispatchScheduler] Refusing to start: ${this.#queue.haltReason}`);
            return false;
        }
        if (this.running) return true;

        const cronExpression = intervalToCron(this.#checkIntervalSec);
        if (cronExpression === null) {
            throw new Error(`[DispatchScheduler] check_interval of ${this.#checkIntervalSec}s cannot be scheduled.`);
        }

        this.#stopping = false;
        this.#scheduler.register({
            id: DISPATCH_JOB_ID,
            cronExpression,
            description: 'Dispatch queue items whose release time has passed',
            quiet: true,
            handler: async () => {
                await this.runOnce();
            },
        });
        void logThought(`[DispatchScheduler] Started; checking every ${this.#checkIntervalSec}s.`);
        return true;
    }

    /**
     * Unregister the tick and wait for the current dispatch to settle. Items
     * still due stay in the queue for the next start.
     */
    async stop(): Promise<void> {
        this.#stopping = true;
        const wasRunning = this.#scheduler.unregister(DISPATCH_JOB_ID);

        if (this.#tick) {
            await this.#tick;
        }
        if (wasRunning) {
            await logThought('[DispatchScheduler] Stopped.');
        }
    }

    /**
     * Dispatch everything currently due. Resolves with the number of items
     * handed to the retry manager by the pass this call joined.
     */
    runOnce(): Promise<number> {
        if (this.#tick) {
            this.#pendingTick = true;
            return this.#tick;
        }
        this.#tick = this.#run();
        return this.#tick;
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #run(): Promise<number> {
        let dispatched = 0;
        try {
            do {
                this.#pendingTick = false;
                dispatched += await this.#drainDue();
            } while (this.#pendingTick && !this.#stopping);
        } finally {
            this.#tick = null;
        }
        return dispatched;
    }

    async #drainDue(): Promise<number> {
        let dispatched = 0;
        while (!this.#stopping && this.#queue.haltReason === null) {
            const [item] = this.#queue.popDue(this.#now(), 1);
            if (!item) break;

            await this.#retryManager.dispatch(item);
            dispatched += 1;
        }
        return dispatched;
    }
}
