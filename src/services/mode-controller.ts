import type { DispatchMode, EnqueueRejectReason, MediaPayload, QueueItem } from '../types/queue.js';
import { logThought } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/retry.js';
import type { DelayPolicy } from './delay-policy.js';
import type { DelayedQueue, EnqueueOptions } from './delayed-queue.js';
import type { RetryManager } from './retry-manager.js';

export type SubmitResult =
    | { kind: 'queued'; item: QueueItem }
    | { kind: 'rejected'; reason: EnqueueRejectReason; message: string }
    | { kind: 'sent' }
    | { kind: 'failed'; reason: string };

export interface ModeControllerOptions {
    queue: DelayedQueue;
    retryManager: RetryManager;
    policy: DelayPolicy;
    initialMode: DispatchMode;
    /** Called after a payload is delivered outside the queue. */
    onDelivered?: (payload: MediaPayload) => Promise<void>;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Routes finished downloads either into the delayed queue or straight to the
 * sink. Switching mode only affects items submitted afterwards.
 */
export class ModeController {
    readonly #queue: DelayedQueue;
    readonly #retryManager: RetryManager;
    readonly #policy: DelayPolicy;
    readonly #onDelivered: ((payload: MediaPayload) => Promise<void>) | undefined;
    readonly #sleep: (ms: number) => Promise<void>;
    #mode: DispatchMode;

    constructor(options: ModeControllerOptions) {
        this.#queue = options.queue;
        this.#retryManager = options.retryManager;
        this.#policy = options.policy;
        this.#mode = options.initialMode;
        this.#onDelivered = options.onDelivered;
        this.#sleep = options.sleep ?? defaultSleep;
    }

    get mode(): DispatchMode {
        return this.#mode;
    }

    /** Switch mode, returning the previous one. */
    setMode(mode: DispatchMode): DispatchMode {
        const previous = this.#mode;
        this.#mode = mode;
        if (previous !== mode) {
            void logThought(`[ModeController] Dispatch mode changed from '${previous}' to '${mode}'.`);
        }
        return previous;
    }

    /** Hand over a payload whose media has finished downloading. */
    async submit(payload: MediaPayload, priority = 0): Promise<SubmitResult> {
        if (this.#mode === 'queued') {
            return this.#enqueue(payload, { priority });
        }

        await this.#sleep(this.#policy.immediateJitter());
        const outcome = await this.#retryManager.attempt(payload);

        switch (outcome.kind) {
            case 'success':
                if (this.#onDelivered) {
                    await this.#onDelivered(payload);
                }
                return { kind: 'sent' };
            case 'transient':
                if (this.#queue.maxAttempts <= 1) {
                    console.error(`[ModeController] Immediate send failed with no attempts left: ${outcome.reason}`);
                    await logThought(`[ModeController] Immediate send failed with no attempts left: ${outcome.reason}`);
                    return { kind: 'failed', reason: outcome.reason };
                }
                await logThought(`[ModeController] Immediate send failed (${outcome.reason}); falling back to the queue.`);
                return this.#enqueue(payload, { priority, attempts: 1, lastError: outcome.reason });
            case 'permanent':
                console.error(`[ModeController] Immediate send rejected: ${outcome.reason}`);
                await logThought(`[ModeController] Immediate send rejected: ${outcome.reason}`);
                return { kind: 'failed', reason: outcome.reason };
        }
    }

    #enqueue(payload: MediaPayload, options: EnqueueOptions): SubmitResult {
        const result = this.#queue.enqueue(payload, options);
        if (result.ok) {
            return { kind: 'queued', item: result.item };
        }
        console.warn(`[ModeController] Item not queued: ${result.message}`);
        return { kind: 'rejected', reason: result.reason, message: result.message };
    }
}
