import { ConfigValidationError, type ConfigIssue } from '../types/errors.js';
import type { BatchPolicyState, DelayMode } from '../types/queue.js';

export interface DelayPolicyOptions {
    mode: DelayMode;
    minDelayMs: number;
    maxDelayMs: number;
    batchSize: number;
    batchIntervalMs: number;
    hybridJitterMinMs: number;
    hybridJitterMaxMs: number;
    immediateJitterMinMs: number;
    immediateJitterMaxMs: number;
    /** Uniform source in [0, 1). Defaults to Math.random. */
    random?: () => number;
}

export interface ScheduleDecision {
    scheduledTime: number;
    batchId?: string;
}

function checkRange(issues: ConfigIssue[], key: string, min: number, max: number): void {
    if (!Number.isFinite(min) || !Number.isFinite(max) || min < 0) {
        issues.push({ key, message: `bounds must be non-negative numbers, got [${min}, ${max}].` });
        return;
    }
    if (min > max) {
        issues.push({ key, message: `minimum (${min}) must not exceed maximum (${max}).` });
    }
}

/** Collect every problem with a delay configuration instead of stopping at the first. */
export function validateDelayOptions(options: DelayPolicyOptions): ConfigIssue[] {
    const issues: ConfigIssue[] = [];
    checkRange(issues, 'min_send_delay/max_send_delay', options.minDelayMs, options.maxDelayMs);
    checkRange(issues, 'hybrid_jitter_min/hybrid_jitter_max', options.hybridJitterMinMs, options.hybridJitterMaxMs);
    checkRange(
        issues,
        'immediate_jitter_min/immediate_jitter_max',
        options.immediateJitterMinMs,
        options.immediateJitterMaxMs,
    );
    if (!Number.isInteger(options.batchSize) || options.batchSize <= 0) {
        issues.push({ key: 'batch_size', message: `must be a positive integer, got ${options.batchSize}.` });
    }
    if (!Number.isFinite(options.batchIntervalMs) || options.batchIntervalMs <= 0) {
        issues.push({ key: 'batch_interval', message: `must be positive, got ${options.batchIntervalMs}.` });
    }
    return issues;
}

export function initialBatchState(): BatchPolicyState {
    return { origin: null, index: 0, count: 0, sequence: 0 };
}

/**
 * Computes release times for arriving items.
 *
 * Batch and hybrid modes are stateful: consecutive arrivals fill batches of
 * `batchSize`, and batch N of a sequence is released at
 * `origin + N * batchInterval`, where `origin` is one interval after the
 * arrival that opened the sequence. A batch also closes once its release time
 * has passed; the next arrival then opens a fresh sequence.
 */
export class DelayPolicy {
    readonly #options: DelayPolicyOptions;
    readonly #random: () => number;
    #batch: BatchPolicyState = initialBatchState();

    constructor(options: DelayPolicyOptions) {
        const issues = validateDelayOptions(options);
        if (issues.length > 0) {
            throw new ConfigValidationError(issues);
        }
        this.#options = options;
        this.#random = options.random ?? Math.random;
    }

    get mode(): DelayMode {
        return this.#options.mode;
    }

    schedule(arrivalTime: number): ScheduleDecision {
        const options = this.#options;

        switch (options.mode) {
            case 'immediate':
                return {
                    scheduledTime:
                        arrivalTime + this.#uniform(options.immediateJitterMinMs, options.immediateJitterMaxMs),
                };
            case 'random':
                return { scheduledTime: arrivalTime + this.#uniform(options.minDelayMs, options.maxDelayMs) };
            case 'batch': {
                const { release, batchId } = this.#assignBatch(arrivalTime);
                return { scheduledTime: release, batchId };
            }
            case 'hybrid': {
                const { release, batchId } = this.#assignBatch(arrivalTime);
                const jitter = this.#uniform(options.hybridJitterMinMs, options.hybridJitterMaxMs);
                return { scheduledTime: release + jitter, batchId };
            }
        }
    }

    /** Jitter applied before an immediate-mode dispatch. */
    immediateJitter(): number {
        return this.#uniform(this.#options.immediateJitterMinMs, this.#options.immediateJitterMaxMs);
    }

    exportState(): BatchPolicyState {
        return { ...this.#batch };
    }

    restoreState(state: BatchPolicyState | null): void {
        this.#batch = state ? { ...state } : initialBatchState();
    }

    #assignBatch(arrivalTime: number): { release: number; batchId: string } {
        const { batchSize, batchIntervalMs } = this.#options;
        const batch = this.#batch;

        if (batch.origin !== null) {
            const release = batch.origin + batch.index * batchIntervalMs;
            if (arrivalTime < release) {
                if (batch.count < batchSize) {
                    batch.count += 1;
                    return { release, batchId: this.#batchId() };
                }
                batch.index += 1;
                batch.count = 1;
                return { release: batch.origin + batch.index * batchIntervalMs, batchId: this.#batchId() };
            }
        }

        batch.sequence += 1;
        batch.origin = arrivalTime + batchIntervalMs;
        batch.index = 0;
        batch.count = 1;
        return { release: batch.origin, batchId: this.#batchId() };
    }

    #batchId(): string {
        return `batch-${this.#batch.sequence}-${this.#batch.index}`;
    }

    /** Whole milliseconds in `[min, max]`, each equally likely. */
    #uniform(min: number, max: number): number {
        return min + Math.floor(this.#random() * (max - min + 1));
    }
}
