import { logThought } from './logger.js';
import type { BackoffMode } from '../types/queue.js';

export interface BackoffPolicy {
    mode: BackoffMode;
    baseDelayMs: number;
    /** Multiplier applied per failed attempt in exponential mode. */
    factor: number;
    maxDelayMs: number;
}

/**
 * Delay before the next attempt, given how many attempts have failed so far
 * (1 after the first failure).
 */
export function computeBackoffDelay(policy: BackoffPolicy, failedAttempts: number): number {
    if (policy.mode === 'fixed') {
        return Math.min(policy.baseDelayMs, policy.maxDelayMs);
    }
    const exponent = Math.max(0, failedAttempts - 1);
    return Math.min(policy.baseDelayMs * policy.factor ** exponent, policy.maxDelayMs);
}

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** @default 2 */
    backoffFactor?: number;
    /** @default 15000 */
    maxDelayMs?: number;
    /** Label used in log messages. */
    label?: string;
    sleep?: (ms: number) => Promise<void>;
}

/** Result of a retried operation. */
export interface RetryResult<T> {
    ok: boolean;
    value?: T;
    error?: string;
    attempts: number;
    totalDurationMs: number;
}

const DEFAULTS = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
};

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => store.save(state),
 *   { maxAttempts: 5, label: 'queue:save' },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
    const policy: BackoffPolicy = {
        mode: 'exponential',
        baseDelayMs: options.baseDelayMs ?? DEFAULTS.baseDelayMs,
        factor: options.backoffFactor ?? DEFAULTS.backoffFactor,
        maxDelayMs: options.maxDelayMs ?? DEFAULTS.maxDelayMs,
    };
    const label = options.label ?? 'unnamed';
    const wait = options.sleep ?? sleep;

    const start = Date.now();
    let lastError = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            const value = await fn();
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                void logThought(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastError = err instanceof Error ? err.message : String(err);

            if (attempt < maxAttempts) {
                const delay = computeBackoffDelay(policy, attempt);
                void logThought(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
                );
                await wait(delay);
            } else {
                void logThought(
                    `[Retry] ${label} exhausted all ${maxAttempts} attempts. Last error: ${lastError}.`,
                );
            }
        }
    }

    return {
        ok: false,
        error: lastError,
        attempts: maxAttempts,
        totalDurationMs: Date.now() - start,
    };
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
