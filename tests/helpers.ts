import type { DelayPolicyOptions } from '../src/services/delay-policy.js';
import { emptyQueueState, type LoadResult, type QueueStore } from '../src/services/queue-store.js';
import type { DispatchOutcome, DispatchSink, MediaPayload, QueueSettings, QueueState } from '../src/types/queue.js';

export function policyOptions(overrides: Partial<DelayPolicyOptions> = {}): DelayPolicyOptions {
  return {
    mode: 'random',
    minDelayMs: 300,
    maxDelayMs: 7200,
    batchSize: 5,
    batchIntervalMs: 1800,
    hybridJitterMinMs: 0,
    hybridJitterMaxMs: 100,
    immediateJitterMinMs: 1000,
    immediateJitterMaxMs: 5000,
    random: () => 0,
    ...overrides,
  };
}

export function queueSettings(overrides: Partial<QueueSettings> = {}): QueueSettings {
  return {
    delayMode: 'random',
    minSendDelayMs: 0,
    maxSendDelayMs: 0,
    batchSize: 5,
    batchIntervalMs: 1800,
    hybridJitterMinMs: 0,
    hybridJitterMaxMs: 0,
    immediateJitterMinMs: 0,
    immediateJitterMaxMs: 0,
    checkIntervalSec: 30,
    maxQueueSize: 10,
    maxAttempts: 3,
    retryBackoffMode: 'exponential',
    retryBackoffBaseMs: 1000,
    retryBackoffFactor: 2,
    retryBackoffMaxMs: 10_000,
    dispatchTimeoutMs: 1000,
    autoSave: true,
    saveIntervalSec: 60,
    savePath: 'unused.json',
    storeKind: 'json',
    historyLimit: 50,
    overduePolicy: 'dispatch',
    persistenceMaxAttempts: 2,
    ...overrides,
  };
}

export function textPayload(text = 'hello'): MediaPayload {
  return { files: [], text };
}

export function sequentialIds(prefix = 'item'): () => string {
  let counter = 0;
  return () => `${prefix}-${++counter}`;
}

/** In-process stand-in for a durable store. */
export class MemoryQueueStore implements QueueStore {
  readonly description = 'memory';
  readonly saved: QueueState[] = [];
  initial: QueueState = emptyQueueState();
  failuresRemaining = 0;
  gate: Promise<void> | null = null;
  closed = false;

  async save(state: QueueState): Promise<void> {
    if (this.gate) await this.gate;
    if (this.failuresRemaining > 0) {
      this.failuresRemaining -= 1;
      throw new Error('disk full');
    }
    this.saved.push(structuredClone(state));
  }

  async load(): Promise<LoadResult> {
    return { state: structuredClone(this.saved.at(-1) ?? this.initial), corrupt: [], savedAt: null };
  }

  close(): void {
    this.closed = true;
  }
}

/** Sink whose outcomes are scripted per call; the last outcome repeats. */
export class ScriptedSink implements DispatchSink {
  readonly payloads: MediaPayload[] = [];
  #outcomes: DispatchOutcome[];

  constructor(...outcomes: DispatchOutcome[]) {
    this.#outcomes = outcomes.length > 0 ? outcomes : [{ kind: 'success' }];
  }

  async dispatch(payload: MediaPayload): Promise<DispatchOutcome> {
    this.payloads.push(payload);
    const next = this.#outcomes.length > 1 ? this.#outcomes.shift() : this.#outcomes[0];
    return next ?? { kind: 'success' };
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
