import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { DelayPolicy } from '../../src/services/delay-policy.js';
import { DelayedQueue } from '../../src/services/delayed-queue.js';
import { ModeController } from '../../src/services/mode-controller.js';
import { RetryManager } from '../../src/services/retry-manager.js';
import type { DispatchMode, DispatchOutcome, MediaPayload } from '../../src/types/queue.js';
import { ScriptedSink, policyOptions, sequentialIds, textPayload } from '../helpers.js';

describe('ModeController', () => {
  let queue: DelayedQueue;
  let policy: DelayPolicy;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let onDelivered: Mock<(payload: MediaPayload) => Promise<void>>;

  function createController(initialMode: DispatchMode, ...outcomes: DispatchOutcome[]) {
    const sink = new ScriptedSink(...outcomes);
    const retryManager = new RetryManager({
      queue,
      sink,
      backoff: { mode: 'fixed', baseDelayMs: 1000, factor: 1, maxDelayMs: 1000 },
      dispatchTimeoutMs: 1000,
    });
    const controller = new ModeController({ queue, retryManager, policy, initialMode, onDelivered, sleep });
    return { controller, sink, retryManager };
  }

  beforeEach(() => {
    policy = new DelayPolicy(policyOptions({ immediateJitterMinMs: 1000, immediateJitterMaxMs: 5000, random: () => 0 }));
    queue = new DelayedQueue({
      capacity: 10,
      maxAttempts: 3,
      historyLimit: 10,
      policy,
      now: () => 1000,
      generateId: sequentialIds(),
    });
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
    onDelivered = vi.fn<(payload: MediaPayload) => Promise<void>>(async () => undefined);
  });

  it('queues submissions in queued mode', async () => {
    const { controller, sink } = createController('queued');

    const result = await controller.submit(textPayload(), 3);

    expect(result.kind).toBe('queued');
    expect(result.kind === 'queued' && result.item.priority).toBe(3);
    expect(sink.payloads).toEqual([]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sends straight away in immediate mode after the jitter', async () => {
    const { controller, sink } = createController('immediate', { kind: 'success' });

    const result = await controller.submit(textPayload('now'));

    expect(result).toEqual({ kind: 'sent' });
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(sink.payloads).toEqual([{ files: [], text: 'now' }]);
    expect(onDelivered).toHaveBeenCalledWith({ files: [], text: 'now' });
    expect(queue.size).toBe(0);
  });

  it('falls back to the queue when an immediate send fails transiently', async () => {
    const { controller } = createController('immediate', { kind: 'transient', reason: 'HTTP 429' });

    const result = await controller.submit(textPayload());

    expect(result.kind).toBe('queued');
    expect(result.kind === 'queued' && result.item.attempts).toBe(1);
    expect(result.kind === 'queued' && result.item.lastError).toBe('HTTP 429');
    expect(onDelivered).not.toHaveBeenCalled();
  });

  it('counts the immediate send against the attempt limit', async () => {
    const { controller, sink, retryManager } = createController('immediate', { kind: 'transient', reason: 'HTTP 503' });

    await controller.submit(textPayload());
    for (let round = 0; round < 5; round++) {
      for (const item of queue.popDue(Number.MAX_SAFE_INTEGER)) {
        await retryManager.dispatch(item);
      }
    }

    expect(sink.payloads).toHaveLength(3);
    expect(queue.size).toBe(0);
    expect(queue.history()).toMatchObject([{ id: 'item-1', status: 'dead_letter', attempts: 3 }]);
  });

  it('reports the failure instead of queueing when a single attempt is allowed', async () => {
    queue = new DelayedQueue({ capacity: 10, maxAttempts: 1, historyLimit: 10, policy, now: () => 1000 });
    const { controller, sink } = createController('immediate', { kind: 'transient', reason: 'HTTP 503' });

    expect(await controller.submit(textPayload())).toEqual({ kind: 'failed', reason: 'HTTP 503' });
    expect(sink.payloads).toHaveLength(1);
    expect(queue.size).toBe(0);
  });

  it('reports a permanent immediate failure without queueing', async () => {
    const { controller } = createController('immediate', { kind: 'permanent', reason: 'chat not found' });

    const result = await controller.submit(textPayload());

    expect(result).toEqual({ kind: 'failed', reason: 'chat not found' });
    expect(queue.size).toBe(0);
  });

  it('passes a queue rejection through', async () => {
    const { controller } = createController('queued');
    queue.halt('disk full');

    expect(await controller.submit(textPayload())).toEqual({
      kind: 'rejected',
      reason: 'persistence_halted',
      message: 'Queue is halted: disk full',
    });
  });

  it('switches mode for later submissions only', async () => {
    const { controller } = createController('queued', { kind: 'success' });

    expect(controller.setMode('immediate')).toBe('queued');
    expect(controller.mode).toBe('immediate');
    expect(controller.setMode('immediate')).toBe('immediate');
    expect(await controller.submit(textPayload())).toEqual({ kind: 'sent' });
  });
});
