import { describe, it, expect } from 'vitest';
import { DelayPolicy, validateDelayOptions } from '../../src/services/delay-policy.js';
import { ConfigValidationError } from '../../src/types/errors.js';
import { policyOptions } from '../helpers.js';

describe('DelayPolicy', () => {
  describe('random mode', () => {
    it('places the release time at the lower bound for the smallest draw', () => {
      const policy = new DelayPolicy(policyOptions({ random: () => 0 }));
      expect(policy.schedule(1000)).toEqual({ scheduledTime: 1300 });
    });

    it('places the release time at the upper bound for the largest draw', () => {
      const policy = new DelayPolicy(policyOptions({ random: () => 0.9999999 }));
      expect(policy.schedule(1000).scheduledTime).toBe(8200);
    });

    it('keeps every draw inside [arrival + min, arrival + max]', () => {
      const policy = new DelayPolicy(policyOptions({ random: Math.random }));

      for (let index = 0; index < 200; index++) {
        const { scheduledTime } = policy.schedule(1000);
        expect(scheduledTime).toBeGreaterThanOrEqual(1300);
        expect(scheduledTime).toBeLessThanOrEqual(8200);
      }
    });

    it('gives the bounds the same share of draws as interior values', () => {
      const draws = [0.3, 0.34, 0.66, 0.67];
      const policy = new DelayPolicy(
        policyOptions({ minDelayMs: 300, maxDelayMs: 302, random: () => draws.shift() ?? 0 }),
      );

      expect(Array.from({ length: 4 }, () => policy.schedule(0).scheduledTime)).toEqual([300, 301, 301, 302]);
    });

        it('collapses to a fixed delay when both bounds are equal', () => {
      const policy = new DelayPolicy(policyOptions({ minDelayMs: 500, maxDelayMs: 500, random: () => 0.7 }));
      expect(policy.schedule(0).scheduledTime).toBe(500);
    });
  });

  describe('batch mode', () => {
    it('fills batches of batchSize released one interval apart', () => {
      const policy = new DelayPolicy(policyOptions({ mode: 'batch', batchSize: 5, batchIntervalMs: 1800 }));

      const decisions = Array.from({ length: 12 }, () => policy.schedule(0));

      expect(decisions.map((decision) => decision.scheduledTime)).toEqual([
        1800, 1800, 1800, 1800, 1800,
        3600, 3600, 3600, 3600, 3600,
        5400, 5400,
      ]);
      expect(new Set(decisions.map((decision) => decision.batchId))).toEqual(
        new Set(['batch-1-0', 'batch-1-1', 'batch-1-2']),
      );
    });

    it('opens a new sequence once the open batch release has passed', () => {
      const policy = new DelayPolicy(policyOptions({ mode: 'batch', batchSize: 5, batchIntervalMs: 1800 }));

      expect(policy.schedule(0)).toEqual({ scheduledTime: 1800, batchId: 'batch-1-0' });
      expect(policy.schedule(2000)).toEqual({ scheduledTime: 3800, batchId: 'batch-2-0' });
    });

    it('continues the sequence from exported state', () => {
      const first = new DelayPolicy(policyOptions({ mode: 'batch', batchSize: 2, batchIntervalMs: 1800 }));
      first.schedule(0);
      first.schedule(0);
      first.schedule(0);

      const second = new DelayPolicy(policyOptions({ mode: 'batch', batchSize: 2, batchIntervalMs: 1800 }));
      second.restoreState(first.exportState());

      expect(first.exportState()).toEqual({ origin: 1800, index: 1, count: 1, sequence: 1 });
      expect(second.schedule(10)).toEqual({ scheduledTime: 3600, batchId: 'batch-1-1' });
    });

    it('starts over when restored with no state', () => {
      const policy = new DelayPolicy(policyOptions({ mode: 'batch' }));
      policy.schedule(0);
      policy.restoreState(null);
      expect(policy.exportState()).toEqual({ origin: null, index: 0, count: 0, sequence: 0 });
    });
  });

  describe('hybrid mode', () => {
    it('adds jitter on top of the batch release', () => {
      const policy = new DelayPolicy(
        policyOptions({ mode: 'hybrid', batchIntervalMs: 1800, hybridJitterMinMs: 0, hybridJitterMaxMs: 100, random: () => 0.5 }),
      );
      expect(policy.schedule(0)).toEqual({ scheduledTime: 1850, batchId: 'batch-1-0' });
    });
  });

  describe('immediate mode', () => {
    it('delays only by the immediate jitter', () => {
      const policy = new DelayPolicy(policyOptions({ mode: 'immediate', random: () => 0.25 }));
      expect(policy.schedule(100)).toEqual({ scheduledTime: 2100 });
      expect(policy.immediateJitter()).toBe(2000);
    });
  });

  describe('validation', () => {
    it('rejects a minimum above the maximum', () => {
      expect(() => new DelayPolicy(policyOptions({ minDelayMs: 900, maxDelayMs: 100 }))).toThrow(ConfigValidationError);
    });

    it('reports every problem at once', () => {
      const issues = validateDelayOptions(
        policyOptions({ minDelayMs: 900, maxDelayMs: 100, batchSize: 0, batchIntervalMs: -1 }),
      );
      expect(issues.map((issue) => issue.key)).toEqual(['min_send_delay/max_send_delay', 'batch_size', 'batch_interval']);
      expect(issues[0].message).toBe('minimum (900) must not exceed maximum (100).');
    });

    it('rejects negative jitter bounds', () => {
      const issues = validateDelayOptions(policyOptions({ hybridJitterMinMs: -5 }));
      expect(issues).toEqual([
        { key: 'hybrid_jitter_min/hybrid_jitter_max', message: 'bounds must be non-negative numbers, got [-5, 100].' },
      ]);
    });
  });
});
