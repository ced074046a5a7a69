import { describe, it, expect, vi } from 'vitest';
import {
  executeControlCommand,
  formatControlResponse,
  parseControlCommand,
  parseDispatchMode,
  type ControlTarget,
} from '../../src/core/control-commands.js';
import type { DispatchMode, QueueStatusSnapshot } from '../../src/types/queue.js';

const STATUS: QueueStatusSnapshot = {
  size: 2,
  capacity: 10,
  byStatus: { pending: 0, scheduled: 1, due: 0, dispatching: 1, sent: 3, retrying: 0, dead_letter: 0 },
  nextDueAt: Date.UTC(2026, 0, 1, 0, 0, 0),
  oldestItemAgeMs: 5000,
  inFlight: 1,
  historySize: 3,
  totals: { queued: 6, sent: 3, failed: 1, deadLettered: 0 },
};

class FakeTarget implements ControlTarget {
  mode: DispatchMode = 'queued';
  running = false;
  canStart = true;
  readonly clear = vi.fn(() => 2);
  readonly clearHistory = vi.fn(() => 1);

  queueStatus(): QueueStatusSnapshot {
    return STATUS;
  }

  start(): boolean {
    if (this.canStart) this.running = true;
    return this.canStart;
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  setMode(mode: DispatchMode): DispatchMode {
    const previous = this.mode;
    this.mode = mode;
    return previous;
  }
}

describe('parseControlCommand', () => {
  it('parses simple commands and drops a bot-name suffix', () => {
    expect(parseControlCommand('/status')).toEqual({ ok: true, command: { name: 'status' } });
    expect(parseControlCommand('  /CLEAR@relay_bot ')).toEqual({ ok: true, command: { name: 'clear' } });
    expect(parseControlCommand('/clear_history')).toEqual({ ok: true, command: { name: 'clear_history' } });
  });

  it('accepts queue as an alias of queued', () => {
    expect(parseControlCommand('/mode queue')).toEqual({ ok: true, command: { name: 'mode', mode: 'queued' } });
    expect(parseControlCommand('/mode Immediate')).toEqual({ ok: true, command: { name: 'mode', mode: 'immediate' } });
  });

  it('explains what is wrong with a bad command', () => {
    expect(parseControlCommand('status')).toEqual({ ok: false, error: 'Commands start with "/".' });
    expect(parseControlCommand('/mode')).toEqual({ ok: false, error: 'Usage: /mode immediate|queue' });
    expect(parseControlCommand('/mode fast')).toEqual({ ok: false, error: 'Usage: /mode immediate|queue' });
    expect(parseControlCommand('/restart now')).toEqual({ ok: false, error: 'Unknown command: /restart' });
  });

  it('parses dispatch modes on their own', () => {
    expect(parseDispatchMode(' QUEUED ')).toBe('queued');
    expect(parseDispatchMode('later')).toBeNull();
  });
});

describe('executeControlCommand', () => {
  it('clears the queue and reports how many items went', async () => {
    const target = new FakeTarget();

    const response = await executeControlCommand(target, { name: 'clear' });

    expect(target.clear).toHaveBeenCalledTimes(1);
    expect(response).toEqual({
      command: 'clear',
      ok: true,
      mode: 'queued',
      running: false,
      status: STATUS,
      removed: 2,
      message: 'Removed 2 queued item(s).',
    });
  });

  it('uses the singular for one history entry', async () => {
    const response = await executeControlCommand(new FakeTarget(), { name: 'clear_history' });
    expect(response.message).toBe('Removed 1 history entry.');
    expect(response.removed).toBe(1);
  });

  it('starts and stops dispatching', async () => {
    const target = new FakeTarget();

    const started = await executeControlCommand(target, { name: 'start' });
    const again = await executeControlCommand(target, { name: 'start' });
    const stopped = await executeControlCommand(target, { name: 'stop' });
    const stoppedAgain = await executeControlCommand(target, { name: 'stop' });

    expect([started.message, again.message, stopped.message, stoppedAgain.message]).toEqual([
      'Dispatching started.',
      'Dispatching is already running.',
      'Dispatching stopped.',
      'Dispatching is already stopped.',
    ]);
    expect(started.running).toBe(true);
    expect(stopped.running).toBe(false);
  });

  it('reports a start refused by a halted queue', async () => {
    const target = new FakeTarget();
    target.canStart = false;

    const response = await executeControlCommand(target, { name: 'start' });

    expect(response.ok).toBe(false);
    expect(response.message).toBe('Dispatching cannot start while the queue is halted.');
  });

  it('switches mode', async () => {
    const target = new FakeTarget();

    const changed = await executeControlCommand(target, { name: 'mode', mode: 'immediate' });
    const unchanged = await executeControlCommand(target, { name: 'mode', mode: 'immediate' });

    expect(changed.message).toBe("Mode changed from 'queued' to 'immediate'.");
    expect(changed.mode).toBe('immediate');
    expect(unchanged.message).toBe("Mode is already 'immediate'.");
  });
});

describe('formatControlResponse', () => {
  it('renders the response as chat lines', async () => {
    const target = new FakeTarget();
    target.running = true;

    const response = await executeControlCommand(target, { name: 'status' });

    expect(formatControlResponse(response)).toBe(
      [
        'Queue status.',
        'Mode: queued',
        'Dispatcher: running',
        'Queued: 2/10 (in flight: 1)',
        'Next due: 2026-01-01T00:00:00.000Z',
        'Sent: 3, failed: 1, dead-lettered: 0',
      ].join('\n'),
    );
  });

  it('shows none when nothing is waiting', () => {
    const text = formatControlResponse({
      command: 'status',
      ok: true,
      mode: 'immediate',
      running: false,
      status: { ...STATUS, nextDueAt: null },
      message: 'Queue status.',
    });
    expect(text.split('\n')[4]).toBe('Next due: none');
  });
});
