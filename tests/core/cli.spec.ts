import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  handleHelpCli,
  handleStatusCli,
  handleUnknownCommand,
  handleValidateConfigCli,
  readConfigFlag,
} from '../../src/core/cli.js';
import { JsonFileQueueStore } from '../../src/services/queue-store.js';
import type { QueueItem } from '../../src/types/queue.js';

// Capture console output during tests
let consoleOutput: string[] = [];
let consoleErrors: string[] = [];

beforeEach(() => {
  consoleOutput = [];
  consoleErrors = [];
  vi.spyOn(console, 'log').mockImplementation((...args) => {
    consoleOutput.push(args.join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args) => {
    consoleErrors.push(args.join(' '));
  });
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  process.exitCode = undefined;
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

// ── readConfigFlag ───────────────────────────────────────────────────────────

describe('readConfigFlag', () => {
  it('reads both flag spellings', () => {
    expect(readConfigFlag(['--config', 'a.json'])).toBe('a.json');
    expect(readConfigFlag(['status', '--config=b.json'])).toBe('b.json');
    expect(readConfigFlag(['status'])).toBeUndefined();
  });
});

// ── handleHelpCli ────────────────────────────────────────────────────────────

describe('handleHelpCli', () => {
  it('returns false when --help is not present', () => {
    expect(handleHelpCli([])).toBe(false);
    expect(handleHelpCli(['status'])).toBe(false);
  });

  it('returns true and prints help when -h is present', () => {
    expect(handleHelpCli(['-h'])).toBe(true);
    expect(consoleOutput.join('\n')).toMatch(/usage/i);
    expect(process.exitCode).toBe(0);
  });

  it('help output includes known commands', () => {
    handleHelpCli(['--help']);
    const output = consoleOutput.join('\n');
    expect(output).toContain('validate-config');
    expect(output).toContain('status');
  });
});

// ── handleUnknownCommand ─────────────────────────────────────────────────────

describe('handleUnknownCommand', () => {
  it('ignores known commands, flags and flag values', () => {
    expect(handleUnknownCommand([])).toBe(false);
    expect(handleUnknownCommand(['status'])).toBe(false);
    expect(handleUnknownCommand(['--config', 'relay.json'])).toBe(false);
    expect(process.exitCode).toBeUndefined();
  });

  it('rejects anything else with a non-zero exit code', () => {
    expect(handleUnknownCommand(['frobnicate'])).toBe(true);
    expect(consoleErrors[0]).toBe("[Relay] Unknown command: 'frobnicate'");
    expect(process.exitCode).toBe(1);
  });
});

// ── config-backed commands ───────────────────────────────────────────────────

describe('config-backed commands', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'paced-relay-cli-'));
    configPath = path.join(dir, 'relay.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('validate-config reports a valid file', async () => {
    await writeFile(
      configPath,
      JSON.stringify({ telegram: { bot_token: 'test-token', target_chat_id: '-100123' } }),
    );

    expect(await handleValidateConfigCli(['validate-config', '--config', configPath])).toBe(true);
    expect(consoleOutput).toEqual([`Configuration at ${configPath} is valid.`]);
    expect(process.exitCode).toBe(0);
  });

  it('validate-config lists every problem', async () => {
    await writeFile(
      configPath,
      JSON.stringify({
        queue: { min_send_delay: 600, max_send_delay: 60 },
        telegram: { bot_token: 'test-token', target_chat_id: '-100123' },
      }),
    );

    await handleValidateConfigCli(['validate-config', '--config', configPath]);

    expect(consoleErrors).toEqual([
      `Configuration at ${configPath} has 1 problem(s):`,
      '  - min_send_delay/max_send_delay: minimum (600000) must not exceed maximum (60000).',
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('validate-config leaves other commands alone', async () => {
    expect(await handleValidateConfigCli(['status'])).toBe(false);
  });

  it('status prints the persisted queue without Telegram credentials', async () => {
    await writeFile(configPath, JSON.stringify({ queue: { save_path: 'queue.json' } }));
    const item: QueueItem = {
      id: 'saved-1',
      payload: { files: [], text: 'later' },
      arrivalTime: Date.parse('2026-01-01T00:00:00.000Z'),
      scheduledTime: Date.parse('2026-01-01T00:10:00.000Z'),
      priority: 0,
      attempts: 0,
      status: 'scheduled',
    };
    await new JsonFileQueueStore(path.join(dir, 'queue.json')).save({
      items: [item],
      history: [],
      totals: { queued: 1, sent: 0, failed: 0, deadLettered: 0 },
      policyState: null,
    });

    expect(await handleStatusCli(['status', '--config', configPath])).toBe(true);

    const report = JSON.parse(consoleOutput[0]);
    expect(report.store).toBe(`json:${path.join(dir, 'queue.json')}`);
    expect(report.corruptEntries).toBe(0);
    expect(report.status.size).toBe(1);
    expect(report.status.byStatus.scheduled).toBe(1);
    expect(report.status.nextDueAt).toBe(Date.parse('2026-01-01T00:10:00.000Z'));
    expect(process.exitCode).toBe(0);
  });
});
