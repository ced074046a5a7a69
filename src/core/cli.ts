import { inspectRelayConfig, type RelayConfig } from '../config/relay-config.js';
import { DelayPolicy } from '../services/delay-policy.js';
import { DelayedQueue } from '../services/delayed-queue.js';
import { createQueueStore } from '../services/forwarding-engine.js';
import type { QueueStatusSnapshot } from '../types/queue.js';

export interface OfflineStatus {
  store: string;
  savedAt: string | null;
  corruptEntries: number;
  status: QueueStatusSnapshot;
}

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: paced-relay [command] [options]

Commands:
  (none)              Run the relay: restore the queue, dispatch, serve the API
  validate-config     Check the configuration and list every problem found
  status              Print the persisted queue status as JSON (offline)

Options:
  --config <path>     Config file (default: relay.json, or RELAY_CONFIG_PATH)
  --help, -h          Show this help message

Examples:
  paced-relay
  paced-relay --config /etc/paced-relay/relay.json
  paced-relay validate-config
  paced-relay status --config ./relay.json
`.trim();

const KNOWN_COMMANDS = new Set(['validate-config', 'status']);

/** Value of `--config <path>` or `--config=<path>`, if given. */
export function readConfigFlag(argv: string[]): string | undefined {
  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index];
    if (arg === '--config') return argv[index + 1];
    if (arg.startsWith('--config=')) return arg.slice('--config='.length);
  }
  return undefined;
}

/** First argument that is neither a flag nor a flag's value. */
function commandOf(argv: string[]): string | undefined {
  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index];
    if (arg === '--config') {
      index += 1;
      continue;
    }
    if (!arg.startsWith('-')) return arg;
  }
  return undefined;
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Handle `validate-config`: print every issue, exit code 1 when there is any.
 * Returns `true` when the command was recognized and handled.
 */
export async function handleValidateConfigCli(argv: string[]): Promise<boolean> {
  if (commandOf(argv) !== 'validate-config') return false;

  try {
    const { config, issues } = await inspectRelayConfig({ path: readConfigFlag(argv) });
    if (issues.length === 0) {
      console.log(`Configuration at ${config.sourcePath} is valid.`);
      process.exitCode = 0;
    } else {
      console.error(`Configuration at ${config.sourcePath} has ${issues.length} problem(s):`);
      for (const issue of issues) {
        console.error(`  - ${issue.key}: ${issue.message}`);
      }
      process.exitCode = 1;
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Relay] Configuration check failed: ${message}`);
    process.exitCode = 1;
  }

  return true;
}

/** Restore persisted state into a detached queue and return its status. */
export async function readOfflineStatus(config: RelayConfig): Promise<OfflineStatus> {
  const settings = config.queue;
  const policy = new DelayPolicy({
    mode: settings.delayMode,
    minDelayMs: settings.minSendDelayMs,
    maxDelayMs: settings.maxSendDelayMs,
    batchSize: settings.batchSize,
    batchIntervalMs: settings.batchIntervalMs,
    hybridJitterMinMs: settings.hybridJitterMinMs,
    hybridJitterMaxMs: settings.hybridJitterMaxMs,
    immediateJitterMinMs: settings.immediateJitterMinMs,
    immediateJitterMaxMs: settings.immediateJitterMaxMs,
  });
  const queue = new DelayedQueue({
    capacity: settings.maxQueueSize,
    maxAttempts: settings.maxAttempts,
    historyLimit: settings.historyLimit,
    policy,
  });

  const store = createQueueStore(settings);
  try {
    const loaded = await store.load();
    queue.restore(loaded.state);
    return {
      store: store.description,
      savedAt: loaded.savedAt,
      corruptEntries: loaded.corrupt.length,
      status: queue.status(),
    };
  } finally {
    store.close?.();
  }
}

/**
 * Handle `status`: print the persisted queue status without starting the relay.
 * Returns `true` when the command was recognized and handled.
 */
export async function handleStatusCli(argv: string[]): Promise<boolean> {
  if (commandOf(argv) !== 'status') return false;

  try {
    const { config, issues } = await inspectRelayConfig({ path: readConfigFlag(argv), requireTelegram: false });
    if (issues.length > 0) {
      console.error(`[Relay] Configuration is invalid: ${issues.map((issue) => `${issue.key}: ${issue.message}`).join('; ')}`);
      process.exitCode = 1;
      return true;
    }
    console.log(JSON.stringify(await readOfflineStatus(config), null, 2));
    process.exitCode = 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Relay] Could not read queue status: ${message}`);
    process.exitCode = 1;
  }

  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  const command = commandOf(argv);
  if (command === undefined || KNOWN_COMMANDS.has(command)) return false;

  console.error(`[Relay] Unknown command: '${command}'`);
  console.error(`Run 'paced-relay --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}
