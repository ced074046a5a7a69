#!/usr/bin/env node
import type { Server } from 'node:http';
import TelegramBot from 'node-telegram-bot-api';
import { startApiServer } from './api/router.js';
import { loadRelayConfig, type RelayConfig } from './config/relay-config.js';
import {
    handleHelpCli,
    handleStatusCli,
    handleUnknownCommand,
    handleValidateConfigCli,
    readConfigFlag,
} from './core/cli.js';
import { TelegramControl } from './interfaces/telegram-control.js';
import { TelegramSink } from './interfaces/telegram-sink.js';
import { ForwardingEngine } from './services/forwarding-engine.js';
import { configureLogger, logThought } from './utils/logger.js';

const argv = process.argv.slice(2);

// ── Early one-shot CLI commands (bypass service startup) ─────────────────────

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 1);
}

if ((await handleValidateConfigCli(argv)) || (await handleStatusCli(argv))) {
    process.exit(process.exitCode ?? 0);
}

// ── Service startup ──────────────────────────────────────────────────────────

let config: RelayConfig;
try {
    config = await loadRelayConfig({ path: readConfigFlag(argv) });
} catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Relay] Startup blocked: ${message}`);
    process.exit(1);
}

configureLogger({ directory: config.logging.directory });

const adminUserId = config.telegram.adminUserId;
const bot = new TelegramBot(config.telegram.botToken, { polling: adminUserId !== null });
const sink = new TelegramSink(bot, config.telegram.targetChatId);

const engine = new ForwardingEngine({
    settings: config.queue,
    sink,
    initialMode: config.dispatchMode,
    deleteDeliveredMedia: config.deleteAfterSend,
});

engine.persistence.onFatal((error) => {
    console.error(`[Relay] Persistence halted the queue: ${error.message}`);
});

try {
    const report = await engine.init();
    console.log(
        `[Relay] Restored ${report.restored} queued item(s) from ${engine.persistence.store.description}` +
        (report.corruptEntries > 0 ? ` (${report.corruptEntries} corrupt entr${report.corruptEntries === 1 ? 'y' : 'ies'} skipped)` : '') +
        '.',
    );
} catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Relay] Could not restore the queue: ${message}`);
    await logThought(`[Relay] Startup aborted: ${message}`);
    process.exit(1);
}

engine.start();

let apiServer: Server | null = null;
if (config.api.enabled) {
    try {
        apiServer = await startApiServer({ engine, apiSecret: config.api.secret }, config.api.port);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Relay] Control plane failed to start: ${message}`);
        await engine.shutdown();
        process.exit(1);
    }
}

if (adminUserId !== null) {
    new TelegramControl(bot, { target: engine, adminUserId }).attach();
}

console.log(`[Relay] Running in '${engine.mode}' mode with ${config.queue.delayMode} delays.`);
await logThought(`[Relay] Started (mode ${engine.mode}, delay ${config.queue.delayMode}).`);

// ── Graceful shutdown ────────────────────────────────────────────────────────

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Relay] ${signal} received; finishing the in-flight dispatch and saving the queue.`);

    try {
        if (adminUserId !== null) {
            await bot.stopPolling();
        }
        await new Promise<void>((resolve) => {
            if (!apiServer) {
                resolve();
                return;
            }
            apiServer.close(() => resolve());
        });
        await engine.shutdown();
        await logThought(`[Relay] Stopped on ${signal}.`);
        process.exit(0);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Relay] Shutdown failed: ${message}`);
        process.exit(1);
    }
}

process.on('SIGINT', (signal) => {
    void shutdown(signal);
});
process.on('SIGTERM', (signal) => {
    void shutdown(signal);
});
