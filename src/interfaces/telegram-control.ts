import type TelegramBot from 'node-telegram-bot-api';
import {
    executeControlCommand,
    formatControlResponse,
    parseControlCommand,
    type ControlTarget,
} from '../core/control-commands.js';
import { logThought } from '../utils/logger.js';

/** Minimum ms between handled commands. */
const RATE_LIMIT_MS = 1500;

export type TelegramControlBot = Pick<TelegramBot, 'on' | 'sendMessage'>;

export interface TelegramControlOptions {
    target: ControlTarget;
    /** Only this Telegram user may issue commands. */
    adminUserId: number;
    rateLimitMs?: number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Admin commands over Telegram: `/status`, `/clear`, `/clear_history`,
 * `/start`, `/stop`, `/mode immediate|queue`.
 */
export class TelegramControl {
    readonly #bot: TelegramControlBot;
    readonly #target: ControlTarget;
    readonly #adminUserId: number;
    readonly #rateLimitMs: number;
    readonly #sleep: (ms: number) => Promise<void>;
    #lastCommandAt = 0;

    constructor(bot: TelegramControlBot, options: TelegramControlOptions) {
        this.#bot = bot;
        this.#target = options.target;
        this.#adminUserId = options.adminUserId;
        this.#rateLimitMs = options.rateLimitMs ?? RATE_LIMIT_MS;
        this.#sleep = options.sleep ?? ((ms) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
    }

    /** Start listening for commands on the bot's polling loop. */
    attach(): void {
        this.#bot.on('message', (msg) => {
            void this.handleMessage(msg);
        });
        this.#bot.on('polling_error', (err) => {
            console.error('[TelegramControl] Polling error:', err.message);
        });
    }

    /** Handle one inbound message. Never rejects. */
    async handleMessage(msg: TelegramBot.Message): Promise<void> {
        const text = msg.text?.trim();
        if (!msg.from || !text || !text.startsWith('/')) return;

        if (msg.from.id !== this.#adminUserId) {
            void logThought(`[TelegramControl] Ignored command from non-admin user ${msg.from.id}.`);
            return;
        }

        try {
            await this.#applyRateLimit();

            const parsed = parseControlCommand(text);
            const reply = parsed.ok
                ? formatControlResponse(await executeControlCommand(this.#target, parsed.command))
                : parsed.error;

            await this.#bot.sendMessage(msg.chat.id, reply);
        } catch (err) {
            console.error('[TelegramControl] Failed to handle command:', err);
            await logThought(
                `[TelegramControl] Failed to handle '${text}': ${err instanceof Error ? err.message : String(err)}`,
            );
        }
    }

    // ── Private Helpers ──────────────────────────────────────────────────────────

    async #applyRateLimit(): Promise<void> {
        const elapsed = Date.now() - this.#lastCommandAt;
        if (elapsed < this.#rateLimitMs) {
            await this.#sleep(this.#rateLimitMs - elapsed);
        }
        this.#lastCommandAt = Date.now();
    }
}
