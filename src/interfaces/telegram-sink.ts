import { access } from 'node:fs/promises';
import type TelegramBot from 'node-telegram-bot-api';
import { DispatchPermanentError, DispatchTransientError } from '../types/errors.js';
import type { DispatchOutcome, DispatchSink, MediaFile, MediaPayload } from '../types/queue.js';

/** Telegram caps captions at 1024 characters; longer text goes out as its own message. */
export const CAPTION_LIMIT = 1024;
/** Telegram accepts at most 10 entries per media group. */
export const MEDIA_GROUP_LIMIT = 10;

export type TelegramSendApi = Pick<
    TelegramBot,
    'sendMessage' | 'sendPhoto' | 'sendVideo' | 'sendAudio' | 'sendDocument' | 'sendMediaGroup'
>;

function readProperty(source: unknown, key: string): unknown {
    if (typeof source !== 'object' || source === null) return undefined;
    const value: unknown = Reflect.get(source, key);
    return value;
}

/**
 * Map a send failure onto a dispatch outcome. node-telegram-bot-api reports
 * API refusals as `ETELEGRAM` with the HTTP response attached and transport
 * problems as `EFATAL`.
 */
export function classifyTelegramError(err: unknown): DispatchOutcome {
    const reason = err instanceof Error ? err.message : String(err);

    if (err instanceof DispatchPermanentError) return { kind: 'permanent', reason };
    if (err instanceof DispatchTransientError) return { kind: 'transient', reason };

    const code = readProperty(err, 'code');
    if (code === 'ENOENT') return { kind: 'permanent', reason };
    if (code === 'ETELEGRAM') {
        const statusCode = readProperty(readProperty(err, 'response'), 'statusCode');
        if (typeof statusCode === 'number' && statusCode !== 429 && statusCode < 500) {
            return { kind: 'permanent', reason };
        }
    }
    return { kind: 'transient', reason };
}

/**
 * Delivers payloads to one Telegram chat.
 *
 * Text too long for a caption and each album chunk go out as separate
 * requests. A failure part way through reports the whole payload as failed,
 * so a retry sends the parts that already arrived again: delivery is at
 * least once.
 */
export class TelegramSink implements DispatchSink {
    readonly #bot: TelegramSendApi;
    readonly #chatId: string;

    constructor(bot: TelegramSendApi, chatId: string) {
        this.#bot = bot;
        this.#chatId = chatId;
    }

    async dispatch(payload: MediaPayload): Promise<DispatchOutcome> {
        try {
            await this.#send(payload);
            return { kind: 'success' };
        } catch (err) {
            const outcome = classifyTelegramError(err);
            console.warn(`[TelegramSink] Send to ${this.#chatId} failed: ${err instanceof Error ? err.message : String(err)}`);
            return outcome;
        }
    }

    // ── Private Helpers ──────────────────────────────────────────────────────────

    async #send(payload: MediaPayload): Promise<void> {
        const { files } = payload;
        const text = payload.text.trim();

        if (files.length === 0) {
            if (!text) {
                throw new DispatchPermanentError('Payload has neither files nor text.');
            }
            await this.#bot.sendMessage(this.#chatId, text);
            return;
        }

        await Promise.all(files.map((file) => this.#assertReadable(file)));

        let caption: string | undefined = text || undefined;
        if (text.length > CAPTION_LIMIT) {
            await this.#bot.sendMessage(this.#chatId, text);
            caption = undefined;
        }

        if (files.length > 1 && files.every((file) => file.type === 'photo' || file.type === 'video')) {
            await this.#sendAlbum(files, caption);
            return;
        }

        for (const [index, file] of files.entries()) {
            await this.#sendSingle(file, index === 0 ? caption : undefined);
        }
    }

    async #sendAlbum(files: MediaFile[], caption: string | undefined): Promise<void> {
        for (let start = 0; start < files.length; start += MEDIA_GROUP_LIMIT) {
            const chunk = files.slice(start, start + MEDIA_GROUP_LIMIT);
            const media = chunk.map((file, index) => {
                const entryCaption = start === 0 && index === 0 ? caption : undefined;
                return file.type === 'photo'
                    ? { type: 'photo' as const, media: file.path, caption: entryCaption }
                    : { type: 'video' as const, media: file.path, caption: entryCaption };
            });
            await this.#bot.sendMediaGroup(this.#chatId, media);
        }
    }

    async #sendSingle(file: MediaFile, caption: string | undefined): Promise<void> {
        const options: { caption?: string } = caption ? { caption } : {};
        switch (file.type) {
            case 'photo':
                await this.#bot.sendPhoto(this.#chatId, file.path, options);
                return;
            case 'video':
                await this.#bot.sendVideo(this.#chatId, file.path, options);
                return;
            case 'audio':
                await this.#bot.sendAudio(this.#chatId, file.path, options);
                return;
            case 'document':
                await this.#bot.sendDocument(this.#chatId, file.path, options);
                return;
        }
    }

    async #assertReadable(file: MediaFile): Promise<void> {
        try {
            await access(file.path);
        } catch {
            throw new DispatchPermanentError(`Media file not found: ${file.path}`);
        }
    }
}
