import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { CorruptStateEntryError, PersistenceFailureError } from '../types/errors.js';
import {
    QUEUE_ITEM_STATUSES,
    type BatchPolicyState,
    type MediaFile,
    type MediaFileType,
    type MediaPayload,
    type QueueItem,
    type QueueItemStatus,
    type QueueState,
    type QueueTotals,
} from '../types/queue.js';
import { logThought } from '../utils/logger.js';

export const QUEUE_SCHEMA_VERSION = 1;

/** Pluggable persistence boundary for queue state. */
export interface QueueStore {
    readonly description: string;
    save(state: QueueState): Promise<void>;
    load(): Promise<LoadResult>;
    /** Release any handle the store holds open. */
    close?(): void;
}

export interface LoadResult {
    state: QueueState;
    /** Entries skipped because they could not be decoded. */
    corrupt: CorruptStateEntryError[];
    savedAt: string | null;
}

/** On-disk shape of one queue item. Times are ISO-8601 strings. */
export interface PersistedItemRecord {
    id: string;
    payload: MediaPayload;
    arrival_time: string;
    scheduled_time: string;
    priority: number;
    attempts: number;
    batch_id: string | null;
    status: QueueItemStatus;
    last_error: string | null;
    completed_at: string | null;
}

export interface PersistedQueueDocument {
    schemaVersion: number;
    savedAt: string;
    items: PersistedItemRecord[];
    history: PersistedItemRecord[];
    stats: QueueTotals;
    policyState: BatchPolicyState | null;
}

const MEDIA_FILE_TYPES: ReadonlySet<string> = new Set<MediaFileType>(['photo', 'video', 'audio', 'document']);
const STATUSES: ReadonlySet<string> = new Set<string>(QUEUE_ITEM_STATUSES);

export function emptyQueueState(): QueueState {
    return {
        items: [],
        history: [],
        totals: { queued: 0, sent: 0, failed: 0, deadLettered: 0 },
        policyState: null,
    };
}

export function toPersistedRecord(item: QueueItem): PersistedItemRecord {
    return {
        id: item.id,
        payload: item.payload,
        arrival_time: new Date(item.arrivalTime).toISOString(),
        scheduled_time: new Date(item.scheduledTime).toISOString(),
        priority: item.priority,
        attempts: item.attempts,
        batch_id: item.batchId ?? null,
        status: item.status,
        last_error: item.lastError ?? null,
        completed_at: item.completedAt === undefined ? null : new Date(item.completedAt).toISOString(),
    };
}

export function encodeQueueDocument(state: QueueState, savedAt: Date = new Date()): PersistedQueueDocument {
    return {
        schemaVersion: QUEUE_SCHEMA_VERSION,
        savedAt: savedAt.toISOString(),
        items: state.items.map(toPersistedRecord),
        history: state.history.map(toPersistedRecord),
        stats: { ...state.totals },
        policyState: state.policyState,
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStatus(value: unknown): value is QueueItemStatus {
    return typeof value === 'string' && STATUSES.has(value);
}

function isMediaFileType(value: unknown): value is MediaFileType {
    return typeof value === 'string' && MEDIA_FILE_TYPES.has(value);
}

function parseTime(value: unknown, field: string): number {
    if (typeof value !== 'string') {
        throw new Error(`'${field}' must be an ISO timestamp.`);
    }
    const parsed = Date.parse(value);
    if (Number.isNaN(parsed)) {
        throw new Error(`'${field}' is not a valid timestamp: ${value}`);
    }
    return parsed;
}

/** Validate an untrusted payload object, throwing with the first problem found. */
export function parsePayload(value: unknown): MediaPayload {
    if (!isRecord(value)) {
        throw new Error("'payload' must be an object.");
    }
    if (!Array.isArray(value.files)) {
        throw new Error("'payload.files' must be an array.");
    }
    const files: MediaFile[] = value.files.map((file: unknown, index: number) => {
        if (!isRecord(file) || typeof file.path !== 'string' || !isMediaFileType(file.type)) {
            throw new Error(`'payload.files[${index}]' must have a string path and a known type.`);
        }
        return { path: file.path, type: file.type };
    });
    if (typeof value.text !== 'string') {
        throw new Error("'payload.text' must be a string.");
    }

    const payload: MediaPayload = { files, text: value.text };
    if (typeof value.sourceMessageId === 'number') payload.sourceMessageId = value.sourceMessageId;
    if (typeof value.channelTitle === 'string') payload.channelTitle = value.channelTitle;
    if (typeof value.groupId === 'string') payload.groupId = value.groupId;
    return payload;
}

/** Decode one persisted item, throwing {@link CorruptStateEntryError} when it is malformed. */
export function parsePersistedRecord(raw: unknown, index: number): QueueItem {
    const entryId = isRecord(raw) && typeof raw.id === 'string' ? raw.id : null;

    try {
        if (!isRecord(raw)) {
            throw new Error('entry is not an object.');
        }
        if (typeof raw.id !== 'string' || raw.id.trim().length === 0) {
            throw new Error("'id' must be a non-empty string.");
        }
        if (typeof raw.priority !== 'number' || !Number.isInteger(raw.priority)) {
            throw new Error("'priority' must be an integer.");
        }
        if (typeof raw.attempts !== 'number' || !Number.isInteger(raw.attempts) || raw.attempts < 0) {
            throw new Error("'attempts' must be a non-negative integer.");
        }
        if (!isStatus(raw.status)) {
            throw new Error(`'status' is not a known status: ${String(raw.status)}`);
        }

        const arrivalTime = parseTime(raw.arrival_time, 'arrival_time');
        const scheduledTime = parseTime(raw.scheduled_time, 'scheduled_time');
        if (scheduledTime < arrivalTime) {
            throw new Error("'scheduled_time' precedes 'arrival_time'.");
        }

        const item: QueueItem = {
            id: raw.id,
            payload: parsePayload(raw.payload),
            arrivalTime,
            scheduledTime,
            priority: raw.priority,
            attempts: raw.attempts,
            status: raw.status,
        };
        if (typeof raw.batch_id === 'string') item.batchId = raw.batch_id;
        if (typeof raw.last_error === 'string') item.lastError = raw.last_error;
        if (raw.completed_at !== null && raw.completed_at !== undefined) {
            item.completedAt = parseTime(raw.completed_at, 'completed_at');
        }
        return item;
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new CorruptStateEntryError(index, entryId, `Entry ${index}${entryId ? ` (${entryId})` : ''}: ${message}`);
    }
}

export function parseTotals(value: unknown): QueueTotals {
    const totals = emptyQueueState().totals;
    if (!isRecord(value)) return totals;
    for (const key of ['queued', 'sent', 'failed', 'deadLettered'] as const) {
        const count = value[key];
        if (typeof count === 'number' && Number.isFinite(count) && count >= 0) {
            totals[key] = Math.floor(count);
        }
    }
    return totals;
}

export function parsePolicyState(value: unknown): BatchPolicyState | null {
    if (!isRecord(value)) return null;
    const { origin, index, count, sequence } = value;
    if (
        (origin !== null && typeof origin !== 'number') ||
        typeof index !== 'number' ||
        typeof count !== 'number' ||
        typeof sequence !== 'number'
    ) {
        return null;
    }
    return { origin, index, count, sequence };
}

/**
 * Decode a list of persisted entries, skipping and collecting the ones that
 * cannot be restored.
 */
export function decodeEntries(
    entries: readonly unknown[],
    corrupt: CorruptStateEntryError[],
    offset = 0,
): QueueItem[] {
    const items: QueueItem[] = [];
    entries.forEach((entry, position) => {
        try {
            items.push(parsePersistedRecord(entry, offset + position));
        } catch (err) {
            if (err instanceof CorruptStateEntryError) {
                corrupt.push(err);
                return;
            }
            throw err;
        }
    });
    return items;
}

/** Decode a whole persisted document. Only the envelope itself is fatal. */
export function decodeQueueDocument(raw: unknown): LoadResult {
    if (!isRecord(raw)) {
        throw new PersistenceFailureError('Queue state document is not an object.');
    }
    if (raw.schemaVersion !== QUEUE_SCHEMA_VERSION) {
        throw new PersistenceFailureError(
            `Unsupported queue state schema version: ${String(raw.schemaVersion)} (expected ${QUEUE_SCHEMA_VERSION}).`,
        );
    }

    const corrupt: CorruptStateEntryError[] = [];
    const rawItems = Array.isArray(raw.items) ? raw.items : [];
    const rawHistory = Array.isArray(raw.history) ? raw.history : [];
    const items = decodeEntries(rawItems, corrupt);
    const history = decodeEntries(rawHistory, corrupt, rawItems.length);

    return {
        state: {
            items,
            history,
            totals: parseTotals(raw.stats),
            policyState: parsePolicyState(raw.policyState),
        },
        corrupt,
        savedAt: typeof raw.savedAt === 'string' ? raw.savedAt : null,
    };
}

export async function reportCorruptEntries(store: string, corrupt: readonly CorruptStateEntryError[]): Promise<void> {
    for (const entry of corrupt) {
        console.warn(`[QueueStore] Skipped corrupt entry from ${store}: ${entry.message}`);
        await logThought(`[QueueStore] Skipped corrupt entry from ${store}: ${entry.message}`);
    }
}

/**
 * Queue state in a single JSON file. Writes go to a temporary sibling first
 * and are renamed over the previous file, so an interrupted write leaves the
 * prior copy intact.
 */
export class JsonFileQueueStore implements QueueStore {
    readonly #filePath: string;
    readonly #now: () => Date;

    constructor(filePath: string, options: { now?: () => Date } = {}) {
        this.#filePath = path.resolve(filePath);
        this.#now = options.now ?? (() => new Date());
    }

    get description(): string {
        return `json:${this.#filePath}`;
    }

    get filePath(): string {
        return this.#filePath;
    }

    async save(state: QueueState): Promise<void> {
        const document = encodeQueueDocument(state, this.#now());
        const tempPath = `${this.#filePath}.${process.pid}.${Date.now()}.tmp`;

        try {
            await mkdir(path.dirname(this.#filePath), { recursive: true });
            await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, { encoding: 'utf8', mode: 0o600 });
            await rename(tempPath, this.#filePath);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            if (existsSync(tempPath)) {
                await unlink(tempPath).catch((cleanupErr: unknown) => {
                    console.warn(`[QueueStore] Could not remove temp file ${tempPath}:`, cleanupErr);
                });
            }
            throw new PersistenceFailureError(`Failed to save queue state to ${this.#filePath}: ${message}`);
        }
    }

    async load(): Promise<LoadResult> {
        let raw: string;
        try {
            raw = await readFile(this.#filePath, 'utf8');
        } catch (error) {
            const fsError = error instanceof Error ? error : new Error(String(error));
            if ('code' in fsError && fsError.code === 'ENOENT') {
                return { state: emptyQueueState(), corrupt: [], savedAt: null };
            }
            throw new PersistenceFailureError(`Failed to read queue state at ${this.#filePath}: ${fsError.message}`);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new PersistenceFailureError(`Queue state at ${this.#filePath} is not valid JSON: ${message}`);
        }

        const result = decodeQueueDocument(parsed);
        await reportCorruptEntries(this.description, result.corrupt);
        return result;
    }
}
