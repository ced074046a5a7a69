import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { CorruptStateEntryError, PersistenceFailureError } from '../types/errors.js';
import type { QueueItem, QueueState } from '../types/queue.js';
import {
    QUEUE_SCHEMA_VERSION,
    decodeEntries,
    emptyQueueState,
    parsePolicyState,
    parseTotals,
    reportCorruptEntries,
    toPersistedRecord,
    type LoadResult,
    type QueueStore,
} from './queue-store.js';

type ItemKind = 'live' | 'history';

interface ItemRow {
    id: string;
    kind: ItemKind;
    position: number;
    record_json: string;
}

interface MetaRow {
    key: string;
    value: string;
}

function isItemRow(row: unknown): row is ItemRow {
    if (typeof row !== 'object' || row === null) return false;
    return (
        'id' in row && typeof row.id === 'string' &&
        'kind' in row && (row.kind === 'live' || row.kind === 'history') &&
        'position' in row && typeof row.position === 'number' &&
        'record_json' in row && typeof row.record_json === 'string'
    );
}

function isMetaRow(row: unknown): row is MetaRow {
    if (typeof row !== 'object' || row === null) return false;
    return 'key' in row && typeof row.key === 'string' && 'value' in row && typeof row.value === 'string';
}

function parseJsonOrNull(value: string | undefined): unknown {
    if (value === undefined) return null;
    try {
        return JSON.parse(value);
    } catch {
        return null;
    }
}

export interface SqliteQueueStoreOptions {
    /** Database file path, or ':memory:'. */
    filename: string;
    now?: () => Date;
}

/**
 * Queue state in an embedded SQLite database. Each save replaces the stored
 * state inside one transaction.
 */
export class SqliteQueueStore implements QueueStore {
    readonly #db: Database.Database;
    readonly #filename: string;
    readonly #now: () => Date;

    constructor(options: SqliteQueueStoreOptions) {
        this.#filename = options.filename;
        this.#now = options.now ?? (() => new Date());

        if (options.filename !== ':memory:') {
            mkdirSync(path.dirname(path.resolve(options.filename)), { recursive: true });
        }
        this.#db = new Database(options.filename);
        this.#db.pragma('journal_mode = WAL');
        this.#db.exec(`
          CREATE TABLE IF NOT EXISTS queue_items (
            id TEXT PRIMARY KEY,
            kind TEXT NOT NULL CHECK (kind IN ('live', 'history')),
            position INTEGER NOT NULL,
            record_json TEXT NOT NULL
          );

          CREATE TABLE IF NOT EXISTS queue_meta (
            key TEXT PRIMARY KEY,
            value TEXT NOT NULL
          );
        `);
    }

    get description(): string {
        return `sqlite:${this.#filename}`;
    }

    async save(state: QueueState): Promise<void> {
        const insertItem = this.#db.prepare(
            'INSERT INTO queue_items (id, kind, position, record_json) VALUES (?, ?, ?, ?)',
        );
        const upsertMeta = this.#db.prepare(
            'INSERT INTO queue_meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value',
        );

        const writeAll = this.#db.transaction((snapshot: QueueState, savedAt: string) => {
            this.#db.prepare('DELETE FROM queue_items').run();
            const writeKind = (items: QueueItem[], kind: ItemKind) => {
                items.forEach((item, position) => {
                    insertItem.run(item.id, kind, position, JSON.stringify(toPersistedRecord(item)));
                });
            };
            writeKind(snapshot.items, 'live');
            writeKind(snapshot.history, 'history');
            upsertMeta.run('schema_version', String(QUEUE_SCHEMA_VERSION));
            upsertMeta.run('saved_at', savedAt);
            upsertMeta.run('stats', JSON.stringify(snapshot.totals));
            upsertMeta.run('policy_state', JSON.stringify(snapshot.policyState));
        });

        try {
            writeAll(state, this.#now().toISOString());
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new PersistenceFailureError(`Failed to save queue state to ${this.description}: ${message}`);
        }
    }

    async load(): Promise<LoadResult> {
        let itemRows: unknown[];
        let metaRows: unknown[];
        try {
            itemRows = this.#db.prepare('SELECT * FROM queue_items ORDER BY kind ASC, position ASC').all();
            metaRows = this.#db.prepare('SELECT key, value FROM queue_meta').all();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new PersistenceFailureError(`Failed to read queue state from ${this.description}: ${message}`);
        }

        const meta = new Map<string, string>();
        for (const row of metaRows) {
            if (isMetaRow(row)) meta.set(row.key, row.value);
        }
        if (meta.size === 0 && itemRows.length === 0) {
            return { state: emptyQueueState(), corrupt: [], savedAt: null };
        }

        const version = meta.get('schema_version');
        if (version !== undefined && Number(version) !== QUEUE_SCHEMA_VERSION) {
            throw new PersistenceFailureError(`Unsupported queue state schema version: ${version}.`);
        }

        const corrupt: CorruptStateEntryError[] = [];
        const live: unknown[] = [];
        const history: unknown[] = [];
        itemRows.forEach((row, index) => {
            if (!isItemRow(row)) {
                corrupt.push(new CorruptStateEntryError(index, null, `Row ${index} has an unexpected shape.`));
                return;
            }
            try {
                const record: unknown = JSON.parse(row.record_json);
                (row.kind === 'live' ? live : history).push(record);
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                corrupt.push(new CorruptStateEntryError(index, row.id, `Row ${index} (${row.id}): ${message}`));
            }
        });

        const result: LoadResult = {
            state: {
                items: decodeEntries(live, corrupt),
                history: decodeEntries(history, corrupt, live.length),
                totals: parseTotals(parseJsonOrNull(meta.get('stats'))),
                policyState: parsePolicyState(parseJsonOrNull(meta.get('policy_state'))),
            },
            corrupt,
            savedAt: meta.get('saved_at') ?? null,
        };

        await reportCorruptEntries(this.description, corrupt);
        return result;
    }

    close(): void {
        this.#db.close();
    }
}
