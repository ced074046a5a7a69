/** Lifecycle states of a queued forwarding item. */
export type QueueItemStatus =
    | 'pending'
    | 'scheduled'
    | 'due'
    | 'dispatching'
    | 'sent'
    | 'retrying'
    | 'dead_letter';

export const TERMINAL_STATUSES: ReadonlySet<QueueItemStatus> = new Set(['sent', 'dead_letter']);

export const QUEUE_ITEM_STATUSES: readonly QueueItemStatus[] = [
    'pending',
    'scheduled',
    'due',
    'dispatching',
    'sent',
    'retrying',
    'dead_letter',
];

/** Kind of media file attached to a payload; drives the Telegram send method. */
export type MediaFileType = 'photo' | 'video' | 'audio' | 'document';

export interface MediaFile {
    path: string;
    type: MediaFileType;
}

/**
 * Opaque forwarding payload. The queue carries it untouched; only the
 * dispatch sink and media cleanup look inside.
 */
export interface MediaPayload {
    files: MediaFile[];
    text: string;
    sourceMessageId?: number;
    channelTitle?: string;
    /** Grouping key of a multi-part media message, assigned upstream. */
    groupId?: string;
}

export interface QueueItem {
    readonly id: string;
    readonly payload: MediaPayload;
    /** Epoch ms when the item was accepted. */
    readonly arrivalTime: number;
    /** Epoch ms at which the item becomes due. Never earlier than `arrivalTime`. */
    scheduledTime: number;
    /** Higher values dispatch first among items due at the same instant. */
    readonly priority: number;
    attempts: number;
    batchId?: string;
    status: QueueItemStatus;
    lastError?: string;
    /** Epoch ms when the item reached a terminal status. */
    completedAt?: number;
}

export type DelayMode = 'immediate' | 'random' | 'batch' | 'hybrid';
export type DispatchMode = 'immediate' | 'queued';
export type BackoffMode = 'fixed' | 'exponential';
export type OverduePolicy = 'dispatch' | 'reschedule';
export type StoreKind = 'json' | 'sqlite';

/** Queue-engine settings. Durations are milliseconds once loaded. */
export interface QueueSettings {
    delayMode: DelayMode;
    minSendDelayMs: number;
    maxSendDelayMs: number;
    batchSize: number;
    batchIntervalMs: number;
    hybridJitterMinMs: number;
    hybridJitterMaxMs: number;
    immediateJitterMinMs: number;
    immediateJitterMaxMs: number;
    checkIntervalSec: number;
    maxQueueSize: number;
    maxAttempts: number;
    retryBackoffMode: BackoffMode;
    retryBackoffBaseMs: number;
    retryBackoffFactor: number;
    retryBackoffMaxMs: number;
    dispatchTimeoutMs: number;
    autoSave: boolean;
    saveIntervalSec: number;
    savePath: string;
    storeKind: StoreKind;
    historyLimit: number;
    overduePolicy: OverduePolicy;
    persistenceMaxAttempts: number;
}

/** Batch sequence bookkeeping carried across restarts. */
export interface BatchPolicyState {
    /** Release time (epoch ms) of batch 0 of the current sequence, or null before the first item. */
    origin: number | null;
    index: number;
    count: number;
    sequence: number;
}

export interface QueueTotals {
    queued: number;
    sent: number;
    failed: number;
    deadLettered: number;
}

/** Full durable state of the queue. */
export interface QueueState {
    items: QueueItem[];
    history: QueueItem[];
    totals: QueueTotals;
    policyState: BatchPolicyState | null;
}

export interface QueueStatusSnapshot {
    size: number;
    capacity: number;
    byStatus: Record<QueueItemStatus, number>;
    /** Epoch ms of the earliest scheduled item that is not in flight. */
    nextDueAt: number | null;
    oldestItemAgeMs: number | null;
    inFlight: number;
    historySize: number;
    totals: QueueTotals;
}

export type EnqueueRejectReason = 'capacity_exceeded' | 'persistence_halted';

export type EnqueueResult =
    | { ok: true; item: QueueItem }
    | { ok: false; reason: EnqueueRejectReason; message: string };

/** Outcome reported by a dispatch sink for a single send attempt. */
export type DispatchOutcome =
    | { kind: 'success' }
    | { kind: 'transient'; reason: string }
    | { kind: 'permanent'; reason: string };

/** Performs the actual send to the destination platform. */
export interface DispatchSink {
    dispatch(payload: MediaPayload): Promise<DispatchOutcome>;
}
