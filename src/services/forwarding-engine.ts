import type {
    DispatchMode,
    DispatchSink,
    MediaPayload,
    QueueSettings,
    QueueStatusSnapshot,
} from '../types/queue.js';
import type { JobSnapshot } from '../types/scheduler.js';
import { logThought } from '../utils/logger.js';
import { DelayPolicy } from './delay-policy.js';
import { DelayedQueue } from './delayed-queue.js';
import { DISPATCH_JOB_ID, DispatchScheduler } from './dispatch-scheduler.js';
import { JobScheduler } from './job-scheduler.js';
import { cleanupPayloadFiles } from './media-cleanup.js';
import { ModeController, type SubmitResult } from './mode-controller.js';
import { QueuePersistence, type PersistenceLoadReport } from './queue-persistence.js';
import { JsonFileQueueStore, type QueueStore } from './queue-store.js';
import { RetryManager } from './retry-manager.js';
import { SqliteQueueStore } from './sqlite-queue-store.js';

export interface ForwardingEngineOptions {
    settings: QueueSettings;
    sink: DispatchSink;
    /** Defaults to the store named by `settings.storeKind` at `settings.savePath`. */
    store?: QueueStore;
    scheduler?: JobScheduler;
    initialMode?: DispatchMode;
    /** Delete media files once their item has been delivered. @default true */
    deleteDeliveredMedia?: boolean;
    now?: () => number;
    random?: () => number;
    generateId?: () => string;
    sleep?: (ms: number) => Promise<void>;
}

export interface PersistenceHealth {
    healthy: boolean;
    store: string;
    lastSavedAt: string | null;
    error: string | null;
}

export interface EngineStatus {
    mode: DispatchMode;
    running: boolean;
    halted: string | null;
    queue: QueueStatusSnapshot;
    persistence: PersistenceHealth;
    jobs: JobSnapshot[];
}

export function createQueueStore(settings: Pick<QueueSettings, 'storeKind' | 'savePath'>): QueueStore {
    return settings.storeKind === 'sqlite'
        ? new SqliteQueueStore({ filename: settings.savePath })
        : new JsonFileQueueStore(settings.savePath);
}

/**
 * Wires the queue engine together and owns its lifecycle:
 * `init()` restores persisted state, `start()`/`stop()` toggle dispatching,
 * and `shutdown()` stops everything and writes a final save.
 */
export class ForwardingEngine {
    readonly queue: DelayedQueue;
    readonly policy: DelayPolicy;
    readonly retryManager: RetryManager;
    readonly dispatcher: DispatchScheduler;
    readonly modes: ModeController;
    readonly persistence: QueuePersistence;
    readonly scheduler: JobScheduler;

    readonly #settings: QueueSettings;
    #initialized = false;

    constructor(options: ForwardingEngineOptions) {
        const { settings } = options;
        this.#settings = settings;
        this.scheduler = options.scheduler ?? new JobScheduler();

        this.policy = new DelayPolicy({
            mode: settings.delayMode,
            minDelayMs: settings.minSendDelayMs,
            maxDelayMs: settings.maxSendDelayMs,
            batchSize: settings.batchSize,
            batchIntervalMs: settings.batchIntervalMs,
            hybridJitterMinMs: settings.hybridJitterMinMs,
            hybridJitterMaxMs: settings.hybridJitterMaxMs,
            immediateJitterMinMs: settings.immediateJitterMinMs,
            immediateJitterMaxMs: settings.immediateJitterMaxMs,
            random: options.random,
        });

        this.queue = new DelayedQueue({
            capacity: settings.maxQueueSize,
            maxAttempts: settings.maxAttempts,
            historyLimit: settings.historyLimit,
            policy: this.policy,
            now: options.now,
            generateId: options.generateId,
        });

        this.retryManager = new RetryManager({
            queue: this.queue,
            sink: options.sink,
            backoff: {
                mode: settings.retryBackoffMode,
                baseDelayMs: settings.retryBackoffBaseMs,
                factor: settings.retryBackoffFactor,
                maxDelayMs: settings.retryBackoffMaxMs,
            },
            dispatchTimeoutMs: settings.dispatchTimeoutMs,
            now: options.now,
        });

        this.dispatcher = new DispatchScheduler({
            queue: this.queue,
            retryManager: this.retryManager,
            scheduler: this.scheduler,
            checkIntervalSec: settings.checkIntervalSec,
            now: options.now,
        });

        const deleteDelivered = options.deleteDeliveredMedia ?? true;
        this.modes = new ModeController({
            queue: this.queue,
            retryManager: this.retryManager,
            policy: this.policy,
            initialMode: options.initialMode ?? 'queued',
            sleep: options.sleep,
            onDelivered: deleteDelivered
                ? async (payload) => {
                    await cleanupPayloadFiles(payload);
                }
                : undefined,
        });
        if (deleteDelivered) {
            this.retryManager.on('item:sent', async (event) => {
                await cleanupPayloadFiles(event.item.payload);
            });
        }

        this.persistence = new QueuePersistence({
            store: options.store ?? createQueueStore(settings),
            queue: this.queue,
            scheduler: this.scheduler,
            autoSave: settings.autoSave,
            saveIntervalSec: settings.saveIntervalSec,
            maxAttempts: settings.persistenceMaxAttempts,
            sleep: options.sleep,
        });
        this.persistence.onFatal(() => {
            this.dispatcher.stop().catch((err: unknown) => {
                console.error('[ForwardingEngine] Failed to stop dispatcher after persistence failure:', err);
            });
        });
    }

    get mode(): DispatchMode {
        return this.modes.mode;
    }

    get running(): boolean {
        return this.dispatcher.running;
    }

    /** Restore persisted state and begin persisting changes. */
    async init(): Promise<PersistenceLoadReport> {
        if (this.#initialized) {
            throw new Error('[ForwardingEngine] init() has already been called.');
        }
        const report = await this.persistence.restore(this.#settings.overduePolicy);
        this.persistence.start();
        this.#initialized = true;

        // Restore emits its change before persistence subscribes.
        const repaired =
            report.rearmed + report.rescheduled + report.deadLettered +
            report.skippedDuplicates.length + report.corruptEntries;
        if (repaired > 0) {
            await this.persistence.requestSave();
        }
        return report;
    }

    /** Begin dispatching due items. Returns false when the engine is halted. */
    start(): boolean {
        if (!this.#initialized) {
            throw new Error('[ForwardingEngine] init() must complete before start().');
        }
        const started = this.dispatcher.start();
        if (started) {
            this.scheduler.runNow(DISPATCH_JOB_ID).catch((err: unknown) => {
                console.error('[ForwardingEngine] First dispatch pass failed:', err);
            });
        }
        return started;
    }

    /** Stop dispatching. Queued items stay put and new ones are still accepted. */
    async stop(): Promise<void> {
        await this.dispatcher.stop();
    }

    /** Stop dispatching, write the final state and release the store. */
    async shutdown(): Promise<void> {
        await this.dispatcher.stop();
        this.persistence.stop();
        try {
            if (this.#initialized && this.persistence.healthy) {
                await this.persistence.flush();
            }
        } finally {
            this.scheduler.stopAll();
            this.persistence.store.close?.();
            await logThought('[ForwardingEngine] Shut down.');
        }
    }

    submit(payload: MediaPayload, priority = 0): Promise<SubmitResult> {
        return this.modes.submit(payload, priority);
    }

    setMode(mode: DispatchMode): DispatchMode {
        return this.modes.setMode(mode);
    }

    clear(): number {
        return this.queue.clear();
    }

    clearHistory(): number {
        return this.queue.clearHistory();
    }

    queueStatus(): QueueStatusSnapshot {
        return this.queue.status();
    }

    status(): EngineStatus {
        const failure = this.persistence.failure;
        return {
            mode: this.mode,
            running: this.running,
            halted: this.queue.haltReason,
            queue: this.queue.status(),
            persistence: {
                healthy: this.persistence.healthy,
                store: this.persistence.store.description,
                lastSavedAt: this.persistence.lastSavedAt?.toISOString() ?? null,
                error: failure ? failure.message : null,
            },
            jobs: this.scheduler.listJobs(),
        };
    }
}
