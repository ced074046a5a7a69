import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import type { JobConfig, JobSnapshot, JobStatus } from '../types/scheduler.js';

interface RegisteredJob {
    config: JobConfig;
    task: ScheduledTask | null;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
    runCount: number;
}

/**
 * Named repeating background jobs on top of `node-cron`. A failing handler is
 * logged and recorded on its job without affecting the others. The relay
 * registers its dispatch tick and periodic queue save here, and reports
 * {@link listJobs} through the health endpoint.
 *
 * ```ts
 * const scheduler = new JobScheduler();
 * scheduler.register({
 *   id: 'queue-dispatch',
 *   cronExpression: '*\/30 * * * * *',
 *   description: 'Dispatch due queue items',
 *   handler: async () => { … },
 * });
 * ```
 */
export class JobScheduler {
    readonly #jobs: Map<string, RegisteredJob> = new Map();

    /** Register a new repeating job. Throws if a job with the same ID already exists. */
    register(config: JobConfig): void {
        if (this.#jobs.has(config.id)) {
            throw new Error(`[JobScheduler] Job '${config.id}' is already registered.`);
        }

        if (!cron.validate(config.cronExpression)) {
            throw new Error(
                `[JobScheduler] Invalid cron expression for job '${config.id}': ${config.cronExpression}`,
            );
        }

        const entry: RegisteredJob = {
            config,
            task: null,
            status: 'idle',
            lastRunAt: null,
            lastError: null,
            runCount: 0,
        };

        this.#jobs.set(config.id, entry);

        if (config.autoStart ?? true) {
            this.#startJob(entry);
        }
    }

    /** Unregister and stop a job by ID. */
    unregister(jobId: string): boolean {
        const entry = this.#jobs.get(jobId);
        if (!entry) return false;

        entry.task?.stop();
        this.#jobs.delete(jobId);
        return true;
    }

    has(jobId: string): boolean {
        return this.#jobs.has(jobId);
    }

    /** Stop every running job. */
    stopAll(): void {
        for (const entry of this.#jobs.values()) {
            if (entry.task) {
                entry.task.stop();
                entry.task = null;
                entry.status = 'stopped';
            }
        }
    }

    /** Run a registered job's handler right away, outside its schedule. Handler errors are recorded, not thrown. */
    async runNow(jobId: string): Promise<void> {
        const entry = this.#jobs.get(jobId);
        if (!entry) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }
        await this.#executeJob(entry);
    }

    listJobs(): JobSnapshot[] {
        return [...this.#jobs.values()].map((entry) => this.#snapshot(entry));
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #snapshot(entry: RegisteredJob): JobSnapshot {
        return {
            id: entry.config.id,
            cronExpression: entry.config.cronExpression,
            description: entry.config.description,
            status: entry.status,
            lastRunAt: entry.lastRunAt,
            lastError: entry.lastError,
            runCount: entry.runCount,
        };
    }

    #startJob(entry: RegisteredJob): void {
        if (entry.task) return;

        entry.task = cron.schedule(entry.config.cronExpression, async () => {
            await this.#executeJob(entry);
        });

        entry.status = 'idle';
    }

    async #executeJob(entry: RegisteredJob): Promise<void> {
        const { config } = entry;
        entry.status = 'running';
        entry.lastRunAt = new Date();
        entry.runCount += 1;

        try {
            if (!config.quiet) {
                await logThought(`[JobScheduler] Executing job '${config.id}' (${config.cronExpression}).`);
            }
            await config.handler();
            entry.status = entry.task ? 'idle' : 'stopped';
            entry.lastError = null;
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            entry.status = 'error';
            entry.lastError = message;

            console.error(`[JobScheduler] Job '${config.id}' failed:`, message);
            await logThought(`[JobScheduler] Job '${config.id}' failed: ${message}`);
        }
    }
}
