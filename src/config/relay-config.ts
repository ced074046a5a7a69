import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { ConfigValidationError, type ConfigIssue } from '../types/errors.js';
import type {
    BackoffMode,
    DelayMode,
    DispatchMode,
    OverduePolicy,
    QueueSettings,
    StoreKind,
} from '../types/queue.js';
import { validateDelayOptions } from '../services/delay-policy.js';
import { INTERVAL_RULE, intervalToCron } from '../utils/cron.js';

export const DEFAULT_CONFIG_FILE = 'relay.json';

const DELAY_MODES: readonly DelayMode[] = ['immediate', 'random', 'batch', 'hybrid'];
const DISPATCH_MODES: readonly DispatchMode[] = ['immediate', 'queued'];
const BACKOFF_MODES: readonly BackoffMode[] = ['fixed', 'exponential'];
const OVERDUE_POLICIES: readonly OverduePolicy[] = ['dispatch', 'reschedule'];
const STORE_KINDS: readonly StoreKind[] = ['json', 'sqlite'];

/** Queue options as written in the config file. Durations are seconds. */
export interface QueueFileConfig {
    dispatch_mode: DispatchMode;
    delay_mode: DelayMode;
    min_send_delay: number;
    max_send_delay: number;
    batch_size: number;
    batch_interval: number;
    hybrid_jitter_min: number;
    hybrid_jitter_max: number;
    immediate_jitter_min: number;
    immediate_jitter_max: number;
    check_interval: number;
    max_queue_size: number;
    max_attempts: number;
    retry_backoff_mode: BackoffMode;
    retry_backoff_base: number;
    retry_backoff_factor: number;
    retry_backoff_max: number;
    dispatch_timeout: number;
    auto_save: boolean;
    save_interval: number;
    save_path: string;
    store_kind: StoreKind;
    history_limit: number;
    overdue_policy: OverduePolicy;
    persistence_max_attempts: number;
    delete_after_send: boolean;
}

export interface RelayFileConfig {
    queue: QueueFileConfig;
    telegram: {
        bot_token: string;
        target_chat_id: string;
        admin_user_id: number | null;
    };
    api: {
        enabled: boolean;
        port: number;
        secret: string;
    };
    logging: {
        directory: string;
    };
}

export const DEFAULT_CONFIG: RelayFileConfig = {
    queue: {
        dispatch_mode: 'queued',
        delay_mode: 'random',
        min_send_delay: 300,
        max_send_delay: 3600,
        batch_size: 5,
        batch_interval: 1800,
        hybrid_jitter_min: 0,
        hybrid_jitter_max: 300,
        immediate_jitter_min: 1,
        immediate_jitter_max: 5,
        check_interval: 30,
        max_queue_size: 1000,
        max_attempts: 3,
        retry_backoff_mode: 'exponential',
        retry_backoff_base: 300,
        retry_backoff_factor: 2,
        retry_backoff_max: 900,
        dispatch_timeout: 120,
        auto_save: true,
        save_interval: 60,
        save_path: 'data/queue.json',
        store_kind: 'json',
        history_limit: 200,
        overdue_policy: 'dispatch',
        persistence_max_attempts: 3,
        delete_after_send: true,
    },
    telegram: {
        bot_token: '',
        target_chat_id: '',
        admin_user_id: null,
    },
    api: {
        enabled: true,
        port: 3100,
        secret: '',
    },
    logging: {
        directory: 'logs',
    },
};

/** Fully resolved runtime configuration. Queue durations are milliseconds. */
export interface RelayConfig {
    sourcePath: string;
    dispatchMode: DispatchMode;
    deleteAfterSend: boolean;
    queue: QueueSettings;
    telegram: {
        botToken: string;
        targetChatId: string;
        adminUserId: number | null;
    };
    api: {
        enabled: boolean;
        port: number;
        secret: string;
    };
    logging: {
        directory: string;
    };
}

export interface LoadConfigOptions {
    /** Explicit config path, e.g. from `--config`. */
    path?: string;
    env?: NodeJS.ProcessEnv;
    /** Require Telegram credentials. @default true */
    requireTelegram?: boolean;
}

export interface ConfigInspection {
    config: RelayConfig;
    issues: ConfigIssue[];
}

export function getConfigPath(overridePath?: string, env: NodeJS.ProcessEnv = process.env): string {
    if (overridePath) return path.resolve(overridePath);
    if (env.RELAY_CONFIG_PATH) return path.resolve(env.RELAY_CONFIG_PATH);
    return path.resolve(DEFAULT_CONFIG_FILE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads one config section: an environment override wins over the file
 * value, which wins over the default. Values of the wrong type are reported
 * and replaced by the default.
 */
class SectionReader {
    readonly #source: Record<string, unknown>;
    readonly #env: NodeJS.ProcessEnv;
    readonly #section: string;
    readonly #envPrefix: string;
    readonly #issues: ConfigIssue[];

    constructor(
        source: unknown,
        env: NodeJS.ProcessEnv,
        section: string,
        envPrefix: string,
        issues: ConfigIssue[],
    ) {
        this.#source = isRecord(source) ? source : {};
        this.#env = env;
        this.#section = section;
        this.#envPrefix = envPrefix;
        this.#issues = issues;
    }

    number(key: string, fallback: number): number {
        const raw = this.#raw(key);
        if (raw === undefined) return fallback;
        const value = typeof raw === 'string' ? Number(raw.trim()) : raw;
        if (typeof value === 'number' && Number.isFinite(value)) return value;
        this.#report(key, `must be a number, got ${JSON.stringify(raw)}.`);
        return fallback;
    }

    boolean(key: string, fallback: boolean): boolean {
        const raw = this.#raw(key);
        if (raw === undefined) return fallback;
        if (typeof raw === 'boolean') return raw;
        if (typeof raw === 'string') {
            const normalized = raw.trim().toLowerCase();
            if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
            if (['false', '0', 'no', 'off'].includes(normalized)) return false;
        }
        this.#report(key, `must be a boolean, got ${JSON.stringify(raw)}.`);
        return fallback;
    }

    string(key: string, fallback: string, aliases: readonly string[] = []): string {
        const raw = this.#raw(key, aliases);
        if (raw === undefined) return fallback;
        if (typeof raw === 'string') return raw.trim();
        if (typeof raw === 'number') return String(raw);
        this.#report(key, 'must be a string.');
        return fallback;
    }

    optionalInteger(key: string, fallback: number | null): number | null {
        const raw = this.#raw(key);
        if (raw === undefined || raw === null || raw === '') return fallback;
        const value = typeof raw === 'string' ? Number(raw.trim()) : raw;
        if (typeof value === 'number' && Number.isInteger(value)) return value;
        this.#report(key, `must be an integer, got ${JSON.stringify(raw)}.`);
        return fallback;
    }

    choice<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
        const raw = this.#raw(key);
        if (raw === undefined) return fallback;
        const match = allowed.find((option) => typeof raw === 'string' && option === raw.trim().toLowerCase());
        if (match !== undefined) return match;
        this.#report(key, `must be one of ${allowed.join(', ')}, got ${JSON.stringify(raw)}.`);
        return fallback;
    }

    #raw(key: string, aliases: readonly string[] = []): unknown {
        for (const envName of [`${this.#envPrefix}${key.toUpperCase()}`, ...aliases]) {
            const envValue = this.#env[envName];
            if (envValue !== undefined && envValue.trim() !== '') {
                return envValue;
            }
        }
        return this.#source[key];
    }

    #report(key: string, message: string): void {
        this.#issues.push({ key: this.#section === 'queue' ? key : `${this.#section}.${key}`, message });
    }
}

/** Merge a parsed config document and environment overrides over the defaults. */
export function mergeWithDefaults(
    loaded: unknown,
    env: NodeJS.ProcessEnv = process.env,
    issues: ConfigIssue[] = [],
): RelayFileConfig {
    const root = isRecord(loaded) ? loaded : {};
    const q = new SectionReader(root.queue, env, 'queue', 'RELAY_', issues);
    const t = new SectionReader(root.telegram, env, 'telegram', 'RELAY_TELEGRAM_', issues);
    const a = new SectionReader(root.api, env, 'api', 'RELAY_API_', issues);
    const l = new SectionReader(root.logging, env, 'logging', 'RELAY_LOG_', issues);
    const d = DEFAULT_CONFIG;

    return {
        queue: {
            dispatch_mode: q.choice('dispatch_mode', DISPATCH_MODES, d.queue.dispatch_mode),
            delay_mode: q.choice('delay_mode', DELAY_MODES, d.queue.delay_mode),
            min_send_delay: q.number('min_send_delay', d.queue.min_send_delay),
            max_send_delay: q.number('max_send_delay', d.queue.max_send_delay),
            batch_size: q.number('batch_size', d.queue.batch_size),
            batch_interval: q.number('batch_interval', d.queue.batch_interval),
            hybrid_jitter_min: q.number('hybrid_jitter_min', d.queue.hybrid_jitter_min),
            hybrid_jitter_max: q.number('hybrid_jitter_max', d.queue.hybrid_jitter_max),
            immediate_jitter_min: q.number('immediate_jitter_min', d.queue.immediate_jitter_min),
            immediate_jitter_max: q.number('immediate_jitter_max', d.queue.immediate_jitter_max),
            check_interval: q.number('check_interval', d.queue.check_interval),
            max_queue_size: q.number('max_queue_size', d.queue.max_queue_size),
            max_attempts: q.number('max_attempts', d.queue.max_attempts),
            retry_backoff_mode: q.choice('retry_backoff_mode', BACKOFF_MODES, d.queue.retry_backoff_mode),
            retry_backoff_base: q.number('retry_backoff_base', d.queue.retry_backoff_base),
            retry_backoff_factor: q.number('retry_backoff_factor', d.queue.retry_backoff_factor),
            retry_backoff_max: q.number('retry_backoff_max', d.queue.retry_backoff_max),
            dispatch_timeout: q.number('dispatch_timeout', d.queue.dispatch_timeout),
            auto_save: q.boolean('auto_save', d.queue.auto_save),
            save_interval: q.number('save_interval', d.queue.save_interval),
            save_path: q.string('save_path', d.queue.save_path),
            store_kind: q.choice('store_kind', STORE_KINDS, d.queue.store_kind),
            history_limit: q.number('history_limit', d.queue.history_limit),
            overdue_policy: q.choice('overdue_policy', OVERDUE_POLICIES, d.queue.overdue_policy),
            persistence_max_attempts: q.number('persistence_max_attempts', d.queue.persistence_max_attempts),
            delete_after_send: q.boolean('delete_after_send', d.queue.delete_after_send),
        },
        telegram: {
            bot_token: t.string('bot_token', d.telegram.bot_token, ['TELEGRAM_BOT_TOKEN']),
            target_chat_id: t.string('target_chat_id', d.telegram.target_chat_id),
            admin_user_id: t.optionalInteger('admin_user_id', d.telegram.admin_user_id),
        },
        api: {
            enabled: a.boolean('enabled', d.api.enabled),
            port: a.number('port', d.api.port),
            secret: a.string('secret', d.api.secret),
        },
        logging: {
            directory: l.string('directory', d.logging.directory),
        },
    };
}

const seconds = (value: number): number => Math.round(value * 1000);

export function toRelayConfig(file: RelayFileConfig, sourcePath: string): RelayConfig {
    const q = file.queue;
    return {
        sourcePath,
        // An immediate delay mode would otherwise still wait for the next check_interval tick.
        dispatchMode: q.delay_mode === 'immediate' ? 'immediate' : q.dispatch_mode,
        deleteAfterSend: q.delete_after_send,
        queue: {
            delayMode: q.delay_mode,
            minSendDelayMs: seconds(q.min_send_delay),
            maxSendDelayMs: seconds(q.max_send_delay),
            batchSize: q.batch_size,
            batchIntervalMs: seconds(q.batch_interval),
            hybridJitterMinMs: seconds(q.hybrid_jitter_min),
            hybridJitterMaxMs: seconds(q.hybrid_jitter_max),
            immediateJitterMinMs: seconds(q.immediate_jitter_min),
            immediateJitterMaxMs: seconds(q.immediate_jitter_max),
            checkIntervalSec: q.check_interval,
            maxQueueSize: q.max_queue_size,
            maxAttempts: q.max_attempts,
            retryBackoffMode: q.retry_backoff_mode,
            retryBackoffBaseMs: seconds(q.retry_backoff_base),
            retryBackoffFactor: q.retry_backoff_factor,
            retryBackoffMaxMs: seconds(q.retry_backoff_max),
            dispatchTimeoutMs: seconds(q.dispatch_timeout),
            autoSave: q.auto_save,
            saveIntervalSec: q.save_interval,
            savePath: path.resolve(path.dirname(sourcePath), q.save_path),
            storeKind: q.store_kind,
            historyLimit: q.history_limit,
            overduePolicy: q.overdue_policy,
            persistenceMaxAttempts: q.persistence_max_attempts,
        },
        telegram: {
            botToken: file.telegram.bot_token,
            targetChatId: file.telegram.target_chat_id,
            adminUserId: file.telegram.admin_user_id,
        },
        api: { ...file.api },
        logging: {
            directory: path.resolve(path.dirname(sourcePath), file.logging.directory),
        },
    };
}

function requirePositiveInteger(issues: ConfigIssue[], key: string, value: number): void {
    if (!Number.isInteger(value) || value <= 0) {
        issues.push({ key, message: `must be a positive integer, got ${value}.` });
    }
}

/** Every semantic problem with a resolved configuration. */
export function validateRelayConfig(config: RelayConfig, options: { requireTelegram?: boolean } = {}): ConfigIssue[] {
    const q = config.queue;
    const issues = validateDelayOptions({
        mode: q.delayMode,
        minDelayMs: q.minSendDelayMs,
        maxDelayMs: q.maxSendDelayMs,
        batchSize: q.batchSize,
        batchIntervalMs: q.batchIntervalMs,
        hybridJitterMinMs: q.hybridJitterMinMs,
        hybridJitterMaxMs: q.hybridJitterMaxMs,
        immediateJitterMinMs: q.immediateJitterMinMs,
        immediateJitterMaxMs: q.immediateJitterMaxMs,
    });

    requirePositiveInteger(issues, 'max_queue_size', q.maxQueueSize);
    requirePositiveInteger(issues, 'max_attempts', q.maxAttempts);
    requirePositiveInteger(issues, 'persistence_max_attempts', q.persistenceMaxAttempts);

    if (intervalToCron(q.checkIntervalSec) === null) {
        issues.push({
            key: 'check_interval',
            message: `${INTERVAL_RULE}; got ${q.checkIntervalSec}.`,
        });
    }
    if (!q.autoSave && intervalToCron(q.saveIntervalSec) === null) {
        issues.push({
            key: 'save_interval',
            message: `${INTERVAL_RULE}; got ${q.saveIntervalSec}.`,
        });
    }
    if (!(q.retryBackoffBaseMs > 0)) {
        issues.push({ key: 'retry_backoff_base', message: 'must be positive.' });
    }
    if (!(q.retryBackoffFactor >= 1)) {
        issues.push({ key: 'retry_backoff_factor', message: 'must be at least 1.' });
    }
    if (q.retryBackoffMaxMs < q.retryBackoffBaseMs) {
        issues.push({ key: 'retry_backoff_max', message: 'must not be smaller than retry_backoff_base.' });
    }
    if (!(q.dispatchTimeoutMs > 0)) {
        issues.push({ key: 'dispatch_timeout', message: 'must be positive.' });
    }
    if (!Number.isInteger(q.historyLimit) || q.historyLimit < 0) {
        issues.push({ key: 'history_limit', message: `must be a non-negative integer, got ${q.historyLimit}.` });
    }
    if (q.savePath.trim().length === 0) {
        issues.push({ key: 'save_path', message: 'must not be empty.' });
    }

    if (config.api.enabled && (!Number.isInteger(config.api.port) || config.api.port < 1 || config.api.port > 65_535)) {
        issues.push({ key: 'api.port', message: `must be an integer between 1 and 65535, got ${config.api.port}.` });
    }

    if (options.requireTelegram ?? true) {
        if (!config.telegram.botToken) {
            issues.push({ key: 'telegram.bot_token', message: 'is required (or set RELAY_TELEGRAM_BOT_TOKEN).' });
        }
        if (!config.telegram.targetChatId) {
            issues.push({ key: 'telegram.target_chat_id', message: 'is required.' });
        }
    }
    return issues;
}

async function readConfigDocument(configPath: string): Promise<unknown> {
    let raw: string;
    try {
        raw = await readFile(configPath, 'utf8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return {};
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigValidationError([{ key: 'file', message: `could not read ${configPath}: ${message}` }]);
    }

    try {
        return JSON.parse(raw);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigValidationError([{ key: 'file', message: `${configPath} is not valid JSON: ${message}` }]);
    }
}

/** Load and validate without throwing on semantic issues. */
export async function inspectRelayConfig(options: LoadConfigOptions = {}): Promise<ConfigInspection> {
    const env = options.env ?? process.env;
    const sourcePath = getConfigPath(options.path, env);
    const issues: ConfigIssue[] = [];

    const document = await readConfigDocument(sourcePath);
    const config = toRelayConfig(mergeWithDefaults(document, env, issues), sourcePath);
    issues.push(...validateRelayConfig(config, { requireTelegram: options.requireTelegram }));
    return { config, issues };
}

/** Load the configuration, throwing {@link ConfigValidationError} on any issue. */
export async function loadRelayConfig(options: LoadConfigOptions = {}): Promise<RelayConfig> {
    const { config, issues } = await inspectRelayConfig(options);
    if (issues.length > 0) {
        throw new ConfigValidationError(issues);
    }
    return config;
}
