import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const REDACTED = '[REDACTED]';

/** Environment variables whose raw values must never reach a log line. */
const SENSITIVE_ENV_KEYS = ['RELAY_API_SECRET', 'RELAY_TELEGRAM_BOT_TOKEN', 'TELEGRAM_BOT_TOKEN'];

const BOT_TOKEN_PATTERN = /\b\d{6,12}:[A-Za-z0-9_-]{30,}\b/g;
const SECRET_ASSIGNMENT_PATTERN = /\b([A-Za-z0-9_]*(?:token|secret|password|api[_-]?key)[A-Za-z0-9_]*)\s*[=:]\s*("[^"]*"|'[^']*'|[^\s,;]+)/gi;

let logDirectory = path.resolve('logs');

/** Point the thought log at a different directory (config load, tests). */
export function configureLogger(options: { directory: string }): void {
    logDirectory = path.resolve(options.directory);
}

export function getLogDirectory(): string {
    return logDirectory;
}

/**
 * Redact credentials from free text before it is logged or returned to an
 * operator.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text
        .replace(BOT_TOKEN_PATTERN, REDACTED)
        .replace(SECRET_ASSIGNMENT_PATTERN, (_match, key: string) => `${key}=${REDACTED}`);

    for (const key of SENSITIVE_ENV_KEYS) {
        const value = process.env[key];
        if (value && value.trim().length >= 8) {
            scrubbed = scrubbed.split(value.trim()).join(REDACTED);
        }
    }

    return scrubbed;
}

function dailyLogPath(now: Date): string {
    return path.join(logDirectory, `${now.toISOString().slice(0, 10)}.log`);
}

/**
 * Append a timestamped line to today's operational log.
 * Never rejects; write failures go to stderr.
 */
export async function logThought(message: string): Promise<void> {
    const now = new Date();
    const line = `[${now.toISOString()}] ${scrubSensitiveText(message)}\n`;

    try {
        await mkdir(logDirectory, { recursive: true });
        await appendFile(dailyLogPath(now), line, 'utf8');
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.error(`[Logger] Failed to write log line: ${reason}`);
    }
}
