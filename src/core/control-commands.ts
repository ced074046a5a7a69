import type { DispatchMode, QueueStatusSnapshot } from '../types/queue.js';

export type ControlCommandName = 'status' | 'clear' | 'clear_history' | 'start' | 'stop' | 'mode';

export type ControlCommand =
    | { name: Exclude<ControlCommandName, 'mode'> }
    | { name: 'mode'; mode: DispatchMode };

export interface ControlResponse {
    command: ControlCommandName;
    ok: boolean;
    mode: DispatchMode;
    running: boolean;
    status: QueueStatusSnapshot;
    /** Number of items removed by `clear` / `clear_history`. */
    removed?: number;
    message: string;
}

export type ParsedCommand = { ok: true; command: ControlCommand } | { ok: false; error: string };

/** What the control surface needs from the running engine. */
export interface ControlTarget {
    readonly mode: DispatchMode;
    readonly running: boolean;
    queueStatus(): QueueStatusSnapshot;
    clear(): number;
    clearHistory(): number;
    start(): boolean;
    stop(): Promise<void>;
    setMode(mode: DispatchMode): DispatchMode;
}

const SIMPLE_COMMANDS: ReadonlySet<string> = new Set(['status', 'clear', 'clear_history', 'start', 'stop']);

function isSimpleCommand(name: string): name is Exclude<ControlCommandName, 'mode'> {
    return SIMPLE_COMMANDS.has(name);
}

/** Accepts `queue` as an alias of `queued`. */
export function parseDispatchMode(value: string): DispatchMode | null {
    switch (value.trim().toLowerCase()) {
        case 'immediate':
            return 'immediate';
        case 'queue':
        case 'queued':
            return 'queued';
        default:
            return null;
    }
}

/**
 * Parse a chat command such as `/status` or `/mode queue`. A bot-name suffix
 * (`/status@relay_bot`) is ignored.
 */
export function parseControlCommand(text: string): ParsedCommand {
    const [head = '', ...args] = text.trim().split(/\s+/);
    if (!head.startsWith('/')) {
        return { ok: false, error: 'Commands start with "/".' };
    }

    const name = head.slice(1).split('@')[0].toLowerCase();
    if (isSimpleCommand(name)) {
        return { ok: true, command: { name } };
    }
    if (name === 'mode') {
        const mode = parseDispatchMode(args[0] ?? '');
        if (!mode) {
            return { ok: false, error: 'Usage: /mode immediate|queue' };
        }
        return { ok: true, command: { name: 'mode', mode } };
    }
    return { ok: false, error: `Unknown command: ${head}` };
}

type HandlerResult = Pick<ControlResponse, 'ok' | 'message'> & { removed?: number };
type CommandHandler = (target: ControlTarget, command: ControlCommand) => Promise<HandlerResult>;

const HANDLERS: Record<ControlCommandName, CommandHandler> = {
    status: async () => ({ ok: true, message: 'Queue status.' }),

    clear: async (target) => {
        const removed = target.clear();
        return { ok: true, removed, message: `Removed ${removed} queued item(s).` };
    },

    clear_history: async (target) => {
        const removed = target.clearHistory();
        return { ok: true, removed, message: `Removed ${removed} history entr${removed === 1 ? 'y' : 'ies'}.` };
    },

    start: async (target) => {
        if (target.running) {
            return { ok: true, message: 'Dispatching is already running.' };
        }
        const started = target.start();
        return started
            ? { ok: true, message: 'Dispatching started.' }
            : { ok: false, message: 'Dispatching cannot start while the queue is halted.' };
    },

    stop: async (target) => {
        if (!target.running) {
            return { ok: true, message: 'Dispatching is already stopped.' };
        }
        await target.stop();
        return { ok: true, message: 'Dispatching stopped.' };
    },

    mode: async (target, command) => {
        if (command.name !== 'mode') {
            return { ok: false, message: 'No mode given.' };
        }
        const previous = target.setMode(command.mode);
        return {
            ok: true,
            message: previous === command.mode
                ? `Mode is already '${command.mode}'.`
                : `Mode changed from '${previous}' to '${command.mode}'.`,
        };
    },
};

export async function executeControlCommand(
    target: ControlTarget,
    command: ControlCommand,
): Promise<ControlResponse> {
    const result = await HANDLERS[command.name](target, command);
    const response: ControlResponse = {
        command: command.name,
        ok: result.ok,
        mode: target.mode,
        running: target.running,
        status: target.queueStatus(),
        message: result.message,
    };
    if (result.removed !== undefined) {
        response.removed = result.removed;
    }
    return response;
}

function formatTime(epochMs: number | null): string {
    return epochMs === null ? 'none' : new Date(epochMs).toISOString();
}

/** Plain-text rendering of a response for chat replies. */
export function formatControlResponse(response: ControlResponse): string {
    const { status } = response;
    return [
        response.message,
        `Mode: ${response.mode}`,
        `Dispatcher: ${response.running ? 'running' : 'stopped'}`,
        `Queued: ${status.size}/${status.capacity} (in flight: ${status.inFlight})`,
        `Next due: ${formatTime(status.nextDueAt)}`,
        `Sent: ${status.totals.sent}, failed: ${status.totals.failed}, dead-lettered: ${status.totals.deadLettered}`,
    ].join('\n');
}
