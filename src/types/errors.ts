import type { QueueItemStatus } from './queue.js';

export class EnqueueRejectedError extends Error {
    readonly reason: 'capacity_exceeded' | 'persistence_halted';

    constructor(reason: 'capacity_exceeded' | 'persistence_halted', message: string) {
        super(message);
        this.name = 'EnqueueRejectedError';
        this.reason = reason;
    }
}

export class DispatchTransientError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DispatchTransientError';
    }
}

export class DispatchPermanentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DispatchPermanentError';
    }
}

export class PersistenceFailureError extends Error {
    readonly attempts: number;

    constructor(message: string, attempts = 1) {
        super(message);
        this.name = 'PersistenceFailureError';
        this.attempts = attempts;
    }
}

/** A single persisted entry that could not be restored. */
export class CorruptStateEntryError extends Error {
    readonly index: number;
    readonly entryId: string | null;

    constructor(index: number, entryId: string | null, message: string) {
        super(message);
        this.name = 'CorruptStateEntryError';
        this.index = index;
        this.entryId = entryId;
    }
}

export interface ConfigIssue {
    key: string;
    message: string;
}

export class ConfigValidationError extends Error {
    readonly issues: ConfigIssue[];

    constructor(issues: ConfigIssue[]) {
        super(`Invalid relay configuration: ${issues.map((issue) => `${issue.key}: ${issue.message}`).join('; ')}`);
        this.name = 'ConfigValidationError';
        this.issues = issues;
    }
}

export class InvalidTransitionError extends Error {
    readonly itemId: string;
    readonly from: QueueItemStatus;
    readonly to: QueueItemStatus;

    constructor(itemId: string, from: QueueItemStatus, to: QueueItemStatus) {
        super(`Item ${itemId} cannot move from '${from}' to '${to}'.`);
        this.name = 'InvalidTransitionError';
        this.itemId = itemId;
        this.from = from;
        this.to = to;
    }
}
