import { FailureKind, TaskFailure } from '../types/domain';

export class WorkflowError extends Error {
    public readonly kind: FailureKind;

    constructor(kind: FailureKind, message: string) {
        super(message);
        this.name = kind;
        this.kind = kind;
    }

    toFailure(): TaskFailure {
        return { kind: this.kind, reason: this.message };
    }
}

export class ValidationError extends WorkflowError {
    public readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super('ValidationError', message);
        this.issues = issues;
    }
}

export class NotFoundError extends WorkflowError {
    constructor(entity: string, id: string) {
        super('NotFound', `${entity} ${id} not found`);
    }
}

export class ExpiredError extends WorkflowError {
    public readonly expiredAt: number;

    constructor(entity: string, id: string, expiredAt: number) {
        super('Expired', `${entity} ${id} expired at ${new Date(expiredAt).toISOString()}`);
        this.expiredAt = expiredAt;
    }
}

export class InvalidTransitionError extends WorkflowError {
    constructor(taskId: string, from: string, to: string) {
        super('InvalidTransition', `task ${taskId} cannot move from ${from} to ${to}`);
    }
}

export class UnfillableFieldError extends WorkflowError {
    public readonly fieldId: string;

    constructor(fieldId: string, message: string) {
        super('UnfillableField', message);
        this.fieldId = fieldId;
    }
}

/**
 * The work itself may have succeeded: only the broker notification was lost.
 */
export class DeliveryError extends WorkflowError {
    public readonly topic: string;

    constructor(topic: string, message: string) {
        super('DeliveryError', message);
        this.topic = topic;
    }
}

export class CapabilityError extends WorkflowError {
    public readonly capability: string;
    public readonly transient: boolean;

    constructor(capability: string, message: string, transient: boolean = true) {
        super('CapabilityError', message);
        this.capability = capability;
        this.transient = transient;
    }
}

export class CancelledError extends WorkflowError {
    constructor(message: string = 'task cancelled') {
        super('Cancelled', message);
    }
}

export class TimeoutError extends WorkflowError {
    constructor(message: string) {
        super('Timeout', message);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function toFailure(error: unknown): TaskFailure {
    if (error instanceof WorkflowError) {
        return error.toFailure();
    }
    return { kind: 'WorkError', reason: errorMessage(error) };
}
