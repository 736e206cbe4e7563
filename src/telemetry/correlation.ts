import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

interface CorrelationContext {
    correlationId: string;
    taskId: string | null;
}

const correlationStore = new AsyncLocalStorage<CorrelationContext>();

function sanitizeCorrelationId(value: string): string {
    const trimmed = value.trim();
    if (!trimmed) return randomUUID();
    return trimmed.replace(/[^a-zA-Z0-9._-]/g, '').slice(0, 80) || randomUUID();
}

export function resolveCorrelationId(value?: string | null): string {
    if (!value) return randomUUID();
    return sanitizeCorrelationId(value);
}

export function runWithCorrelationId<T>(correlationId: string, callback: () => T): T {
    const parent = correlationStore.getStore();
    return correlationStore.run({ correlationId, taskId: parent?.taskId ?? null }, callback);
}

/** Worker scope: the task id doubles as correlation id for everything the task logs or publishes. */
export function runInTaskScope<T>(taskId: string, callback: () => T): T {
    return correlationStore.run({ correlationId: taskId, taskId }, callback);
}

export function getCorrelationId(): string | null {
    return correlationStore.getStore()?.correlationId ?? null;
}

export function getCurrentTaskId(): string | null {
    return correlationStore.getStore()?.taskId ?? null;
}
