/**
 * Detached execution of submitted tasks.
 *
 * submit() persists the task and schedules the work on the event loop; it never
 * awaits the work. Tasks sharing an account key run strictly one after another
 * because they share one authenticated browser session. A global gate bounds how
 * many tasks run at once across accounts.
 */

import { config } from '../config';
import { CompletionListener } from '../messaging/completionListener';
import { ResultPublisher } from '../messaging/resultPublisher';
import { resultTopicForKind } from '../messaging/topics';
import { stripCredentials } from '../security/redaction';
import { runInTaskScope } from '../telemetry/correlation';
import { logError, logInfo, logWarn } from '../telemetry/logger';
import { Task, TaskFailure, TaskKind } from '../types/domain';
import { DeliveryError, InvalidTransitionError, TimeoutError, errorMessage, toFailure } from './errors';
import { TaskRegistry } from './taskRegistry';

export interface TaskContext {
    taskId: string;
    accountKey: string;
    signal: AbortSignal;
    publisher: ResultPublisher;
}

export type TaskWork = (context: TaskContext) => Promise<Record<string, unknown>>;

export interface SubmitOptions {
    accountKey: string;
    taskId?: string;
    work: TaskWork;
}

export interface TaskRunnerDeps {
    registry: TaskRegistry;
    publisher: ResultPublisher;
    listener?: CompletionListener | null;
    maxConcurrent?: number;
    completionTimeoutMs?: number;
}

class ConcurrencyGate {
    private active = 0;
    private readonly queue: Array<() => void> = [];

    constructor(private readonly limit: number) {}

    get activeCount(): number {
        return this.active;
    }

    async acquire(): Promise<() => void> {
        if (this.active >= this.limit) {
            await new Promise<void>((resolve) => this.queue.push(resolve));
        }
        this.active += 1;
        let released = false;
        return () => {
            if (released) return;
            released = true;
            this.active -= 1;
            this.queue.shift()?.();
        };
    }
}

export class TaskRunner {
    private readonly registry: TaskRegistry;
    private readonly publisher: ResultPublisher;
    private readonly listener: CompletionListener | null;
    private readonly completionTimeoutMs: number;
    private readonly gate: ConcurrencyGate;
    private readonly accountChains = new Map<string, Promise<void>>();
    private readonly controllers = new Map<string, AbortController>();
    private readonly inFlight = new Set<Promise<void>>();

    constructor(deps: TaskRunnerDeps) {
        this.registry = deps.registry;
        this.publisher = deps.publisher;
        this.listener = deps.listener ?? null;
        this.completionTimeoutMs = deps.completionTimeoutMs ?? config.taskCompletionTimeoutMs;
        this.gate = new ConcurrencyGate(Math.max(1, deps.maxConcurrent ?? config.maxConcurrentTasks));
    }

    get activeCount(): number {
        return this.gate.activeCount;
    }

    get scheduledCount(): number {
        return this.inFlight.size;
    }

    async submit(kind: TaskKind, params: Record<string, unknown>, options: SubmitOptions): Promise<Task> {
        const task = await this.registry.create(kind, stripCredentials(params), options.accountKey, options.taskId);
        const controller = new AbortController();
        this.controllers.set(task.id, controller);
        this.armCompletionTimeout(task, controller);

        const previous = this.accountChains.get(task.accountKey) ?? Promise.resolve();
        const run = previous.then(() => this.execute(task, options.work, controller));
        this.accountChains.set(task.accountKey, run);
        this.inFlight.add(run);
        void run.then(() => {
            this.inFlight.delete(run);
            if (this.accountChains.get(task.accountKey) === run) {
                this.accountChains.delete(task.accountKey);
            }
        });

        await logInfo('task_runner.task.submitted', { taskId: task.id, kind, accountKey: task.accountKey });
        return task;
    }

    /**
     * A pending task fails immediately; a running one is signalled and
     * finalizes itself at its next cancellation check.
     */
    async cancel(taskId: string): Promise<Task> {
        const task = await this.registry.getState(taskId);
        if (task.state === 'COMPLETED' || task.state === 'FAILED') {
            throw new InvalidTransitionError(taskId, task.state, 'FAILED');
        }
        const controller = this.controllers.get(taskId);
        controller?.abort();
        if (task.state === 'PENDING' || !controller) {
            await this.fail(task, { kind: 'Cancelled', reason: 'task cancelled' }, null);
        }
        await logInfo('task_runner.task.cancel_requested', { taskId, state: task.state });
        return this.registry.getState(taskId);
    }

    /** Fails tasks a previous process left behind. Call before accepting new work. */
    async recoverInterrupted(): Promise<number> {
        let recovered = 0;
        for (const state of ['RUNNING', 'PENDING'] as const) {
            for (const taskId of await this.registry.listByState(state)) {
                if (this.controllers.has(taskId)) continue;
                try {
                    await this.registry.markFailed(taskId, { kind: 'WorkError', reason: 'interrupted' });
                    recovered += 1;
                } catch (error) {
                    if (!(error instanceof InvalidTransitionError)) throw error;
                }
            }
        }
        if (recovered > 0) {
            await logWarn('task_runner.recovered_interrupted', { recovered });
        }
        return recovered;
    }

    async drain(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all([...this.inFlight]);
        }
    }

    private armCompletionTimeout(task: Task, controller: AbortController): void {
        if (!this.listener || this.completionTimeoutMs <= 0) {
            return;
        }
        const topic = resultTopicForKind(task.kind);
        void this.listener
            .awaitSignal(topic, task.id, { timeoutMs: this.completionTimeoutMs, taskId: task.id })
            .then(
                () => undefined,
                async (error: unknown) => {
                    if (error instanceof TimeoutError) {
                        controller.abort();
                        return;
                    }
                    await logError('task_runner.completion_wait.failed', { taskId: task.id, error: errorMessage(error) });
                }
            );
    }

    private async execute(task: Task, work: TaskWork, controller: AbortController): Promise<void> {
        const release = await this.gate.acquire();
        try {
            await runInTaskScope(task.id, () => this.runTask(task, work, controller.signal));
        } catch (error) {
            await logError('task_runner.task.crashed', { taskId: task.id, error: errorMessage(error) });
        } finally {
            release();
            this.controllers.delete(task.id);
        }
    }

    private async runTask(task: Task, work: TaskWork, signal: AbortSignal): Promise<void> {
        if (signal.aborted) {
            return;
        }
        try {
            await this.registry.markRunning(task.id);
        } catch (error) {
            if (error instanceof InvalidTransitionError) {
                await logInfo('task_runner.task.not_pending', { taskId: task.id, error: error.message });
                return;
            }
            throw error;
        }
        await logInfo('task_runner.task.started', { taskId: task.id, kind: task.kind });

        let result: Record<string, unknown>;
        try {
            result = await work({ taskId: task.id, accountKey: task.accountKey, signal, publisher: this.publisher });
        } catch (error) {
            await this.fail(task, toFailure(error), null);
            return;
        }
        if (signal.aborted) {
            // partial work stands: the result travels with the failure
            await this.fail(task, { kind: 'Cancelled', reason: 'task cancelled' }, result);
            return;
        }

        const topic = resultTopicForKind(task.kind);
        let resultRef: string;
        try {
            const receipt = await this.publisher.publish(task.id, topic, result);
            resultRef = receipt.ref;
        } catch (error) {
            if (!(error instanceof DeliveryError)) throw error;
            await this.markFailedQuietly(task.id, error.toFailure(), result);
            await logError('task_runner.task.delivery_failed', { taskId: task.id, topic, error: error.message });
            return;
        }

        try {
            await this.registry.markCompleted(task.id, resultRef, result);
            await logInfo('task_runner.task.completed', { taskId: task.id, resultRef });
        } catch (error) {
            if (!(error instanceof InvalidTransitionError)) throw error;
            await logWarn('task_runner.task.finalized_elsewhere', { taskId: task.id, error: error.message });
        }
    }

    private async fail(task: Task, failure: TaskFailure, result: Record<string, unknown> | null): Promise<void> {
        const marked = await this.markFailedQuietly(task.id, failure, result);
        if (!marked) {
            return;
        }
        await logWarn('task_runner.task.failed', { taskId: task.id, kind: failure.kind, reason: failure.reason });
        try {
            await this.publisher.publish(task.id, resultTopicForKind(task.kind), {
                ...(result ?? {}),
                status: 'failed',
                error: failure,
            });
        } catch (error) {
            await logError('task_runner.failure_notice.undelivered', { taskId: task.id, error: errorMessage(error) });
        }
    }

    private async markFailedQuietly(taskId: string, failure: TaskFailure, result: Record<string, unknown> | null): Promise<boolean> {
        try {
            await this.registry.markFailed(taskId, failure, result);
            return true;
        } catch (error) {
            if (!(error instanceof InvalidTransitionError)) throw error;
            await logInfo('task_runner.task.already_terminal', { taskId, attempted: failure.kind });
            return false;
        }
    }
}
