/**
 * Task lifecycle: PENDING → RUNNING → {COMPLETED | FAILED}.
 *
 * The registry only records state. Running the work belongs to the TaskRunner,
 * which is the sole caller of the mark* operations besides the completion
 * listener's timeout. Terminal states never change again.
 */

import { randomUUID } from 'crypto';
import {
    casMarkCompleted,
    casMarkFailed,
    casMarkRunning,
    getTaskRecord,
    insertTask,
    insertTaskTransition,
    listTaskIdsByState,
    listTaskTransitions,
    parseJsonObject,
} from './repositories';
import { InvalidTransitionError, NotFoundError } from './errors';
import { Task, TaskFailure, TaskKind, TaskRecord, TaskState, TaskTransitionRecord, TERMINAL_TASK_STATES } from '../types/domain';

export type Clock = () => Date;

function toTask(record: TaskRecord): Task {
    return {
        id: record.id,
        kind: record.kind,
        state: record.state,
        accountKey: record.account_key,
        params: parseJsonObject(record.params_json),
        createdAt: record.created_at,
        startedAt: record.started_at,
        completedAt: record.completed_at,
        error: record.error_kind ? { kind: record.error_kind, reason: record.error_reason ?? '' } : null,
        resultRef: record.result_ref,
        result: record.result_json ? parseJsonObject(record.result_json) : null,
    };
}

export class TaskRegistry {
    private readonly clock: Clock;

    constructor(clock: Clock = () => new Date()) {
        this.clock = clock;
    }

    async create(kind: TaskKind, params: Record<string, unknown>, accountKey: string, taskId: string = randomUUID()): Promise<Task> {
        await insertTask(taskId, kind, accountKey, params, this.clock().toISOString());
        return this.getState(taskId);
    }

    async getState(taskId: string): Promise<Task> {
        const record = await getTaskRecord(taskId);
        if (!record) {
            throw new NotFoundError('task', taskId);
        }
        return toTask(record);
    }

    async listTransitions(taskId: string): Promise<TaskTransitionRecord[]> {
        await this.getState(taskId);
        return listTaskTransitions(taskId);
    }

    async markRunning(taskId: string): Promise<Task> {
        const at = this.clock().toISOString();
        const swapped = await casMarkRunning(taskId, at);
        if (!swapped) {
            await this.rejectTransition(taskId, 'RUNNING');
        }
        await insertTaskTransition(taskId, 'PENDING', 'RUNNING', null, at);
        return this.getState(taskId);
    }

    async markCompleted(taskId: string, resultRef: string, result: Record<string, unknown>): Promise<Task> {
        const at = this.clock().toISOString();
        const swapped = await casMarkCompleted(taskId, resultRef, result, at);
        if (!swapped) {
            await this.rejectTransition(taskId, 'COMPLETED');
        }
        await insertTaskTransition(taskId, 'RUNNING', 'COMPLETED', resultRef, at);
        return this.getState(taskId);
    }

    /**
     * Accepted from PENDING as well: a task can be cancelled or time out before its worker starts.
     */
    async markFailed(taskId: string, failure: TaskFailure, result: Record<string, unknown> | null = null): Promise<Task> {
        const at = this.clock().toISOString();
        const current = await this.getState(taskId);
        if (TERMINAL_TASK_STATES.has(current.state)) {
            throw new InvalidTransitionError(taskId, current.state, 'FAILED');
        }
        const swapped = await casMarkFailed(taskId, [current.state], failure.kind, failure.reason, result, at);
        if (!swapped) {
            await this.rejectTransition(taskId, 'FAILED');
        }
        await insertTaskTransition(taskId, current.state, 'FAILED', `${failure.kind}: ${failure.reason}`, at);
        return this.getState(taskId);
    }

    async listByState(state: TaskState): Promise<string[]> {
        return listTaskIdsByState(state);
    }

    private async rejectTransition(taskId: string, target: TaskState): Promise<never> {
        const record = await getTaskRecord(taskId);
        if (!record) {
            throw new NotFoundError('task', taskId);
        }
        throw new InvalidTransitionError(taskId, record.state, target);
    }
}
