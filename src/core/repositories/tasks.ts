/**
 * repositories/tasks.ts
 * Task rows and their transition audit trail. Every state change is a
 * compare-and-set on the current state, so concurrent writers cannot both win.
 */

import { getDatabase } from '../../db';
import { FailureKind, TaskKind, TaskRecord, TaskState, TaskTransitionRecord } from '../../types/domain';
import { nowIso } from './shared';

const TASK_SELECT_COLUMNS = `id, kind, state, account_key, params_json, error_kind, error_reason,
    result_ref, result_json, created_at, started_at, completed_at`;

export async function insertTask(
    id: string,
    kind: TaskKind,
    accountKey: string,
    params: Record<string, unknown>,
    createdAt: string = nowIso()
): Promise<void> {
    const db = await getDatabase();
    await db.run(
        `INSERT INTO tasks (id, kind, state, account_key, params_json, created_at) VALUES (?, ?, 'PENDING', ?, ?, ?)`,
        [id, kind, accountKey, JSON.stringify(params), createdAt]
    );
    await insertTaskTransition(id, null, 'PENDING', null, createdAt);
}

export async function getTaskRecord(id: string): Promise<TaskRecord | undefined> {
    const db = await getDatabase();
    return db.get<TaskRecord>(`SELECT ${TASK_SELECT_COLUMNS} FROM tasks WHERE id = ?`, [id]);
}

export async function insertTaskTransition(
    taskId: string,
    fromState: TaskState | null,
    toState: TaskState,
    detail: string | null,
    createdAt: string = nowIso()
): Promise<void> {
    const db = await getDatabase();
    await db.run(
        `INSERT INTO task_transitions (task_id, from_state, to_state, detail, created_at) VALUES (?, ?, ?, ?, ?)`,
        [taskId, fromState, toState, detail, createdAt]
    );
}

export async function listTaskTransitions(taskId: string): Promise<TaskTransitionRecord[]> {
    const db = await getDatabase();
    return db.query<TaskTransitionRecord>(
        `SELECT id, task_id, from_state, to_state, detail, created_at FROM task_transitions WHERE task_id = ? ORDER BY id ASC`,
        [taskId]
    );
}

export async function casMarkRunning(id: string, at: string): Promise<boolean> {
    const db = await getDatabase();
    const result = await db.run(
        `UPDATE tasks SET state = 'RUNNING', started_at = ? WHERE id = ? AND state = 'PENDING'`,
        [at, id]
    );
    return (result.changes ?? 0) > 0;
}

export async function casMarkCompleted(
    id: string,
    resultRef: string,
    result: Record<string, unknown>,
    at: string
): Promise<boolean> {
    const db = await getDatabase();
    const update = await db.run(
        `UPDATE tasks SET state = 'COMPLETED', result_ref = ?, result_json = ?, completed_at = ?
         WHERE id = ? AND state = 'RUNNING'`,
        [resultRef, JSON.stringify(result), at, id]
    );
    return (update.changes ?? 0) > 0;
}

export async function casMarkFailed(
    id: string,
    fromStates: TaskState[],
    kind: FailureKind,
    reason: string,
    result: Record<string, unknown> | null,
    at: string
): Promise<boolean> {
    const db = await getDatabase();
    const placeholders = fromStates.map(() => '?').join(', ');
    const update = await db.run(
        `UPDATE tasks SET state = 'FAILED', error_kind = ?, error_reason = ?, result_json = ?, completed_at = ?
         WHERE id = ? AND state IN (${placeholders})`,
        [kind, reason, result ? JSON.stringify(result) : null, at, id, ...fromStates]
    );
    return (update.changes ?? 0) > 0;
}

export async function listTaskIdsByState(state: TaskState): Promise<string[]> {
    const db = await getDatabase();
    const rows = await db.query<{ id: string }>(`SELECT id FROM tasks WHERE state = ? ORDER BY created_at ASC`, [state]);
    return rows.map((row) => row.id);
}
