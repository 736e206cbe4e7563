import assert from 'assert';
import { after, before, describe, test } from 'node:test';
import { configureTestEnv } from './helpers';

configureTestEnv();

let db: typeof import('../db');
let errors: typeof import('../core/errors');
let registry: import('../core/taskRegistry').TaskRegistry;

before(async () => {
    db = await import('../db');
    errors = await import('../core/errors');
    const { TaskRegistry } = await import('../core/taskRegistry');
    await db.initDatabase();
    registry = new TaskRegistry();
});

after(async () => {
    await db.closeDatabase();
});

describe('TaskRegistry', () => {
    test('a task moves PENDING → RUNNING → COMPLETED and records each step', async () => {
        const created = await registry.create('job_apply', { job_searches: [] }, 'user@example.com');
        assert.equal(created.state, 'PENDING');
        assert.equal(created.startedAt, null);

        const running = await registry.markRunning(created.id);
        assert.equal(running.state, 'RUNNING');
        assert.notEqual(running.startedAt, null);

        const completed = await registry.markCompleted(created.id, 'job-results:1-0', { total_applied: 1 });
        assert.equal(completed.state, 'COMPLETED');
        assert.equal(completed.resultRef, 'job-results:1-0');
        assert.deepEqual(completed.result, { total_applied: 1 });

        const transitions = await registry.listTransitions(created.id);
        assert.deepEqual(
            transitions.map((t) => [t.from_state, t.to_state]),
            [[null, 'PENDING'], ['PENDING', 'RUNNING'], ['RUNNING', 'COMPLETED']]
        );
    });

    test('terminal states never change again', async () => {
        const task = await registry.create('outreach_send', {}, 'user@example.com');
        await registry.markRunning(task.id);
        await registry.markFailed(task.id, { kind: 'WorkError', reason: 'boom' });

        await assert.rejects(() => registry.markRunning(task.id), errors.InvalidTransitionError);
        await assert.rejects(() => registry.markCompleted(task.id, 'ref', {}), errors.InvalidTransitionError);
        await assert.rejects(() => registry.markFailed(task.id, { kind: 'Cancelled', reason: 'late' }), errors.InvalidTransitionError);

        const state = await registry.getState(task.id);
        assert.equal(state.state, 'FAILED');
        assert.deepEqual(state.error, { kind: 'WorkError', reason: 'boom' });
    });

    test('a pending task may fail directly but cannot complete without running', async () => {
        const task = await registry.create('outreach_search', {}, 'user@example.com');
        await assert.rejects(() => registry.markCompleted(task.id, 'ref', {}), errors.InvalidTransitionError);

        const failed = await registry.markFailed(task.id, { kind: 'Cancelled', reason: 'task cancelled' });
        assert.equal(failed.state, 'FAILED');
        assert.equal(failed.startedAt, null);
    });

    test('only one of two concurrent starts wins', async () => {
        const task = await registry.create('job_apply', {}, 'user@example.com');
        const outcomes = await Promise.allSettled([registry.markRunning(task.id), registry.markRunning(task.id)]);
        assert.equal(outcomes.filter((o) => o.status === 'fulfilled').length, 1);
        assert.equal(outcomes.filter((o) => o.status === 'rejected').length, 1);
    });

    test('unknown ids fail NotFound', async () => {
        await assert.rejects(() => registry.getState('missing-task'), errors.NotFoundError);
    });
});
