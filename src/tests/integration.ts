import assert from 'assert';
import { once } from 'events';
import type { Server } from 'http';
import { after, before, describe, test } from 'node:test';
import type { FakeAutomationScript } from './helpers';
import { FakeAutomation, FakeForm, StubCapability, configureTestEnv, deferred, profileUrl, textField, waitFor } from './helpers';

configureTestEnv();

let db: typeof import('../db');
let repositories: typeof import('../core/repositories');
let runtimeModule: typeof import('../core/runtime');
let runtime: import('../core/runtime').Runtime;
let server: Server;
let baseUrl = '';

const jobUrl = 'https://www.linkedin.com/jobs/view/900/';
const script: FakeAutomationScript = {
    jobs: {
        'Backend Engineer': [
            { id: '900', title: 'Backend Engineer', company: 'Acme', location: 'Remote', url: jobUrl, description: 'APIs' },
        ],
    },
    forms: { [jobUrl]: new FakeForm([{ fields: [textField('first', 'First name')] }]) },
    employees: {
        Acme: [{ name: 'Alice Smith', title: 'Backend Engineer', profile_url: profileUrl('alice') }],
    },
};
const automation = new FakeAutomation(script);

interface ApiResponse {
    status: number;
    correlationId: string | null;
    body: unknown;
}

async function call(method: 'GET' | 'POST', path: string, body?: unknown, headers: Record<string, string> = {}): Promise<ApiResponse> {
    const response = await fetch(`${baseUrl}${path}`, {
        method,
        headers: { 'content-type': 'application/json', ...headers },
        body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
    });
    const parsed: unknown = await response.json();
    return { status: response.status, correlationId: response.headers.get('x-correlation-id'), body: parsed };
}

function pick(value: unknown, ...path: string[]): unknown {
    let current = value;
    for (const key of path) {
        if (!repositories.isRecord(current)) return undefined;
        current = current[key];
    }
    return current;
}

function text(value: unknown, ...path: string[]): string {
    const found = pick(value, ...path);
    assert.equal(typeof found, 'string', `expected a string at ${path.join('.')}`);
    return String(found);
}

async function stateOf(taskId: string): Promise<string> {
    return (await runtime.registry.getState(taskId)).state;
}

async function waitForState(taskId: string, state: 'COMPLETED' | 'FAILED'): Promise<void> {
    await waitFor(async () => (await stateOf(taskId)) === state);
}

before(async () => {
    db = await import('../db');
    repositories = await import('../core/repositories');
    runtimeModule = await import('../core/runtime');
    const { InMemoryBroker } = await import('../messaging/memoryBroker');
    const { createApp } = await import('../api/server');
    await db.initDatabase();
    await repositories.insertCompany({ name: 'Acme', industry: 'Software', country: 'United States', size: '51-200' });

    runtime = runtimeModule.createRuntime({
        broker: new InMemoryBroker({ redeliveryDelayMs: 0 }),
        automation,
        capability: new StubCapability(),
    });
    const app = createApp({
        orchestrator: runtime.orchestrator,
        broker: runtime.broker,
        activeTasks: () => runtime.runner.scheduledCount,
    });
    server = app.listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    assert.ok(address !== null && typeof address === 'object');
    baseUrl = `http://127.0.0.1:${address.port}`;
});

after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    await runtimeModule.shutdownRuntime(runtime);
    await db.closeDatabase();
});

describe('HTTP API', () => {
    test('health reports broker and database reachability', async () => {
        const response = await call('GET', '/health');
        assert.equal(response.status, 200);
        assert.deepEqual(response.body, {
            status: 'ok',
            broker: { name: 'memory', reachable: true },
            database: { reachable: true },
            active_tasks: 0,
        });
    });

    test('echoes a caller correlation id and generates one otherwise', async () => {
        const echoed = await call('GET', '/health', undefined, { 'x-correlation-id': 'req-42' });
        assert.equal(echoed.correlationId, 'req-42');

        const generated = await call('GET', '/health');
        assert.match(generated.correlationId ?? '', /^[0-9a-f-]{36}$/);
    });

    test('invalid requests get 400 with every issue listed', async () => {
        const response = await call('POST', '/jobs/apply', { job_searches: [] });
        assert.equal(response.status, 400);
        assert.equal(text(response.body, 'error'), 'ValidationError');
        assert.deepEqual(pick(response.body, 'issues'), ['job_searches: Array must contain at least 1 element(s)']);
    });

    test('malformed JSON is a validation error', async () => {
        const response = await call('POST', '/jobs/apply', '{"job_searches": [');
        assert.equal(response.status, 400);
        assert.equal(text(response.body, 'error'), 'ValidationError');
    });

    test('unknown tasks and unknown routes are 404', async () => {
        const task = await call('GET', '/tasks/does-not-exist');
        assert.equal(task.status, 404);
        assert.equal(text(task.body, 'error'), 'NotFound');

        const route = await call('GET', '/nowhere');
        assert.equal(route.status, 404);
    });

    test('lists the company filter values', async () => {
        const response = await call('GET', '/outreach/filters');
        assert.equal(response.status, 200);
        assert.deepEqual(response.body, {
            industries: ['Software'],
            countries: ['United States'],
            sizes: ['51-200'],
            total_companies: 1,
        });
    });
});

describe('task lifecycle', () => {
    test('submission returns before the work finishes and the task completes later', async () => {
        const gate = deferred();
        script.gate = gate.promise;
        const completion = await runtime.listener.subscribe('job-results');

        const accepted = await call('POST', '/jobs/apply', {
            job_searches: [{ job_title: 'Backend Engineer' }],
            credentials: { email: 'User@Example.com', password: 'test-secret' },
            profile: { first_name: 'Ada' },
        });
        assert.equal(accepted.status, 202);
        const taskId = text(accepted.body, 'task_id');

        const pending = await call('GET', `/tasks/${taskId}`);
        assert.ok(['PENDING', 'RUNNING'].includes(text(pending.body, 'task', 'state')));
        assert.equal(pick(pending.body, 'task', 'params', 'credentials'), undefined);
        assert.equal(text(pending.body, 'task', 'accountKey'), 'user@example.com');

        gate.resolve();
        script.gate = undefined;
        await waitForState(taskId, 'COMPLETED');

        const done = await call('GET', `/tasks/${taskId}`);
        assert.equal(pick(done.body, 'task', 'result', 'total_applied'), 1);
        const transitions = pick(done.body, 'transitions');
        assert.ok(Array.isArray(transitions));
        assert.deepEqual(transitions.map((t: unknown) => pick(t, 'to_state')), ['PENDING', 'RUNNING', 'COMPLETED']);

        const signal = await runtime.listener.awaitSignal('job-results', taskId, { timeoutMs: 1000 });
        assert.equal(signal.payload.task_id, taskId);
        assert.equal(signal.payload.total_applied, 1);
        completion();
    });

    test('a search followed by a send messages the grouped candidates', async () => {
        const search = await call('POST', '/outreach/search', { filters: { industry: ['software'] } });
        assert.equal(search.status, 202);
        const searchTask = text(search.body, 'task_id');
        const sessionId = text(search.body, 'session_id');
        await waitForState(searchTask, 'COMPLETED');

        const searched = await runtime.registry.getState(searchTask);
        assert.equal(searched.result?.total_candidates, 1);

        const send = await call('POST', '/outreach/send', {
            session_id: sessionId,
            selected_groups: { Engineering: { message_template: 'Hi {employee_name}, saw your work at {company_name}' } },
        });
        assert.equal(send.status, 202);
        const sendTask = text(send.body, 'task_id');
        await waitForState(sendTask, 'COMPLETED');

        assert.deepEqual(automation.sent, [
            { channel: 'direct_message', profileUrl: profileUrl('alice'), text: 'Hi Alice, saw your work at Acme' },
        ]);
        const sent = await runtime.registry.getState(sendTask);
        assert.equal(sent.result?.sent, 1);
    });

    test('sending from an unknown or expired session fails before a task exists', async () => {
        const body = { selected_groups: { Engineering: { message_template: 'Hi' } } };

        const unknown = await call('POST', '/outreach/send', { ...body, session_id: 'no-such-session' });
        assert.equal(unknown.status, 404);

        const expiredId = await runtime.sessions.create({ task_id: 'old' }, 0);
        await new Promise((resolve) => setTimeout(resolve, 5));
        const expired = await call('POST', '/outreach/send', { ...body, session_id: expiredId });
        assert.equal(expired.status, 410);
        assert.equal(text(expired.body, 'error'), 'Expired');
    });

    test('cancelling a task fails it as Cancelled and a second cancel conflicts', async () => {
        const gate = deferred();
        script.gate = gate.promise;

        const accepted = await call('POST', '/jobs/apply', { job_searches: [{ job_title: 'Nothing Matches' }] });
        const taskId = text(accepted.body, 'task_id');

        const cancelled = await call('POST', `/tasks/${taskId}/cancel`);
        assert.equal(cancelled.status, 202);

        gate.resolve();
        script.gate = undefined;
        await waitForState(taskId, 'FAILED');
        const task = await runtime.registry.getState(taskId);
        assert.equal(task.error?.kind, 'Cancelled');

        const again = await call('POST', `/tasks/${taskId}/cancel`);
        assert.equal(again.status, 409);
        assert.equal(text(again.body, 'error'), 'InvalidTransition');
    });
});
