import assert from 'assert';
import { after, before, describe, test } from 'node:test';
import type { TaskContext } from '../core/taskRunner';
import type { BrokerMessage } from '../messaging/broker';
import type { AutomationProvider } from '../types/capabilities';
import type { Candidate, RoleCategory } from '../types/domain';
import { FakeAutomation, StubCapability, configureTestEnv, profileUrl } from './helpers';

configureTestEnv({ DAILY_MESSAGE_LIMIT: '2', WARMUP_DAILY_LIMIT: '1' });

let db: typeof import('../db');
let config: typeof import('../config');
let repositories: typeof import('../core/repositories');
let schemas: typeof import('../validation/requestSchemas');
let searchWorkflow: typeof import('../workflows/outreachSearchWorkflow');
let sendWorkflow: typeof import('../workflows/outreachSendWorkflow');
let roles: typeof import('../ai/roleClassifier');
let broker: import('../messaging/memoryBroker').InMemoryBroker;
let publisher: import('../messaging/resultPublisher').ResultPublisher;
let sessions: import('../core/sessionStore').SessionStore;

function contextFor(taskId: string, accountKey: string, signal: AbortSignal = new AbortController().signal): TaskContext {
    return { taskId, accountKey, signal, publisher };
}

function member(slug: string, name: string, company: string, category: RoleCategory): Candidate {
    const reference = profileUrl(slug);
    return {
        id: slug,
        display_name: name,
        title: 'n/a',
        profile_reference: reference,
        company,
        assigned_category: category,
    };
}

async function storeSession(candidates: Candidate[]): Promise<string> {
    return sessions.create(
        {
            task_id: 'search-task',
            trace_id: 'search-task',
            filters: { industry: [], country: [], size: [] },
            companies: [...new Set(candidates.map((candidate) => candidate.company))],
            role_groups: roles.groupByRole(candidates),
        },
        3600
    );
}

function sendRequest(sessionId: string, extra: Record<string, unknown> = {}) {
    return schemas.parseRequest(schemas.outreachSendRequestSchema, {
        session_id: sessionId,
        selected_groups: {
            Engineering: { message_template: 'Hi {employee_name}, greetings from {sender}', template_variables: { sender: 'Sam' } },
        },
        ...extra,
    });
}

async function sendsToday(accountKey: string): Promise<number> {
    const now = new Date();
    return repositories.countDailySends(accountKey, config.config.dailyCapWindow, config.getLocalDateString(now), now.getTime());
}

before(async () => {
    db = await import('../db');
    config = await import('../config');
    repositories = await import('../core/repositories');
    schemas = await import('../validation/requestSchemas');
    searchWorkflow = await import('../workflows/outreachSearchWorkflow');
    sendWorkflow = await import('../workflows/outreachSendWorkflow');
    roles = await import('../ai/roleClassifier');
    const { InMemoryBroker } = await import('../messaging/memoryBroker');
    const { ResultPublisher } = await import('../messaging/resultPublisher');
    const { SessionStore } = await import('../core/sessionStore');
    await db.initDatabase();
    broker = new InMemoryBroker();
    publisher = new ResultPublisher(broker);
    sessions = new SessionStore();

    await repositories.insertCompany({ name: 'Acme', industry: 'Software', country: 'United States' });
    await repositories.insertCompany({ name: 'Beta', industry: ' software ', country: 'united states' });
    await repositories.insertCompany({ name: 'Gamma', industry: 'Finance', country: 'Italy' });
});

after(async () => {
    await broker.close();
    await db.closeDatabase();
});

describe('outreach search', () => {
    test('collects, dedupes and groups employees of matching companies into a session', async () => {
        const automation = new FakeAutomation({
            employees: {
                Acme: [
                    { name: 'Alice Smith', title: 'Backend Engineer', profile_url: profileUrl('alice') },
                    { name: 'Bob Jones', title: 'CFO', profile_url: profileUrl('bob') },
                    { name: 'Alice Smith', title: 'Backend Engineer', profile_url: 'https://it.linkedin.com/in/Alice?trk=people' },
                ],
                Beta: [{ name: 'Carol White', title: 'Account Executive', profile_url: profileUrl('carol') }],
                Gamma: [{ name: 'Dan Brown', title: 'Engineer', profile_url: profileUrl('dan') }],
            },
        });
        const capability = new StubCapability();
        const signals: BrokerMessage[] = [];
        await broker.subscribe('search-complete-signal', 'outreach-test', async (message) => {
            signals.push(message);
        });
        const request = schemas.parseRequest(schemas.outreachSearchRequestSchema, {
            filters: { industry: ['Software'], country: ['united states'] },
        });
        const sessionId = sessions.allocateId();

        const result = await searchWorkflow.runOutreachSearchWorkflow(contextFor('search-1', 'acct-search'), request, sessionId, {
            automation,
            capability,
            sessions,
        });
        await broker.drain();

        assert.equal(result.session_id, sessionId);
        assert.equal(result.companies_processed, 2);
        assert.equal(result.total_candidates, 3);
        assert.deepEqual(result.errors, []);
        assert.equal(result.summary.Engineering, 1);
        assert.equal(result.summary.Executive, 1);
        assert.equal(result.summary.Sales, 1);
        assert.equal(result.summary.Finance, 0);
        assert.deepEqual(result.role_groups.Engineering?.map((c) => c.display_name), ['Alice Smith']);
        assert.equal(capability.classifyCalls, 0);
        assert.equal(automation.sessionsOpened, 1);
        assert.equal(automation.sessionsClosed, 1);

        const stored = sendWorkflow.parseSessionPayload(sessionId, await sessions.read(sessionId));
        assert.equal(stored.task_id, 'search-1');
        assert.deepEqual(stored.companies, ['Acme', 'Beta']);
        assert.equal(stored.role_groups.length, 11);

        assert.equal(signals.length, 1);
        assert.equal(signals[0]?.key, sessionId);
        assert.equal(signals[0]?.payload.total_candidates, 3);
    });

    test('honours excluded companies, excluded profiles and the total limit', async () => {
        const automation = new FakeAutomation({
            employees: {
                Acme: [
                    { name: 'Alice Smith', title: 'Backend Engineer', profile_url: profileUrl('alice') },
                    { name: 'Erin Gray', title: 'Data Scientist', profile_url: profileUrl('erin') },
                    { name: 'Finn Black', title: 'QA Engineer', profile_url: profileUrl('finn') },
                ],
                Beta: [{ name: 'Carol White', title: 'Account Executive', profile_url: profileUrl('carol') }],
            },
        });
        const request = schemas.parseRequest(schemas.outreachSearchRequestSchema, {
            filters: { industry: ['software'] },
            exclude_companies: ['beta'],
            exclude_profile_urls: ['https://www.linkedin.com/in/ALICE/?trk=x'],
            total_limit: 1,
        });

        const result = await searchWorkflow.runOutreachSearchWorkflow(
            contextFor('search-2', 'acct-search'),
            request,
            sessions.allocateId(),
            { automation, capability: new StubCapability(), sessions }
        );

        assert.equal(result.total_candidates, 1);
        assert.deepEqual(result.role_groups.Engineering?.map((c) => c.display_name), ['Erin Gray']);
        assert.equal(result.companies_processed, 1);
    });
});

describe('outreach send', () => {
    test('sends up to the daily cap and skips the rest', async () => {
        const sessionId = await storeSession([
            member('ann', 'Ann Lee', 'Acme', 'Engineering'),
            member('ben', 'Ben Ray', 'Beta', 'Engineering'),
            member('cid', 'Cid Moe', 'Acme', 'Engineering'),
        ]);
        const automation = new FakeAutomation();

        const result = await sendWorkflow.runOutreachSendWorkflow(contextFor('send-cap', 'acct-cap'), sendRequest(sessionId), {
            automation,
            sessions,
        });

        assert.equal(result.status, 'daily_limit_reached');
        assert.equal(result.sent, 2);
        assert.equal(result.skipped, 1);
        assert.deepEqual(result.records.map((r) => [r.candidate_id, r.status, r.reason]), [
            ['ann', 'SENT', null],
            ['ben', 'SENT', null],
            ['cid', 'SKIPPED', 'cap_reached'],
        ]);
        assert.deepEqual(automation.sent, [
            { channel: 'direct_message', profileUrl: profileUrl('ann'), text: 'Hi Ann, greetings from Sam' },
            { channel: 'direct_message', profileUrl: profileUrl('ben'), text: 'Hi Ben, greetings from Sam' },
        ]);
        assert.deepEqual(result.results_by_role.Engineering, { sent: 2, skipped: 1, failed: 0 });
        assert.equal(await sendsToday('acct-cap'), 2);

        const stored = await repositories.listDispatchRecords('send-cap');
        assert.equal(stored.length, 3);
    });

    test('warm-up mode uses the lower cap', async () => {
        const sessionId = await storeSession([
            member('gia', 'Gia Park', 'Acme', 'Engineering'),
            member('hal', 'Hal Fox', 'Beta', 'Engineering'),
        ]);
        const result = await sendWorkflow.runOutreachSendWorkflow(
            contextFor('send-warm', 'acct-warm'),
            sendRequest(sessionId, { warm_up: true }),
            { automation: new FakeAutomation(), sessions }
        );

        assert.equal(result.sent, 1);
        assert.equal(result.records[1]?.reason, 'cap_reached');
    });

    test('skips candidates already contacted from the same account', async () => {
        await repositories.markProfileContacted('acct-seen', profileUrl('ivy'), 'Acme', 'direct_message', new Date().toISOString());
        const sessionId = await storeSession([
            member('ivy', 'Ivy Cho', 'Acme', 'Engineering'),
            member('jon', 'Jon Kim', 'Beta', 'Engineering'),
        ]);
        const automation = new FakeAutomation();

        const result = await sendWorkflow.runOutreachSendWorkflow(contextFor('send-seen', 'acct-seen'), sendRequest(sessionId), {
            automation,
            sessions,
        });

        assert.equal(result.status, 'completed');
        assert.deepEqual(result.records.map((r) => [r.candidate_id, r.status, r.reason]), [
            ['ivy', 'SKIPPED', 'already_contacted'],
            ['jon', 'SENT', null],
        ]);
        assert.equal(await repositories.isProfileContacted('acct-seen', profileUrl('jon')), true);
    });

    test('a profile with no messaging affordance is skipped and its reservation released', async () => {
        const sessionId = await storeSession([
            member('kay', 'Kay Wu', 'Acme', 'Engineering'),
            member('lou', 'Lou Diaz', 'Beta', 'Engineering'),
        ]);
        const automation = new FakeAutomation({
            affordances: { [profileUrl('kay')]: 'none', [profileUrl('lou')]: 'connection_request' },
        });

        const result = await sendWorkflow.runOutreachSendWorkflow(contextFor('send-none', 'acct-none'), sendRequest(sessionId), {
            automation,
            sessions,
        });

        assert.deepEqual(result.records.map((r) => [r.candidate_id, r.status, r.reason, r.channel]), [
            ['kay', 'SKIPPED', 'no_affordance', null],
            ['lou', 'SENT', null, 'connection_request'],
        ]);
        assert.deepEqual(automation.sent.map((s) => s.channel), ['connection_request']);
        assert.equal(await sendsToday('acct-none'), 1);
    });

    test('limits sends per company', async () => {
        const sessionId = await storeSession([
            member('max', 'Max Orr', 'Acme', 'Engineering'),
            member('ned', 'Ned Poe', 'acme', 'Engineering'),
        ]);

        const result = await sendWorkflow.runOutreachSendWorkflow(
            contextFor('send-company', 'acct-company'),
            sendRequest(sessionId, { max_per_company: 1 }),
            { automation: new FakeAutomation(), sessions }
        );

        assert.deepEqual(result.records.map((r) => [r.candidate_id, r.status, r.reason]), [
            ['max', 'SENT', null],
            ['ned', 'SKIPPED', 'company_limit'],
        ]);
    });

    test('a failed delivery is recorded and does not count against the cap', async () => {
        const sessionId = await storeSession([
            member('oli', 'Oli Ash', 'Acme', 'Engineering'),
            member('pia', 'Pia Roe', 'Beta', 'Engineering'),
        ]);
        const automation = new FakeAutomation({ failingProfiles: [profileUrl('oli')] });

        const result = await sendWorkflow.runOutreachSendWorkflow(contextFor('send-fail', 'acct-fail'), sendRequest(sessionId), {
            automation,
            sessions,
        });

        assert.equal(result.status, 'completed');
        assert.equal(result.failed, 1);
        assert.equal(result.sent, 1);
        assert.equal(result.records[0]?.status, 'FAILED');
        assert.notEqual(result.records[0]?.reason, null);
        assert.equal(await sendsToday('acct-fail'), 1);
        assert.equal(await repositories.isProfileContacted('acct-fail', profileUrl('oli')), false);
    });

    test('a browser session that fails to open gives the reserved slot back', async () => {
        const sessionId = await storeSession([member('ugo', 'Ugo Park', 'Acme', 'Engineering')]);
        let opens = 0;
        const automation: AutomationProvider = {
            openSession: async () => {
                opens += 1;
                throw new Error('browser unavailable');
            },
        };
        const { CapabilityError } = await import('../core/errors');

        await assert.rejects(
            () => sendWorkflow.runOutreachSendWorkflow(contextFor('send-open', 'acct-open'), sendRequest(sessionId), {
                automation,
                sessions,
            }),
            CapabilityError
        );
        assert.equal(opens, 2);
        assert.equal(await sendsToday('acct-open'), 0);
    });

    test('only enabled groups are messaged and reassignments move candidates between groups', async () => {
        const sessionId = await storeSession([
            member('quin', 'Quin Day', 'Acme', 'Engineering'),
            member('rae', 'Rae Sun', 'Beta', 'Sales'),
            member('sol', 'Sol Vega', 'Beta', 'Marketing'),
        ]);
        const automation = new FakeAutomation();

        const result = await sendWorkflow.runOutreachSendWorkflow(
            contextFor('send-groups', 'acct-groups'),
            sendRequest(sessionId, {
                selected_groups: {
                    Engineering: { message_template: 'Hello {employee_full_name} ({category})' },
                    Sales: { enabled: false, message_template: 'unused' },
                },
                reassignments: { [profileUrl('sol')]: 'Engineering' },
            }),
            { automation, sessions }
        );

        assert.deepEqual(automation.sent.map((s) => s.text), ['Hello Quin Day (Engineering)', 'Hello Sol Vega (Engineering)']);
        assert.equal(result.records.some((r) => r.candidate_id === 'rae'), false);
    });

    test('a cancelled task stops before the first candidate', async () => {
        const sessionId = await storeSession([member('tom', 'Tom Ito', 'Acme', 'Engineering')]);
        const controller = new AbortController();
        controller.abort();
        const automation = new FakeAutomation();

        const result = await sendWorkflow.runOutreachSendWorkflow(
            contextFor('send-cancel', 'acct-cancel', controller.signal),
            sendRequest(sessionId),
            { automation, sessions }
        );

        assert.equal(result.status, 'cancelled');
        assert.deepEqual(result.records, []);
        assert.equal(automation.sessionsOpened, 0);
    });

    test('a session that does not hold a search result is rejected', async () => {
        const sessionId = await sessions.create({ something: 'else' }, 3600);
        const { ValidationError } = await import('../core/errors');

        await assert.rejects(
            () => sendWorkflow.runOutreachSendWorkflow(contextFor('send-bad', 'acct-bad'), sendRequest(sessionId), {
                automation: new FakeAutomation(),
                sessions,
            }),
            ValidationError
        );
    });
});
