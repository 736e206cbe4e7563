import assert from 'assert';
import { before, describe, test } from 'node:test';
import { configureTestEnv, textField } from './helpers';

configureTestEnv();

type Modules = {
    config: typeof import('../config');
    template: typeof import('../workflows/messageTemplate');
    channel: typeof import('../workflows/deliveryChannel');
    profileUrl: typeof import('../profileUrl');
    resolver: typeof import('../forms/valueResolver');
    classifier: typeof import('../forms/fieldClassifier');
    selectors: typeof import('../selectors');
    redaction: typeof import('../security/redaction');
    schemas: typeof import('../validation/requestSchemas');
    errors: typeof import('../core/errors');
};

let m: Modules;

before(async () => {
    m = {
        config: await import('../config'),
        template: await import('../workflows/messageTemplate'),
        channel: await import('../workflows/deliveryChannel'),
        profileUrl: await import('../profileUrl'),
        resolver: await import('../forms/valueResolver'),
        classifier: await import('../forms/fieldClassifier'),
        selectors: await import('../selectors'),
        redaction: await import('../security/redaction'),
        schemas: await import('../validation/requestSchemas'),
        errors: await import('../core/errors'),
    };
});

describe('message templates', () => {
    test('replaces known placeholders and blanks unknown ones', () => {
        const rendered = m.template.renderTemplate('Hi {employee_name} at {company_name}{missing}!', {
            employee_name: 'Ada',
            company_name: 'Acme',
        });
        assert.equal(rendered, 'Hi Ada at Acme!');
    });

    test('candidate variables override static ones of the same name', () => {
        const vars = m.template.buildCandidateVariables(
            {
                id: 'c1',
                display_name: '  Ada Lovelace ',
                title: 'Software Engineer',
                profile_reference: 'https://www.linkedin.com/in/ada/',
                company: 'Acme',
                assigned_category: 'Engineering',
            },
            { company_name: 'Static Co', sender: 'Sam' }
        );
        assert.equal(vars.company_name, 'Acme');
        assert.equal(vars.sender, 'Sam');
        assert.equal(vars.employee_name, 'Ada');
        assert.equal(vars.employee_full_name, 'Ada Lovelace');
    });
});

describe('delivery channels', () => {
    test('connection notes are cut to 300 characters', () => {
        assert.equal(m.channel.truncateNote('a'.repeat(350)).length, 300);
        assert.equal(m.channel.truncateNote('short'), 'short');
    });

    test('notes are cut by character, never inside a surrogate pair', () => {
        const note = m.channel.truncateNote('a'.repeat(299) + '\u{1F600}' + 'b'.repeat(10));
        assert.equal(Array.from(note).length, 300);
        assert.equal(note.length, 301);
        assert.equal(note.endsWith('\u{1F600}'), true);
        assert.equal(m.channel.truncateNote('\u{1F600}'.repeat(300)), '\u{1F600}'.repeat(300));
    });

    test('affordances map onto channels', () => {
        assert.deepEqual(m.channel.channelForAffordance('connection_request'), { kind: 'connection_request', noteLimit: 300 });
        assert.deepEqual(m.channel.channelForAffordance('none'), { kind: 'none' });
    });

    test('a connection request delivers the truncated note', async () => {
        const notes: string[] = [];
        const automation = {
            searchEmployees: async () => [],
            detectAffordance: async () => 'connection_request' as const,
            sendDirectMessage: async () => undefined,
            sendConnectionRequest: async (_url: string, note: string) => {
                notes.push(note);
            },
        };
        const delivered = await m.channel.dispatchOnChannel(
            automation,
            { kind: 'connection_request', noteLimit: 300 },
            'https://www.linkedin.com/in/ada/',
            'x'.repeat(320)
        );
        assert.equal(delivered.length, 300);
        assert.deepEqual(notes, ['x'.repeat(300)]);
    });
});

describe('profile references', () => {
    test('platform profile URLs collapse to one canonical form', () => {
        assert.equal(
            m.profileUrl.normalizeProfileReference('http://it.linkedin.com/in/Ada-Lovelace?trk=search#top'),
            'https://www.linkedin.com/in/ada-lovelace/'
        );
        assert.equal(
            m.profileUrl.normalizeProfileReference('https://www.linkedin.com/in/ada-lovelace/details/experience/'),
            'https://www.linkedin.com/in/ada-lovelace/'
        );
    });

    test('other references are only trimmed and lowercased', () => {
        assert.equal(m.profileUrl.normalizeProfileReference('  Some-Ref '), 'some-ref');
    });

    test('candidate ids are stable across variants of one profile', () => {
        const a = m.profileUrl.candidateIdFor('https://www.linkedin.com/in/ada-lovelace/');
        const b = m.profileUrl.candidateIdFor('https://linkedin.com/in/ADA-LOVELACE?x=1');
        assert.equal(a, b);
        assert.equal(a.length, 16);
    });
});

describe('option matching', () => {
    test('exact, then partial, then first option', () => {
        assert.equal(m.resolver.findBestOptionMatch('yes', ['Yes', 'No']), 'Yes');
        assert.equal(m.resolver.findBestOptionMatch('United', ['Canada', 'United States']), 'United States');
        assert.equal(m.resolver.findBestOptionMatch('zzz', ['A', 'B']), 'A');
        assert.equal(m.resolver.findBestOptionMatch('x', []), '');
    });
});

describe('field typing by attributes', () => {
    test('native controls are typed without the capability', () => {
        assert.equal(m.classifier.classifyFieldByAttributes(textField('f', 'Name')), 'text');
        assert.equal(m.classifier.classifyFieldByAttributes(textField('f', 'CV', { inputType: 'file' })), 'file');
        assert.equal(m.classifier.classifyFieldByAttributes(textField('f', 'Country', { tagName: 'select' })), 'select');
        assert.equal(m.classifier.classifyFieldByAttributes(textField('f', 'Agree', { inputType: 'checkbox' })), 'checkbox');
    });

    test('custom widgets without a known role stay unresolved', () => {
        assert.equal(m.classifier.classifyFieldByAttributes(textField('f', 'Widget', { tagName: 'div', inputType: null })), null);
    });
});

describe('request validation', () => {
    test('send requests need at least one enabled group', () => {
        assert.throws(
            () => m.schemas.parseRequest(m.schemas.outreachSendRequestSchema, {
                session_id: 's1',
                selected_groups: { Engineering: { enabled: false, message_template: 'Hi' } },
            }),
            (error: unknown) => error instanceof m.errors.ValidationError
                && error.issues.includes('selected_groups: at least one group must be enabled')
        );
    });

    test('defaults are applied to search requests', () => {
        const parsed = m.schemas.parseRequest(m.schemas.outreachSearchRequestSchema, {});
        assert.deepEqual(parsed.filters, { industry: [], country: [], size: [] });
        assert.equal(parsed.credentials, null);
        assert.equal(parsed.total_limit, null);
    });
});

describe('credential redaction', () => {
    test('passwords never reach persisted task params', () => {
        const stripped = m.redaction.stripCredentials({
            credentials: { email: 'user@example.com', password: 'test-secret' },
            filters: { industry: ['software'] },
        });
        assert.equal(JSON.stringify(stripped).includes('test-secret'), false);
        assert.deepEqual(stripped.filters, { industry: ['software'] });
    });
});

describe('configuration', () => {
    test('local dates follow the configured timezone', () => {
        const instant = new Date('2024-03-10T23:30:00Z');
        assert.equal(m.config.getLocalDateString(instant, 'UTC'), '2024-03-10');
        assert.equal(m.config.getLocalDateString(instant, 'Europe/Rome'), '2024-03-11');
    });

    test('the test environment passes critical validation', () => {
        assert.deepEqual(m.config.validateCriticalConfig(), []);
        assert.equal(m.config.config.dbPath, ':memory:');
        assert.equal(m.config.config.outreachMaxDelaySec, 0);
    });
});

describe('selectors', () => {
    test('every key has at least one fallback', () => {
        for (const [key, value] of Object.entries(m.selectors.SELECTORS)) {
            assert.ok(value.length >= 2, `selector "${key}" has ${value.length} alternatives`);
        }
    });
});
