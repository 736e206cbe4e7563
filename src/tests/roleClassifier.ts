import assert from 'assert';
import { after, before, describe, test } from 'node:test';
import type { Candidate, RoleCategory } from '../types/domain';
import { StubCapability, configureTestEnv } from './helpers';

configureTestEnv();

let db: typeof import('../db');
let roles: typeof import('../ai/roleClassifier');

function candidate(id: string, category: RoleCategory): Candidate {
    return {
        id,
        display_name: id,
        title: 'n/a',
        profile_reference: `https://www.linkedin.com/in/${id}/`,
        company: 'Acme',
        assigned_category: category,
    };
}

before(async () => {
    db = await import('../db');
    roles = await import('../ai/roleClassifier');
    await db.initDatabase();
});

after(async () => {
    await db.closeDatabase();
});

describe('RoleClassifier', () => {
    test('keyword rules decide without the capability, first rule wins', async () => {
        const capability = new StubCapability();
        const classifier = new roles.RoleClassifier(capability);

        assert.equal(await classifier.classify('CTO, Software'), 'Executive');
        assert.equal(await classifier.classify('Senior Backend Engineer'), 'Engineering');
        assert.equal(await classifier.classify('M&A Associate'), 'Investment Banking / M&A');
        assert.equal(await classifier.classify('Talent Acquisition Partner'), 'HR/People');
        assert.equal(capability.classifyCalls, 0);
    });

    test('titles that normalize alike share one capability call', async () => {
        const capability = new StubCapability(async () => 'Strategy Consulting');
        const classifier = new roles.RoleClassifier(capability);

        const results = await Promise.all([
            classifier.classify('Head of Research'),
            classifier.classify('  head of   RESEARCH '),
            classifier.classify('Head of Research!'),
        ]);

        assert.deepEqual(results, ['Strategy Consulting', 'Strategy Consulting', 'Strategy Consulting']);
        assert.equal(capability.classifyCalls, 1);
    });

    test('answers outside the enumeration map to Other', async () => {
        const classifier = new roles.RoleClassifier(new StubCapability(async () => 'Astronaut'));
        assert.equal(await classifier.classify('Mission Specialist'), 'Other');
    });

    test('a failing capability yields Other after its retries', async () => {
        const capability = new StubCapability(async () => {
            throw new Error('model unavailable');
        });
        const classifier = new roles.RoleClassifier(capability, { maxAttempts: 2, baseDelayMs: 1 });

        assert.equal(await classifier.classify('Head of Research'), 'Other');
        assert.equal(capability.classifyCalls, 2);
    });

    test('an empty title is Other', async () => {
        const capability = new StubCapability();
        const classifier = new roles.RoleClassifier(capability);
        assert.equal(await classifier.classify('  --  '), 'Other');
        assert.equal(capability.classifyCalls, 0);
    });
});

describe('coerceRoleCategory', () => {
    test('accepts quoted or differently cased labels', () => {
        assert.equal(roles.coerceRoleCategory('"Finance".'), 'Finance');
        assert.equal(roles.coerceRoleCategory('hr/people'), 'HR/People');
        assert.equal(roles.coerceRoleCategory('something else'), 'Other');
    });
});

describe('groupByRole', () => {
    test('returns all eleven categories in order, empty ones included', () => {
        const groups = roles.groupByRole([candidate('a', 'Sales'), candidate('b', 'Engineering'), candidate('c', 'Sales')]);

        assert.equal(groups.length, 11);
        assert.equal(groups[0]?.category_name, 'Engineering');
        assert.equal(groups[10]?.category_name, 'Other');
        assert.deepEqual(groups.find((g) => g.category_name === 'Sales')?.members.map((m) => m.id), ['a', 'c']);
        assert.deepEqual(groups.find((g) => g.category_name === 'Finance')?.members, []);
    });
});
