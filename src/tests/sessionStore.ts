import assert from 'assert';
import { after, before, describe, test } from 'node:test';
import { configureTestEnv } from './helpers';

configureTestEnv();

let db: typeof import('../db');
let errors: typeof import('../core/errors');
let SessionStore: typeof import('../core/sessionStore').SessionStore;

before(async () => {
    db = await import('../db');
    errors = await import('../core/errors');
    ({ SessionStore } = await import('../core/sessionStore'));
    await db.initDatabase();
});

after(async () => {
    await db.closeDatabase();
});

describe('SessionStore', () => {
    test('a payload reads back unchanged within its ttl', async () => {
        let now = 1_000_000;
        const store = new SessionStore(() => now);
        const id = await store.create({ companies: ['Acme'], count: 2 }, 60);
        now += 59_000;
        assert.deepEqual(await store.read(id), { companies: ['Acme'], count: 2 });
    });

    test('reads after expiry fail Expired for any ttl', async () => {
        for (const ttl of [0, 1, 30]) {
            let now = 2_000_000;
            const store = new SessionStore(() => now);
            const id = await store.create({ ttl }, ttl);
            now += ttl * 1000 + 1;
            await assert.rejects(() => store.read(id), errors.ExpiredError);
        }
    });

    test('a pre-allocated id is honoured', async () => {
        const store = new SessionStore();
        const id = store.allocateId();
        assert.equal(await store.create({ ok: true }, 60, { sessionId: id }), id);
        assert.deepEqual(await store.read(id), { ok: true });
    });

    test('unknown ids fail NotFound and negative ttls are rejected', async () => {
        const store = new SessionStore();
        await assert.rejects(() => store.read('no-such-session'), errors.NotFoundError);
        await assert.rejects(() => store.create({}, -1), errors.ValidationError);
    });

    test('purgeExpired removes only expired rows', async () => {
        let now = 5_000_000_000;
        const store = new SessionStore(() => now);
        const live = await store.create({ live: true }, 600);
        const dead = await store.create({ live: false }, 1);
        now += 2_000;
        const purged = await store.purgeExpired();
        assert.ok(purged >= 1);
        await assert.rejects(() => store.read(dead), errors.NotFoundError);
        assert.deepEqual(await store.read(live), { live: true });
    });
});
