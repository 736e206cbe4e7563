import { randomUUID } from 'crypto';
import { config } from '../config';
import { deleteExpiredSessions, getSessionRecord, insertSession, parseJsonObject } from './repositories';
import { ExpiredError, NotFoundError, ValidationError } from './errors';

export interface CreateSessionOptions {
    /** Pre-allocated id, handed to the caller before the payload exists. */
    sessionId?: string;
}

/**
 * Write-once, read-many handoff between the two outreach phases.
 * Expiry is checked lazily on read; purgeExpired only reclaims space.
 */
export class SessionStore {
    private readonly now: () => number;

    constructor(now: () => number = Date.now) {
        this.now = now;
    }

    allocateId(): string {
        return randomUUID();
    }

    async create(
        payload: Record<string, unknown>,
        ttlSeconds: number = config.sessionTtlSeconds,
        options: CreateSessionOptions = {}
    ): Promise<string> {
        if (!Number.isFinite(ttlSeconds) || ttlSeconds < 0) {
            throw new ValidationError(`session ttl must be >= 0, got ${ttlSeconds}`);
        }
        const sessionId = options.sessionId ?? this.allocateId();
        const createdAt = this.now();
        await insertSession(sessionId, payload, createdAt, createdAt + Math.floor(ttlSeconds * 1000));
        return sessionId;
    }

    async read(sessionId: string): Promise<Record<string, unknown>> {
        const record = await getSessionRecord(sessionId);
        if (!record) {
            throw new NotFoundError('session', sessionId);
        }
        if (this.now() > record.expires_at) {
            throw new ExpiredError('session', sessionId, record.expires_at);
        }
        return parseJsonObject(record.payload_json);
    }

    async purgeExpired(): Promise<number> {
        return deleteExpiredSessions(this.now());
    }
}
