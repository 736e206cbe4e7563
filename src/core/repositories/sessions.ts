import { getDatabase } from '../../db';
import { SessionRecord } from '../../types/domain';
import { toNumber } from './shared';

interface SessionRow {
    id: string;
    payload_json: string;
    created_at: number | string;
    expires_at: number | string;
}

export async function insertSession(id: string, payload: Record<string, unknown>, createdAt: number, expiresAt: number): Promise<void> {
    const db = await getDatabase();
    await db.run(
        `INSERT INTO sessions (id, payload_json, created_at, expires_at) VALUES (?, ?, ?, ?)`,
        [id, JSON.stringify(payload), createdAt, expiresAt]
    );
}

export async function getSessionRecord(id: string): Promise<SessionRecord | undefined> {
    const db = await getDatabase();
    const row = await db.get<SessionRow>(`SELECT id, payload_json, created_at, expires_at FROM sessions WHERE id = ?`, [id]);
    if (!row) {
        return undefined;
    }
    return {
        id: row.id,
        payload_json: row.payload_json,
        created_at: toNumber(row.created_at),
        expires_at: toNumber(row.expires_at),
    };
}

export async function deleteExpiredSessions(now: number): Promise<number> {
    const db = await getDatabase();
    const result = await db.run(`DELETE FROM sessions WHERE expires_at < ?`, [now]);
    return result.changes ?? 0;
}
