/**
 * repositories/dispatch.ts
 * Append-only outreach audit trail plus the set of profiles already contacted per account.
 */

import { getDatabase } from '../../db';
import { DispatchChannelKind, DispatchStatus, MessageDispatchRecord, RoleCategory } from '../../types/domain';

interface DispatchRow {
    task_id: string;
    candidate_id: string;
    profile_reference: string;
    category: RoleCategory;
    channel: DispatchChannelKind | null;
    status: DispatchStatus;
    reason: string | null;
    created_at: string;
}

export async function appendDispatchRecord(record: MessageDispatchRecord): Promise<void> {
    const db = await getDatabase();
    await db.run(
        `
        INSERT INTO message_dispatch_records (task_id, candidate_id, profile_reference, category, channel, status, reason, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `,
        [
            record.task_id,
            record.candidate_id,
            record.profile_reference,
            record.category,
            record.channel,
            record.status,
            record.reason,
            record.timestamp,
        ]
    );
}

export async function listDispatchRecords(taskId: string): Promise<MessageDispatchRecord[]> {
    const db = await getDatabase();
    const rows = await db.query<DispatchRow>(
        `SELECT task_id, candidate_id, profile_reference, category, channel, status, reason, created_at
         FROM message_dispatch_records WHERE task_id = ? ORDER BY id ASC`,
        [taskId]
    );
    return rows.map((row) => ({
        task_id: row.task_id,
        candidate_id: row.candidate_id,
        profile_reference: row.profile_reference,
        category: row.category,
        channel: row.channel,
        status: row.status,
        reason: row.reason,
        timestamp: row.created_at,
    }));
}

export async function markProfileContacted(
    accountKey: string,
    profileReference: string,
    company: string,
    channel: DispatchChannelKind,
    contactedAt: string
): Promise<void> {
    const db = await getDatabase();
    await db.run(
        `INSERT OR IGNORE INTO contacted_profiles (account_key, profile_reference, company, channel, contacted_at)
         VALUES (?, ?, ?, ?, ?)`,
        [accountKey, profileReference, company, channel, contactedAt]
    );
}

export async function isProfileContacted(accountKey: string, profileReference: string): Promise<boolean> {
    const db = await getDatabase();
    const row = await db.get<{ profile_reference: string }>(
        `SELECT profile_reference FROM contacted_profiles WHERE account_key = ? AND profile_reference = ?`,
        [accountKey, profileReference]
    );
    return !!row;
}
