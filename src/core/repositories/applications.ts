import { getDatabase } from '../../db';
import { JobApplicationRecord, JobApplicationStatus } from '../../types/domain';

export async function upsertJobApplication(
    accountKey: string,
    taskId: string,
    record: JobApplicationRecord
): Promise<void> {
    const db = await getDatabase();
    await db.run(
        `
        INSERT INTO job_applications (job_id, account_key, title, company, url, status, reason, task_id, applied_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(job_id, account_key) DO UPDATE SET
            status = excluded.status,
            reason = excluded.reason,
            task_id = excluded.task_id,
            applied_at = excluded.applied_at
    `,
        [record.job_id, accountKey, record.title, record.company, record.url, record.status, record.reason, taskId, record.applied_at]
    );
}

export async function listAppliedJobIds(accountKey: string, jobIds: string[]): Promise<Set<string>> {
    if (jobIds.length === 0) {
        return new Set();
    }
    const db = await getDatabase();
    const status: JobApplicationStatus = 'APPLIED';
    const rows = await db.query<{ job_id: string }>(
        `SELECT job_id FROM job_applications WHERE account_key = ? AND status = ? AND job_id IN (${jobIds.map(() => '?').join(', ')})`,
        [accountKey, status, ...jobIds]
    );
    return new Set(rows.map((row) => row.job_id));
}
