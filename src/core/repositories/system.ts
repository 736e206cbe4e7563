/**
 * repositories/system.ts
 * Run logs written by the telemetry logger.
 */

import { getDatabase } from '../../db';
import { nowIso } from './shared';

export async function recordRunLog(
    level: 'INFO' | 'WARN' | 'ERROR',
    event: string,
    correlationId: string | null,
    payload: Record<string, unknown>
): Promise<void> {
    const db = await getDatabase();
    await db.run(
        `
        INSERT INTO run_logs (level, event, correlation_id, payload_json, created_at)
        VALUES (?, ?, ?, ?, ?)
    `,
        [level, event, correlationId, JSON.stringify(payload), nowIso()]
    );
}
