/**
 * repositories/sendLedger.ts
 * The daily-send cap is enforced by one conditional INSERT: the count check and
 * the reservation happen in the same statement, so concurrent tasks cannot overshoot.
 */

import { getDatabase } from '../../db';
import { DailyCapWindow } from '../../config';
import { toNumber } from './shared';

const ROLLING_WINDOW_MS = 24 * 60 * 60 * 1000;

export interface SendReservationInput {
    reservationId: string;
    accountKey: string;
    cap: number;
    window: DailyCapWindow;
    localDate: string;
    nowMs: number;
}

function windowClause(window: DailyCapWindow): string {
    return window === 'calendar' ? 'local_date = ?' : 'sent_at > ?';
}

function windowParam(window: DailyCapWindow, localDate: string, nowMs: number): string | number {
    return window === 'calendar' ? localDate : nowMs - ROLLING_WINDOW_MS;
}

export async function tryReserveDailySend(input: SendReservationInput): Promise<boolean> {
    if (input.cap <= 0) {
        return false;
    }
    const db = await getDatabase();
    const result = await db.run(
        `
        INSERT INTO daily_send_ledger (id, account_key, local_date, sent_at)
        SELECT ?, ?, ?, ?
        WHERE (
            SELECT COUNT(*) FROM daily_send_ledger
            WHERE account_key = ? AND ${windowClause(input.window)}
        ) < ?
    `,
        [
            input.reservationId,
            input.accountKey,
            input.localDate,
            input.nowMs,
            input.accountKey,
            windowParam(input.window, input.localDate, input.nowMs),
            input.cap,
        ]
    );
    return (result.changes ?? 0) > 0;
}

export async function releaseDailySend(reservationId: string): Promise<void> {
    const db = await getDatabase();
    await db.run(`DELETE FROM daily_send_ledger WHERE id = ?`, [reservationId]);
}

export async function countDailySends(
    accountKey: string,
    window: DailyCapWindow,
    localDate: string,
    nowMs: number
): Promise<number> {
    const db = await getDatabase();
    const row = await db.get<{ total: number | string }>(
        `SELECT COUNT(*) AS total FROM daily_send_ledger WHERE account_key = ? AND ${windowClause(window)}`,
        [accountKey, windowParam(window, localDate, nowMs)]
    );
    return toNumber(row?.total);
}
