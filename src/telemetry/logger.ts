import { recordRunLog } from '../core/repositories';
import { sanitizeForLogs } from '../security/redaction';
import { getCorrelationId, getCurrentTaskId } from './correlation';
import { publishLiveEvent } from './liveEvents';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

const CONSOLE_WRITERS: Record<LogLevel, (message: string, payload: Record<string, unknown>) => void> = {
    INFO: (message, payload) => console.log(message, payload),
    WARN: (message, payload) => console.warn(message, payload),
    ERROR: (message, payload) => console.error(message, payload),
};

async function writeLog(level: LogLevel, event: string, payload: Record<string, unknown>): Promise<void> {
    const correlationId = getCorrelationId();
    const taskId = getCurrentTaskId();
    const enriched: Record<string, unknown> = { ...payload };
    if (correlationId) enriched.correlationId = correlationId;
    if (taskId && enriched.taskId === undefined) enriched.taskId = taskId;
    const safePayload = sanitizeForLogs(enriched);
    CONSOLE_WRITERS[level](`[${level}] ${event}`, safePayload);
    try {
        await recordRunLog(level, event, correlationId, safePayload);
    } catch (error) {
        console.error(`[ERROR] run_log.persist_failed ${event}`, error instanceof Error ? error.message : error);
    }
    publishLiveEvent('run.log', { level, event, payload: safePayload });
}

export async function logInfo(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await writeLog('INFO', event, payload);
}

export async function logWarn(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await writeLog('WARN', event, payload);
}

export async function logError(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await writeLog('ERROR', event, payload);
}
