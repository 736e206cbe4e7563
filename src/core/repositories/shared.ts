export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseJsonObject(raw: string | null | undefined): Record<string, unknown> {
    if (!raw) {
        return {};
    }
    try {
        const parsed: unknown = JSON.parse(raw);
        return isRecord(parsed) ? parsed : {};
    } catch {
        return {};
    }
}

export function normalizeTextValue(value: string | null | undefined): string {
    return (value ?? '').trim();
}

export function normalizeAccountKey(value: string | null | undefined): string {
    return normalizeTextValue(value).toLowerCase() || 'default';
}

/** Postgres hands BIGINT and COUNT(*) back as strings. */
export function toNumber(value: unknown): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : 0;
    }
    return 0;
}

export function nowIso(now: Date = new Date()): string {
    return now.toISOString();
}
