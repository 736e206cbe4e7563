const MAX_RECURSION_DEPTH = 6;
const REDACTED = '[REDACTED]';

const SENSITIVE_KEY_PATTERN = /(token|secret|password|passwd|api_?key|cookie|authorization|credentials|bearer)/i;

const JWT_PATTERN = /\b[A-Za-z0-9_-]{20,}\.[A-Za-z0-9_-]{20,}\.[A-Za-z0-9_-]{20,}\b/g;
const API_KEY_PATTERN = /\b(sk|pk|rk)-?[A-Za-z0-9_-]{16,}\b/gi;
const REDIS_URL_PASSWORD_PATTERN = /(rediss?:\/\/[^:@/\s]*:)[^@/\s]+@/gi;
const POSTGRES_URL_PASSWORD_PATTERN = /(postgres(?:ql)?:\/\/[^:@/\s]*:)[^@/\s]+@/gi;

function sanitizeString(input: string): string {
    return input
        .replace(JWT_PATTERN, REDACTED)
        .replace(API_KEY_PATTERN, REDACTED)
        .replace(REDIS_URL_PASSWORD_PATTERN, `$1${REDACTED}@`)
        .replace(POSTGRES_URL_PASSWORD_PATTERN, `$1${REDACTED}@`);
}

function sanitizeArray(input: unknown[], depth: number): unknown[] {
    if (depth > MAX_RECURSION_DEPTH) {
        return ['[MAX_DEPTH_REACHED]'];
    }
    return input.map((item) => sanitizeValue(item, depth + 1));
}

function sanitizeObject(input: object, depth: number): Record<string, unknown> {
    if (depth > MAX_RECURSION_DEPTH) {
        return { note: '[MAX_DEPTH_REACHED]' };
    }

    const output: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
        if (SENSITIVE_KEY_PATTERN.test(key)) {
            output[key] = REDACTED;
            continue;
        }
        output[key] = sanitizeValue(value, depth + 1);
    }
    return output;
}

function sanitizeValue(value: unknown, depth: number): unknown {
    if (value === null || value === undefined) {
        return value;
    }
    if (typeof value === 'string') {
        return sanitizeString(value);
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (value instanceof Error) {
        return { name: value.name, message: sanitizeString(value.message) };
    }
    if (Array.isArray(value)) {
        return sanitizeArray(value, depth);
    }
    if (typeof value === 'object') {
        return sanitizeObject(value, depth);
    }
    return String(value);
}

export function sanitizeForLogs(payload: Record<string, unknown>): Record<string, unknown> {
    return sanitizeObject(payload, 0);
}

/** Strips login secrets from request params before they are persisted on a task. */
export function stripCredentials(params: Record<string, unknown>): Record<string, unknown> {
    const output: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(params)) {
        if (key === 'credentials') {
            continue;
        }
        output[key] = value;
    }
    return output;
}
