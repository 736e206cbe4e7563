import { createHash } from 'crypto';

export function tryParseUrl(raw: string): URL | null {
    const trimmed = raw.trim();
    if (!trimmed) return null;
    try {
        return new URL(trimmed);
    } catch {
        return null;
    }
}

function safeDecode(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch {
        return segment;
    }
}

export function isLinkedInHost(hostname: string): boolean {
    const host = hostname.toLowerCase();
    return host === 'linkedin.com' || host.endsWith('.linkedin.com');
}

/**
 * Canonical form of a profile reference: profiles collapse to https://www.linkedin.com/in/<slug>/
 * so that tracking parameters, locale subdomains and sub-pages do not create duplicates.
 * Anything that is not a platform URL is only trimmed and lowercased.
 */
export function normalizeProfileReference(raw: string): string {
    const parsed = tryParseUrl(raw);
    if (!parsed || !isLinkedInHost(parsed.hostname)) {
        return raw.trim().toLowerCase();
    }

    const normalized = new URL(parsed.toString());
    normalized.protocol = 'https:';
    normalized.hostname = 'www.linkedin.com';
    normalized.hash = '';
    normalized.search = '';

    const parts = normalized.pathname.split('/').filter(Boolean);
    const [section, slug] = parts;
    if (section && slug && section.toLowerCase() === 'in') {
        normalized.pathname = `/in/${safeDecode(slug).toLowerCase()}/`;
        return normalized.toString();
    }

    normalized.pathname = normalized.pathname.replace(/\/+$/, '').toLowerCase();
    return normalized.toString();
}

export function candidateIdFor(profileReference: string): string {
    return createHash('sha256').update(normalizeProfileReference(profileReference)).digest('hex').slice(0, 16);
}
