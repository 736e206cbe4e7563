import { config } from '../config';
import { callCapability } from '../core/integrationPolicy';
import { errorMessage } from '../core/errors';
import { logWarn } from '../telemetry/logger';
import { ClassificationCapability } from '../types/capabilities';
import { Candidate, DEFAULT_ROLE_CATEGORY, ROLE_CATEGORIES, RoleCategory, RoleGroup } from '../types/domain';

interface RoleRule {
    category: RoleCategory;
    pattern: RegExp;
}

// Order matters: the first matching rule wins ("CTO, Software" is Executive, not Engineering).
const ROLE_RULES: ReadonlyArray<RoleRule> = [
    { category: 'Executive', pattern: /\b(ceo|cfo|cto|coo|cmo|cio|chief|founder|co founder|cofounder|president|managing partner)\b/ },
    { category: 'Investment Banking / M&A', pattern: /\b(investment bank(ing|er)?|m&a|mergers|acquisitions|corporate finance advisory)\b/ },
    { category: 'Strategy Consulting', pattern: /\b(consultant|consulting|strategy|strategist|engagement manager)\b/ },
    { category: 'Crypto / Web3', pattern: /\b(crypto|blockchain|web3|defi|smart contracts?|solidity|tokenomics)\b/ },
    { category: 'Engineering', pattern: /\b(engineer(ing)?|developer|software|devops|sre|programmer|architect|data scientist|machine learning|ml|frontend|backend|full stack|qa|tech lead)\b/ },
    { category: 'Finance', pattern: /\b(finance|financial|accountant|accounting|controller|treasury|fp&a|auditor|tax|cpa)\b/ },
    { category: 'Sales', pattern: /\b(sales|account executive|account manager|business development|bdr|sdr|partnerships)\b/ },
    { category: 'Marketing', pattern: /\b(marketing|growth|brand|seo|content|communications|pr|social media)\b/ },
    { category: 'HR/People', pattern: /\b(hr|human resources|recruit(er|ing|ment)?|talent|people|hrbp)\b/ },
    { category: 'Operations', pattern: /\b(operations|ops|supply chain|logistics|procurement|office manager)\b/ },
];

export function normalizeTitle(title: string): string {
    return title
        .toLowerCase()
        .replace(/[^\p{L}\p{N}&\s]/gu, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

export function matchRoleRule(normalizedTitle: string): RoleCategory | null {
    for (const rule of ROLE_RULES) {
        if (rule.pattern.test(normalizedTitle)) {
            return rule.category;
        }
    }
    return null;
}

/** Maps a free-form model answer onto the enumeration; anything unrecognized is Other. */
export function coerceRoleCategory(raw: string): RoleCategory {
    const cleaned = raw.trim().replace(/^["'`]+|["'`.]+$/g, '').trim();
    const exact = ROLE_CATEGORIES.find((category) => category === cleaned);
    if (exact) {
        return exact;
    }
    const lowered = cleaned.toLowerCase();
    return ROLE_CATEGORIES.find((category) => category.toLowerCase() === lowered) ?? DEFAULT_ROLE_CATEGORY;
}

export interface RoleClassifierOptions {
    maxAttempts?: number;
    baseDelayMs?: number;
}

/**
 * One instance per search run. Results are cached by normalized title, and the
 * cache holds the pending promise so concurrent lookups of one title share a call.
 */
export class RoleClassifier {
    private readonly capability: ClassificationCapability;
    private readonly cache = new Map<string, Promise<RoleCategory>>();
    private readonly maxAttempts: number;
    private readonly baseDelayMs: number;

    constructor(capability: ClassificationCapability, options: RoleClassifierOptions = {}) {
        this.capability = capability;
        this.maxAttempts = options.maxAttempts ?? config.capabilityMaxAttempts;
        this.baseDelayMs = options.baseDelayMs ?? config.capabilityBaseDelayMs;
    }

    classify(title: string): Promise<RoleCategory> {
        const normalized = normalizeTitle(title);
        if (!normalized) {
            return Promise.resolve(DEFAULT_ROLE_CATEGORY);
        }
        const cached = this.cache.get(normalized);
        if (cached) {
            return cached;
        }
        const pending = this.resolve(normalized);
        this.cache.set(normalized, pending);
        return pending;
    }

    private async resolve(normalized: string): Promise<RoleCategory> {
        const ruled = matchRoleRule(normalized);
        if (ruled) {
            return ruled;
        }
        try {
            const answer = await callCapability('classify', () => this.capability.classify(normalized, ROLE_CATEGORIES), {
                maxAttempts: this.maxAttempts,
                baseDelayMs: this.baseDelayMs,
            });
            return coerceRoleCategory(answer);
        } catch (error) {
            await logWarn('role_classifier.capability_failed', { title: normalized, error: errorMessage(error) });
            return DEFAULT_ROLE_CATEGORY;
        }
    }
}

/** Every category appears, in enumeration order, even when empty. */
export function groupByRole(candidates: readonly Candidate[]): RoleGroup[] {
    return ROLE_CATEGORIES.map((category) => ({
        category_name: category,
        members: candidates.filter((candidate) => candidate.assigned_category === category),
    }));
}
