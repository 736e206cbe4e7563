/**
 * Value sources for one form field, in priority order:
 *   profile:   explicit applicant data matched by label
 *   inferred:  a safe default for the field's shape (consent boxes, yes/no, numbers)
 *   generated: free text from the generation capability, mapped onto options
 */

import { callCapability } from '../core/integrationPolicy';
import { CancelledError, errorMessage } from '../core/errors';
import { logWarn } from '../telemetry/logger';
import { ClassificationCapability } from '../types/capabilities';
import { ApplicantProfile, JobPosting } from '../types/domain';
import { FormField } from './fieldClassifier';

export type ValueSource = 'profile' | 'inferred' | 'generated';

export const VALUE_SOURCES: readonly ValueSource[] = ['profile', 'inferred', 'generated'];

export interface ValueResolverContext {
    profile: ApplicantProfile;
    capability: ClassificationCapability;
    job?: JobPosting | null;
    monthlySalary?: number | null;
    resumePath?: string | null;
    maxAttempts?: number;
    baseDelayMs?: number;
    signal?: AbortSignal;
}

interface ProfileRule {
    pattern: RegExp;
    value: (context: ValueResolverContext) => string;
}

const PLACEHOLDER_OPTION = /^(select|choose|please|--|-)/i;

const NUMERIC_LABEL = /\b(how many|number of|years?|months?)\b/i;

function fullName(profile: ApplicantProfile): string {
    return `${profile.first_name} ${profile.last_name}`.trim();
}

// Checked in order; the first pattern found in the label decides.
const PROFILE_RULES: ReadonlyArray<ProfileRule> = [
    { pattern: /country code/, value: (c) => c.profile.phone_country_code },
    { pattern: /\b(first|given) name\b/, value: (c) => c.profile.first_name },
    { pattern: /\b(last|family) name\b|\bsurname\b/, value: (c) => c.profile.last_name },
    { pattern: /\bfull name\b|^name$|\byour name\b/, value: (c) => fullName(c.profile) },
    { pattern: /e-?mail/, value: (c) => c.profile.email },
    { pattern: /\b(phone|mobile)\b/, value: (c) => c.profile.phone },
    { pattern: /\b(city|location)\b/, value: (c) => c.profile.city },
    { pattern: /\bcountry\b/, value: (c) => c.profile.country },
    { pattern: /linkedin/, value: (c) => c.profile.linkedin_url },
    { pattern: /\b(website|portfolio)\b/, value: (c) => c.profile.website },
    {
        pattern: /\b(salary|compensation|pay expectations?)\b/,
        value: (c) => (c.monthlySalary ? String(c.monthlySalary) : c.profile.expected_salary),
    },
    { pattern: /\b(summary|cover letter|about yourself)\b/, value: (c) => c.profile.summary },
];

function normalizeLabel(label: string): string {
    return label.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Exact (case-insensitive) match first, then containment either way, then the
 * first option. Empty when the field has no options.
 */
export function findBestOptionMatch(answer: string, options: readonly string[]): string {
    if (options.length === 0) {
        return '';
    }
    const wanted = answer.trim().toLowerCase();
    const exact = options.find((option) => option.toLowerCase() === wanted);
    if (exact !== undefined) {
        return exact;
    }
    if (wanted) {
        const partial = options.find((option) => {
            const candidate = option.toLowerCase();
            return candidate.includes(wanted) || wanted.includes(candidate);
        });
        if (partial !== undefined) {
            return partial;
        }
    }
    return options[0] ?? '';
}

function strictOptionMatch(value: string, options: readonly string[]): string | null {
    const wanted = value.trim().toLowerCase();
    if (!wanted) return null;
    const exact = options.find((option) => option.toLowerCase() === wanted);
    if (exact !== undefined) return exact;
    return options.find((option) => option.toLowerCase().includes(wanted)) ?? null;
}

function isChoiceField(field: FormField): boolean {
    return field.semantic_type === 'select' || field.semantic_type === 'radio';
}

function yearsOfExperience(label: string, profile: ApplicantProfile): string | null {
    if (!/\byears?\b/.test(label) || !/experience/.test(label)) {
        return null;
    }
    for (const [skill, years] of Object.entries(profile.years_of_experience)) {
        if (label.includes(skill.toLowerCase())) {
            return String(years);
        }
    }
    return null;
}

function fromProfile(field: FormField, context: ValueResolverContext): string | null {
    const label = normalizeLabel(field.label);

    if (field.semantic_type === 'file') {
        const resume = context.resumePath || context.profile.resume_path;
        return /\b(resume|cv|curriculum)\b/.test(label) && resume ? resume : null;
    }

    let value: string | null = null;
    for (const [question, answer] of Object.entries(context.profile.answers)) {
        if (question && label.includes(question.toLowerCase())) {
            value = answer;
            break;
        }
    }
    if (value === null) {
        value = yearsOfExperience(label, context.profile);
    }
    if (value === null) {
        const rule = PROFILE_RULES.find((candidate) => candidate.pattern.test(label));
        value = rule ? rule.value(context) : null;
    }
    if (!value) {
        return null;
    }
    if (isChoiceField(field)) {
        return strictOptionMatch(value, field.options);
    }
    return value;
}

function inferDefault(field: FormField): string | null {
    switch (field.semantic_type) {
        case 'checkbox':
            return 'true';
        case 'select':
        case 'radio': {
            const yes = field.options.find((option) => option.trim().toLowerCase() === 'yes');
            if (yes !== undefined) return yes;
            return field.options.find((option) => option.trim() !== '' && !PLACEHOLDER_OPTION.test(option.trim())) ?? null;
        }
        case 'text':
            if (field.input_type === 'number' || NUMERIC_LABEL.test(field.label)) {
                return '0';
            }
            return null;
        default:
            return null;
    }
}

export function buildGenerationPrompt(field: FormField, context: ValueResolverContext): string {
    const { profile, job } = context;
    const lines = [
        'Candidate profile:',
        `- Name: ${fullName(profile)}`,
        `- Location: ${[profile.city, profile.country].filter(Boolean).join(', ') || 'n/a'}`,
        `- Summary: ${profile.summary || 'n/a'}`,
        `- Years of experience: ${Object.entries(profile.years_of_experience).map(([skill, years]) => `${skill} ${years}`).join(', ') || 'n/a'}`,
        `- Expected monthly salary: ${context.monthlySalary ?? (profile.expected_salary || 'n/a')}`,
    ];
    if (job) {
        lines.push('', `Job: ${job.title} at ${job.company} (${job.location})`);
    }
    lines.push('', `Form question: ${field.label || field.identifier}`, `Question type: ${field.semantic_type}`);
    if (field.options.length > 0) {
        lines.push(`Available options: ${field.options.join(' | ')}`);
    }
    lines.push('', 'Answer with the value only (max 200 characters). For choices, give the exact option text.');
    return lines.join('\n');
}

async function generateValue(field: FormField, context: ValueResolverContext): Promise<string | null> {
    if (field.semantic_type === 'file' || field.semantic_type === 'unknown') {
        return null;
    }
    let answer: string;
    try {
        answer = await callCapability('generate', () => context.capability.generate(buildGenerationPrompt(field, context)), {
            maxAttempts: context.maxAttempts,
            baseDelayMs: context.baseDelayMs,
            signal: context.signal,
        });
    } catch (error) {
        if (error instanceof CancelledError) throw error;
        await logWarn('form.value.generate_failed', { fieldId: field.identifier, error: errorMessage(error) });
        return null;
    }
    const trimmed = answer.trim();
    if (isChoiceField(field)) {
        return findBestOptionMatch(trimmed, field.options) || null;
    }
    if (field.semantic_type === 'checkbox') {
        return /^(no|false)$/i.test(trimmed) ? 'false' : 'true';
    }
    return trimmed ? trimmed.slice(0, 200) : null;
}

export async function resolveFromSource(
    field: FormField,
    source: ValueSource,
    context: ValueResolverContext
): Promise<string | null> {
    switch (source) {
        case 'profile':
            return fromProfile(field, context);
        case 'inferred':
            return inferDefault(field);
        case 'generated':
            return generateValue(field, context);
    }
}
