import { Candidate } from '../types/domain';

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function extractFirstName(fullName: string): string {
    return fullName.trim().split(/\s+/)[0] ?? '';
}

/** Replaces {name} placeholders. Unknown placeholders render as empty text. */
export function renderTemplate(template: string, variables: Record<string, string>): string {
    return template.replace(PLACEHOLDER, (_match, name: string) => variables[name] ?? '');
}

/**
 * Static variables come from the request; the per-candidate ones always win
 * over a static variable of the same name.
 */
export function buildCandidateVariables(
    candidate: Candidate,
    staticVariables: Record<string, string> = {}
): Record<string, string> {
    return {
        ...staticVariables,
        employee_name: extractFirstName(candidate.display_name),
        employee_full_name: candidate.display_name.trim(),
        company_name: candidate.company,
        employee_title: candidate.title,
        category: candidate.assigned_category,
    };
}
