import { z } from 'zod';
import { ValidationError } from '../core/errors';
import { ROLE_CATEGORIES } from '../types/domain';

const trimmedString = z.string().trim();

export const credentialsSchema = z.object({
    email: trimmedString.min(1),
    password: z.string().min(1),
});

export const applicantProfileSchema = z.object({
    first_name: trimmedString.default(''),
    last_name: trimmedString.default(''),
    email: trimmedString.default(''),
    phone: trimmedString.default(''),
    phone_country_code: trimmedString.default(''),
    city: trimmedString.default(''),
    country: trimmedString.default(''),
    linkedin_url: trimmedString.default(''),
    website: trimmedString.default(''),
    resume_path: trimmedString.default(''),
    expected_salary: trimmedString.default(''),
    summary: z.string().default(''),
    years_of_experience: z.record(z.number().nonnegative()).default({}),
    answers: z.record(z.string()).default({}),
});

export const jobSearchSchema = z.object({
    job_title: trimmedString.min(1),
    location: trimmedString.default(''),
    monthly_salary: z.number().nonnegative().nullable().default(null),
    limit: z.number().int().min(1).max(100).default(20),
});

export const jobApplyRequestSchema = z.object({
    job_searches: z.array(jobSearchSchema).min(1),
    credentials: credentialsSchema.nullable().default(null),
    profile: applicantProfileSchema.default({}),
    cv_data_path: trimmedString.min(1).nullable().default(null),
});

export const companyFiltersSchema = z.object({
    industry: z.array(trimmedString).default([]),
    country: z.array(trimmedString).default([]),
    size: z.array(trimmedString).default([]),
});

export const outreachSearchRequestSchema = z.object({
    filters: companyFiltersSchema.default({}),
    credentials: credentialsSchema.nullable().default(null),
    company_limit: z.number().int().positive().nullable().default(null),
    employees_per_company: z.number().int().min(1).max(100).nullable().default(null),
    total_limit: z.number().int().positive().nullable().default(null),
    exclude_companies: z.array(trimmedString).default([]),
    exclude_profile_urls: z.array(trimmedString).default([]),
});

const roleCategorySchema = z.enum(ROLE_CATEGORIES);

export const selectedGroupSchema = z.object({
    enabled: z.boolean().default(true),
    message_template: z.string().min(1),
    template_variables: z.record(z.string()).default({}),
});

export const outreachSendRequestSchema = z
    .object({
        session_id: trimmedString.min(1),
        selected_groups: z.record(roleCategorySchema, selectedGroupSchema),
        credentials: credentialsSchema.nullable().default(null),
        warm_up: z.boolean().default(false),
        reassignments: z.record(trimmedString, roleCategorySchema).default({}),
        selected_candidates: z.array(trimmedString).nullable().default(null),
        max_per_company: z.number().int().positive().nullable().default(null),
    })
    .superRefine((request, ctx) => {
        const enabled = Object.values(request.selected_groups).some((group) => group?.enabled);
        if (!enabled) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['selected_groups'],
                message: 'at least one group must be enabled',
            });
        }
    });

export type JobApplyRequest = z.infer<typeof jobApplyRequestSchema>;
export type OutreachSearchRequest = z.infer<typeof outreachSearchRequestSchema>;
export type OutreachSendRequest = z.infer<typeof outreachSendRequestSchema>;
export type SelectedGroup = z.infer<typeof selectedGroupSchema>;

function formatIssue(issue: z.ZodIssue): string {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
}

export function validateBody<T extends z.ZodType>(
    schema: T,
    body: unknown
): { success: true; data: z.infer<T> } | { success: false; issues: z.ZodIssue[] } {
    const result = schema.safeParse(body);
    if (!result.success) {
        return { success: false, issues: result.error.issues };
    }
    return { success: true, data: result.data };
}

/** Same as validateBody but raises ValidationError, listing every issue. */
export function parseRequest<T extends z.ZodType>(schema: T, body: unknown): z.infer<T> {
    const result = validateBody(schema, body);
    if (!result.success) {
        const issues = result.issues.map(formatIssue);
        throw new ValidationError(`invalid request: ${issues.join('; ')}`, issues);
    }
    return result.data;
}
