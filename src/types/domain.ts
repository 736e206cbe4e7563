export type TaskKind = 'job_apply' | 'outreach_search' | 'outreach_send';

export type TaskState = 'PENDING' | 'RUNNING' | 'COMPLETED' | 'FAILED';

export const TERMINAL_TASK_STATES: ReadonlySet<TaskState> = new Set<TaskState>(['COMPLETED', 'FAILED']);

export type FailureKind =
    | 'ValidationError'
    | 'NotFound'
    | 'Expired'
    | 'InvalidTransition'
    | 'UnfillableField'
    | 'DeliveryError'
    | 'CapabilityError'
    | 'Cancelled'
    | 'Timeout'
    | 'WorkError';

export interface TaskFailure {
    kind: FailureKind;
    reason: string;
}

export interface TaskRecord {
    id: string;
    kind: TaskKind;
    state: TaskState;
    account_key: string;
    params_json: string;
    error_kind: FailureKind | null;
    error_reason: string | null;
    result_ref: string | null;
    result_json: string | null;
    created_at: string;
    started_at: string | null;
    completed_at: string | null;
}

export interface Task {
    id: string;
    kind: TaskKind;
    state: TaskState;
    accountKey: string;
    params: Record<string, unknown>;
    createdAt: string;
    startedAt: string | null;
    completedAt: string | null;
    error: TaskFailure | null;
    resultRef: string | null;
    result: Record<string, unknown> | null;
}

export interface TaskTransitionRecord {
    id: number;
    task_id: string;
    from_state: TaskState | null;
    to_state: TaskState;
    detail: string | null;
    created_at: string;
}

export interface SessionRecord {
    id: string;
    payload_json: string;
    created_at: number;
    expires_at: number;
}

// ─── Outreach ────────────────────────────────────────────────────────────────

export const ROLE_CATEGORIES = [
    'Engineering',
    'Finance',
    'Investment Banking / M&A',
    'Strategy Consulting',
    'Crypto / Web3',
    'Sales',
    'Marketing',
    'HR/People',
    'Operations',
    'Executive',
    'Other',
] as const;

export type RoleCategory = typeof ROLE_CATEGORIES[number];

export const DEFAULT_ROLE_CATEGORY: RoleCategory = 'Other';

export interface CompanyRecord {
    id: number;
    name: string;
    domain: string;
    industry: string;
    country: string;
    size: string;
    linkedin_url: string;
}

export interface CompanyFilters {
    industry: string[];
    country: string[];
    size: string[];
}

/** Raw person returned by the employee-search capability, before classification. */
export interface EmployeeProfile {
    name: string;
    title: string;
    profile_url: string;
}

export interface Candidate {
    id: string;
    display_name: string;
    title: string;
    profile_reference: string;
    company: string;
    assigned_category: RoleCategory;
}

export interface RoleGroup {
    category_name: RoleCategory;
    members: Candidate[];
}

/** Stored in the Session between the two outreach phases. */
export type OutreachSessionPayload = {
    task_id: string;
    trace_id: string;
    filters: CompanyFilters;
    companies: string[];
    role_groups: RoleGroup[];
};

export type DispatchStatus = 'SENT' | 'SKIPPED' | 'FAILED';

export type DispatchChannelKind = 'direct_message' | 'connection_request';

export interface MessageDispatchRecord {
    task_id: string;
    candidate_id: string;
    profile_reference: string;
    category: RoleCategory;
    channel: DispatchChannelKind | null;
    status: DispatchStatus;
    reason: string | null;
    timestamp: string;
}

// ─── Job applications ────────────────────────────────────────────────────────

export interface JobSearchQuery {
    job_title: string;
    location: string;
    monthly_salary: number | null;
    limit: number;
}

export interface JobPosting {
    id: string;
    title: string;
    company: string;
    location: string;
    url: string;
    description: string;
}

export type JobApplicationStatus = 'APPLIED' | 'FAILED' | 'SKIPPED';

export interface JobApplicationRecord {
    job_id: string;
    title: string;
    company: string;
    url: string;
    status: JobApplicationStatus;
    reason: string | null;
    applied_at: string;
}

/** Applicant data used to answer application forms. */
export interface ApplicantProfile {
    first_name: string;
    last_name: string;
    email: string;
    phone: string;
    phone_country_code: string;
    city: string;
    country: string;
    linkedin_url: string;
    website: string;
    resume_path: string;
    expected_salary: string;
    summary: string;
    years_of_experience: Record<string, number>;
    answers: Record<string, string>;
}

export interface Credentials {
    email: string;
    password: string;
}
