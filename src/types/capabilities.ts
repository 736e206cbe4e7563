import { CompanyRecord, Credentials, EmployeeProfile, JobPosting, JobSearchQuery } from './domain';

export type FieldSemanticType = 'text' | 'select' | 'radio' | 'checkbox' | 'file' | 'unknown';

export const FIELD_SEMANTIC_TYPES: readonly FieldSemanticType[] = ['text', 'select', 'radio', 'checkbox', 'file', 'unknown'];

/**
 * A field as the browser reports it. Nothing here is known at compile time
 * about the target site's markup: semantic typing happens at run time.
 */
export interface VisibleField {
    identifier: string;
    label: string;
    tagName: string;
    inputType: string | null;
    role: string | null;
    name: string | null;
    autocomplete: string | null;
    placeholder: string | null;
    required: boolean;
    currentValue: string;
    validationError: string | null;
    options: string[];
}

export type SubmitOrAdvanceOutcome = 'advanced' | 'submitted' | 'blocked';

export interface FormActions {
    advance: boolean;
    submit: boolean;
}

export interface FormAutomation {
    navigate(url: string): Promise<void>;
    listVisibleFields(): Promise<VisibleField[]>;
    setValue(fieldId: string, value: string): Promise<void>;
    submitOrAdvance(): Promise<SubmitOrAdvanceOutcome>;
    listFormActions(): Promise<FormActions>;
}

export interface JobSearchAutomation {
    searchJobs(query: JobSearchQuery): Promise<JobPosting[]>;
}

export type MessagingAffordance = 'direct_message' | 'connection_request' | 'none';

export interface OutreachAutomation {
    searchEmployees(company: CompanyRecord, limit: number): Promise<EmployeeProfile[]>;
    detectAffordance(profileUrl: string): Promise<MessagingAffordance>;
    sendDirectMessage(profileUrl: string, text: string): Promise<void>;
    sendConnectionRequest(profileUrl: string, note: string): Promise<void>;
}

/** One authenticated browser session, owned by a single task at a time. */
export interface AutomationSession extends FormAutomation, JobSearchAutomation, OutreachAutomation {
    close(): Promise<void>;
}

export interface AutomationProvider {
    openSession(accountKey: string, credentials: Credentials | null): Promise<AutomationSession>;
}

export interface ClassificationCapability {
    classify(text: string, allowedLabels: readonly string[]): Promise<string>;
    generate(prompt: string): Promise<string>;
}
