/**
 * Shared fixtures. Nothing here imports runtime modules at load time: config
 * reads process.env once, so configureTestEnv must run before the first
 * dynamic import of anything that touches config.
 */

import type {
    AutomationProvider,
    AutomationSession,
    ClassificationCapability,
    FormActions,
    MessagingAffordance,
    SubmitOrAdvanceOutcome,
    VisibleField,
} from '../types/capabilities';
import type { CompanyRecord, Credentials, EmployeeProfile, JobPosting, JobSearchQuery } from '../types/domain';

export function configureTestEnv(overrides: Record<string, string> = {}): void {
    const defaults: Record<string, string> = {
        DB_PATH: ':memory:',
        DATABASE_URL: '',
        REDIS_URL: '',
        TIMEZONE: 'UTC',
        INTEGRATION_CIRCUIT_BREAKER_ENABLED: 'false',
        TASK_COMPLETION_TIMEOUT_MS: '0',
        OUTREACH_MIN_DELAY_SEC: '0',
        OUTREACH_MAX_DELAY_SEC: '0',
        PUBLISH_MAX_ATTEMPTS: '3',
        PUBLISH_BASE_DELAY_MS: '1',
        PUBLISH_MAX_DELAY_MS: '2',
        CAPABILITY_MAX_ATTEMPTS: '2',
        CAPABILITY_BASE_DELAY_MS: '1',
        INTEGRATION_RETRY_MAX_DELAY_MS: '2',
        OPENAI_BASE_URL: 'http://localhost:8088/v1',
        OPENAI_API_KEY: 'test-secret',
    };
    for (const [key, value] of Object.entries({ ...defaults, ...overrides })) {
        process.env[key] = value;
    }
}

export class StubCapability implements ClassificationCapability {
    classifyCalls = 0;
    generateCalls = 0;

    constructor(
        private readonly classifier: (text: string, labels: readonly string[]) => Promise<string> = async (_text, labels) => labels[0] ?? '',
        private readonly generator: (prompt: string) => Promise<string> = async () => ''
    ) {}

    async classify(text: string, allowedLabels: readonly string[]): Promise<string> {
        this.classifyCalls += 1;
        return this.classifier(text, allowedLabels);
    }

    async generate(prompt: string): Promise<string> {
        this.generateCalls += 1;
        return this.generator(prompt);
    }
}

export function textField(identifier: string, label: string, extra: Partial<VisibleField> = {}): VisibleField {
    return {
        identifier,
        label,
        tagName: 'input',
        inputType: 'text',
        role: null,
        name: identifier,
        autocomplete: null,
        placeholder: null,
        required: true,
        currentValue: '',
        validationError: null,
        options: [],
        ...extra,
    };
}

export interface FormStepScript {
    fields: VisibleField[];
    /** Error text for a value, or null when the value is accepted. */
    validate?: Record<string, (value: string) => string | null>;
}

/**
 * A scripted multi-step form: every step but the last offers "advance", the
 * last one offers "submit".
 */
export class FakeForm {
    readonly writes: Array<{ fieldId: string; value: string }> = [];
    submitted = false;
    navigatedTo: string | null = null;
    private stepIndex = 0;
    private values = new Map<string, string>();

    constructor(private readonly steps: FormStepScript[]) {}

    async navigate(url: string): Promise<void> {
        this.navigatedTo = url;
    }

    async listVisibleFields(): Promise<VisibleField[]> {
        const step = this.steps[this.stepIndex];
        if (!step || this.submitted) return [];
        return step.fields.map((field) => {
            const value = this.values.get(field.identifier) ?? field.currentValue;
            const check = step.validate?.[field.identifier];
            const touched = this.values.has(field.identifier);
            return {
                ...field,
                currentValue: value,
                validationError: touched && check ? check(value) : field.validationError,
            };
        });
    }

    async setValue(fieldId: string, value: string): Promise<void> {
        this.writes.push({ fieldId, value });
        this.values.set(fieldId, value);
    }

    async listFormActions(): Promise<FormActions> {
        if (this.submitted) return { advance: false, submit: false };
        const last = this.stepIndex === this.steps.length - 1;
        return { advance: !last, submit: last };
    }

    async submitOrAdvance(): Promise<SubmitOrAdvanceOutcome> {
        if (this.submitted) return 'blocked';
        if (this.stepIndex === this.steps.length - 1) {
            this.submitted = true;
            return 'submitted';
        }
        this.stepIndex += 1;
        this.values = new Map();
        return 'advanced';
    }
}

export interface FakeAutomationScript {
    jobs?: Record<string, JobPosting[]>;
    forms?: Record<string, FakeForm>;
    employees?: Record<string, EmployeeProfile[]>;
    affordances?: Record<string, MessagingAffordance>;
    failingProfiles?: string[];
    failingSearches?: string[];
    /** Awaited at the start of every search, to hold a task in RUNNING. */
    gate?: Promise<void>;
}

export interface SentMessage {
    channel: 'direct_message' | 'connection_request';
    profileUrl: string;
    text: string;
}

export class FakeAutomation implements AutomationProvider {
    readonly sent: SentMessage[] = [];
    sessionsOpened = 0;
    sessionsClosed = 0;

    constructor(private readonly script: FakeAutomationScript = {}) {}

    async openSession(_accountKey: string, _credentials: Credentials | null): Promise<AutomationSession> {
        this.sessionsOpened += 1;
        return new FakeSession(this, this.script);
    }
}

class FakeSession implements AutomationSession {
    private form: FakeForm | null = null;

    constructor(private readonly owner: FakeAutomation, private readonly script: FakeAutomationScript) {}

    private currentForm(): FakeForm {
        if (!this.form) throw new Error('no form open');
        return this.form;
    }

    async navigate(url: string): Promise<void> {
        const form = this.script.forms?.[url];
        if (!form) throw new Error(`no scripted form for ${url}`);
        this.form = form;
        await form.navigate(url);
    }

    listVisibleFields(): Promise<VisibleField[]> {
        return this.currentForm().listVisibleFields();
    }

    setValue(fieldId: string, value: string): Promise<void> {
        return this.currentForm().setValue(fieldId, value);
    }

    submitOrAdvance(): Promise<SubmitOrAdvanceOutcome> {
        return this.currentForm().submitOrAdvance();
    }

    listFormActions(): Promise<FormActions> {
        return this.currentForm().listFormActions();
    }

    async searchJobs(query: JobSearchQuery): Promise<JobPosting[]> {
        await this.script.gate;
        if (this.script.failingSearches?.includes(query.job_title)) {
            throw new Error(`search unavailable for ${query.job_title}`);
        }
        return this.script.jobs?.[query.job_title] ?? [];
    }

    async searchEmployees(company: CompanyRecord, limit: number): Promise<EmployeeProfile[]> {
        await this.script.gate;
        return (this.script.employees?.[company.name] ?? []).slice(0, limit);
    }

    async detectAffordance(profileUrl: string): Promise<MessagingAffordance> {
        return this.script.affordances?.[profileUrl] ?? 'direct_message';
    }

    async sendDirectMessage(profileUrl: string, text: string): Promise<void> {
        this.assertDeliverable(profileUrl);
        this.owner.sent.push({ channel: 'direct_message', profileUrl, text });
    }

    async sendConnectionRequest(profileUrl: string, note: string): Promise<void> {
        this.assertDeliverable(profileUrl);
        this.owner.sent.push({ channel: 'connection_request', profileUrl, text: note });
    }

    async close(): Promise<void> {
        this.owner.sessionsClosed += 1;
    }

    private assertDeliverable(profileUrl: string): void {
        if (this.script.failingProfiles?.includes(profileUrl)) {
            throw new Error(`delivery rejected for ${profileUrl}`);
        }
    }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((done) => {
        resolve = done;
    });
    return { promise, resolve };
}

export async function waitFor(check: () => Promise<boolean>, timeoutMs: number = 3000): Promise<void> {
    const startedAt = Date.now();
    while (!(await check())) {
        if (Date.now() - startedAt > timeoutMs) {
            throw new Error(`condition not met within ${timeoutMs}ms`);
        }
        await new Promise((resolve) => setTimeout(resolve, 10));
    }
}

export function profileUrl(slug: string): string {
    return `https://www.linkedin.com/in/${slug}/`;
}
