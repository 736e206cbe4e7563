/**
 * Drives one multi-step application form whose markup is unknown in advance.
 *
 *   Loaded → Analyzing → Filling → Validating → Advancing → Analyzing (next step)
 *                                            └→ Submitting → Completed
 *
 * Any non-terminal state can move to Failed. Nothing survives between runs.
 */

import { config } from '../config';
import { CancelledError, UnfillableFieldError, errorMessage } from '../core/errors';
import { callCapability } from '../core/integrationPolicy';
import { logInfo, logWarn } from '../telemetry/logger';
import { ClassificationCapability, FormAutomation, VisibleField } from '../types/capabilities';
import { ApplicantProfile, JobPosting } from '../types/domain';
import { FormField, classifyField } from './fieldClassifier';
import { VALUE_SOURCES, ValueResolverContext, resolveFromSource } from './valueResolver';

export type FormState =
    | 'Loaded'
    | 'Analyzing'
    | 'Filling'
    | 'Validating'
    | 'Advancing'
    | 'Submitting'
    | 'Completed'
    | 'Failed';

export type FormFailureReason =
    | 'unfillable_field'
    | 'unsupported_field'
    | 'step_limit_exceeded'
    | 'unexpected_ui_state'
    | 'cancelled';

export interface FormTransition {
    from: FormState;
    to: FormState;
    step: number;
    detail: string | null;
    at: string;
}

export interface FormRunResult {
    state: 'Completed' | 'Failed';
    reason: FormFailureReason | null;
    detail: string | null;
    steps: number;
    transitions: FormTransition[];
    answers: Record<string, string>;
}

export interface FormRunOptions {
    profile: ApplicantProfile;
    capability: ClassificationCapability;
    url?: string | null;
    job?: JobPosting | null;
    monthlySalary?: number | null;
    resumePath?: string | null;
    maxSteps?: number;
    maxFillAttempts?: number;
    capabilityMaxAttempts?: number;
    capabilityBaseDelayMs?: number;
    signal?: AbortSignal;
}

interface FillProgress {
    sourceIndex: number;
    attempts: number;
}

class FormRunFailure extends Error {
    constructor(readonly reason: FormFailureReason, detail: string) {
        super(detail);
        this.name = 'FormRunFailure';
    }
}

function needsValue(field: FormField, visible: VisibleField | undefined): boolean {
    if (!visible) {
        return false;
    }
    if (visible.validationError) {
        return true;
    }
    return field.required && visible.currentValue.trim() === '';
}

export class FormCompletionStateMachine {
    private readonly automation: FormAutomation;
    private readonly options: FormRunOptions;
    private readonly maxSteps: number;
    private readonly maxFillAttempts: number;
    private readonly resolverContext: ValueResolverContext;
    private state: FormState = 'Loaded';
    private step = 0;
    private readonly transitions: FormTransition[] = [];
    private readonly answers: Record<string, string> = {};

    constructor(automation: FormAutomation, options: FormRunOptions) {
        this.automation = automation;
        this.options = options;
        this.maxSteps = options.maxSteps ?? config.formMaxSteps;
        this.maxFillAttempts = Math.max(1, options.maxFillAttempts ?? config.formMaxFillAttempts);
        this.resolverContext = {
            profile: options.profile,
            capability: options.capability,
            job: options.job ?? null,
            monthlySalary: options.monthlySalary ?? null,
            resumePath: options.resumePath ?? null,
            maxAttempts: options.capabilityMaxAttempts,
            baseDelayMs: options.capabilityBaseDelayMs,
            signal: options.signal,
        };
    }

    get currentState(): FormState {
        return this.state;
    }

    async run(): Promise<FormRunResult> {
        if (this.state !== 'Loaded') {
            throw new Error('form state machine instances are single-use');
        }
        try {
            if (this.options.url) {
                const url = this.options.url;
                await this.port('navigate', () => this.automation.navigate(url));
            }
            await this.runSteps();
            return this.result(null, null);
        } catch (error) {
            const failure = this.toRunFailure(error);
            this.moveTo('Failed', `${failure.reason}: ${failure.message}`, false);
            await logWarn('form.run.failed', { reason: failure.reason, detail: failure.message, steps: this.step });
            return this.result(failure.reason, failure.message);
        }
    }

    private async runSteps(): Promise<void> {
        for (;;) {
            this.step += 1;
            if (this.step > this.maxSteps) {
                throw new FormRunFailure('step_limit_exceeded', `form still open after ${this.maxSteps} steps`);
            }

            const visible = await this.port('listVisibleFields', () => this.automation.listVisibleFields());
            this.moveTo('Analyzing', `${visible.length} fields`);
            const actions = await this.port('listFormActions', () => this.automation.listFormActions());
            if (visible.length === 0 && !actions.advance && !actions.submit) {
                throw new FormRunFailure('unexpected_ui_state', 'no fields and no form actions visible');
            }

            const fields: FormField[] = [];
            for (const field of visible) {
                fields.push(await classifyField(field, this.options.capability, {
                    maxAttempts: this.options.capabilityMaxAttempts,
                    baseDelayMs: this.options.capabilityBaseDelayMs,
                    signal: this.options.signal,
                }));
            }
            this.assertSupported(fields);

            this.moveTo('Filling', null);
            const progress = new Map<string, FillProgress>();
            for (const field of fields) {
                if (field.semantic_type === 'unknown' || !needsValue(field, visible.find((v) => v.identifier === field.identifier))) {
                    continue;
                }
                await this.fill(field, progress);
            }

            this.moveTo('Validating', null);
            await this.validate(fields, progress);

            const outcomeActions = await this.port('listFormActions', () => this.automation.listFormActions());
            if (outcomeActions.advance) {
                this.moveTo('Advancing', null);
                const outcome = await this.port('submitOrAdvance', () => this.automation.submitOrAdvance());
                if (outcome === 'advanced') {
                    continue;
                }
                if (outcome === 'submitted') {
                    this.moveTo('Submitting', 'advance action submitted the form');
                    this.moveTo('Completed', null);
                    await logInfo('form.run.completed', { steps: this.step });
                    return;
                }
                throw new FormRunFailure('unexpected_ui_state', 'advance action was blocked');
            }
            if (outcomeActions.submit) {
                this.moveTo('Submitting', null);
                const outcome = await this.port('submitOrAdvance', () => this.automation.submitOrAdvance());
                if (outcome === 'submitted') {
                    this.moveTo('Completed', null);
                    await logInfo('form.run.completed', { steps: this.step });
                    return;
                }
                throw new FormRunFailure('unexpected_ui_state', `submit returned ${outcome}`);
            }
            throw new FormRunFailure('unexpected_ui_state', 'form validated but offers neither advance nor submit');
        }
    }

    private assertSupported(fields: FormField[]): void {
        for (const field of fields) {
            if (!field.required) continue;
            if (field.semantic_type === 'unknown') {
                throw new FormRunFailure('unsupported_field', `required field "${field.label || field.identifier}" has an unrecognized type`);
            }
            if (field.semantic_type === 'file' && !(this.options.resumePath || this.options.profile.resume_path)) {
                throw new FormRunFailure('unsupported_field', `required upload "${field.label || field.identifier}" but no document is available`);
            }
        }
    }

    /** Tries the next value source for the field and writes the first value found. */
    private async fill(field: FormField, progress: Map<string, FillProgress>): Promise<void> {
        const entry = progress.get(field.identifier) ?? { sourceIndex: 0, attempts: 0 };
        progress.set(field.identifier, entry);
        if (entry.attempts >= this.maxFillAttempts) {
            throw new UnfillableFieldError(
                field.identifier,
                `field "${field.label || field.identifier}" still invalid after ${entry.attempts} attempts`
            );
        }

        while (entry.sourceIndex < VALUE_SOURCES.length) {
            const source = VALUE_SOURCES[entry.sourceIndex];
            entry.sourceIndex += 1;
            if (!source) break;
            const value = await resolveFromSource(field, source, this.resolverContext);
            if (value === null) {
                continue;
            }
            await this.port('setValue', () => this.automation.setValue(field.identifier, value));
            entry.attempts += 1;
            this.answers[field.label || field.identifier] = value;
            return;
        }

        throw new UnfillableFieldError(field.identifier, `no value source left for field "${field.label || field.identifier}"`);
    }

    private async validate(fields: FormField[], progress: Map<string, FillProgress>): Promise<void> {
        for (let round = 0; ; round += 1) {
            const reread = await this.port('listVisibleFields', () => this.automation.listVisibleFields());
            const failing = fields.filter((field) => {
                if (field.semantic_type === 'unknown') return false;
                return needsValue(field, reread.find((v) => v.identifier === field.identifier));
            });
            if (failing.length === 0) {
                return;
            }
            if (round >= this.maxFillAttempts) {
                const ids = failing.map((field) => field.identifier).join(',');
                throw new UnfillableFieldError(ids, `fields ${ids} still invalid after ${round} refill rounds`);
            }
            this.moveTo('Filling', `refill ${failing.map((field) => field.identifier).join(',')}`);
            for (const field of failing) {
                await this.fill(field, progress);
            }
            this.moveTo('Validating', null);
        }
    }

    private async port<T>(operation: string, call: () => Promise<T>): Promise<T> {
        this.checkCancelled();
        return callCapability(`form.${operation}`, call, {
            maxAttempts: this.options.capabilityMaxAttempts,
            baseDelayMs: this.options.capabilityBaseDelayMs,
            signal: this.options.signal,
        });
    }

    private checkCancelled(): void {
        if (this.options.signal?.aborted) {
            throw new CancelledError('form run cancelled');
        }
    }

    private moveTo(next: FormState, detail: string | null, checkCancel: boolean = true): void {
        if (checkCancel) {
            this.checkCancelled();
        }
        this.transitions.push({
            from: this.state,
            to: next,
            step: this.step,
            detail,
            at: new Date().toISOString(),
        });
        this.state = next;
    }

    private toRunFailure(error: unknown): FormRunFailure {
        if (error instanceof FormRunFailure) {
            return error;
        }
        if (error instanceof CancelledError) {
            return new FormRunFailure('cancelled', error.message);
        }
        if (error instanceof UnfillableFieldError) {
            return new FormRunFailure('unfillable_field', error.message);
        }
        return new FormRunFailure('unexpected_ui_state', errorMessage(error));
    }

    private result(reason: FormFailureReason | null, detail: string | null): FormRunResult {
        return {
            state: this.state === 'Completed' ? 'Completed' : 'Failed',
            reason,
            detail,
            steps: this.step,
            transitions: [...this.transitions],
            answers: { ...this.answers },
        };
    }
}
