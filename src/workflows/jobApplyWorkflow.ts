import { config } from '../config';
import { CancelledError, errorMessage } from '../core/errors';
import { callCapability } from '../core/integrationPolicy';
import { listAppliedJobIds, upsertJobApplication } from '../core/repositories';
import { TaskContext } from '../core/taskRunner';
import { FormCompletionStateMachine, FormFailureReason } from '../forms/formStateMachine';
import { logInfo, logWarn } from '../telemetry/logger';
import { AutomationProvider, AutomationSession, ClassificationCapability } from '../types/capabilities';
import { ApplicantProfile, JobApplicationStatus, JobPosting } from '../types/domain';
import { JobApplyRequest } from '../validation/requestSchemas';

export type JobApplicationOutcome = {
    job_id: string;
    title: string;
    company: string;
    url: string;
    status: JobApplicationStatus;
    reason: string | null;
    form_steps: number;
};

export type JobApplyResult = {
    task_id: string;
    status: 'completed' | 'cancelled';
    total_jobs_found: number;
    total_filtered: number;
    total_applied: number;
    application_results: JobApplicationOutcome[];
    errors: string[];
};

export interface JobApplyDeps {
    automation: AutomationProvider;
    capability: ClassificationCapability;
}

const RELEVANCE_LABELS = ['YES', 'NO'] as const;

function buildRelevanceText(job: JobPosting, profile: ApplicantProfile): string {
    return [
        `Job title: ${job.title}`,
        `Company: ${job.company}`,
        `Location: ${job.location}`,
        `Description: ${job.description.slice(0, 2000)}`,
        '',
        `Candidate summary: ${profile.summary || 'n/a'}`,
        `Candidate skills: ${Object.keys(profile.years_of_experience).join(', ') || 'n/a'}`,
        '',
        'Is this job a reasonable match for the candidate?',
    ].join('\n');
}

async function searchAllQueries(
    session: AutomationSession,
    request: JobApplyRequest,
    context: TaskContext,
    errors: string[]
): Promise<JobPosting[]> {
    const byId = new Map<string, JobPosting>();
    let lastError: unknown = null;
    let succeeded = 0;
    for (const query of request.job_searches) {
        try {
            const postings = await callCapability('searchJobs', () => session.searchJobs(query), { signal: context.signal });
            succeeded += 1;
            for (const posting of postings) {
                if (!byId.has(posting.id)) {
                    byId.set(posting.id, posting);
                }
            }
        } catch (error) {
            if (error instanceof CancelledError) throw error;
            lastError = error;
            errors.push(`search "${query.job_title}": ${errorMessage(error)}`);
        }
    }
    if (succeeded === 0 && lastError !== null) {
        throw lastError;
    }
    return [...byId.values()];
}

async function isRelevant(job: JobPosting, profile: ApplicantProfile, capability: ClassificationCapability, signal: AbortSignal): Promise<boolean> {
    try {
        const answer = await callCapability('classify', () => capability.classify(buildRelevanceText(job, profile), RELEVANCE_LABELS), {
            signal,
        });
        return !answer.trim().toUpperCase().startsWith('NO');
    } catch (error) {
        if (error instanceof CancelledError) throw error;
        await logWarn('job_apply.filter.capability_failed', { jobId: job.id, error: errorMessage(error) });
        return true;
    }
}

function describeFormFailure(reason: FormFailureReason | null, detail: string | null): string {
    if (!reason) return detail ?? 'form failed';
    return detail ? `${reason}: ${detail}` : reason;
}

export async function runJobApplyWorkflow(
    context: TaskContext,
    request: JobApplyRequest,
    deps: JobApplyDeps
): Promise<JobApplyResult> {
    const errors: string[] = [];
    const applicationResults: JobApplicationOutcome[] = [];
    let status: JobApplyResult['status'] = 'completed';
    let totalFound = 0;
    let totalFiltered = 0;
    let totalApplied = 0;

    const session = await callCapability('openSession', () => deps.automation.openSession(context.accountKey, request.credentials), {
        signal: context.signal,
    });
    try {
        const jobs = await searchAllQueries(session, request, context, errors);
        totalFound = jobs.length;

        const relevant: JobPosting[] = [];
        for (const job of jobs) {
            if (await isRelevant(job, request.profile, deps.capability, context.signal)) {
                relevant.push(job);
            }
        }
        totalFiltered = relevant.length;

        const alreadyApplied = await listAppliedJobIds(context.accountKey, relevant.map((job) => job.id));
        const salaryByTitle = new Map(request.job_searches.map((query) => [query.job_title.toLowerCase(), query.monthly_salary]));
        const fallbackSalary = request.job_searches.find((query) => query.monthly_salary !== null)?.monthly_salary ?? null;

        for (const job of relevant) {
            if (context.signal.aborted) {
                status = 'cancelled';
                break;
            }
            if (alreadyApplied.has(job.id)) {
                applicationResults.push({
                    job_id: job.id,
                    title: job.title,
                    company: job.company,
                    url: job.url,
                    status: 'SKIPPED',
                    reason: 'already_applied',
                    form_steps: 0,
                });
                continue;
            }

            const machine = new FormCompletionStateMachine(session, {
                profile: request.profile,
                capability: deps.capability,
                url: job.url,
                job,
                monthlySalary: salaryByTitle.get(job.title.toLowerCase()) ?? fallbackSalary,
                resumePath: request.cv_data_path,
                maxSteps: config.formMaxSteps,
                maxFillAttempts: config.formMaxFillAttempts,
                signal: context.signal,
            });
            const run = await machine.run();
            if (run.reason === 'cancelled') {
                status = 'cancelled';
                break;
            }

            const applied = run.state === 'Completed';
            const outcome: JobApplicationOutcome = {
                job_id: job.id,
                title: job.title,
                company: job.company,
                url: job.url,
                status: applied ? 'APPLIED' : 'FAILED',
                reason: applied ? null : describeFormFailure(run.reason, run.detail),
                form_steps: run.steps,
            };
            applicationResults.push(outcome);
            if (applied) {
                totalApplied += 1;
            } else if (outcome.reason) {
                errors.push(`${job.id}: ${outcome.reason}`);
            }
            await upsertJobApplication(context.accountKey, context.taskId, {
                job_id: job.id,
                title: job.title,
                company: job.company,
                url: job.url,
                status: outcome.status,
                reason: outcome.reason,
                applied_at: new Date().toISOString(),
            });
            await logInfo('job_apply.application.finished', { jobId: job.id, status: outcome.status, steps: run.steps });
        }
    } catch (error) {
        if (!(error instanceof CancelledError)) {
            throw error;
        }
        status = 'cancelled';
    } finally {
        await session.close().catch((error: unknown) => logWarn('job_apply.session.close_failed', { error: errorMessage(error) }));
    }

    return {
        task_id: context.taskId,
        status,
        total_jobs_found: totalFound,
        total_filtered: totalFiltered,
        total_applied: totalApplied,
        application_results: applicationResults,
        errors,
    };
}
