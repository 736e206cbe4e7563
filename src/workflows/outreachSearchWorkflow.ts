import { config } from '../config';
import { RoleClassifier, groupByRole } from '../ai/roleClassifier';
import { CancelledError, errorMessage } from '../core/errors';
import { callCapability } from '../core/integrationPolicy';
import { findCompaniesByFilters } from '../core/repositories';
import { SessionStore } from '../core/sessionStore';
import { TaskContext } from '../core/taskRunner';
import { TOPICS } from '../messaging/topics';
import { candidateIdFor, normalizeProfileReference } from '../profileUrl';
import { logInfo, logWarn } from '../telemetry/logger';
import { AutomationProvider, ClassificationCapability } from '../types/capabilities';
import { Candidate, CompanyRecord, EmployeeProfile, OutreachSessionPayload } from '../types/domain';
import { OutreachSearchRequest } from '../validation/requestSchemas';

export type OutreachSearchResult = {
    task_id: string;
    session_id: string;
    status: 'completed';
    companies_processed: number;
    total_candidates: number;
    role_groups: Record<string, Candidate[]>;
    summary: Record<string, number>;
    errors: string[];
};

export interface OutreachSearchDeps {
    automation: AutomationProvider;
    capability: ClassificationCapability;
    sessions: SessionStore;
}

function selectCompanies(companies: CompanyRecord[], request: OutreachSearchRequest): CompanyRecord[] {
    const excluded = new Set(request.exclude_companies.map((name) => name.toLowerCase()));
    const selected = companies.filter((company) => !excluded.has(company.name.trim().toLowerCase()));
    return request.company_limit ? selected.slice(0, request.company_limit) : selected;
}

export async function runOutreachSearchWorkflow(
    context: TaskContext,
    request: OutreachSearchRequest,
    sessionId: string,
    deps: OutreachSearchDeps
): Promise<OutreachSearchResult> {
    const companies = selectCompanies(await findCompaniesByFilters(request.filters), request);
    const perCompany = request.employees_per_company ?? config.employeesPerCompany;
    const excludedProfiles = new Set(request.exclude_profile_urls.map(normalizeProfileReference));
    const classifier = new RoleClassifier(deps.capability);
    const errors: string[] = [];
    const candidates: Candidate[] = [];
    const seen = new Set<string>();
    let companiesProcessed = 0;

    await logInfo('outreach_search.companies.selected', { companies: companies.length, perCompany });

    const session = await callCapability('openSession', () => deps.automation.openSession(context.accountKey, request.credentials), {
        signal: context.signal,
    });
    try {
        for (const company of companies) {
            if (context.signal.aborted) {
                throw new CancelledError();
            }
            if (request.total_limit !== null && candidates.length >= request.total_limit) {
                break;
            }
            let employees: EmployeeProfile[];
            try {
                employees = await callCapability('searchEmployees', () => session.searchEmployees(company, perCompany), {
                    signal: context.signal,
                });
            } catch (error) {
                if (error instanceof CancelledError) throw error;
                errors.push(`${company.name}: ${errorMessage(error)}`);
                await logWarn('outreach_search.company.failed', { company: company.name, error: errorMessage(error) });
                continue;
            }
            companiesProcessed += 1;

            for (const employee of employees) {
                if (request.total_limit !== null && candidates.length >= request.total_limit) {
                    break;
                }
                const reference = normalizeProfileReference(employee.profile_url);
                if (!reference || excludedProfiles.has(reference)) {
                    continue;
                }
                const id = candidateIdFor(reference);
                if (seen.has(id)) {
                    continue;
                }
                seen.add(id);
                candidates.push({
                    id,
                    display_name: employee.name.trim(),
                    title: employee.title.trim(),
                    profile_reference: reference,
                    company: company.name,
                    assigned_category: await classifier.classify(employee.title),
                });
            }
        }
    } finally {
        await session.close().catch((error: unknown) => logWarn('outreach_search.session.close_failed', { error: errorMessage(error) }));
    }

    const groups = groupByRole(candidates);
    const payload: OutreachSessionPayload = {
        task_id: context.taskId,
        trace_id: context.taskId,
        filters: request.filters,
        companies: companies.map((company) => company.name),
        role_groups: groups,
    };
    await deps.sessions.create(payload, config.sessionTtlSeconds, { sessionId });

    const roleGroups: Record<string, Candidate[]> = {};
    const summary: Record<string, number> = {};
    for (const group of groups) {
        roleGroups[group.category_name] = group.members;
        summary[group.category_name] = group.members.length;
    }

    await context.publisher.publish(
        context.taskId,
        TOPICS.searchCompleteSignal,
        { session_id: sessionId, total_candidates: candidates.length, summary },
        sessionId
    );
    await logInfo('outreach_search.completed', { sessionId, candidates: candidates.length, companiesProcessed });

    return {
        task_id: context.taskId,
        session_id: sessionId,
        status: 'completed',
        companies_processed: companiesProcessed,
        total_candidates: candidates.length,
        role_groups: roleGroups,
        summary,
        errors,
    };
}
