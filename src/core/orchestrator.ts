import { logInfo } from '../telemetry/logger';
import { AutomationProvider, ClassificationCapability } from '../types/capabilities';
import { Task, TaskTransitionRecord } from '../types/domain';
import {
    jobApplyRequestSchema,
    outreachSearchRequestSchema,
    outreachSendRequestSchema,
    parseRequest,
} from '../validation/requestSchemas';
import { runJobApplyWorkflow } from '../workflows/jobApplyWorkflow';
import { runOutreachSearchWorkflow } from '../workflows/outreachSearchWorkflow';
import { runOutreachSendWorkflow } from '../workflows/outreachSendWorkflow';
import { normalizeAccountKey } from './repositories';
import { SessionStore } from './sessionStore';
import { TaskRegistry } from './taskRegistry';
import { TaskRunner } from './taskRunner';

export interface OrchestratorDeps {
    registry: TaskRegistry;
    runner: TaskRunner;
    sessions: SessionStore;
    automation: AutomationProvider;
    capability: ClassificationCapability;
    /** Injected by tests to make send pacing deterministic. */
    random?: () => number;
}

export interface TaskView {
    task: Task;
    transitions: TaskTransitionRecord[];
}

function accountKeyFor(credentials: { email: string } | null): string {
    return normalizeAccountKey(credentials?.email);
}

/**
 * Entry point for every submission surface (HTTP, CLI). Validates the request,
 * creates the task and hands the work to the runner; never waits for the work.
 */
export class WorkflowOrchestrator {
    private readonly deps: OrchestratorDeps;

    constructor(deps: OrchestratorDeps) {
        this.deps = deps;
    }

    async submitJobApply(body: unknown): Promise<{ taskId: string }> {
        const request = parseRequest(jobApplyRequestSchema, body);
        const task = await this.deps.runner.submit('job_apply', request, {
            accountKey: accountKeyFor(request.credentials),
            work: (context) => runJobApplyWorkflow(context, request, this.deps),
        });
        return { taskId: task.id };
    }

    async submitOutreachSearch(body: unknown): Promise<{ taskId: string; sessionId: string }> {
        const request = parseRequest(outreachSearchRequestSchema, body);
        const sessionId = this.deps.sessions.allocateId();
        const task = await this.deps.runner.submit('outreach_search', { ...request, session_id: sessionId }, {
            accountKey: accountKeyFor(request.credentials),
            work: (context) => runOutreachSearchWorkflow(context, request, sessionId, this.deps),
        });
        await logInfo('orchestrator.outreach_search.accepted', { taskId: task.id, sessionId });
        return { taskId: task.id, sessionId };
    }

    /** Fails fast with NotFound or Expired when the session cannot be read; no task is created then. */
    async submitOutreachSend(body: unknown): Promise<{ taskId: string }> {
        const request = parseRequest(outreachSendRequestSchema, body);
        await this.deps.sessions.read(request.session_id);
        const task = await this.deps.runner.submit('outreach_send', request, {
            accountKey: accountKeyFor(request.credentials),
            work: (context) => runOutreachSendWorkflow(context, request, this.deps),
        });
        return { taskId: task.id };
    }

    async cancel(taskId: string): Promise<Task> {
        return this.deps.runner.cancel(taskId);
    }

    async getTask(taskId: string): Promise<TaskView> {
        const task = await this.deps.registry.getState(taskId);
        const transitions = await this.deps.registry.listTransitions(taskId);
        return { task, transitions };
    }
}
