/**
 * Phase two of outreach: messages the candidates stored in a search Session.
 *
 * Before each candidate, in order: cancellation, already contacted, per-company
 * limit, then an atomic reservation against the daily cap. A reservation is
 * released again when nothing was delivered (no affordance, failed send).
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { config, getLocalDateString } from '../config';
import { groupByRole } from '../ai/roleClassifier';
import { CancelledError, ValidationError, errorMessage } from '../core/errors';
import { callCapability, sleep } from '../core/integrationPolicy';
import {
    appendDispatchRecord,
    isProfileContacted,
    markProfileContacted,
    releaseDailySend,
    tryReserveDailySend,
} from '../core/repositories';
import { SessionStore } from '../core/sessionStore';
import { TaskContext } from '../core/taskRunner';
import { normalizeProfileReference } from '../profileUrl';
import { logInfo, logWarn } from '../telemetry/logger';
import { AutomationProvider, AutomationSession } from '../types/capabilities';
import {
    Candidate,
    DispatchChannelKind,
    DispatchStatus,
    MessageDispatchRecord,
    OutreachSessionPayload,
    ROLE_CATEGORIES,
    RoleCategory,
} from '../types/domain';
import { OutreachSendRequest, SelectedGroup } from '../validation/requestSchemas';
import { channelForAffordance, dispatchOnChannel } from './deliveryChannel';
import { buildCandidateVariables, renderTemplate } from './messageTemplate';

export type DispatchCounts = {
    sent: number;
    skipped: number;
    failed: number;
};

export type OutreachSendResult = {
    task_id: string;
    session_id: string;
    status: 'completed' | 'daily_limit_reached' | 'cancelled';
    sent: number;
    skipped: number;
    failed: number;
    results_by_role: Record<string, DispatchCounts>;
    records: MessageDispatchRecord[];
};

export interface OutreachSendDeps {
    automation: AutomationProvider;
    sessions: SessionStore;
    random?: () => number;
    now?: () => Date;
}

const roleCategorySchema = z.enum(ROLE_CATEGORIES);

const candidateSchema = z.object({
    id: z.string(),
    display_name: z.string(),
    title: z.string(),
    profile_reference: z.string(),
    company: z.string(),
    assigned_category: roleCategorySchema,
});

const sessionPayloadSchema = z.object({
    task_id: z.string(),
    trace_id: z.string(),
    filters: z.object({
        industry: z.array(z.string()),
        country: z.array(z.string()),
        size: z.array(z.string()),
    }),
    companies: z.array(z.string()),
    role_groups: z.array(z.object({ category_name: roleCategorySchema, members: z.array(candidateSchema) })),
});

export function parseSessionPayload(sessionId: string, raw: Record<string, unknown>): OutreachSessionPayload {
    const parsed = sessionPayloadSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ValidationError(`session ${sessionId} does not hold an outreach search result`);
    }
    return parsed.data;
}

/** Applies manual category overrides, then narrows to the selected candidates when a list is given. */
export function prepareCandidates(payload: OutreachSessionPayload, request: OutreachSendRequest): Candidate[] {
    const reassignments = new Map<string, RoleCategory>();
    for (const [reference, category] of Object.entries(request.reassignments)) {
        reassignments.set(normalizeProfileReference(reference), category);
    }
    const selected = request.selected_candidates
        ? new Set(request.selected_candidates.flatMap((value) => [value, normalizeProfileReference(value)]))
        : null;

    const candidates: Candidate[] = [];
    for (const group of payload.role_groups) {
        for (const member of group.members) {
            if (selected && !selected.has(member.id) && !selected.has(member.profile_reference)) {
                continue;
            }
            const override = reassignments.get(member.profile_reference);
            candidates.push(override ? { ...member, assigned_category: override } : member);
        }
    }
    return candidates;
}

function randomDelayMs(random: () => number): number {
    const min = Math.max(0, config.outreachMinDelaySec);
    const max = Math.max(min, config.outreachMaxDelaySec);
    return Math.round((min + random() * (max - min)) * 1000);
}

class SendRun {
    readonly records: MessageDispatchRecord[] = [];
    readonly byRole: Record<string, DispatchCounts> = {};
    private readonly companyCounts = new Map<string, number>();

    constructor(private readonly context: TaskContext) {}

    async record(
        candidate: Candidate,
        status: DispatchStatus,
        reason: string | null,
        channel: DispatchChannelKind | null
    ): Promise<void> {
        const record: MessageDispatchRecord = {
            task_id: this.context.taskId,
            candidate_id: candidate.id,
            profile_reference: candidate.profile_reference,
            category: candidate.assigned_category,
            channel,
            status,
            reason,
            timestamp: new Date().toISOString(),
        };
        await appendDispatchRecord(record);
        this.records.push(record);
        const counts = this.byRole[candidate.assigned_category] ?? { sent: 0, skipped: 0, failed: 0 };
        if (status === 'SENT') counts.sent += 1;
        else if (status === 'SKIPPED') counts.skipped += 1;
        else counts.failed += 1;
        this.byRole[candidate.assigned_category] = counts;
    }

    sentTo(company: string): number {
        return this.companyCounts.get(company.toLowerCase()) ?? 0;
    }

    countSend(company: string): void {
        this.companyCounts.set(company.toLowerCase(), this.sentTo(company) + 1);
    }

    total(status: DispatchStatus): number {
        return this.records.filter((record) => record.status === status).length;
    }
}

export async function runOutreachSendWorkflow(
    context: TaskContext,
    request: OutreachSendRequest,
    deps: OutreachSendDeps
): Promise<OutreachSendResult> {
    const payload = parseSessionPayload(request.session_id, await deps.sessions.read(request.session_id));
    const groups = groupByRole(prepareCandidates(payload, request));
    const random = deps.random ?? Math.random;
    const now = deps.now ?? (() => new Date());
    const cap = request.warm_up ? config.warmupDailyLimit : config.dailyMessageLimit;
    const run = new SendRun(context);
    let status: OutreachSendResult['status'] = 'completed';
    let capReached = false;
    let pauseBeforeNext = false;

    await logInfo('outreach_send.started', { sessionId: request.session_id, cap, warmUp: request.warm_up });

    let session: AutomationSession | null = null;
    try {
        outer: for (const group of groups) {
            const selection: SelectedGroup | undefined = request.selected_groups[group.category_name];
            if (!selection?.enabled) {
                continue;
            }
            for (const candidate of group.members) {
                if (pauseBeforeNext && !capReached) {
                    await sleep(randomDelayMs(random), context.signal);
                    pauseBeforeNext = false;
                }
                if (context.signal.aborted) {
                    status = 'cancelled';
                    break outer;
                }
                if (capReached) {
                    await run.record(candidate, 'SKIPPED', 'cap_reached', null);
                    continue;
                }
                if (await isProfileContacted(context.accountKey, candidate.profile_reference)) {
                    await run.record(candidate, 'SKIPPED', 'already_contacted', null);
                    continue;
                }
                if (request.max_per_company !== null && run.sentTo(candidate.company) >= request.max_per_company) {
                    await run.record(candidate, 'SKIPPED', 'company_limit', null);
                    continue;
                }

                const at = now();
                const reservationId = randomUUID();
                const reserved = await tryReserveDailySend({
                    reservationId,
                    accountKey: context.accountKey,
                    cap,
                    window: config.dailyCapWindow,
                    localDate: getLocalDateString(at),
                    nowMs: at.getTime(),
                });
                if (!reserved) {
                    capReached = true;
                    status = 'daily_limit_reached';
                    await logWarn('outreach_send.daily_cap_reached', { cap, accountKey: context.accountKey });
                    await run.record(candidate, 'SKIPPED', 'cap_reached', null);
                    continue;
                }

                if (!session) {
                    const openedFor = request.credentials;
                    try {
                        session = await callCapability('openSession', () => deps.automation.openSession(context.accountKey, openedFor), {
                            signal: context.signal,
                        });
                    } catch (error) {
                        await releaseDailySend(reservationId);
                        throw error;
                    }
                }
                const browser = session;
                const text = renderTemplate(selection.message_template, buildCandidateVariables(candidate, selection.template_variables));

                pauseBeforeNext = true;
                try {
                    const affordance = await callCapability('detectAffordance', () => browser.detectAffordance(candidate.profile_reference), {
                        signal: context.signal,
                    });
                    const channel = channelForAffordance(affordance);
                    if (channel.kind === 'none') {
                        await releaseDailySend(reservationId);
                        pauseBeforeNext = false;
                        await run.record(candidate, 'SKIPPED', 'no_affordance', null);
                        continue;
                    }
                    await dispatchOnChannel(browser, channel, candidate.profile_reference, text, { signal: context.signal });
                    await markProfileContacted(
                        context.accountKey,
                        candidate.profile_reference,
                        candidate.company,
                        channel.kind,
                        new Date().toISOString()
                    );
                    run.countSend(candidate.company);
                    await run.record(candidate, 'SENT', null, channel.kind);
                } catch (error) {
                    await releaseDailySend(reservationId);
                    if (error instanceof CancelledError) {
                        status = 'cancelled';
                        break outer;
                    }
                    await run.record(candidate, 'FAILED', errorMessage(error), null);
                }
            }
        }
    } catch (error) {
        if (!(error instanceof CancelledError)) {
            throw error;
        }
        status = 'cancelled';
    } finally {
        if (session) {
            await session.close().catch((error: unknown) => logWarn('outreach_send.session.close_failed', { error: errorMessage(error) }));
        }
    }

    const sent = run.total('SENT');
    const skipped = run.total('SKIPPED');
    const failed = run.total('FAILED');
    await logInfo('outreach_send.finished', { status, sent, skipped, failed });

    return {
        task_id: context.taskId,
        session_id: request.session_id,
        status,
        sent,
        skipped,
        failed,
        results_by_role: run.byRole,
        records: run.records,
    };
}
