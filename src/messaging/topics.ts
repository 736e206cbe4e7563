import { TaskKind } from '../types/domain';

export const TOPICS = {
    jobResults: 'job-results',
    outreachSearchResults: 'outreach-search-results',
    outreachResults: 'outreach-results',
    searchCompleteSignal: 'search-complete-signal',
} as const;

export type Topic = typeof TOPICS[keyof typeof TOPICS];

const RESULT_TOPIC_BY_KIND: Record<TaskKind, Topic> = {
    job_apply: TOPICS.jobResults,
    outreach_search: TOPICS.outreachSearchResults,
    outreach_send: TOPICS.outreachResults,
};

export function resultTopicForKind(kind: TaskKind): Topic {
    return RESULT_TOPIC_BY_KIND[kind];
}
