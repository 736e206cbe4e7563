/**
 * One-shot commands: wait, filters, purge-sessions.
 */

import { config } from '../../config';
import { SessionStore } from '../../core/sessionStore';
import { TaskRegistry } from '../../core/taskRegistry';
import { getCompanyFilterValues } from '../../core/repositories';
import { createMessageBroker } from '../../messaging/brokerFactory';
import { CompletionListener } from '../../messaging/completionListener';
import { TOPICS, resultTopicForKind } from '../../messaging/topics';
import { Task } from '../../types/domain';
import { getOptionValue, getPositionalArgs, parseIntStrict } from '../cliParser';

const DEFAULT_WAIT_SECONDS = 600;

function isTerminal(task: Task): boolean {
    return task.state === 'COMPLETED' || task.state === 'FAILED';
}

/**
 * wait <task_id> [--timeout <sec>]
 * wait --session <session_id> [--timeout <sec>]
 *
 * Listens on its own consumer group so the server keeps receiving every message.
 */
export async function runWaitCommand(args: string[]): Promise<void> {
    const timeoutRaw = getOptionValue(args, '--timeout');
    const timeoutMs = (timeoutRaw ? parseIntStrict(timeoutRaw, '--timeout') : DEFAULT_WAIT_SECONDS) * 1000;
    const sessionId = getOptionValue(args, '--session');
    const taskId = getPositionalArgs(args)[0];
    if (!sessionId && !taskId) {
        throw new Error('usage: wait <task_id> [--timeout <sec>] | wait --session <session_id> [--timeout <sec>]');
    }

    const registry = new TaskRegistry();
    const broker = createMessageBroker();
    const listener = new CompletionListener(broker, registry, {
        group: `${config.brokerConsumerGroup}-wait-${process.pid}`,
    });
    try {
        if (sessionId) {
            const message = await listener.awaitSignal(TOPICS.searchCompleteSignal, sessionId, { timeoutMs });
            console.log(JSON.stringify(message.payload, null, 2));
            return;
        }
        if (!taskId) return;
        const task = await registry.getState(taskId);
        if (!isTerminal(task)) {
            const topic = resultTopicForKind(task.kind);
            await listener.subscribe(topic);
            // a result landing between the first read and the subscription is only visible in the registry
            if (!isTerminal(await registry.getState(taskId))) {
                await listener.awaitSignal(topic, taskId, { timeoutMs });
            }
        }
        console.log(JSON.stringify(await registry.getState(taskId), null, 2));
    } finally {
        await listener.close();
        await broker.close();
    }
}

export async function runFiltersCommand(): Promise<void> {
    console.log(JSON.stringify(await getCompanyFilterValues(), null, 2));
}

export async function runPurgeSessionsCommand(): Promise<void> {
    const purged = await new SessionStore().purgeExpired();
    console.log(`Expired sessions removed: ${purged}`);
}
