/**
 * Consumer side of result delivery.
 *
 * The broker delivers at least once, so the listener keeps a bounded cache of
 * the (topic, correlation id) pairs it has already handled and drops repeats.
 * Handlers for one correlation id run one after another; different ids interleave.
 */

import { config } from '../config';
import { InvalidTransitionError, TimeoutError, errorMessage } from '../core/errors';
import { TaskRegistry } from '../core/taskRegistry';
import { logInfo, logWarn } from '../telemetry/logger';
import { BrokerMessage, MessageBroker, Unsubscribe } from './broker';
import { RecentIdCache } from './recentIdCache';
import { Topic } from './topics';

export type SignalHandler = (correlationId: string, message: BrokerMessage) => Promise<void>;

export interface CompletionListenerOptions {
    group?: string;
    dedupCacheSize?: number;
}

export interface AwaitSignalOptions {
    timeoutMs: number;
    /** Task failed with kind Timeout when the wait runs out. */
    taskId?: string;
}

interface Waiter {
    resolve: (message: BrokerMessage) => void;
}

export function extractCorrelationId(message: BrokerMessage): string | null {
    if (message.key) {
        return message.key;
    }
    const { task_id: taskId, session_id: sessionId } = message.payload;
    if (typeof taskId === 'string' && taskId) {
        return taskId;
    }
    if (typeof sessionId === 'string' && sessionId) {
        return sessionId;
    }
    return null;
}

export class CompletionListener {
    private readonly broker: MessageBroker;
    private readonly registry: TaskRegistry;
    private readonly group: string;
    private readonly handled: RecentIdCache<BrokerMessage>;
    private readonly handlers = new Map<Topic, Set<SignalHandler>>();
    private readonly subscriptions = new Map<Topic, Promise<Unsubscribe>>();
    private readonly chains = new Map<string, Promise<void>>();
    private readonly waiters = new Map<string, Set<Waiter>>();

    constructor(broker: MessageBroker, registry: TaskRegistry, options: CompletionListenerOptions = {}) {
        this.broker = broker;
        this.registry = registry;
        this.group = options.group ?? config.brokerConsumerGroup;
        this.handled = new RecentIdCache<BrokerMessage>(options.dedupCacheSize ?? config.listenerDedupCacheSize);
    }

    /** Registers a handler for a topic. The returned function removes it again. */
    async subscribe(topic: Topic, handler?: SignalHandler): Promise<() => void> {
        const handlers = this.handlers.get(topic) ?? new Set<SignalHandler>();
        this.handlers.set(topic, handlers);
        if (handler) {
            handlers.add(handler);
        }
        await this.ensureSubscribed(topic);
        return () => {
            if (handler) {
                handlers.delete(handler);
            }
        };
    }

    /**
     * Resolves with the first message for the correlation id on the topic.
     * A message that was already handled resolves immediately.
     */
    async awaitSignal(topic: Topic, correlationId: string, options: AwaitSignalOptions): Promise<BrokerMessage> {
        await this.subscribe(topic);
        const key = dedupKey(topic, correlationId);
        const seen = this.handled.get(key);
        if (seen) {
            return seen;
        }

        const message = await new Promise<BrokerMessage | null>((resolve) => {
            const waiter: Waiter = {
                resolve: (received) => {
                    clearTimeout(timer);
                    resolve(received);
                },
            };
            const timer = setTimeout(() => {
                this.removeWaiter(key, waiter);
                resolve(null);
            }, Math.max(0, options.timeoutMs));
            const waiters = this.waiters.get(key) ?? new Set<Waiter>();
            waiters.add(waiter);
            this.waiters.set(key, waiters);
        });
        if (message) {
            return message;
        }

        const reason = `no ${topic} signal for ${correlationId} within ${options.timeoutMs}ms`;
        if (options.taskId) {
            await this.failTimedOutTask(options.taskId, reason);
        }
        throw new TimeoutError(reason);
    }

    async close(): Promise<void> {
        for (const pending of this.subscriptions.values()) {
            const unsubscribe = await pending;
            await unsubscribe();
        }
        this.subscriptions.clear();
        this.handlers.clear();
        await Promise.all([...this.chains.values()]);
    }

    private ensureSubscribed(topic: Topic): Promise<Unsubscribe> {
        const existing = this.subscriptions.get(topic);
        if (existing) {
            return existing;
        }
        const pending = this.broker.subscribe(topic, this.group, (message) => this.onMessage(topic, message));
        this.subscriptions.set(topic, pending);
        pending.catch(() => {
            this.subscriptions.delete(topic);
        });
        return pending;
    }

    private onMessage(topic: Topic, message: BrokerMessage): Promise<void> {
        const correlationId = extractCorrelationId(message);
        if (!correlationId) {
            return logWarn('listener.message.uncorrelated', { topic, messageId: message.id });
        }
        const key = dedupKey(topic, correlationId);
        const previous = this.chains.get(key) ?? Promise.resolve();
        const current = previous.then(() => this.handle(topic, key, correlationId, message));
        // the chain only orders work; the error itself goes back to the broker through `current`
        const tail = current.then(
            () => undefined,
            () => undefined
        );
        this.chains.set(key, tail);
        void tail.then(() => {
            if (this.chains.get(key) === tail) {
                this.chains.delete(key);
            }
        });
        return current;
    }

    private async handle(topic: Topic, key: string, correlationId: string, message: BrokerMessage): Promise<void> {
        if (this.handled.has(key)) {
            await logInfo('listener.message.duplicate_discarded', {
                topic,
                correlationId,
                messageId: message.id,
                deliveryCount: message.deliveryCount,
            });
            return;
        }
        for (const handler of this.handlers.get(topic) ?? []) {
            await handler(correlationId, message);
        }
        this.handled.set(key, message);

        const waiters = this.waiters.get(key);
        if (waiters) {
            this.waiters.delete(key);
            for (const waiter of waiters) {
                waiter.resolve(message);
            }
        }
    }

    private removeWaiter(key: string, waiter: Waiter): void {
        const waiters = this.waiters.get(key);
        if (!waiters) return;
        waiters.delete(waiter);
        if (waiters.size === 0) {
            this.waiters.delete(key);
        }
    }

    private async failTimedOutTask(taskId: string, reason: string): Promise<void> {
        try {
            await this.registry.markFailed(taskId, { kind: 'Timeout', reason });
            await logWarn('listener.task.timed_out', { taskId, reason });
        } catch (error) {
            if (!(error instanceof InvalidTransitionError)) {
                throw error;
            }
            await logInfo('listener.task.already_terminal', { taskId, error: errorMessage(error) });
        }
    }
}

function dedupKey(topic: string, correlationId: string): string {
    return `${topic}:${correlationId}`;
}
