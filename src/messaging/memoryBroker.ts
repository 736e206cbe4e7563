import { randomUUID } from 'crypto';
import { BrokerHandler, BrokerMessage, MessageBroker, Unsubscribe } from './broker';
import { logError, logWarn } from '../telemetry/logger';

interface Subscriber {
    id: string;
    handler: BrokerHandler;
}

interface ConsumerGroup {
    members: Subscriber[];
    nextIndex: number;
}

export interface InMemoryBrokerOptions {
    maxDeliveryAttempts?: number;
    redeliveryDelayMs?: number;
}

/**
 * In-process broker used when no REDIS_URL is configured and as the test stand-in.
 * Same contract as the Redis Streams broker: every consumer group receives each
 * message once, round-robin inside the group, and a failing handler gets the
 * message again until the delivery budget runs out.
 */
export class InMemoryBroker implements MessageBroker {
    readonly name = 'memory';
    private readonly topics = new Map<string, Map<string, ConsumerGroup>>();
    private readonly inFlight = new Set<Promise<void>>();
    private readonly maxDeliveryAttempts: number;
    private readonly redeliveryDelayMs: number;
    private closed = false;

    constructor(options: InMemoryBrokerOptions = {}) {
        this.maxDeliveryAttempts = Math.max(1, options.maxDeliveryAttempts ?? 5);
        this.redeliveryDelayMs = Math.max(0, options.redeliveryDelayMs ?? 25);
    }

    async publish(topic: string, key: string, payload: Record<string, unknown>): Promise<string> {
        if (this.closed) {
            throw new Error('memory broker: connection is closed');
        }
        const message: BrokerMessage = {
            id: randomUUID(),
            topic,
            key,
            payload,
            publishedAt: new Date().toISOString(),
            deliveryCount: 0,
        };
        const groups = this.topics.get(topic);
        if (groups) {
            for (const group of groups.values()) {
                const subscriber = this.pickMember(group);
                if (subscriber) {
                    this.track(this.deliver(subscriber, message));
                }
            }
        }
        return message.id;
    }

    async subscribe(topic: string, group: string, handler: BrokerHandler): Promise<Unsubscribe> {
        const groups = this.topics.get(topic) ?? new Map<string, ConsumerGroup>();
        this.topics.set(topic, groups);
        const consumerGroup = groups.get(group) ?? { members: [], nextIndex: 0 };
        groups.set(group, consumerGroup);

        const subscriber: Subscriber = { id: randomUUID(), handler };
        consumerGroup.members.push(subscriber);

        return async () => {
            consumerGroup.members = consumerGroup.members.filter((member) => member.id !== subscriber.id);
            if (consumerGroup.members.length === 0) {
                groups.delete(group);
            }
        };
    }

    async ping(): Promise<boolean> {
        return !this.closed;
    }

    /** Resolves once every scheduled delivery, including redeliveries, has settled. */
    async drain(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all([...this.inFlight]);
        }
    }

    async close(): Promise<void> {
        this.closed = true;
        await this.drain();
        this.topics.clear();
    }

    private pickMember(group: ConsumerGroup): Subscriber | null {
        if (group.members.length === 0) {
            return null;
        }
        const index = group.nextIndex % group.members.length;
        group.nextIndex = index + 1;
        return group.members[index] ?? null;
    }

    private track(delivery: Promise<void>): void {
        this.inFlight.add(delivery);
        const settle = () => {
            this.inFlight.delete(delivery);
        };
        void delivery.then(settle, (error: unknown) => {
            settle();
            console.error('[ERROR] broker.memory.delivery_crashed', error instanceof Error ? error.message : error);
        });
    }

    private async deliver(subscriber: Subscriber, message: BrokerMessage): Promise<void> {
        // hand over on a later tick: publish never runs consumer code inline
        await new Promise<void>((resolve) => setImmediate(resolve));
        for (let attempt = 1; attempt <= this.maxDeliveryAttempts; attempt++) {
            try {
                await subscriber.handler({ ...message, deliveryCount: attempt });
                return;
            } catch (error) {
                await logWarn('broker.memory.delivery_failed', {
                    topic: message.topic,
                    key: message.key,
                    attempt,
                    error: error instanceof Error ? error.message : String(error),
                });
                if (attempt < this.maxDeliveryAttempts && this.redeliveryDelayMs > 0) {
                    await new Promise<void>((resolve) => setTimeout(resolve, this.redeliveryDelayMs));
                }
            }
        }
        await logError('broker.memory.delivery_exhausted', {
            topic: message.topic,
            key: message.key,
            messageId: message.id,
        });
    }
}
