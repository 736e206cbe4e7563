/**
 * Redis Streams broker.
 *
 *   - one stream per topic: `{prefix}:{topic}`
 *   - XADD with approximate MAXLEN trimming on publish
 *   - XREADGROUP per consumer group on a dedicated (blocking) connection
 *   - XACK only after the handler resolved; failures stay in the pending list
 *     and are re-read from id 0 on the next poll, which gives at-least-once delivery
 *   - an entry that fails `maxDeliveryAttempts` times is acked and logged as
 *     exhausted, so later entries on the topic keep flowing
 */

import { hostname } from 'os';
import Redis from 'ioredis';
import { BrokerHandler, BrokerMessage, MessageBroker, Unsubscribe } from './broker';
import { parseJsonObject } from '../core/repositories';
import { logError, logWarn } from '../telemetry/logger';

export interface RedisStreamBrokerOptions {
    streamPrefix: string;
    maxLen: number;
    blockMs: number;
    readCount?: number;
    consumerName?: string;
    maxDeliveryAttempts?: number;
}

export interface StreamEntry {
    id: string;
    fields: Record<string, string>;
}

interface StreamSubscription {
    stopped: boolean;
    reader: Redis;
    loop: Promise<void>;
}

function toText(value: unknown): string | null {
    if (typeof value === 'string') return value;
    if (Buffer.isBuffer(value)) return value.toString('utf8');
    return null;
}

function parseFieldList(raw: unknown): Record<string, string> {
    const fields: Record<string, string> = {};
    if (!Array.isArray(raw)) return fields;
    for (let i = 0; i + 1 < raw.length; i += 2) {
        const name = toText(raw[i]);
        const value = toText(raw[i + 1]);
        if (name !== null && value !== null) {
            fields[name] = value;
        }
    }
    return fields;
}

/** XREADGROUP reply: [[stream, [[id, [field, value, ...]], ...]], ...] or null. */
export function parseStreamReply(reply: unknown): StreamEntry[] {
    if (!Array.isArray(reply)) return [];
    const entries: StreamEntry[] = [];
    for (const stream of reply) {
        if (!Array.isArray(stream) || !Array.isArray(stream[1])) continue;
        for (const rawEntry of stream[1]) {
            if (!Array.isArray(rawEntry)) continue;
            const id = toText(rawEntry[0]);
            if (!id) continue;
            entries.push({ id, fields: parseFieldList(rawEntry[1]) });
        }
    }
    return entries;
}

export interface BatchDelivery {
    topic: string;
    handler: BrokerHandler;
    /** Deliveries so far per entry id; owned by the read loop. */
    deliveryCounts: Map<string, number>;
    maxDeliveryAttempts: number;
    ack: (id: string) => Promise<void>;
}

/**
 * Hands each entry to the handler and acks the ones it accepted. An entry is
 * also acked once its delivery budget is spent. Returns true when some entry
 * is still pending and should be re-read.
 */
export async function deliverBatch(entries: StreamEntry[], delivery: BatchDelivery): Promise<boolean> {
    let retryPending = false;
    for (const entry of entries) {
        const deliveryCount = (delivery.deliveryCounts.get(entry.id) ?? 0) + 1;
        delivery.deliveryCounts.set(entry.id, deliveryCount);
        const message: BrokerMessage = {
            id: entry.id,
            topic: delivery.topic,
            key: entry.fields.key ?? '',
            payload: parseJsonObject(entry.fields.payload),
            publishedAt: entry.fields.published_at ?? '',
            deliveryCount,
        };
        try {
            await delivery.handler(message);
            await delivery.ack(entry.id);
            delivery.deliveryCounts.delete(entry.id);
        } catch (error) {
            await logWarn('broker.redis.handler_failed', {
                topic: delivery.topic,
                messageId: entry.id,
                deliveryCount,
                error: error instanceof Error ? error.message : String(error),
            });
            if (deliveryCount < delivery.maxDeliveryAttempts) {
                retryPending = true;
                continue;
            }
            await delivery.ack(entry.id);
            delivery.deliveryCounts.delete(entry.id);
            await logError('broker.redis.delivery_exhausted', {
                topic: delivery.topic,
                key: message.key,
                messageId: entry.id,
            });
        }
    }
    return retryPending;
}

function isBusyGroupError(error: unknown): boolean {
    return error instanceof Error && error.message.includes('BUSYGROUP');
}

export class RedisStreamBroker implements MessageBroker {
    readonly name = 'redis';
    private readonly redis: Redis;
    private readonly options: Required<RedisStreamBrokerOptions>;
    private readonly subscriptions = new Set<StreamSubscription>();

    constructor(redis: Redis, options: RedisStreamBrokerOptions) {
        this.redis = redis;
        this.options = {
            readCount: 10,
            consumerName: `${hostname()}-${process.pid}`,
            maxDeliveryAttempts: 5,
            ...options,
        };
    }

    static fromUrl(url: string, options: RedisStreamBrokerOptions): RedisStreamBroker {
        const redis = new Redis(url, {
            maxRetriesPerRequest: 1,
            connectTimeout: 3000,
            lazyConnect: true,
        });
        redis.on('error', (err: Error) => {
            console.warn('[WARN] broker.redis.connection_error', err.message);
        });
        return new RedisStreamBroker(redis, options);
    }

    private streamKey(topic: string): string {
        return `${this.options.streamPrefix}:${topic}`;
    }

    async publish(topic: string, key: string, payload: Record<string, unknown>): Promise<string> {
        const id = await this.redis.call(
            'XADD',
            this.streamKey(topic),
            'MAXLEN',
            '~',
            String(this.options.maxLen),
            '*',
            'key',
            key,
            'payload',
            JSON.stringify(payload),
            'published_at',
            new Date().toISOString()
        );
        const messageId = toText(id);
        if (!messageId) {
            throw new Error(`XADD on ${topic} returned no id`);
        }
        return messageId;
    }

    async subscribe(topic: string, group: string, handler: BrokerHandler): Promise<Unsubscribe> {
        const stream = this.streamKey(topic);
        try {
            await this.redis.call('XGROUP', 'CREATE', stream, group, '$', 'MKSTREAM');
        } catch (error) {
            if (!isBusyGroupError(error)) {
                throw error;
            }
        }

        const reader = this.redis.duplicate();
        reader.on('error', (err: Error) => {
            console.warn('[WARN] broker.redis.reader_error', err.message);
        });
        const subscription: StreamSubscription = {
            stopped: false,
            reader,
            loop: Promise.resolve(),
        };
        subscription.loop = this.readLoop(subscription, topic, stream, group, handler).catch(async (error: unknown) => {
            await logError('broker.redis.read_loop_crashed', {
                topic,
                group,
                error: error instanceof Error ? error.message : String(error),
            });
        });
        this.subscriptions.add(subscription);

        return async () => {
            subscription.stopped = true;
            reader.disconnect();
            this.subscriptions.delete(subscription);
            await subscription.loop;
        };
    }

    async ping(): Promise<boolean> {
        try {
            const reply = await this.redis.ping();
            return reply === 'PONG';
        } catch (error) {
            await logWarn('broker.redis.ping_failed', { error: error instanceof Error ? error.message : String(error) });
            return false;
        }
    }

    async close(): Promise<void> {
        for (const subscription of [...this.subscriptions]) {
            subscription.stopped = true;
            subscription.reader.disconnect();
            await subscription.loop;
        }
        this.subscriptions.clear();
        await this.redis.quit();
    }

    private async readLoop(
        subscription: StreamSubscription,
        topic: string,
        stream: string,
        group: string,
        handler: BrokerHandler
    ): Promise<void> {
        // start from our own pending list: entries delivered before a crash are retried first
        let readPending = true;
        const deliveryCounts = new Map<string, number>();

        while (!subscription.stopped) {
            let entries: StreamEntry[];
            try {
                const reply = await subscription.reader.call(
                    'XREADGROUP',
                    'GROUP',
                    group,
                    this.options.consumerName,
                    'COUNT',
                    String(this.options.readCount),
                    'BLOCK',
                    String(this.options.blockMs),
                    'STREAMS',
                    stream,
                    readPending ? '0' : '>'
                );
                entries = parseStreamReply(reply);
            } catch (error) {
                if (subscription.stopped) return;
                await logWarn('broker.redis.read_failed', {
                    topic,
                    error: error instanceof Error ? error.message : String(error),
                });
                await new Promise<void>((resolve) => setTimeout(resolve, this.options.blockMs));
                continue;
            }

            if (readPending && entries.length === 0) {
                readPending = false;
                continue;
            }

            const failed = await deliverBatch(entries, {
                topic,
                handler,
                deliveryCounts,
                maxDeliveryAttempts: this.options.maxDeliveryAttempts,
                ack: async (id) => {
                    await this.redis.call('XACK', stream, group, id);
                },
            });
            readPending = failed;
            if (failed) {
                await new Promise<void>((resolve) => setTimeout(resolve, Math.min(1000, this.options.blockMs)));
            }
        }
    }
}
