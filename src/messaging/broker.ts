export interface BrokerMessage {
    id: string;
    topic: string;
    /** Correlation key: the originating task id or session id. */
    key: string;
    payload: Record<string, unknown>;
    publishedAt: string;
    deliveryCount: number;
}

export type BrokerHandler = (message: BrokerMessage) => Promise<void>;

export type Unsubscribe = () => Promise<void>;

/**
 * At-least-once transport. A handler that throws leaves the message
 * unacknowledged, so it is delivered again; consumers must be idempotent.
 */
export interface MessageBroker {
    readonly name: string;
    publish(topic: string, key: string, payload: Record<string, unknown>): Promise<string>;
    subscribe(topic: string, group: string, handler: BrokerHandler): Promise<Unsubscribe>;
    ping(): Promise<boolean>;
    close(): Promise<void>;
}
