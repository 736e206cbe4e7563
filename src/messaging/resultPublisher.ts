import { config } from '../config';
import { executeWithRetryPolicy } from '../core/integrationPolicy';
import { DeliveryError, errorMessage } from '../core/errors';
import { logInfo, logWarn } from '../telemetry/logger';
import { MessageBroker } from './broker';
import { Topic } from './topics';

export interface ResultPublisherOptions {
    maxAttempts?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
}

export interface PublishReceipt {
    topic: Topic;
    messageId: string;
    /** Stored as the task's result_ref. */
    ref: string;
}

export class ResultPublisher {
    private readonly broker: MessageBroker;
    private readonly maxAttempts: number;
    private readonly baseDelayMs: number;
    private readonly maxDelayMs: number;

    constructor(broker: MessageBroker, options: ResultPublisherOptions = {}) {
        this.broker = broker;
        this.maxAttempts = options.maxAttempts ?? config.publishMaxAttempts;
        this.baseDelayMs = options.baseDelayMs ?? config.publishBaseDelayMs;
        this.maxDelayMs = options.maxDelayMs ?? config.publishMaxDelayMs;
    }

    async publish(
        taskId: string,
        topic: Topic,
        payload: Record<string, unknown>,
        correlationId: string = taskId
    ): Promise<PublishReceipt> {
        const body: Record<string, unknown> = { ...payload, task_id: taskId };
        try {
            const messageId = await executeWithRetryPolicy(
                () => this.broker.publish(topic, correlationId, body),
                {
                    integration: 'broker.publish',
                    circuitKey: `broker.publish.${this.broker.name}`,
                    maxAttempts: this.maxAttempts,
                    baseDelayMs: this.baseDelayMs,
                    maxDelayMs: this.maxDelayMs,
                    // any broker failure is worth another try until the budget runs out
                    classifyError: () => 'transient',
                    onRetry: (attempt, delayMs, error) => {
                        void logWarn('publisher.retry', {
                            topic,
                            attempt,
                            delayMs,
                            error: errorMessage(error),
                        });
                    },
                }
            );
            await logInfo('publisher.published', { topic, correlationId, messageId });
            return { topic, messageId, ref: `${topic}:${messageId}` };
        } catch (error) {
            throw new DeliveryError(
                topic,
                `publish to ${topic} failed after ${this.maxAttempts} attempts: ${errorMessage(error)}`
            );
        }
    }
}
