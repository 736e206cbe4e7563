import { config } from '../config';
import { MessageBroker } from './broker';
import { InMemoryBroker } from './memoryBroker';
import { RedisStreamBroker } from './redisStreamBroker';

export function createMessageBroker(): MessageBroker {
    if (config.redisUrl) {
        return RedisStreamBroker.fromUrl(config.redisUrl, {
            streamPrefix: config.brokerStreamPrefix,
            maxLen: config.brokerStreamMaxLen,
            blockMs: config.brokerBlockMs,
        });
    }
    return new InMemoryBroker();
}
