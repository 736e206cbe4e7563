import { OpenAIClassificationCapability } from '../ai/classificationCapability';
import { PlaywrightAutomationProvider } from '../browser/playwrightAutomation';
import { config } from '../config';
import { MessageBroker } from '../messaging/broker';
import { createMessageBroker } from '../messaging/brokerFactory';
import { CompletionListener } from '../messaging/completionListener';
import { ResultPublisher } from '../messaging/resultPublisher';
import { AutomationProvider, ClassificationCapability } from '../types/capabilities';
import { WorkflowOrchestrator } from './orchestrator';
import { SessionStore } from './sessionStore';
import { TaskRegistry } from './taskRegistry';
import { TaskRunner } from './taskRunner';

export interface Runtime {
    broker: MessageBroker;
    registry: TaskRegistry;
    sessions: SessionStore;
    publisher: ResultPublisher;
    listener: CompletionListener;
    runner: TaskRunner;
    orchestrator: WorkflowOrchestrator;
}

export interface RuntimeOverrides {
    broker?: MessageBroker;
    automation?: AutomationProvider;
    capability?: ClassificationCapability;
    random?: () => number;
}

/** Wires every component once; tests pass stand-ins for the external ports. */
export function createRuntime(overrides: RuntimeOverrides = {}): Runtime {
    const broker = overrides.broker ?? createMessageBroker();
    const registry = new TaskRegistry();
    const sessions = new SessionStore();
    const publisher = new ResultPublisher(broker, {
        maxAttempts: config.publishMaxAttempts,
        baseDelayMs: config.publishBaseDelayMs,
        maxDelayMs: config.publishMaxDelayMs,
    });
    const listener = new CompletionListener(broker, registry);
    const runner = new TaskRunner({
        registry,
        publisher,
        listener,
        maxConcurrent: config.maxConcurrentTasks,
        completionTimeoutMs: config.taskCompletionTimeoutMs,
    });
    const orchestrator = new WorkflowOrchestrator({
        registry,
        runner,
        sessions,
        automation: overrides.automation ?? new PlaywrightAutomationProvider(),
        capability: overrides.capability ?? new OpenAIClassificationCapability(),
        random: overrides.random,
    });
    return { broker, registry, sessions, publisher, listener, runner, orchestrator };
}

export async function shutdownRuntime(runtime: Runtime): Promise<void> {
    await runtime.runner.drain();
    await runtime.listener.close();
    await runtime.broker.close();
}
