import { config } from '../config';
import { CancelledError, CapabilityError } from './errors';

export type RetryClassification = 'transient' | 'terminal';

export class CircuitOpenError extends Error {
    readonly circuitKey: string;
    readonly retryAfterMs: number;

    constructor(circuitKey: string, retryAfterMs: number) {
        super(`Circuit breaker open for "${circuitKey}". Retry after ${retryAfterMs}ms.`);
        this.name = 'CircuitOpenError';
        this.circuitKey = circuitKey;
        this.retryAfterMs = retryAfterMs;
    }
}

interface CircuitState {
    consecutiveFailures: number;
    openUntilMs: number;
}

const circuitStates = new Map<string, CircuitState>();

export interface RetryPolicyOptions {
    integration: string;
    circuitKey?: string;
    timeoutMs?: number;
    maxAttempts?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    signal?: AbortSignal;
    classifyError?: (error: unknown) => RetryClassification;
    classifyResponse?: (response: Response) => RetryClassification;
    onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

const DEFAULT_TRANSIENT_HTTP_STATUS = new Set<number>([408, 425, 429, 500, 502, 503, 504]);

export function computeBackoffDelayMs(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
    const exponent = Math.max(0, attempt - 1);
    const base = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, exponent));
    const jitter = Math.floor(Math.random() * Math.max(1, Math.floor(base * 0.25)));
    return Math.min(maxDelayMs, base + jitter);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new CancelledError());
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new CancelledError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

function createTimedAbortController(parent: AbortSignal | null | undefined, timeoutMs: number): {
    signal: AbortSignal;
    cleanup: () => void;
} {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(new Error('Integration timeout')), timeoutMs);

    const onAbort = () => controller.abort(parent?.reason);
    if (parent) {
        if (parent.aborted) {
            controller.abort(parent.reason);
        } else {
            parent.addEventListener('abort', onAbort, { once: true });
        }
    }

    return {
        signal: controller.signal,
        cleanup: () => {
            clearTimeout(timeout);
            if (parent) {
                parent.removeEventListener('abort', onAbort);
            }
        },
    };
}

function isCircuitBreakerOpen(circuitKey: string): number | null {
    if (!config.integrationCircuitBreakerEnabled) {
        return null;
    }
    const state = circuitStates.get(circuitKey);
    if (!state) return null;
    const now = Date.now();
    if (state.openUntilMs > now) {
        return state.openUntilMs - now;
    }
    return null;
}

function registerCircuitFailure(circuitKey: string): void {
    if (!config.integrationCircuitBreakerEnabled) {
        return;
    }
    const now = Date.now();
    const state = circuitStates.get(circuitKey) ?? { consecutiveFailures: 0, openUntilMs: 0 };
    state.consecutiveFailures += 1;
    if (state.consecutiveFailures >= config.integrationCircuitFailureThreshold) {
        state.openUntilMs = now + config.integrationCircuitOpenMs;
        state.consecutiveFailures = 0;
    }
    circuitStates.set(circuitKey, state);
}

function registerCircuitSuccess(circuitKey: string): void {
    if (!config.integrationCircuitBreakerEnabled) {
        return;
    }
    circuitStates.set(circuitKey, { consecutiveFailures: 0, openUntilMs: 0 });
}

export function isTransientHttpStatus(status: number): boolean {
    return DEFAULT_TRANSIENT_HTTP_STATUS.has(status);
}

export function isLikelyTransientError(error: unknown): boolean {
    if (error instanceof CircuitOpenError || error instanceof CancelledError) {
        return false;
    }
    if (error instanceof CapabilityError) {
        return error.transient;
    }
    const message = error instanceof Error ? error.message : String(error);
    const normalized = message.toLowerCase();
    if (normalized.includes('http transient')) {
        return true;
    }
    return normalized.includes('timeout')
        || normalized.includes('timed out')
        || normalized.includes('network')
        || normalized.includes('fetch failed')
        || normalized.includes('econnreset')
        || normalized.includes('econnrefused')
        || normalized.includes('enotfound')
        || normalized.includes('eai_again')
        || normalized.includes('socket hang up')
        || normalized.includes('connection is closed')
        || normalized.includes('temporarily unavailable');
}

export async function executeWithRetryPolicy<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryPolicyOptions
): Promise<T> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? config.capabilityMaxAttempts);
    const baseDelayMs = Math.max(1, options.baseDelayMs ?? config.capabilityBaseDelayMs);
    const maxDelayMs = Math.max(baseDelayMs, options.maxDelayMs ?? config.integrationRetryMaxDelayMs);
    const circuitKey = options.circuitKey ?? options.integration;

    let lastError: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (options.signal?.aborted) {
            throw new CancelledError();
        }
        const openForMs = isCircuitBreakerOpen(circuitKey);
        if (openForMs !== null) {
            throw new CircuitOpenError(circuitKey, openForMs);
        }
        try {
            const result = await operation(attempt);
            registerCircuitSuccess(circuitKey);
            return result;
        } catch (error) {
            lastError = error;
            const classification = options.classifyError
                ? options.classifyError(error)
                : (isLikelyTransientError(error) ? 'transient' : 'terminal');
            if (classification === 'terminal') {
                throw error;
            }
            registerCircuitFailure(circuitKey);
            if (attempt >= maxAttempts) {
                break;
            }
            const delayMs = computeBackoffDelayMs(attempt, baseDelayMs, maxDelayMs);
            options.onRetry?.(attempt, delayMs, error);
            await sleep(delayMs, options.signal);
        }
    }

    throw (lastError instanceof Error ? lastError : new Error(`${options.integration}: retry exhausted`));
}

function classifyCapabilityError(error: unknown): RetryClassification {
    if (error instanceof CancelledError || error instanceof CircuitOpenError) {
        return 'terminal';
    }
    if (error instanceof CapabilityError) {
        return error.transient ? 'transient' : 'terminal';
    }
    return 'transient';
}

/**
 * Wraps a capability port call: transient failures are retried, the final one
 * surfaces as a CapabilityError naming the capability.
 */
export async function callCapability<T>(
    capability: string,
    operation: () => Promise<T>,
    options: Omit<RetryPolicyOptions, 'integration'> = {}
): Promise<T> {
    try {
        return await executeWithRetryPolicy(() => operation(), {
            ...options,
            integration: capability,
            classifyError: options.classifyError ?? classifyCapabilityError,
        });
    } catch (error) {
        if (error instanceof CancelledError || error instanceof CapabilityError) {
            throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new CapabilityError(capability, `${capability} failed: ${message}`, false);
    }
}

export async function fetchWithRetryPolicy(
    url: string,
    init: RequestInit,
    options: RetryPolicyOptions
): Promise<Response> {
    const timeoutMs = Math.max(250, options.timeoutMs ?? config.aiRequestTimeoutMs);
    const classifyResponse = options.classifyResponse
        ?? ((response: Response) => (isTransientHttpStatus(response.status) ? 'transient' : 'terminal'));

    return executeWithRetryPolicy<Response>(
        async () => {
            const controller = createTimedAbortController(init.signal, timeoutMs);
            try {
                const response = await fetch(url, {
                    ...init,
                    signal: controller.signal,
                });
                const classification = classifyResponse(response);
                if (classification === 'transient') {
                    throw new Error(`HTTP transient ${response.status}`);
                }
                return response;
            } finally {
                controller.cleanup();
            }
        },
        {
            ...options,
            classifyError: (error) => (isLikelyTransientError(error) ? 'transient' : 'terminal'),
        }
    );
}

