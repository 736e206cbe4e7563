import {
    parseBoolEnv,
    parseDailyCapWindowEnv,
    parseFloatEnv,
    parseIntEnv,
    parseStringEnv,
    resolvePathFromEnv,
} from './env';
import {
    AiDomainConfig,
    BrokerDomainConfig,
    BrowserDomainConfig,
    FormDomainConfig,
    IntegrationDomainConfig,
    OutreachDomainConfig,
    RuntimeDomainConfig,
} from './types';

export function buildRuntimeDomainConfig(): RuntimeDomainConfig {
    return {
        port: parseIntEnv('PORT', 8080),
        dbPath: resolvePathFromEnv('DB_PATH', 'data/orchestrator.sqlite'),
        databaseUrl: parseStringEnv('DATABASE_URL'),
        allowSqliteInProduction: parseBoolEnv('ALLOW_SQLITE_IN_PRODUCTION', false),
        timezone: parseStringEnv('TIMEZONE', 'UTC') || 'UTC',
        maxConcurrentTasks: Math.max(1, parseIntEnv('MAX_CONCURRENT_TASKS', 4)),
        taskCompletionTimeoutMs: Math.max(0, parseIntEnv('TASK_COMPLETION_TIMEOUT_MS', 2 * 60 * 60 * 1000)),
        sessionTtlSeconds: Math.max(0, parseIntEnv('SESSION_TTL_SECONDS', 3600)),
        sessionPurgeIntervalMs: Math.max(1000, parseIntEnv('SESSION_PURGE_INTERVAL_MS', 15 * 60 * 1000)),
    };
}

export function buildBrokerDomainConfig(): BrokerDomainConfig {
    return {
        redisUrl: parseStringEnv('REDIS_URL'),
        brokerStreamPrefix: parseStringEnv('BROKER_STREAM_PREFIX', 'orchestrator') || 'orchestrator',
        brokerConsumerGroup: parseStringEnv('BROKER_CONSUMER_GROUP', 'orchestrator-listeners') || 'orchestrator-listeners',
        brokerStreamMaxLen: Math.max(100, parseIntEnv('BROKER_STREAM_MAX_LEN', 10_000)),
        brokerBlockMs: Math.max(10, parseIntEnv('BROKER_BLOCK_MS', 2_000)),
        publishMaxAttempts: Math.max(1, parseIntEnv('PUBLISH_MAX_ATTEMPTS', 5)),
        publishBaseDelayMs: Math.max(1, parseIntEnv('PUBLISH_BASE_DELAY_MS', 500)),
        publishMaxDelayMs: Math.max(1, parseIntEnv('PUBLISH_MAX_DELAY_MS', 15_000)),
        listenerDedupCacheSize: Math.max(1, parseIntEnv('LISTENER_DEDUP_CACHE_SIZE', 1_000)),
    };
}

export function buildIntegrationDomainConfig(): IntegrationDomainConfig {
    return {
        capabilityMaxAttempts: Math.max(1, parseIntEnv('CAPABILITY_MAX_ATTEMPTS', 3)),
        capabilityBaseDelayMs: Math.max(1, parseIntEnv('CAPABILITY_BASE_DELAY_MS', 750)),
        integrationRetryMaxDelayMs: Math.max(1, parseIntEnv('INTEGRATION_RETRY_MAX_DELAY_MS', 10_000)),
        integrationCircuitBreakerEnabled: parseBoolEnv('INTEGRATION_CIRCUIT_BREAKER_ENABLED', true),
        integrationCircuitFailureThreshold: Math.max(1, parseIntEnv('INTEGRATION_CIRCUIT_FAILURE_THRESHOLD', 5)),
        integrationCircuitOpenMs: Math.max(1000, parseIntEnv('INTEGRATION_CIRCUIT_OPEN_MS', 60_000)),
    };
}

export function buildFormDomainConfig(): FormDomainConfig {
    return {
        formMaxSteps: Math.max(1, parseIntEnv('FORM_MAX_STEPS', 10)),
        formMaxFillAttempts: Math.max(1, parseIntEnv('FORM_MAX_FILL_ATTEMPTS', 3)),
        applicantProfilePath: resolvePathFromEnv('CV_DATA_PATH', 'data/cv_data.json'),
    };
}

export function buildOutreachDomainConfig(): OutreachDomainConfig {
    return {
        dailyMessageLimit: Math.max(0, parseIntEnv('DAILY_MESSAGE_LIMIT', 50)),
        warmupDailyLimit: Math.max(0, parseIntEnv('WARMUP_DAILY_LIMIT', 10)),
        dailyCapWindow: parseDailyCapWindowEnv('DAILY_CAP_WINDOW', 'calendar'),
        outreachMinDelaySec: Math.max(0, parseFloatEnv('OUTREACH_MIN_DELAY_SEC', 30)),
        outreachMaxDelaySec: Math.max(0, parseFloatEnv('OUTREACH_MAX_DELAY_SEC', 120)),
        employeesPerCompany: Math.max(1, parseIntEnv('EMPLOYEES_PER_COMPANY', 10)),
    };
}

export function buildAiDomainConfig(): AiDomainConfig {
    return {
        openaiBaseUrl: parseStringEnv('OPENAI_BASE_URL', 'http://localhost:8088/v1') || 'http://localhost:8088/v1',
        openaiApiKey: parseStringEnv('OPENAI_API_KEY'),
        aiModel: parseStringEnv('AI_MODEL', 'llama3.1:8b') || 'llama3.1:8b',
        aiRequestTimeoutMs: Math.max(1000, parseIntEnv('AI_REQUEST_TIMEOUT_MS', 30_000)),
        aiAllowRemoteEndpoint: parseBoolEnv('AI_ALLOW_REMOTE_ENDPOINT', false),
        aiTemperature: Math.min(2, Math.max(0, parseFloatEnv('AI_TEMPERATURE', 0.1))),
    };
}

export function buildBrowserDomainConfig(): BrowserDomainConfig {
    return {
        headless: parseBoolEnv('HEADLESS', false),
        sessionDir: resolvePathFromEnv('SESSION_DIR', 'data/session'),
        browserExecutablePath: parseStringEnv('BROWSER_EXECUTABLE_PATH'),
        navigationTimeoutMs: Math.max(1000, parseIntEnv('NAVIGATION_TIMEOUT_MS', 45_000)),
    };
}
