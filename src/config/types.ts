export type DailyCapWindow = 'calendar' | 'rolling';

export interface RuntimeDomainConfig {
    port: number;
    dbPath: string;
    databaseUrl: string;
    allowSqliteInProduction: boolean;
    timezone: string;
    maxConcurrentTasks: number;
    taskCompletionTimeoutMs: number;
    sessionTtlSeconds: number;
    sessionPurgeIntervalMs: number;
}

export interface BrokerDomainConfig {
    redisUrl: string;
    brokerStreamPrefix: string;
    brokerConsumerGroup: string;
    brokerStreamMaxLen: number;
    brokerBlockMs: number;
    publishMaxAttempts: number;
    publishBaseDelayMs: number;
    publishMaxDelayMs: number;
    listenerDedupCacheSize: number;
}

export interface IntegrationDomainConfig {
    capabilityMaxAttempts: number;
    capabilityBaseDelayMs: number;
    integrationRetryMaxDelayMs: number;
    integrationCircuitBreakerEnabled: boolean;
    integrationCircuitFailureThreshold: number;
    integrationCircuitOpenMs: number;
}

export interface FormDomainConfig {
    formMaxSteps: number;
    formMaxFillAttempts: number;
    applicantProfilePath: string;
}

export interface OutreachDomainConfig {
    dailyMessageLimit: number;
    warmupDailyLimit: number;
    dailyCapWindow: DailyCapWindow;
    outreachMinDelaySec: number;
    outreachMaxDelaySec: number;
    employeesPerCompany: number;
}

export interface AiDomainConfig {
    openaiBaseUrl: string;
    openaiApiKey: string;
    aiModel: string;
    aiRequestTimeoutMs: number;
    aiAllowRemoteEndpoint: boolean;
    aiTemperature: number;
}

export interface BrowserDomainConfig {
    headless: boolean;
    sessionDir: string;
    browserExecutablePath: string;
    navigationTimeoutMs: number;
}

export type AppConfig = RuntimeDomainConfig
    & BrokerDomainConfig
    & IntegrationDomainConfig
    & FormDomainConfig
    & OutreachDomainConfig
    & AiDomainConfig
    & BrowserDomainConfig;
