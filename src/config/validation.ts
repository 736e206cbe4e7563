import { AppConfig } from './types';
import { isAiRequestConfigured } from './env';

interface ConfigValidationRule {
    message: string;
    when: (cfg: AppConfig, nodeEnv: string) => boolean;
}

const CONFIG_VALIDATION_RULES: ConfigValidationRule[] = [
    {
        message: '[CONFIG] OPENAI_BASE_URL is not local and OPENAI_API_KEY is missing',
        when: (cfg) => !isAiRequestConfigured(cfg.openaiBaseUrl, cfg.openaiApiKey),
    },
    {
        message: '[CONFIG] OPENAI_BASE_URL is remote but AI_ALLOW_REMOTE_ENDPOINT=false',
        when: (cfg) => !cfg.aiAllowRemoteEndpoint && !!cfg.openaiApiKey && !isLocalUrl(cfg.openaiBaseUrl),
    },
    {
        message: '[CONFIG] OUTREACH_MAX_DELAY_SEC must be >= OUTREACH_MIN_DELAY_SEC',
        when: (cfg) => cfg.outreachMaxDelaySec < cfg.outreachMinDelaySec,
    },
    {
        message: '[CONFIG] WARMUP_DAILY_LIMIT must be <= DAILY_MESSAGE_LIMIT',
        when: (cfg) => cfg.warmupDailyLimit > cfg.dailyMessageLimit,
    },
    {
        message: '[CONFIG] PUBLISH_MAX_DELAY_MS must be >= PUBLISH_BASE_DELAY_MS',
        when: (cfg) => cfg.publishMaxDelayMs < cfg.publishBaseDelayMs,
    },
    {
        message: '[CONFIG] REDIS_URL must start with redis:// or rediss://',
        when: (cfg) => !!cfg.redisUrl && !/^rediss?:\/\//i.test(cfg.redisUrl),
    },
    {
        message: '[CONFIG] DATABASE_URL must be a postgres connection string',
        when: (cfg) => !!cfg.databaseUrl && !cfg.databaseUrl.startsWith('postgres'),
    },
    {
        message: '[CONFIG] SQLite in production requires ALLOW_SQLITE_IN_PRODUCTION=true or a DATABASE_URL',
        when: (cfg, nodeEnv) => nodeEnv === 'production' && !cfg.databaseUrl && !cfg.allowSqliteInProduction,
    },
    {
        message: '[CONFIG] TIMEZONE is not a valid IANA timezone',
        when: (cfg) => !isValidTimezone(cfg.timezone),
    },
];

function isLocalUrl(baseUrl: string): boolean {
    try {
        const host = new URL(baseUrl).hostname.toLowerCase();
        return host === 'localhost' || host === '127.0.0.1' || host === '::1' || host.endsWith('.local');
    } catch {
        return false;
    }
}

function isValidTimezone(timezone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: timezone });
        return true;
    } catch {
        return false;
    }
}

export function validateConfigSchema(cfg: AppConfig, nodeEnv: string = process.env.NODE_ENV ?? 'development'): string[] {
    return CONFIG_VALIDATION_RULES
        .filter((rule) => rule.when(cfg, nodeEnv))
        .map((rule) => rule.message);
}
