import {
    buildAiDomainConfig,
    buildBrokerDomainConfig,
    buildBrowserDomainConfig,
    buildFormDomainConfig,
    buildIntegrationDomainConfig,
    buildOutreachDomainConfig,
    buildRuntimeDomainConfig,
} from './domains';
import { loadDotEnv } from './env';
import { AppConfig, DailyCapWindow } from './types';
import { validateConfigSchema } from './validation';

loadDotEnv();

export const config: AppConfig = {
    ...buildRuntimeDomainConfig(),
    ...buildBrokerDomainConfig(),
    ...buildIntegrationDomainConfig(),
    ...buildFormDomainConfig(),
    ...buildOutreachDomainConfig(),
    ...buildAiDomainConfig(),
    ...buildBrowserDomainConfig(),
};

export function getLocalDateString(now: Date = new Date(), timezone: string = config.timezone): string {
    const formatter = new Intl.DateTimeFormat('en-CA', {
        timeZone: timezone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
    });
    return formatter.format(now);
}

export function validateCriticalConfig(): string[] {
    return validateConfigSchema(config);
}

export type { AppConfig, DailyCapWindow };
