export * from './repositories/applications';
export * from './repositories/companies';
export * from './repositories/dispatch';
export * from './repositories/sendLedger';
export * from './repositories/sessions';
export * from './repositories/system';
export * from './repositories/tasks';
export { isRecord, normalizeAccountKey, parseJsonObject } from './repositories/shared';
