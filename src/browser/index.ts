export * from './launcher';
export * from './humanBehavior';
export * from './uiFallback';
export * from './auth';
export * from './playwrightAutomation';
