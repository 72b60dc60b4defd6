export * from './recurrence/index.ts';
export * from './config.ts';
export * from './logger.ts';
