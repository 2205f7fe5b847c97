export * from './errors';
export * from './logger';
export * from './encryption';
export * from './validation';
export * from './money';
export * from './concurrency';
export * from './config';
export * from './dates';
