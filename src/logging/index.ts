/**
 * Logging Module
 */

export * from './types';
export { Logger } from './logger';
export type { LoggerOptions } from './logger';
export { ComponentLogger } from './component-logger';
export { FileLogBackend } from './file-backend';
