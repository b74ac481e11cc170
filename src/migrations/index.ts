export * from './types';
export { MigrationRegistry } from './migration-registry';
export * from './steps';
