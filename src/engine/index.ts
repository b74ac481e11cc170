export * from './types';
export { ConvergenceEngine, describeFailure } from './convergence-engine';
export type { ConvergenceEngineOptions } from './convergence-engine';
