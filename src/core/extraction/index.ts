/**
 * Extraction Module
 */

export { type AssembledContext, assembleContext, estimateTokens, type TokenBudget } from './context';
export {
  ExtractionError,
  type ExtractionFailureKind,
  ProviderError,
  type ProviderErrorKind
} from './errors';
export {
  type FailureStage,
  LoggingObserver,
  ObserverRegistry,
  type PipelineEvent,
  type PipelineEventInput,
  type PipelineObserver
} from './observers';
export * from './providers';
export { type ExtractionInput, ExtractionRunner, type ExtractionRunnerOptions } from './runner';
export { CandidateSet } from './schemas';
export { type RunnerState, RunnerStateMachine } from './state';
export type * from './types';
