/**
 * Stepwise Public API
 *
 * @module stepwise
 */

export type {
    VariableEvent,
    SeriesPoint,
    GlobalRanges,
    SourceStatus,
    KeySnapshot,
    RenderSnapshot
} from './stepwise-types.js';
export { StepwiseError, ConfigError, PipelineStateError, LockTimeoutError } from './errors.js';
export { createConsoleLogger } from './logger.js';
export type { StepwiseLogger } from './logger.js';

export * from './ingest/index.js';
export * from './series/index.js';
export * from './pipeline/index.js';
export * from './render/index.js';
