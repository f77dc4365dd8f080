/**
 * Stepwise pipeline: shared-state lock, render cadence, configuration, orchestration.
 */

export * from './async-lock.js';
export * from './config.js';
export * from './render-scheduler.js';
export * from './pipeline.js';
