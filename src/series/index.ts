/**
 * Stepwise series layer: bounded history, running statistics, render-time reduction.
 */

export * from './ring-buffer.js';
export * from './series-store.js';
export * from './aggregator.js';
export * from './downsample.js';
