/**
 * Stepwise ingestion boundary: subscription contract, in-process hub, entry validation.
 */

export * from './event-source.js';
export * from './event-hub.js';
export * from './validation.js';
