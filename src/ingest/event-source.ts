import type { VariableEvent } from '../stepwise-types.js';

/**
 * Receives ordered batches from an {@link EventSource}.
 *
 * Batches are typed as well-formed events, but producers outside the type
 * system can still deliver malformed entries; consumers validate per entry.
 */
export interface EventBatchConsumer {
    processEventBatch(events: readonly VariableEvent[]): void | Promise<void>;
}

/**
 * Scoped registration returned by {@link EventSource.subscribe}.
 * `release()` may be called any number of times.
 */
export interface Subscription {
    readonly active: boolean;
    release(): void;
}

export interface EventSource {
    subscribe(consumer: EventBatchConsumer): Subscription;
    /** No-op for consumers that are not registered. */
    unsubscribe(consumer: EventBatchConsumer): void;
    /** Events waiting to be delivered. */
    readonly queueDepth: number;
    /** Events delivered since the source was created. */
    readonly totalEventsProcessed: number;
}
