/**
 * In-process event hub.
 *
 * Producer side of the ingestion boundary: the simulation publishes events,
 * the hub queues them and delivers ordered batches to every subscribed
 * consumer. Constructed explicitly and handed to the pipeline; there is no
 * process-wide instance.
 */

import type { VariableEvent } from '../stepwise-types.js';
import { describeError } from '../errors.js';
import { resolveLogger, type StepwiseLogger } from '../logger.js';
import type { EventBatchConsumer, EventSource, Subscription } from './event-source.js';

export interface EventHubConfig {
    /** Largest batch handed to a consumer in one call. Default 500. */
    maxBatchSize?: number;
    /** Oldest events are dropped beyond this depth. Default 100 000. */
    maxQueueDepth?: number;
    logger?: StepwiseLogger | null;
}

export class EventHub implements EventSource {
    public static readonly DEFAULT_MAX_BATCH_SIZE = 500;
    public static readonly DEFAULT_MAX_QUEUE_DEPTH = 100_000;

    private readonly consumers = new Map<EventBatchConsumer, Subscription>();
    private queue: VariableEvent[] = [];
    private readonly maxBatchSize: number;
    private readonly maxQueueDepth: number;
    private readonly logger: StepwiseLogger | null;
    private _totalEventsProcessed = 0;
    private _droppedEvents = 0;
    private flushing: Promise<number> | null = null;
    private timer: NodeJS.Timeout | null = null;

    constructor(config: EventHubConfig = {}) {
        this.maxBatchSize = Math.max(1, Math.floor(config.maxBatchSize ?? EventHub.DEFAULT_MAX_BATCH_SIZE));
        this.maxQueueDepth = Math.max(1, Math.floor(config.maxQueueDepth ?? EventHub.DEFAULT_MAX_QUEUE_DEPTH));
        this.logger = resolveLogger(config.logger);
    }

    /**
     * Register a consumer. A consumer that is already registered gets its
     * existing handle back; a handle goes inactive once its registration ends,
     * whether through release() or unsubscribe().
     */
    subscribe(consumer: EventBatchConsumer): Subscription {
        const existing = this.consumers.get(consumer);
        if (existing) return existing;

        const consumers = this.consumers;
        const handle: Subscription = {
            get active(): boolean {
                return consumers.get(consumer) === handle;
            },
            release: () => {
                if (consumers.get(consumer) === handle) this.unsubscribe(consumer);
            }
        };
        consumers.set(consumer, handle);
        return handle;
    }

    unsubscribe(consumer: EventBatchConsumer): void {
        this.consumers.delete(consumer);
    }

    isSubscribed(consumer: EventBatchConsumer): boolean {
        return this.consumers.has(consumer);
    }

    /**
     * Queue events for delivery, preserving order.
     */
    publish(events: readonly VariableEvent[]): void {
        for (const event of events) this.queue.push(event);

        const overflow = this.queue.length - this.maxQueueDepth;
        if (overflow > 0) {
            this.queue.splice(0, overflow);
            this._droppedEvents += overflow;
            this.logger?.warn?.(`Event queue over capacity (${this.maxQueueDepth}); dropped ${overflow} oldest events.`);
        }
    }

    /**
     * Deliver every queued event. Concurrent calls share one drain.
     * Resolves with the number of events drained.
     */
    flush(): Promise<number> {
        if (!this.flushing) {
            this.flushing = this.drain().finally(() => {
                this.flushing = null;
            });
        }
        return this.flushing;
    }

    /**
     * Flush periodically until {@link stop}.
     */
    start(intervalMs: number): void {
        if (this.timer) return;
        this.timer = setInterval(() => {
            void this.flush().catch((err: unknown) => {
                this.logger?.error?.(`Scheduled flush failed: ${describeError(err)}`);
            });
        }, Math.max(1, intervalMs));
    }

    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        if (this.flushing) {
            await this.flushing;
        }
    }

    get queueDepth(): number {
        return this.queue.length;
    }

    get totalEventsProcessed(): number {
        return this._totalEventsProcessed;
    }

    get droppedEvents(): number {
        return this._droppedEvents;
    }

    get consumerCount(): number {
        return this.consumers.size;
    }

    private async drain(): Promise<number> {
        let drained = 0;
        while (this.queue.length > 0) {
            const batch: readonly VariableEvent[] = this.queue.splice(0, this.maxBatchSize);
            for (const consumer of Array.from(this.consumers.keys())) {
                // Unsubscribed while an earlier consumer was handling this batch.
                if (!this.consumers.has(consumer)) continue;
                try {
                    await consumer.processEventBatch(batch);
                } catch (err) {
                    this.logger?.error?.(`Consumer failed on batch of ${batch.length} events: ${describeError(err)}`);
                }
            }
            this._totalEventsProcessed += batch.length;
            drained += batch.length;
        }
        return drained;
    }
}
