/**
 * Stepwise MonitoringPipeline
 *
 * Owns the shared ingestion state (series, running averages, dirty flag,
 * counters) behind one AsyncMutex. Producers push batches through
 * processEventBatch; the render scheduler turns unconsumed changes into at most
 * one snapshot per interval.
 */

import type {
    GlobalRanges,
    KeySnapshot,
    RenderSnapshot,
    SeriesPoint,
    SourceStatus,
    VariableEvent
} from '../stepwise-types.js';
import { describeError, PipelineStateError } from '../errors.js';
import { resolveLogger, type StepwiseLogger } from '../logger.js';
import type { EventBatchConsumer, EventSource, Subscription } from '../ingest/event-source.js';
import { parseVariableEvent } from '../ingest/validation.js';
import { SeriesStore } from '../series/series-store.js';
import { TimeWeightedAggregator } from '../series/aggregator.js';
import { downsample, toStepPath } from '../series/downsample.js';
import { seriesColor } from '../render/palette.js';
import { AsyncMutex } from './async-lock.js';
import { RenderScheduler } from './render-scheduler.js';
import { resolvePipelineConfig, type PipelineConfig, type PipelineConfigInput } from './config.js';

export type RenderConsumer = (snapshot: RenderSnapshot) => void | Promise<void>;

export interface MonitoringPipelineOptions {
    config: PipelineConfigInput;
    /** Producer to subscribe to on start(). Batches can also be pushed directly. */
    source?: EventSource | null;
    onRender?: RenderConsumer;
    logger?: StepwiseLogger | null;
    /** Wall clock used for snapshot timestamps. Defaults to Date.now. */
    now?: () => number;
}

export interface BatchResult {
    accepted: number;
    /** Well-formed events for keys outside the monitored set. */
    ignored: number;
    malformed: number;
    outOfOrder: number;
}

export type PipelineState = 'idle' | 'running' | 'stopped';

/** Per-key data copied under the lock; reduced for rendering after release. */
interface CapturedKey {
    key: string;
    color: string;
    points: SeriesPoint[];
    average: number | null;
}

interface CapturedState {
    keys: CapturedKey[];
    ranges: GlobalRanges;
    totalEvents: number;
    eventsSinceLastTick: number;
    elapsedMsSinceLastTick: number;
    producedAt: number;
    source: SourceStatus | null;
}

export class MonitoringPipeline implements EventBatchConsumer {
    readonly config: PipelineConfig;

    private readonly monitored: ReadonlySet<string>;
    private readonly store: SeriesStore;
    private readonly aggregator = new TimeWeightedAggregator();
    private readonly lock = new AsyncMutex('pipeline state');
    private readonly scheduler: RenderScheduler<RenderSnapshot | null>;
    private readonly source: EventSource | null;
    private readonly onRender: RenderConsumer | null;
    private readonly logger: StepwiseLogger | null;
    private readonly now: () => number;

    private subscription: Subscription | null = null;
    private _state: PipelineState = 'idle';
    private _dirty = false;
    private _totalEvents = 0;
    private _eventsSinceLastTick = 0;
    private lastTickAt: number;
    private renderCount = 0;
    private latest: RenderSnapshot | null = null;

    constructor(options: MonitoringPipelineOptions) {
        this.config = resolvePipelineConfig(options.config);
        this.monitored = new Set(this.config.monitoredKeys);
        this.store = new SeriesStore({ maxPoints: this.config.maxPoints });
        this.source = options.source ?? null;
        this.onRender = options.onRender ?? null;
        this.logger = resolveLogger(options.logger);
        this.now = options.now ?? Date.now;
        this.lastTickAt = this.now();
        this.scheduler = new RenderScheduler(() => this.renderTick(), {
            intervalMs: this.config.refreshIntervalMs,
            logger: this.logger
        });
    }

    /**
     * Subscribe to the source and begin ticking.
     */
    start(): void {
        if (this._state === 'stopped') {
            throw new PipelineStateError('Pipeline has been shut down and cannot be restarted.');
        }
        if (this._state === 'running') return;

        if (this.source) {
            this.subscription = this.source.subscribe(this);
        }
        this.scheduler.start();
        this._state = 'running';
        this.logger?.info?.(
            `Monitoring ${this.monitored.size} keys, refresh ${this.config.refreshIntervalMs}ms, ` +
            `maxPoints ${this.config.maxPoints}, downsample target ${this.config.downsampleTarget}.`
        );
    }

    /**
     * Ingestion entry point used by event sources.
     */
    async processEventBatch(events: readonly VariableEvent[]): Promise<void> {
        await this.ingest(events);
    }

    /**
     * Apply a batch atomically with respect to render ticks.
     * Malformed entries and unmonitored keys are skipped; the rest of the batch still applies.
     */
    async ingest(events: readonly VariableEvent[]): Promise<BatchResult> {
        const result: BatchResult = { accepted: 0, ignored: 0, malformed: 0, outOfOrder: 0 };
        if (this._state === 'stopped') {
            result.ignored = events.length;
            this.logger?.debug?.(`Dropped batch of ${events.length} events after shutdown.`);
            return result;
        }

        await this.lock.withExclusive(() => this.applyBatch(events, result), this.config.lockTimeoutMs);
        return result;
    }

    /**
     * Produce a snapshot if anything changed since the last one.
     * Resolves with null when there was nothing to render.
     */
    private async renderTick(): Promise<RenderSnapshot | null> {
        const captured = await this.lock.withExclusive(() => this.capture(), this.config.lockTimeoutMs);
        if (!captured) return null;

        // Keys are arbitrary strings; fromEntries defines own properties even for '__proto__'.
        const perKey: Record<string, KeySnapshot> = Object.fromEntries(
            captured.keys.map((entry): [string, KeySnapshot] => {
                const downsampledPoints = downsample(entry.points, this.config.downsampleTarget);
                const last = entry.points[entry.points.length - 1];
                return [entry.key, {
                    key: entry.key,
                    color: entry.color,
                    currentValue: last ? last.value : null,
                    timeWeightedAverage: entry.average,
                    pointCount: entry.points.length,
                    downsampledPoints,
                    stepPath: toStepPath(downsampledPoints)
                }];
            })
        );

        const snapshot: RenderSnapshot = {
            tick: ++this.renderCount,
            producedAt: captured.producedAt,
            perKey,
            globalRanges: captured.ranges,
            totalEvents: captured.totalEvents,
            eventsSinceLastTick: captured.eventsSinceLastTick,
            elapsedMsSinceLastTick: captured.elapsedMsSinceLastTick,
            source: captured.source
        };
        this.latest = snapshot;

        if (this.onRender) {
            await this.onRender(snapshot);
        }
        return snapshot;
    }

    /**
     * Run a render tick now, serialized with scheduled ticks.
     */
    async renderNow(): Promise<RenderSnapshot | null> {
        return (await this.scheduler.tickNow()) ?? null;
    }

    /**
     * Stop ticking, release the subscription, then clear all state.
     * Teardown failures are logged; shutdown always completes.
     */
    async shutdown(): Promise<void> {
        if (this._state === 'stopped') return;
        this._state = 'stopped';

        await this.scheduler.stop();

        if (this.subscription) {
            try {
                this.subscription.release();
            } catch (err) {
                this.logger?.error?.(`Unsubscribe failed during shutdown: ${describeError(err)}`);
            }
            this.subscription = null;
        }

        try {
            await this.lock.withExclusive(() => this.clearState(), this.config.lockTimeoutMs);
        } catch (err) {
            this.logger?.error?.(`Could not acquire state lock during shutdown: ${describeError(err)}`);
            this.clearState();
        }
        this.logger?.info?.(`Pipeline stopped after ${this._totalEvents} events.`);
    }

    series(key: string): SeriesPoint[] {
        return this.store.snapshot(key);
    }

    /** Time-weighted average for a key, or null before its first event. */
    average(key: string): number | null {
        return this.aggregator.has(key) ? this.aggregator.average(key) : null;
    }

    ranges(): GlobalRanges {
        return this.store.ranges();
    }

    isMonitored(key: string): boolean {
        return this.monitored.has(key);
    }

    get dirty(): boolean {
        return this._dirty;
    }

    get state(): PipelineState {
        return this._state;
    }

    get totalEvents(): number {
        return this._totalEvents;
    }

    get eventsSinceLastTick(): number {
        return this._eventsSinceLastTick;
    }

    get latestSnapshot(): RenderSnapshot | null {
        return this.latest;
    }

    get failedTicks(): number {
        return this.scheduler.failedTicks;
    }

    private applyBatch(events: readonly VariableEvent[], result: BatchResult): void {
        for (const raw of events) {
            const parsed = parseVariableEvent(raw);
            if (!parsed.ok) {
                result.malformed++;
                this.logger?.warn?.(`Skipped malformed event: ${parsed.reason}`);
                continue;
            }

            const { key, timestamp, value } = parsed.event;
            if (!this.monitored.has(key)) {
                result.ignored++;
                continue;
            }

            if (this.config.rejectOutOfOrder) {
                const last = this.store.last(key);
                if (last && timestamp < last.timestamp) {
                    result.outOfOrder++;
                    this.logger?.warn?.(`Skipped out-of-order event for ${key}: ${timestamp} < ${last.timestamp}`);
                    continue;
                }
            }

            this.store.append(key, { timestamp, value });
            this.aggregator.addEvent(key, timestamp, value);
            result.accepted++;
            this.logger?.debug?.(`Processed ${key} = ${value} at time ${timestamp}`);
        }

        if (result.accepted > 0) {
            this._totalEvents += result.accepted;
            this._eventsSinceLastTick += result.accepted;
            this._dirty = true;
        }
    }

    private capture(): CapturedState | null {
        if (!this._dirty) return null;

        const keys: CapturedKey[] = this.config.monitoredKeys.map((key, index) => ({
            key,
            color: seriesColor(index),
            points: this.store.snapshot(key),
            average: this.aggregator.has(key) ? this.aggregator.average(key) : null
        }));

        const producedAt = this.now();
        const captured: CapturedState = {
            keys,
            ranges: this.store.ranges(),
            totalEvents: this._totalEvents,
            eventsSinceLastTick: this._eventsSinceLastTick,
            elapsedMsSinceLastTick: producedAt - this.lastTickAt,
            producedAt,
            source: this.source
                ? { queueDepth: this.source.queueDepth, totalEventsProcessed: this.source.totalEventsProcessed }
                : null
        };

        this._dirty = false;
        this._eventsSinceLastTick = 0;
        this.lastTickAt = producedAt;
        return captured;
    }

    private clearState(): void {
        this.store.clear();
        this.aggregator.clear();
        this._dirty = false;
        this._eventsSinceLastTick = 0;
    }
}
