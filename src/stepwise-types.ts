/**
 * Stepwise shared data model.
 *
 * Events arrive from an external producer, are projected into per-key series
 * points and running statistics, and leave as render snapshots.
 */

/** One variable change reported by the simulation engine. */
export interface VariableEvent {
    readonly key: string;
    /** Simulation-time units, non-decreasing per key. */
    readonly timestamp: number;
    readonly value: number;
    readonly eventType: string;
}

/** Stored projection of a {@link VariableEvent} for one key. */
export interface SeriesPoint {
    readonly timestamp: number;
    readonly value: number;
}

export interface GlobalRanges {
    minTime: number;
    maxTime: number;
    minValue: number;
    maxValue: number;
}

export interface SourceStatus {
    queueDepth: number;
    totalEventsProcessed: number;
}

export interface KeySnapshot {
    key: string;
    color: string;
    /** Value of the newest retained point, `null` when the key has no data yet. */
    currentValue: number | null;
    timeWeightedAverage: number | null;
    /** Retained point count before downsampling. */
    pointCount: number;
    downsampledPoints: SeriesPoint[];
    /** Piecewise-constant connector through `downsampledPoints`. */
    stepPath: SeriesPoint[];
}

export interface RenderSnapshot {
    tick: number;
    /** Wall-clock ms when the snapshot was taken. */
    producedAt: number;
    perKey: Record<string, KeySnapshot>;
    globalRanges: GlobalRanges;
    totalEvents: number;
    eventsSinceLastTick: number;
    elapsedMsSinceLastTick: number;
    source: SourceStatus | null;
}
