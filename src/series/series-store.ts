/**
 * Stepwise SeriesStore
 * Per-key bounded history plus global time/value ranges.
 */

import type { GlobalRanges, SeriesPoint } from '../stepwise-types.js';
import { RingBuffer } from './ring-buffer.js';

export interface SeriesStoreConfig {
    maxPoints?: number;
}

export class SeriesStore {
    public static readonly DEFAULT_MAX_POINTS = 1000;

    private readonly series = new Map<string, RingBuffer<SeriesPoint>>();
    private readonly maxPoints: number;
    private _evicted = 0;

    // Widened on every append, never narrowed by eviction: the axis range may
    // cover points that are no longer retained.
    private minTime = Number.POSITIVE_INFINITY;
    private maxTime = Number.NEGATIVE_INFINITY;
    private minValue = Number.POSITIVE_INFINITY;
    private maxValue = Number.NEGATIVE_INFINITY;

    constructor(config: SeriesStoreConfig = {}) {
        this.maxPoints = config.maxPoints ?? SeriesStore.DEFAULT_MAX_POINTS;
        if (!Number.isInteger(this.maxPoints) || this.maxPoints < 1) {
            throw new RangeError(`maxPoints must be a positive integer, got ${this.maxPoints}`);
        }
    }

    /**
     * Append a point, evicting the key's oldest point once `maxPoints` is exceeded.
     */
    append(key: string, point: SeriesPoint): void {
        let buffer = this.series.get(key);
        if (!buffer) {
            buffer = new RingBuffer<SeriesPoint>(this.maxPoints);
            this.series.set(key, buffer);
        }

        if (buffer.push(point) !== undefined) {
            this._evicted++;
        }

        if (point.timestamp < this.minTime) this.minTime = point.timestamp;
        if (point.timestamp > this.maxTime) this.maxTime = point.timestamp;
        if (point.value < this.minValue) this.minValue = point.value;
        if (point.value > this.maxValue) this.maxValue = point.value;
    }

    /**
     * Retained points for a key, oldest first. Returns a copy.
     */
    snapshot(key: string): SeriesPoint[] {
        return this.series.get(key)?.toArray() ?? [];
    }

    last(key: string): SeriesPoint | undefined {
        return this.series.get(key)?.last();
    }

    count(key: string): number {
        return this.series.get(key)?.length ?? 0;
    }

    has(key: string): boolean {
        return this.series.has(key);
    }

    keys(): string[] {
        return Array.from(this.series.keys());
    }

    ranges(): GlobalRanges {
        return {
            minTime: this.minTime,
            maxTime: this.maxTime,
            minValue: this.minValue,
            maxValue: this.maxValue
        };
    }

    /** True once any point has been appended since construction or `clear()`. */
    get hasData(): boolean {
        return this.maxTime >= this.minTime;
    }

    get capacity(): number {
        return this.maxPoints;
    }

    /** Points dropped by capacity eviction across all keys. */
    get evictedCount(): number {
        return this._evicted;
    }

    clear(): void {
        this.series.clear();
        this._evicted = 0;
        this.minTime = Number.POSITIVE_INFINITY;
        this.maxTime = Number.NEGATIVE_INFINITY;
        this.minValue = Number.POSITIVE_INFINITY;
        this.maxValue = Number.NEGATIVE_INFINITY;
    }
}
