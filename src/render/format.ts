/**
 * Display strings for the dashboard. Runs outside the state lock.
 */

import type { GlobalRanges, KeySnapshot, RenderSnapshot } from '../stepwise-types.js';

export const NO_DATA_LABEL = '—';

export interface MetricLabels {
    current: string;
    average: string;
}

export interface RangeLabels {
    time: string;
    value: string;
}

function fixed(value: number | null, digits: number): string {
    return value === null ? NO_DATA_LABEL : value.toFixed(digits);
}

export function formatMetricLabels(snapshot: KeySnapshot): MetricLabels {
    return {
        current: `Current: ${fixed(snapshot.currentValue, 2)}`,
        average: `Time-Weighted Avg: ${fixed(snapshot.timeWeightedAverage, 2)}`
    };
}

/**
 * Axis labels, or null before the first point.
 */
export function formatRangeLabels(ranges: GlobalRanges): RangeLabels | null {
    if (ranges.maxTime < ranges.minTime) return null;
    return {
        time: `Time: ${ranges.minTime.toFixed(1)} - ${ranges.maxTime.toFixed(1)}`,
        value: `Value: ${ranges.minValue.toFixed(1)} - ${ranges.maxValue.toFixed(1)}`
    };
}

export function formatStatusLine(snapshot: RenderSnapshot): string {
    let line = `${snapshot.totalEvents} total events, ` +
        `${snapshot.eventsSinceLastTick} in last ${Math.round(snapshot.elapsedMsSinceLastTick)}ms`;
    if (snapshot.source) {
        line += `, Queue: ${snapshot.source.queueDepth}, Processed: ${snapshot.source.totalEventsProcessed}`;
    }
    return line;
}
