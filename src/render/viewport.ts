import type { GlobalRanges, SeriesPoint } from '../stepwise-types.js';

/** Integer plot rectangle in device units; y grows downward. */
export interface PlotArea {
    left: number;
    top: number;
    width: number;
    height: number;
}

export interface PlotPoint {
    x: number;
    y: number;
}

/**
 * Map series points into a plot area using the global ranges as axes.
 * A zero-width time or value span maps every point onto the left or bottom edge.
 */
export function projectPoints(points: readonly SeriesPoint[], ranges: GlobalRanges, area: PlotArea): PlotPoint[] {
    const timeSpan = ranges.maxTime - ranges.minTime;
    const valueSpan = ranges.maxValue - ranges.minValue;
    const bottom = area.top + area.height;

    return points.map((p) => {
        const fx = timeSpan > 0 ? (p.timestamp - ranges.minTime) / timeSpan : 0;
        const fy = valueSpan > 0 ? (p.value - ranges.minValue) / valueSpan : 0;
        return {
            x: area.left + Math.trunc(fx * area.width),
            y: bottom - Math.trunc(fy * area.height)
        };
    });
}
