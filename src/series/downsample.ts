import type { SeriesPoint } from '../stepwise-types.js';

export const DEFAULT_DOWNSAMPLE_TARGET = 500;

/**
 * Reduce a series to at most `target` points by fixed-stride selection.
 *
 * The stride is `ceil(n / target)`, so the output never exceeds `target`.
 * Rounding up costs density just past a multiple of the target: 1001 points at
 * target 500 take stride 3 and render 334 points. A floored stride would keep
 * 501 there and overshoot the target instead.
 * Selection starts at the oldest point, and the final selected slot is moved to
 * the newest point so the rendered series always ends at the current value.
 * Inputs are never mutated; the same input always yields the same output.
 */
export function downsample(points: readonly SeriesPoint[], target: number = DEFAULT_DOWNSAMPLE_TARGET): SeriesPoint[] {
    if (!Number.isInteger(target) || target < 1) {
        throw new RangeError(`Downsample target must be a positive integer, got ${target}`);
    }

    const n = points.length;
    if (n <= target) return points.slice();

    const stride = Math.max(1, Math.ceil(n / target));
    const selected = Math.ceil(n / stride);
    const out = new Array<SeriesPoint>(selected);
    for (let i = 0; i < selected - 1; i++) {
        out[i] = points[i * stride];
    }
    out[selected - 1] = points[n - 1];
    return out;
}

/**
 * Expand points into a step-function path: between consecutive points the value
 * holds horizontally until the next timestamp, then jumps vertically.
 *
 * For `n` input points the path has `2n - 1` vertices.
 */
export function toStepPath(points: readonly SeriesPoint[]): SeriesPoint[] {
    if (points.length === 0) return [];

    const path: SeriesPoint[] = [points[0]];
    for (let i = 1; i < points.length; i++) {
        const prev = points[i - 1];
        const curr = points[i];
        path.push({ timestamp: curr.timestamp, value: prev.value });
        path.push(curr);
    }
    return path;
}
