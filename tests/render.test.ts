import { formatMetricLabels, formatRangeLabels, formatStatusLine } from '../src/render/format.js';
import { seriesColor, SERIES_PALETTE } from '../src/render/palette.js';
import { projectPoints } from '../src/render/viewport.js';
import type { KeySnapshot, RenderSnapshot } from '../src/stepwise-types.js';

function keySnapshot(currentValue: number | null, timeWeightedAverage: number | null): KeySnapshot {
    return {
        key: 'k',
        color: '#ff0000',
        currentValue,
        timeWeightedAverage,
        pointCount: 0,
        downsampledPoints: [],
        stepPath: []
    };
}

function renderSnapshot(source: RenderSnapshot['source']): RenderSnapshot {
    return {
        tick: 4,
        producedAt: 0,
        perKey: {},
        globalRanges: { minTime: 0, maxTime: 1, minValue: 0, maxValue: 1 },
        totalEvents: 120,
        eventsSinceLastTick: 20,
        elapsedMsSinceLastTick: 49.6,
        source
    };
}

describe('formatMetricLabels', () => {
    it('prints two decimals', () => {
        expect(formatMetricLabels(keySnapshot(5, 2.5))).toEqual({
            current: 'Current: 5.00',
            average: 'Time-Weighted Avg: 2.50'
        });
    });

    it('shows a placeholder before data arrives', () => {
        expect(formatMetricLabels(keySnapshot(null, null))).toEqual({
            current: 'Current: —',
            average: 'Time-Weighted Avg: —'
        });
    });
});

describe('formatRangeLabels', () => {
    it('prints one decimal per bound', () => {
        expect(formatRangeLabels({ minTime: 0, maxTime: 10, minValue: 1, maxValue: 9 })).toEqual({
            time: 'Time: 0.0 - 10.0',
            value: 'Value: 1.0 - 9.0'
        });
    });

    it('returns null for the empty-store sentinels', () => {
        expect(formatRangeLabels({
            minTime: Infinity,
            maxTime: -Infinity,
            minValue: Infinity,
            maxValue: -Infinity
        })).toBeNull();
    });
});

describe('formatStatusLine', () => {
    it('includes source diagnostics when present', () => {
        expect(formatStatusLine(renderSnapshot({ queueDepth: 3, totalEventsProcessed: 117 }))).toBe(
            '120 total events, 20 in last 50ms, Queue: 3, Processed: 117'
        );
    });

    it('omits source diagnostics without a source', () => {
        expect(formatStatusLine(renderSnapshot(null))).toBe('120 total events, 20 in last 50ms');
    });
});

describe('seriesColor', () => {
    it('cycles through the palette by key index', () => {
        expect(SERIES_PALETTE).toHaveLength(8);
        expect(seriesColor(0)).toBe('#ff0000');
        expect(seriesColor(1)).toBe('#0000ff');
        expect(seriesColor(8)).toBe('#ff0000');
        expect(seriesColor(9)).toBe('#0000ff');
    });
});

describe('projectPoints', () => {
    const area = { left: 60, top: 30, width: 100, height: 50 };

    it('maps time to x and value to an inverted y', () => {
        const ranges = { minTime: 0, maxTime: 10, minValue: 0, maxValue: 100 };
        expect(projectPoints([
            { timestamp: 0, value: 0 },
            { timestamp: 5, value: 50 },
            { timestamp: 10, value: 100 }
        ], ranges, area)).toEqual([
            { x: 60, y: 80 },
            { x: 110, y: 55 },
            { x: 160, y: 30 }
        ]);
    });

    it('pins degenerate spans to the left and bottom edges', () => {
        const ranges = { minTime: 3, maxTime: 3, minValue: 7, maxValue: 7 };
        expect(projectPoints([{ timestamp: 3, value: 7 }], ranges, area)).toEqual([{ x: 60, y: 80 }]);
    });
});
