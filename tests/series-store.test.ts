import { SeriesStore } from '../src/series/series-store.js';

describe('SeriesStore', () => {
    it('creates series lazily and returns points in insertion order', () => {
        const store = new SeriesStore();
        expect(store.has('queue')).toBe(false);
        expect(store.snapshot('queue')).toEqual([]);

        store.append('queue', { timestamp: 1, value: 10 });
        store.append('queue', { timestamp: 2, value: 20 });

        expect(store.has('queue')).toBe(true);
        expect(store.keys()).toEqual(['queue']);
        expect(store.count('queue')).toBe(2);
        expect(store.snapshot('queue')).toEqual([
            { timestamp: 1, value: 10 },
            { timestamp: 2, value: 20 }
        ]);
        expect(store.last('queue')).toEqual({ timestamp: 2, value: 20 });
    });

    it('appending 1001 points with maxPoints=1000 keeps the newest 1000', () => {
        const store = new SeriesStore({ maxPoints: 1000 });
        for (let i = 0; i < 1001; i++) {
            store.append('k', { timestamp: i, value: i * 2 });
        }

        const points = store.snapshot('k');
        expect(points).toHaveLength(1000);
        expect(points[0]).toEqual({ timestamp: 1, value: 2 });
        expect(points[999]).toEqual({ timestamp: 1000, value: 2000 });
        for (let i = 1; i < points.length; i++) {
            expect(points[i].timestamp).toBe(points[i - 1].timestamp + 1);
        }
        expect(store.evictedCount).toBe(1);
    });

    it('defaults to 1000 points per key', () => {
        const store = new SeriesStore();
        expect(store.capacity).toBe(SeriesStore.DEFAULT_MAX_POINTS);
        expect(SeriesStore.DEFAULT_MAX_POINTS).toBe(1000);
    });

    it('caps each key independently', () => {
        const store = new SeriesStore({ maxPoints: 2 });
        for (let i = 0; i < 5; i++) store.append('a', { timestamp: i, value: i });
        store.append('b', { timestamp: 0, value: 9 });

        expect(store.count('a')).toBe(2);
        expect(store.count('b')).toBe(1);
        expect(store.snapshot('a').map((p) => p.timestamp)).toEqual([3, 4]);
    });

    it('seeds ranges with infinite sentinels and widens them on append', () => {
        const store = new SeriesStore();
        expect(store.hasData).toBe(false);
        expect(store.ranges()).toEqual({
            minTime: Infinity,
            maxTime: -Infinity,
            minValue: Infinity,
            maxValue: -Infinity
        });

        store.append('a', { timestamp: 5, value: 3 });
        store.append('b', { timestamp: 2, value: -4 });
        store.append('a', { timestamp: 9, value: 1 });

        expect(store.hasData).toBe(true);
        expect(store.ranges()).toEqual({ minTime: 2, maxTime: 9, minValue: -4, maxValue: 3 });
    });

    it('keeps ranges wide after the extreme points are evicted', () => {
        const store = new SeriesStore({ maxPoints: 2 });
        store.append('k', { timestamp: 0, value: 1000 });
        store.append('k', { timestamp: 1, value: -1000 });
        store.append('k', { timestamp: 2, value: 5 });
        store.append('k', { timestamp: 3, value: 6 });

        expect(store.snapshot('k')).toEqual([
            { timestamp: 2, value: 5 },
            { timestamp: 3, value: 6 }
        ]);
        expect(store.ranges()).toEqual({ minTime: 0, maxTime: 3, minValue: -1000, maxValue: 1000 });
    });

    it('snapshot() returns a copy that does not track later appends', () => {
        const store = new SeriesStore();
        store.append('k', { timestamp: 1, value: 1 });
        const snap = store.snapshot('k');
        store.append('k', { timestamp: 2, value: 2 });

        expect(snap).toHaveLength(1);
        expect(store.count('k')).toBe(2);
    });

    it('clear() drops series and resets ranges', () => {
        const store = new SeriesStore({ maxPoints: 1 });
        store.append('k', { timestamp: 1, value: 1 });
        store.append('k', { timestamp: 2, value: 2 });
        store.clear();

        expect(store.keys()).toEqual([]);
        expect(store.hasData).toBe(false);
        expect(store.evictedCount).toBe(0);
        expect(store.ranges().minTime).toBe(Infinity);
    });

    it('rejects an invalid capacity', () => {
        expect(() => new SeriesStore({ maxPoints: 0 })).toThrow(RangeError);
    });
});
