/**
 * Time-weighted averaging of piecewise-constant signals.
 *
 * Each key holds a plain state record updated in O(1) per event. A value is
 * assumed to hold from its timestamp until the next event for the same key,
 * so `weightedSum / totalDuration` is the integral of that step function over
 * the elapsed duration.
 *
 * Callers must feed non-decreasing timestamps per key. A regression is not
 * rejected here; it contributes a negative duration to the running sums.
 */

export interface AggregatorState {
    lastTime: number;
    lastValue: number;
    weightedSum: number;
    totalDuration: number;
    sampleCount: number;
}

/** Returned by {@link TimeWeightedAggregator.average} for a key with no events. */
export const EMPTY_AVERAGE = 0;

export function createAggregatorState(time: number, value: number): AggregatorState {
    return {
        lastTime: time,
        lastValue: value,
        weightedSum: 0,
        totalDuration: 0,
        sampleCount: 1
    };
}

/**
 * Fold one event into a state record.
 */
export function accumulate(state: AggregatorState, time: number, value: number): void {
    const duration = time - state.lastTime;
    state.weightedSum += state.lastValue * duration;
    state.totalDuration += duration;
    state.lastTime = time;
    state.lastValue = value;
    state.sampleCount += 1;
}

/**
 * Average of a state record. Falls back to the last value while no time has
 * elapsed (single sample, or all samples at the same instant).
 */
export function averageOf(state: AggregatorState): number {
    return state.totalDuration > 0 ? state.weightedSum / state.totalDuration : state.lastValue;
}

export class TimeWeightedAggregator {
    private readonly states = new Map<string, AggregatorState>();

    addEvent(key: string, time: number, value: number): void {
        const existing = this.states.get(key);
        if (!existing) {
            this.states.set(key, createAggregatorState(time, value));
            return;
        }
        accumulate(existing, time, value);
    }

    /**
     * Time-weighted average for a key, or {@link EMPTY_AVERAGE} when the key
     * has no events.
     */
    average(key: string): number {
        const state = this.states.get(key);
        return state ? averageOf(state) : EMPTY_AVERAGE;
    }

    has(key: string): boolean {
        return this.states.has(key);
    }

    /** Copy of a key's state record. */
    state(key: string): AggregatorState | undefined {
        const state = this.states.get(key);
        return state ? { ...state } : undefined;
    }

    get count(): number {
        return this.states.size;
    }

    clear(): void {
        this.states.clear();
    }
}
