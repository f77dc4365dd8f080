/**
 * Stepwise Utilities
 *
 * Shared numeric helpers.
 */

/**
 * Clamp a number into [min, max]. NaN collapses to `min`.
 */
export function clamp(value: number, min: number, max: number): number {
    if (Number.isNaN(value)) return min;
    return Math.min(max, Math.max(min, value));
}

/**
 * Wait for N ms
 */
export const wait = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));
