export const SERIES_PALETTE = [
    '#ff0000', // red
    '#0000ff', // blue
    '#008000', // green
    '#ffa500', // orange
    '#800080', // purple
    '#a52a2a', // brown
    '#ffc0cb', // pink
    '#00ffff'  // cyan
] as const;

/** Colour for the n-th monitored key, cycling through the palette. */
export function seriesColor(index: number): string {
    const len = SERIES_PALETTE.length;
    return SERIES_PALETTE[((Math.floor(index) % len) + len) % len];
}
