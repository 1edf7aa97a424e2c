// Polar bar data for a rose diagram renderer
import type { CircularHistogram, FoldMode } from "./types";

export interface RoseBar {
    /** Bar centre, radians clockwise from north */
    theta: number;
    /** Angular width, radians */
    width: number;
    count: number;
}

const DEG = Math.PI / 180;

/**
 * One bar per histogram bin, centred on the bin. A folded strike is
 * ambiguous by 180°, so in folded mode every bar also appears opposite.
 */
export function roseBars(histogram: CircularHistogram, foldMode: FoldMode): RoseBar[] {
    const bars: RoseBar[] = [];
    histogram.counts.forEach((count, i) => {
        const lo = histogram.edges[i]!;
        const hi = histogram.edges[i + 1]!;
        const centre = (lo + hi) / 2;
        const width = (hi - lo) * DEG;
        bars.push({ theta: centre * DEG, width, count });
        if (foldMode === "folded") {
            bars.push({ theta: (centre + 180) * DEG, width, count });
        }
    });
    return bars;
}
