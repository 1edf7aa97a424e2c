// Fixed-width circular histogram and the mean/median/mode derived from it
import type { AngularDomain, CircularHistogram, EstimatorSummary, FoldMode, MeanMethod, StrikeStatistic } from "./types";
import { RESULTANT_EPSILON } from "./types";
import { domainFor } from "./config";
import { foldAngle } from "./fold";

/**
 * Count samples into bins of `binWidth` degrees spanning the domain.
 * When the width does not divide the domain the last bin is narrower.
 * Samples on the domain's closed upper boundary (90° when folded) go into
 * the last bin.
 */
export function buildHistogram(samples: readonly number[], binWidth: number, domain: AngularDomain): CircularHistogram {
    const span = domain.upper - domain.lower;
    const binCount = Math.max(1, Math.ceil(span / binWidth - 1e-9));

    const edges = new Array<number>(binCount + 1);
    for (let i = 0; i < binCount; i++) edges[i] = domain.lower + i * binWidth;
    edges[binCount] = domain.upper;

    const counts = new Array<number>(binCount).fill(0);
    for (const v of samples) {
        const idx = Math.min(binCount - 1, Math.max(0, Math.floor((v - domain.lower) / binWidth)));
        counts[idx] = (counts[idx] ?? 0) + 1;
    }

    return { edges, counts, binWidth };
}

/** Left edge of the fullest bin; ties go to the lowest angle. Null for an empty histogram. */
export function histogramMode(histogram: CircularHistogram): number | null {
    let best = -1;
    let bestCount = 0;
    histogram.counts.forEach((count, i) => {
        if (count > bestCount) {
            bestCount = count;
            best = i;
        }
    });
    return best < 0 ? null : (histogram.edges[best] ?? null);
}

export function arithmeticMean(samples: readonly number[]): number | null {
    if (samples.length === 0) return null;
    return samples.reduce((s, v) => s + v, 0) / samples.length;
}

export function median(samples: readonly number[]): number | null {
    if (samples.length === 0) return null;
    const sorted = [...samples].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    if (sorted.length % 2 === 1) return sorted[mid]!;
    return (sorted[mid - 1]! + sorted[mid]!) / 2;
}

/**
 * Mean direction from the resultant of unit vectors.
 *
 * Folded angles are axial (θ and θ + 180° are the same strike), so they are
 * doubled onto the full circle before summing and halved after. Returns
 * null when the resultant vanishes and no direction is defined.
 */
export function vectorMean(samples: readonly number[], foldMode: FoldMode): number | null {
    if (samples.length === 0) return null;
    const period = foldMode === "folded" ? 180 : 360;

    let sumCos = 0;
    let sumSin = 0;
    for (const v of samples) {
        const theta = (2 * Math.PI * v) / period;
        sumCos += Math.cos(theta);
        sumSin += Math.sin(theta);
    }

    const C = sumCos / samples.length;
    const S = sumSin / samples.length;
    if (Math.hypot(C, S) < RESULTANT_EPSILON) return null;

    return foldAngle((Math.atan2(S, C) * period) / (2 * Math.PI), foldMode);
}

export function strikeStatistic(
    samples: readonly number[],
    histogram: CircularHistogram,
    foldMode: FoldMode,
    meanMethod: MeanMethod = "arithmetic",
): StrikeStatistic {
    return {
        mean: meanMethod === "vector" ? vectorMean(samples, foldMode) : arithmeticMean(samples),
        median: median(samples),
        mode: histogramMode(histogram),
        sampleCount: samples.length,
    };
}

/** Histogram plus statistics for one sample set under the run's fold mode. */
export function summarizeSamples(
    samples: readonly number[],
    options: { binWidthDegrees: number; foldMode: FoldMode; meanMethod: MeanMethod },
): EstimatorSummary {
    const histogram = buildHistogram(samples, options.binWidthDegrees, domainFor(options.foldMode));
    return {
        histogram,
        statistic: strikeStatistic(samples, histogram, options.foldMode, options.meanMethod),
    };
}
