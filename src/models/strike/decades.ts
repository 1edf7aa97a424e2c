// Decade binning of the canonical grid and of native station samples
import type { CanonicalGrid, DecadeBin, DecadeRange, Estimator, FoldedTables, PeriodSample } from "./types";
import { AGGREGATE_LABEL, DECADE_EPSILON } from "./types";

/** Decade exponent b such that period ∈ [10^b, 10^(b+1)). */
export function decadeOf(period: number): number {
    return Math.floor(Math.log10(period) + DECADE_EPSILON);
}

// Built as text: 10 ** -4 prints as 0.00009999999999999999
function formatPower(exponent: number): string {
    return exponent < 0 ? `0.${"0".repeat(-exponent - 1)}1` : `1${"0".repeat(exponent)}`;
}

/** "0.01-0.1s", "1-10s", "100-1000s" */
export function decadeLabel(exponent: number): string {
    return `${formatPower(exponent)}-${formatPower(exponent + 1)}s`;
}

/**
 * Exponent range covered by the data: from the decade of the shortest
 * period up to and including the decade of the longest. A longest period
 * that is an exact power of ten opens its own decade, so 0.01–1000 s gives
 * six bins, [-2, -1) through [3, 4).
 */
export function resolveDecadeRange(grid: CanonicalGrid, range: DecadeRange | "auto"): DecadeRange {
    if (range !== "auto") return range;
    return [decadeOf(grid.periodMin), decadeOf(grid.periodMax) + 1];
}

function rowsInRange(grid: CanonicalGrid, lower: number, upper: number): number[] {
    const indices: number[] = [];
    grid.periods.forEach((p, i) => {
        const b = decadeOf(p);
        if (b >= lower && b < upper) indices.push(i);
    });
    return indices;
}

/** One bin per decade exponent in the range. With "auto" the bins partition the grid. */
export function decadeBins(grid: CanonicalGrid, range: DecadeRange | "auto" = "auto"): DecadeBin[] {
    const [bMin, bMax] = resolveDecadeRange(grid, range);
    const bins: DecadeBin[] = [];
    for (let b = bMin; b < bMax; b++) {
        bins.push({ label: decadeLabel(b), lower: b, upper: b + 1, gridIndices: rowsInRange(grid, b, b + 1) });
    }
    return bins;
}

/** A single bin spanning the whole requested range. */
export function aggregateBin(grid: CanonicalGrid, range: DecadeRange | "auto" = "auto"): DecadeBin {
    const [bMin, bMax] = resolveDecadeRange(grid, range);
    return { label: AGGREGATE_LABEL, lower: bMin, upper: bMax, gridIndices: rowsInRange(grid, bMin, bMax) };
}

/**
 * Flat folded samples for one (bin, estimator) pair across every station.
 * Null cells are skipped; with `excludeZero` so are exact 0° values, which
 * reproduces output where 0 meant "no data".
 */
export function collectBinSamples(
    folded: FoldedTables,
    bin: DecadeBin,
    estimator: Estimator,
    excludeZero: boolean = false,
): number[] {
    const table = folded.tables[estimator];
    const samples: number[] = [];
    for (const i of bin.gridIndices) {
        for (const v of table[i] ?? []) {
            if (v === null) continue;
            if (excludeZero && v === 0) continue;
            samples.push(v);
        }
    }
    return samples;
}

/** Native-period samples of one station falling in `bin`, by the station's own periods. */
export function binStationSamples(samples: readonly PeriodSample[], bin: DecadeBin, excludeZero: boolean = false): number[] {
    const out: number[] = [];
    for (const { period, angle } of samples) {
        const b = decadeOf(period);
        if (b < bin.lower || b >= bin.upper) continue;
        if (excludeZero && angle === 0) continue;
        out.push(angle);
    }
    return out;
}
