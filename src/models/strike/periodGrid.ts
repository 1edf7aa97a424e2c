// Canonical period grid shared by every station in a run
import { scaleLog } from "d3-scale";
import type { StationRecord } from "../../api/types";
import type { CanonicalGrid } from "./types";
import { InvalidInputError } from "./errors";

/**
 * Build the canonical grid: as many log-spaced periods as the longest
 * station record, spanning the global period extremes.
 *
 * The grid index is mapped onto period through a d3 log scale and inverted,
 * so grid[i] = 10^(log10(min) + i·(log10(max) − log10(min)) / (N − 1)).
 * Both endpoints are pinned to the observed extremes so that exact powers
 * of ten survive the exp/log round trip.
 *
 * When every station shares a single period value the grid collapses to
 * that one period, since a repeated value would not be strictly increasing.
 */
export function buildCanonicalGrid(stations: readonly StationRecord[]): CanonicalGrid {
    if (stations.length === 0) {
        throw new InvalidInputError("station set is empty");
    }

    let periodMin = Infinity;
    let periodMax = -Infinity;
    let size = 0;

    for (const station of stations) {
        if (station.periods.length === 0) {
            throw new InvalidInputError("zero-length period series", station.stationId);
        }
        for (const p of station.periods) {
            if (!Number.isFinite(p) || p <= 0) {
                throw new InvalidInputError(`period must be positive and finite, got ${p}`, station.stationId);
            }
            if (p < periodMin) periodMin = p;
            if (p > periodMax) periodMax = p;
        }
        size = Math.max(size, station.periods.length);
    }

    if (size === 1 || periodMin === periodMax) {
        return { periods: [periodMin], periodMin, periodMax: periodMin };
    }

    const indexToPeriod = scaleLog().domain([periodMin, periodMax]).range([0, size - 1]);

    // Extremes a few ulps apart can invert to repeated values; keep only strict increases
    const periods: number[] = [periodMin];
    for (let i = 1; i < size; i++) {
        const p = i === size - 1 ? periodMax : Math.min(periodMax, indexToPeriod.invert(i));
        const last = periods[periods.length - 1]!;
        if (p > last) periods.push(p);
    }

    return { periods, periodMin, periodMax };
}
