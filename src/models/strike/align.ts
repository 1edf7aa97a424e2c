// Period alignment: station samples onto canonical grid rows
import type { StationRecord } from "../../api/types";
import type { AlignedTables, AngleTable, CanonicalGrid, EstimatorAlignment, EstimatorTables } from "./types";
import { ESTIMATORS, byEstimator } from "./types";

/**
 * First grid index whose period is within relative tolerance of `period`,
 * i.e. |period − grid[i]| < tolerance · grid[i]. Returns -1 when none is.
 * Scans in ascending grid order, so a sample near two dense grid points
 * goes to the shorter period.
 */
export function findGridIndex(period: number, grid: readonly number[], tolerance: number): number {
    for (let i = 0; i < grid.length; i++) {
        const g = grid[i]!;
        if (Math.abs(period - g) < tolerance * g) return i;
    }
    return -1;
}

export function emptyTable(rows: number, columns: number): AngleTable {
    return Array.from({ length: rows }, () => new Array<number | null>(columns).fill(null));
}

function emptyCounts(): EstimatorAlignment {
    return { total: 0, matched: 0, placed: 0, dropped: 0 };
}

function isSample(value: number | null | undefined): value is number {
    return value !== null && value !== undefined && Number.isFinite(value);
}

/**
 * Place every station sample on the canonical grid, independently per estimator.
 *
 * Unmatched samples are dropped. When two samples of one station land on the
 * same grid row the first in record order wins; the later one counts as
 * matched but not placed. Cells nobody reached stay null.
 */
export function alignStations(
    stations: readonly StationRecord[],
    grid: CanonicalGrid,
    tolerance: number,
): AlignedTables {
    const rows = grid.periods.length;
    const columns = stations.length;

    const tables: EstimatorTables = byEstimator(() => emptyTable(rows, columns));
    const ptAzimuthVariance = emptyTable(rows, columns);

    const diagnostics = stations.map((station, s) => {
        const counts = byEstimator(emptyCounts);

        station.periods.forEach((period, k) => {
            const i = findGridIndex(period, grid.periods, tolerance);

            for (const est of ESTIMATORS) {
                const value = station[est][k];
                if (!isSample(value)) continue;

                const c = counts[est];
                c.total++;
                if (i < 0) continue;
                c.matched++;

                const row = tables[est][i]!;
                if (row[s] !== null) continue;
                row[s] = value;
                c.placed++;

                if (est === "ptAzimuth") {
                    ptAzimuthVariance[i]![s] = station.ptAzimuthVariance?.[k] ?? null;
                }
            }
        });

        for (const est of ESTIMATORS) {
            counts[est].dropped = counts[est].total - counts[est].placed;
        }

        return { stationId: station.stationId, estimators: counts };
    });

    return {
        grid,
        stationIds: stations.map((s) => s.stationId),
        tables,
        ptAzimuthVariance,
        diagnostics,
    };
}
