// Angle folding: raw estimator angles into one circular convention
import type { StationRecord } from "../../api/types";
import type { AlignedTables, Estimator, FoldMode, FoldedTables, PeriodSample, ResolvedStrikeConfig } from "./types";
import { byEstimator } from "./types";

/**
 * Raw angles arrive counter-clockwise from east. Invariant and phase-tensor
 * strikes become 90 − raw; the tipper angle is negated.
 */
export function toClockwiseFromNorth(raw: number, estimator: Estimator): number {
    return estimator === "tipperAngle" ? -raw : 90 - raw;
}

/** Folded: (−90, 90]. Unfolded: [0, 360). Any finite input, however many turns out. */
export function foldAngle(angle: number, foldMode: FoldMode): number {
    if (foldMode === "folded") {
        const folded = angle - 180 * Math.ceil((angle - 90) / 180);
        return folded === 0 ? 0 : folded; // no -0
    }
    const wrapped = ((angle % 360) + 360) % 360;
    return wrapped === 360 ? 0 : wrapped;
}

/** Clockwise conversion, frame rotation, then fold. */
export function normalizeAngle(
    raw: number,
    estimator: Estimator,
    foldMode: FoldMode,
    rotationDegrees: number = 0,
): number {
    return foldAngle(toClockwiseFromNorth(raw, estimator) - rotationDegrees, foldMode);
}

/**
 * Fold one sample, applying the phase-tensor error floor.
 * Returns null when the sample is excluded.
 */
export function foldSample(
    raw: number,
    variance: number | null | undefined,
    estimator: Estimator,
    config: ResolvedStrikeConfig,
): number | null {
    const { errorFloorDegrees, errorFloorPolicy, foldMode, rotationDegrees } = config;

    if (estimator === "ptAzimuth" && errorFloorDegrees !== null && variance != null && variance > errorFloorDegrees) {
        return errorFloorPolicy === "zero" ? 0 : null;
    }

    return normalizeAngle(raw, estimator, foldMode, rotationDegrees);
}

/** Fold every cell of the aligned tables; null cells stay null. */
export function foldTables(aligned: AlignedTables, config: ResolvedStrikeConfig): FoldedTables {
    const tables = byEstimator((est) =>
        aligned.tables[est].map((row, i) =>
            row.map((raw, s) => {
                if (raw === null) return null;
                const variance = est === "ptAzimuth" ? aligned.ptAzimuthVariance[i]?.[s] : null;
                return foldSample(raw, variance, est, config);
            }),
        ),
    );

    return {
        grid: aligned.grid,
        stationIds: aligned.stationIds,
        foldMode: config.foldMode,
        tables,
    };
}

/** Folded native samples of one station for one estimator, skipping undefined angles. */
export function foldStationSamples(
    station: StationRecord,
    estimator: Estimator,
    config: ResolvedStrikeConfig,
): PeriodSample[] {
    const samples: PeriodSample[] = [];
    const series = station[estimator];

    station.periods.forEach((period, k) => {
        const raw = series[k];
        if (raw === null || raw === undefined || !Number.isFinite(raw)) return;
        const variance = estimator === "ptAzimuth" ? station.ptAzimuthVariance?.[k] : null;
        const angle = foldSample(raw, variance, estimator, config);
        if (angle !== null) samples.push({ period, angle });
    });

    return samples;
}
