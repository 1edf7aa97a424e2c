// Strike-angle statistics: orchestrator and public API
import type { StationRecord } from "../../api/types";
import type { StrikeConfig } from "./types";
import type { StrikeReport } from "./report";
import { resolveStrikeConfig } from "./config";
import { buildCanonicalGrid } from "./periodGrid";
import { alignStations } from "./align";
import { foldTables } from "./fold";
import { buildStrikeReport } from "./report";

// ─── Public re-exports ─────────────────────────────────────────────

export type {
    Estimator,
    FoldMode,
    MeanMethod,
    ErrorFloorPolicy,
    DecadeRange,
    AngularDomain,
    StrikeConfig,
    ResolvedStrikeConfig,
    CanonicalGrid,
    AngleTable,
    EstimatorTables,
    EstimatorAlignment,
    StationAlignment,
    AlignedTables,
    FoldedTables,
    PeriodSample,
    DecadeBin,
    CircularHistogram,
    StrikeStatistic,
    EstimatorSummary,
    DecadeSummary,
    StationDecadeRow,
} from "./types";
export type { StrikeReport } from "./report";
export type { RoseBar } from "./rose";
export { ESTIMATORS, byEstimator, FOLDED_DOMAIN, UNFOLDED_DOMAIN, AGGREGATE_LABEL } from "./types";
export { StrikeError, InvalidInputError, EmptyBinError } from "./errors";
export { resolveStrikeConfig, domainFor } from "./config";
export { buildCanonicalGrid } from "./periodGrid";
export { alignStations, findGridIndex } from "./align";
export { toClockwiseFromNorth, foldAngle, normalizeAngle, foldTables, foldStationSamples } from "./fold";
export { decadeOf, decadeLabel, decadeBins, aggregateBin, collectBinSamples, binStationSamples } from "./decades";
export { buildHistogram, histogramMode, arithmeticMean, median, vectorMean, summarizeSamples } from "./histogram";
export { roseBars } from "./rose";
export { buildStrikeReport } from "./report";
export { formatStationTable, formatDecadeSummary, formatTriple } from "./textTable";

// ─── Main analysis function ────────────────────────────────────────

/**
 * Batch transform from station records to a statistics report:
 * grid → alignment → folding → decade bins → histograms and statistics.
 * Throws InvalidInputError for unusable input or configuration; empty bins
 * are reported on the result instead.
 */
export function analyzeStrike(stations: readonly StationRecord[], config: StrikeConfig = {}): StrikeReport {
    const resolved = resolveStrikeConfig(config);
    const grid = buildCanonicalGrid(stations);
    const aligned = alignStations(stations, grid, resolved.tolerance);
    const folded = foldTables(aligned, resolved);
    return buildStrikeReport(stations, folded, aligned.diagnostics, resolved);
}
