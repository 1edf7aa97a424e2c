// Per-decade, per-estimator statistics assembled for renderers and text writers
import type { StationRecord } from "../../api/types";
import type {
    CanonicalGrid,
    DecadeBin,
    DecadeSummary,
    Estimator,
    FoldedTables,
    ResolvedStrikeConfig,
    StationAlignment,
    StationDecadeRow,
    StrikeStatistic,
} from "./types";
import { ESTIMATORS, byEstimator } from "./types";
import { EmptyBinError } from "./errors";
import { aggregateBin, binStationSamples, collectBinSamples, decadeBins } from "./decades";
import { foldStationSamples } from "./fold";
import { summarizeSamples } from "./histogram";

export interface StrikeReport {
    config: ResolvedStrikeConfig;
    grid: CanonicalGrid;
    decades: DecadeSummary[];
    /** One row over the whole requested range */
    aggregate: DecadeSummary;
    /** Station × decade, from each station's native periods */
    stationTable: StationDecadeRow[];
    diagnostics: StationAlignment[];
    /** Bins with no samples for an estimator. Their statistics are null. */
    emptyBins: EmptyBinError[];
}

function summarizeBin(folded: FoldedTables, bin: DecadeBin, config: ResolvedStrikeConfig): DecadeSummary {
    return {
        bin,
        estimators: byEstimator((est) => summarizeSamples(collectBinSamples(folded, bin, est, config.excludeZeroAngles), config)),
    };
}

function stationRow(station: StationRecord, bins: readonly DecadeBin[], config: ResolvedStrikeConfig): StationDecadeRow {
    const samples = byEstimator((est) => foldStationSamples(station, est, config));
    const cells: Record<string, Record<Estimator, StrikeStatistic>> = {};

    for (const bin of bins) {
        cells[bin.label] = byEstimator(
            (est) => summarizeSamples(binStationSamples(samples[est], bin, config.excludeZeroAngles), config).statistic,
        );
    }

    return { stationId: station.stationId, cells };
}

/**
 * Summarize folded tables into the report. Empty (bin, estimator) pairs get
 * null statistics and an EmptyBinError entry; the remaining bins are still
 * computed.
 */
export function buildStrikeReport(
    stations: readonly StationRecord[],
    folded: FoldedTables,
    diagnostics: StationAlignment[],
    config: ResolvedStrikeConfig,
): StrikeReport {
    const bins = decadeBins(folded.grid, config.decadeRange);
    const decades = bins.map((bin) => summarizeBin(folded, bin, config));
    const aggregate = summarizeBin(folded, aggregateBin(folded.grid, config.decadeRange), config);

    const emptyBins: EmptyBinError[] = [];
    for (const summary of [...decades, aggregate]) {
        for (const est of ESTIMATORS) {
            if (summary.estimators[est].statistic.sampleCount === 0) {
                emptyBins.push(new EmptyBinError(summary.bin.label, est));
            }
        }
    }

    return {
        config,
        grid: folded.grid,
        decades,
        aggregate,
        stationTable: stations.map((station) => stationRow(station, bins, config)),
        diagnostics,
        emptyBins,
    };
}
