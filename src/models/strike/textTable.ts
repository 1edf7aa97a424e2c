// Fixed-width delimited text for the report writer
import type { Estimator, StrikeStatistic } from "./types";
import { ESTIMATORS } from "./types";
import type { StrikeReport } from "./report";

export const EMPTY_CELL = "--";

function formatValue(value: number | null, precision: number): string {
    return value === null ? EMPTY_CELL : value.toFixed(precision);
}

/** "mean/median/mode", or "--" for a statistic with no samples */
export function formatTriple(statistic: StrikeStatistic | undefined, precision: number = 1): string {
    if (!statistic || statistic.sampleCount === 0) return EMPTY_CELL;
    const { mean, median, mode } = statistic;
    return [mean, median, mode].map((v) => formatValue(v, precision)).join("/");
}

function alignColumns(rows: string[][], delimiter: string): string {
    const widths: number[] = [];
    for (const row of rows) {
        row.forEach((cell, c) => {
            widths[c] = Math.max(widths[c] ?? 0, cell.length);
        });
    }
    return rows
        .map((row) =>
            row
                .map((cell, c) => cell.padEnd(widths[c] ?? 0))
                .join(delimiter)
                .trimEnd(),
        )
        .join("\n") + "\n";
}

/**
 * Station × decade table for one estimator: a `station` column then one
 * column per decade label, every column padded to its widest cell.
 */
export function formatStationTable(
    report: StrikeReport,
    estimator: Estimator,
    options: { delimiter?: string; precision?: number } = {},
): string {
    const { delimiter = ", ", precision = 1 } = options;
    const labels = report.decades.map((d) => d.bin.label);

    const rows: string[][] = [["station", ...labels]];
    for (const row of report.stationTable) {
        rows.push([row.stationId, ...labels.map((label) => formatTriple(row.cells[label]?.[estimator], precision))]);
    }

    return alignColumns(rows, delimiter);
}

/** One line per (bin, estimator), decades first then the aggregate. */
export function formatDecadeSummary(report: StrikeReport, precision: number = 1): string {
    const rows: string[][] = [["bin", "estimator", "n", "mean", "median", "mode"]];
    for (const summary of [...report.decades, report.aggregate]) {
        for (const est of ESTIMATORS) {
            const { mean, median, mode, sampleCount } = summary.estimators[est].statistic;
            rows.push([
                summary.bin.label,
                est,
                String(sampleCount),
                formatValue(mean, precision),
                formatValue(median, precision),
                formatValue(mode, precision),
            ]);
        }
    }
    return alignColumns(rows, "  ");
}
