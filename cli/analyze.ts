/**
 * Strike statistics for a set of MT stations.
 * Usage: npx tsx cli/analyze.ts <stations.json> [options]
 * Example: npx tsx cli/analyze.ts data/example-survey.json --fold unfolded --range=-2:3 --out tables/
 */
import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { parseArgs } from "node:util";
import { parseStationData } from "../src/data/loadStationData.js";
import {
    analyzeStrike,
    ESTIMATORS,
    formatDecadeSummary,
    formatStationTable,
    StrikeError,
} from "../src/models/strike/index.js";
import type {
    DecadeRange,
    ErrorFloorPolicy,
    FoldMode,
    MeanMethod,
    StrikeConfig,
    StrikeReport,
} from "../src/models/strike/index.js";

const USAGE = `Usage: npx tsx cli/analyze.ts <stations.json> [options]

Options:
  --fold folded|unfolded             angular domain (default folded)
  --tolerance <t>                    relative period tolerance (default 0.05)
  --bin-width <deg>                  histogram bin width (default 5)
  --range=auto|<bMin>:<bMax>         decade exponent range (default auto)
  --error-floor <deg>                phase-tensor azimuth variance floor
  --error-floor-policy exclude|zero  what happens above the floor (default zero)
  --mean arithmetic|vector           mean method (default arithmetic)
  --rotate=<deg>                     clockwise frame rotation (default 0)
  --exclude-zero                     drop exact 0° values before statistics
  --out <dir>                        write one station table per estimator
  --json                             print the full report as JSON`;

const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
        fold: { type: "string" },
        tolerance: { type: "string" },
        "bin-width": { type: "string" },
        range: { type: "string" },
        "error-floor": { type: "string" },
        "error-floor-policy": { type: "string" },
        mean: { type: "string" },
        rotate: { type: "string" },
        "exclude-zero": { type: "boolean" },
        out: { type: "string" },
        json: { type: "boolean" },
    },
});

const file = positionals[0];
if (!file) {
    console.error(USAGE);
    process.exit(1);
}

function fail(message: string): never {
    console.error(message);
    process.exit(1);
}

function numberFlag(name: string, raw: string | undefined): number | undefined {
    if (raw === undefined) return undefined;
    const n = Number(raw);
    if (!Number.isFinite(n)) fail(`--${name} expects a number, got "${raw}"`);
    return n;
}

function parseRange(raw: string | undefined): DecadeRange | "auto" | undefined {
    if (raw === undefined || raw === "auto") return raw;
    const match = /^(-?\d+):(-?\d+)$/.exec(raw);
    if (!match) fail(`--range expects auto or <bMin>:<bMax>, got "${raw}"`);
    return [Number(match[1]), Number(match[2])];
}

function oneOf<T extends string>(name: string, raw: string | undefined, allowed: readonly T[]): T | undefined {
    if (raw === undefined) return undefined;
    const found = allowed.find((a) => a === raw);
    if (!found) fail(`--${name} expects ${allowed.join("|")}, got "${raw}"`);
    return found;
}

const config: StrikeConfig = {
    foldMode: oneOf<FoldMode>("fold", values.fold, ["folded", "unfolded"]),
    tolerance: numberFlag("tolerance", values.tolerance),
    binWidthDegrees: numberFlag("bin-width", values["bin-width"]),
    decadeRange: parseRange(values.range),
    errorFloorDegrees: numberFlag("error-floor", values["error-floor"]),
    errorFloorPolicy: oneOf<ErrorFloorPolicy>("error-floor-policy", values["error-floor-policy"], ["exclude", "zero"]),
    meanMethod: oneOf<MeanMethod>("mean", values.mean, ["arithmetic", "vector"]),
    rotationDegrees: numberFlag("rotate", values.rotate),
    excludeZeroAngles: values["exclude-zero"],
};

function runAnalysis(path: string): StrikeReport {
    try {
        const data: unknown = JSON.parse(readFileSync(path, "utf-8"));
        return analyzeStrike(parseStationData(data), config);
    } catch (err) {
        if (err instanceof StrikeError || err instanceof SyntaxError) fail(`${err.name}: ${err.message}`);
        throw err;
    }
}

const report = runAnalysis(file);

if (values.json) {
    const { emptyBins, ...rest } = report;
    const serializable = {
        ...rest,
        emptyBins: emptyBins.map((e) => ({ bin: e.binLabel, estimator: e.estimator, message: e.message })),
    };
    console.log(JSON.stringify(serializable, null, 2));
    process.exit(0);
}

const { grid, diagnostics } = report;
console.log(`Stations: ${diagnostics.length}`);
console.log(
    `Grid: ${grid.periods.length} periods, ${grid.periodMin.toPrecision(4)}s – ${grid.periodMax.toPrecision(4)}s`,
);
console.log(`Fold: ${report.config.foldMode}, tolerance ${report.config.tolerance}, bin ${report.config.binWidthDegrees}°`);
console.log("");

console.log("--- Alignment ---");
for (const d of diagnostics) {
    const parts = ESTIMATORS.map((est) => {
        const c = d.estimators[est];
        return `${est} ${c.placed}/${c.total}`;
    });
    console.log(`  ${d.stationId.padEnd(12)} ${parts.join("  ")}`);
    const dropped = ESTIMATORS.reduce((s, est) => s + d.estimators[est].dropped, 0);
    if (dropped > 0) {
        console.warn(`[strike] ${d.stationId}: ${dropped} sample(s) not placed on the grid`);
    }
}
console.log("");

console.log("--- Decades ---");
console.log(formatDecadeSummary(report));

for (const e of report.emptyBins) {
    console.warn(`[strike] ${e.message}`);
}

if (values.out) {
    mkdirSync(values.out, { recursive: true });
    for (const est of ESTIMATORS) {
        const path = join(values.out, `strike_${est}.txt`);
        writeFileSync(path, formatStationTable(report, est));
        console.log(`Wrote ${path}`);
    }
}
