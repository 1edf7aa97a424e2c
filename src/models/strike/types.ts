// Type definitions and constants for strike-angle statistics

// ─── Estimators and conventions ────────────────────────────────────

export const ESTIMATORS = ["invariantAngle", "ptAzimuth", "tipperAngle"] as const;

export type Estimator = (typeof ESTIMATORS)[number];

/** Build a per-estimator record, calling `make` once per estimator in ESTIMATORS order */
export function byEstimator<T>(make: (estimator: Estimator) => T): Record<Estimator, T> {
    return {
        invariantAngle: make("invariantAngle"),
        ptAzimuth: make("ptAzimuth"),
        tipperAngle: make("tipperAngle"),
    };
}

export type FoldMode = "folded" | "unfolded";

export type MeanMethod = "arithmetic" | "vector";

/** What to do with phase-tensor azimuths whose variance exceeds the error floor */
export type ErrorFloorPolicy = "exclude" | "zero";

/** Inclusive-exclusive decade exponent range `[bMin, bMax)` */
export type DecadeRange = readonly [number, number];

export interface AngularDomain {
    lower: number;
    upper: number;
    /** Whether the domain includes `upper` (folded) or `lower` (unfolded) */
    closed: "upper" | "lower";
}

// ─── Configuration ─────────────────────────────────────────────────

export interface StrikeConfig {
    tolerance?: number;
    binWidthDegrees?: number;
    foldMode?: FoldMode;
    decadeRange?: DecadeRange | "auto";
    errorFloorDegrees?: number | null;
    errorFloorPolicy?: ErrorFloorPolicy;
    meanMethod?: MeanMethod;
    excludeZeroAngles?: boolean;
    rotationDegrees?: number;
}

export type ResolvedStrikeConfig = Required<StrikeConfig>;

// ─── Pipeline stages ───────────────────────────────────────────────

export interface CanonicalGrid {
    /** Strictly increasing periods in seconds */
    periods: number[];
    periodMin: number;
    periodMax: number;
}

/** Grid index × station index; null where no station sample landed */
export type AngleTable = (number | null)[][];

export type EstimatorTables = Record<Estimator, AngleTable>;

export interface EstimatorAlignment {
    total: number;
    /** Samples within tolerance of some grid period */
    matched: number;
    /** Samples actually written to the table (first-wins on collisions) */
    placed: number;
    dropped: number;
}

export interface StationAlignment {
    stationId: string;
    estimators: Record<Estimator, EstimatorAlignment>;
}

export interface AlignedTables {
    grid: CanonicalGrid;
    stationIds: string[];
    tables: EstimatorTables;
    /** Phase-tensor azimuth variance, placed wherever `tables.ptAzimuth` was */
    ptAzimuthVariance: AngleTable;
    diagnostics: StationAlignment[];
}

/** Aligned tables after clockwise conversion, rotation, error floor and folding */
export interface FoldedTables {
    grid: CanonicalGrid;
    stationIds: string[];
    foldMode: FoldMode;
    tables: EstimatorTables;
}

export interface PeriodSample {
    period: number;
    angle: number;
}

export interface DecadeBin {
    label: string;
    /** log10(period) lower bound, inclusive */
    lower: number;
    /** log10(period) upper bound, exclusive */
    upper: number;
    /** Canonical grid rows whose period falls in this bin */
    gridIndices: number[];
}

export interface CircularHistogram {
    /** `counts.length + 1` edges in degrees */
    edges: number[];
    counts: number[];
    binWidth: number;
}

export interface StrikeStatistic {
    mean: number | null;
    median: number | null;
    mode: number | null;
    sampleCount: number;
}

export interface EstimatorSummary {
    statistic: StrikeStatistic;
    histogram: CircularHistogram;
}

export interface DecadeSummary {
    bin: DecadeBin;
    estimators: Record<Estimator, EstimatorSummary>;
}

export interface StationDecadeRow {
    stationId: string;
    /** Keyed by decade label */
    cells: Record<string, Record<Estimator, StrikeStatistic>>;
}

// ─── Constants ─────────────────────────────────────────────────────

export const DEFAULT_TOLERANCE = 0.05; // relative, |p - g| < τ·g
export const DEFAULT_BIN_WIDTH_DEGREES = 5;
export const DEFAULT_FOLD_MODE: FoldMode = "folded";
export const DEFAULT_MEAN_METHOD: MeanMethod = "arithmetic";
export const DEFAULT_ERROR_FLOOR_POLICY: ErrorFloorPolicy = "zero";
export const AGGREGATE_LABEL = "all";
export const DECADE_EPSILON = 1e-9; // log10 slack so 9.999999999999998 lands in [1, 2)
export const RESULTANT_EPSILON = 1e-12; // below this the vector mean has no direction

export const FOLDED_DOMAIN: AngularDomain = { lower: -90, upper: 90, closed: "upper" };
export const UNFOLDED_DOMAIN: AngularDomain = { lower: 0, upper: 360, closed: "lower" };
