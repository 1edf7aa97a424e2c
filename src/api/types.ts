// ─── Sounding reader output (JSON wire shapes) ──────────────────────

/** A single station as written by the sounding reader. Angles are degrees, counter-clockwise from east. */
export interface RawStationRecord {
  stationId: string;
  /** Periods in seconds. Either this or `frequencies` must be present. */
  periods?: number[];
  /** Frequencies in Hz, converted to periods on load */
  frequencies?: number[];
  invariantAngle?: (number | null)[];
  ptAzimuth?: (number | null)[];
  tipperAngle?: (number | null)[];
  ptAzimuthVariance?: (number | null)[];
}

/** Document form: `{ stations: [...] }`. A bare array of stations is accepted too. */
export interface RawStationDocument {
  stations: RawStationRecord[];
}

// ─── Unified internal types ────────────────────────────────────────

/** One angle per period, or null where the estimator is undefined at that period */
export type AngleSeries = readonly (number | null)[];

/** Processed station record used throughout the engine. Immutable after parsing. */
export interface StationRecord {
  readonly stationId: string;
  /** Periods in seconds, in the order the reader supplied them (ascending or descending) */
  readonly periods: readonly number[];
  readonly invariantAngle: AngleSeries;
  readonly ptAzimuth: AngleSeries;
  readonly tipperAngle: AngleSeries;
  /** Phase-tensor azimuth variance, same length as `ptAzimuth` when present */
  readonly ptAzimuthVariance?: AngleSeries;
}
