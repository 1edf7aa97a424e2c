import type { AngleSeries, StationRecord } from "../api/types";
import { InvalidInputError } from "../models/strike/errors";

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseNumberArray(value: unknown, field: string, stationId: string): number[] {
  if (!Array.isArray(value)) {
    throw new InvalidInputError(`"${field}" must be an array`, stationId);
  }
  return value.map((v, i) => {
    if (typeof v !== "number" || !Number.isFinite(v) || v <= 0) {
      throw new InvalidInputError(`"${field}"[${i}] must be a positive number`, stationId);
    }
    return v;
  });
}

/**
 * Angle arrays hold numbers or null. Non-finite numbers mean "no estimate"
 * and become null; a missing array is all-null.
 */
function parseAngleSeries(value: unknown, field: string, stationId: string, length: number): AngleSeries {
  if (value === undefined || value === null) {
    return new Array<number | null>(length).fill(null);
  }
  if (!Array.isArray(value)) {
    throw new InvalidInputError(`"${field}" must be an array`, stationId);
  }
  if (value.length !== length) {
    throw new InvalidInputError(`"${field}" has ${value.length} values for ${length} periods`, stationId);
  }
  return value.map((v, i) => {
    if (v === null) return null;
    if (typeof v !== "number") {
      throw new InvalidInputError(`"${field}"[${i}] must be a number or null`, stationId);
    }
    return Number.isFinite(v) ? v : null;
  });
}

function parseStation(raw: unknown, index: number): StationRecord {
  if (!isObject(raw)) {
    throw new InvalidInputError(`station #${index} is not an object`);
  }

  const stationId = raw.stationId;
  if (typeof stationId !== "string" || stationId.length === 0) {
    throw new InvalidInputError(`station #${index} has no "stationId"`);
  }

  // Frequencies (Hz) are converted to periods (s)
  let periods: number[];
  if (raw.periods !== undefined) {
    periods = parseNumberArray(raw.periods, "periods", stationId);
  } else if (raw.frequencies !== undefined) {
    periods = parseNumberArray(raw.frequencies, "frequencies", stationId).map((f) => 1 / f);
  } else {
    throw new InvalidInputError(`expected "periods" or "frequencies"`, stationId);
  }

  if (periods.length === 0) {
    throw new InvalidInputError("zero-length period series", stationId);
  }

  const n = periods.length;
  const ptAzimuthVariance =
    raw.ptAzimuthVariance !== undefined
      ? parseAngleSeries(raw.ptAzimuthVariance, "ptAzimuthVariance", stationId, n)
      : undefined;

  return {
    stationId,
    periods,
    invariantAngle: parseAngleSeries(raw.invariantAngle, "invariantAngle", stationId, n),
    ptAzimuth: parseAngleSeries(raw.ptAzimuth, "ptAzimuth", stationId, n),
    tipperAngle: parseAngleSeries(raw.tipperAngle, "tipperAngle", stationId, n),
    ...(ptAzimuthVariance ? { ptAzimuthVariance } : {}),
  };
}

/**
 * Parse sounding-reader output. Handles two layouts:
 * - Document: { stations: [...] }
 * - Flat array of stations: [ { stationId, periods, ... }, ... ]
 *
 * Throws InvalidInputError for an unrecognized layout, a malformed station,
 * or a duplicate station id. Records keep the reader's order.
 */
export function parseStationData(data: unknown): StationRecord[] {
  let rawStations: unknown[];

  if (Array.isArray(data)) {
    rawStations = data;
  } else if (isObject(data) && Array.isArray(data.stations)) {
    rawStations = data.stations;
  } else {
    throw new InvalidInputError("Unrecognized station data format");
  }

  const records = rawStations.map(parseStation);

  const seen = new Set<string>();
  for (const r of records) {
    if (seen.has(r.stationId)) {
      throw new InvalidInputError("duplicate station id", r.stationId);
    }
    seen.add(r.stationId);
  }

  return records;
}
