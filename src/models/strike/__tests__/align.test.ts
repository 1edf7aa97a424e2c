import { describe, it, expect } from "vitest";
import { alignStations, findGridIndex } from "../align";
import { buildCanonicalGrid } from "../periodGrid";
import { ESTIMATORS } from "../types";
import { makeStation, makeSyntheticSurvey } from "../../__tests__/fixtures/synthetic";

function twoStations() {
    return [
        makeStation("A", [1, 10, 100], { invariantAngle: [10, 20, 30] }),
        makeStation("B", [1.02, 9.8, 105], { invariantAngle: [15, 25, 35] }),
    ];
}

describe("findGridIndex", () => {
    it("matches within relative tolerance of the grid period", () => {
        expect(findGridIndex(1.02, [1, 10, 100], 0.05)).toBe(0);
        expect(findGridIndex(96, [1, 10, 100], 0.05)).toBe(2);
    });

    it("returns -1 outside tolerance", () => {
        expect(findGridIndex(94, [1, 10, 100], 0.05)).toBe(-1);
        expect(findGridIndex(3, [1, 10, 100], 0.05)).toBe(-1);
    });

    it("takes the first grid period in ascending order when two are in range", () => {
        expect(findGridIndex(10.3, [10, 10.5], 0.05)).toBe(0);
    });
});

describe("alignStations", () => {
    it("places both stations on every row of the shared grid", () => {
        const stations = twoStations();
        const aligned = alignStations(stations, buildCanonicalGrid(stations), 0.05);

        expect(aligned.stationIds).toEqual(["A", "B"]);
        expect(aligned.tables.invariantAngle).toEqual([
            [10, 15],
            [20, 25],
            [30, 35],
        ]);
        expect(aligned.diagnostics[1]!.estimators.invariantAngle).toEqual({ total: 3, matched: 3, placed: 3, dropped: 0 });
    });

    it("leaves undefined estimators as null cells with no samples counted", () => {
        const stations = twoStations();
        const aligned = alignStations(stations, buildCanonicalGrid(stations), 0.05);

        expect(aligned.tables.tipperAngle[0]).toEqual([null, null]);
        expect(aligned.diagnostics[0]!.estimators.tipperAngle.total).toBe(0);
    });

    it("keeps the first sample when two land on the same row", () => {
        const stations = [
            makeStation("A", [1, 1.01], { invariantAngle: [5, 7] }),
            makeStation("B", [1, 10, 100], { invariantAngle: [1, 2, 3] }),
        ];
        const aligned = alignStations(stations, buildCanonicalGrid(stations), 0.05);

        expect(aligned.tables.invariantAngle[0]).toEqual([5, 1]);
        expect(aligned.diagnostics[0]!.estimators.invariantAngle).toEqual({ total: 2, matched: 2, placed: 1, dropped: 1 });
    });

    it("drops samples with no grid period within tolerance", () => {
        const stations = [
            makeStation("A", [1, 10, 100], { invariantAngle: [1, 2, 3] }),
            makeStation("B", [3], { invariantAngle: [40] }),
        ];
        const aligned = alignStations(stations, buildCanonicalGrid(stations), 0.05);

        expect(aligned.tables.invariantAngle.map((row) => row[1])).toEqual([null, null, null]);
        expect(aligned.diagnostics[1]!.estimators.invariantAngle).toEqual({ total: 1, matched: 0, placed: 0, dropped: 1 });
    });

    it("aligns each estimator independently", () => {
        const stations = [
            makeStation("A", [1, 10, 100], {
                invariantAngle: [1, 2, 3],
                tipperAngle: [4, null, 6],
            }),
        ];
        const aligned = alignStations(stations, buildCanonicalGrid(stations), 0.05);

        expect(aligned.tables.invariantAngle[1]).toEqual([2]);
        expect(aligned.tables.tipperAngle[1]).toEqual([null]);
        expect(aligned.diagnostics[0]!.estimators.tipperAngle).toEqual({ total: 2, matched: 2, placed: 2, dropped: 0 });
    });

    it("carries phase-tensor variance to the row its azimuth was placed on", () => {
        const stations = [
            makeStation("A", [100, 10, 1], {
                ptAzimuth: [30, 20, 10],
                ptAzimuthVariance: [3, 2, 1],
            }),
        ];
        const aligned = alignStations(stations, buildCanonicalGrid(stations), 0.05);

        expect(aligned.tables.ptAzimuth).toEqual([[10], [20], [30]]);
        expect(aligned.ptAzimuthVariance).toEqual([[1], [2], [3]]);
    });

    it("never matches fewer samples as tolerance grows", () => {
        const stations = makeSyntheticSurvey({ periodJitter: 0.15, seed: 7 });
        const grid = buildCanonicalGrid(stations);

        const matchedAt = (tolerance: number) =>
            alignStations(stations, grid, tolerance).diagnostics.map((d) =>
                ESTIMATORS.reduce((s, est) => s + d.estimators[est].matched, 0),
            );

        const tolerances = [0.005, 0.01, 0.02, 0.05, 0.1, 0.2, 0.5];
        for (let t = 1; t < tolerances.length; t++) {
            const before = matchedAt(tolerances[t - 1]!);
            const after = matchedAt(tolerances[t]!);
            after.forEach((count, s) => expect(count).toBeGreaterThanOrEqual(before[s]!));
        }
    });
});
