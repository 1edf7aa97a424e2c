import { describe, it, expect } from "vitest";
import {
    arithmeticMean,
    buildHistogram,
    histogramMode,
    median,
    strikeStatistic,
    summarizeSamples,
    vectorMean,
} from "../histogram";
import { roseBars } from "../rose";
import { foldAngle } from "../fold";
import { FOLDED_DOMAIN, UNFOLDED_DOMAIN } from "../types";
import { mulberry32 } from "../../__tests__/fixtures/synthetic";

describe("buildHistogram", () => {
    it("spans the folded domain in 5° bins", () => {
        const h = buildHistogram([80, 75], 5, FOLDED_DOMAIN);

        expect(h.counts).toHaveLength(36);
        expect(h.edges[0]).toBe(-90);
        expect(h.edges[36]).toBe(90);
        expect(h.counts[33]).toBe(1);
        expect(h.counts[34]).toBe(1);
        expect(h.counts.filter((c) => c > 0)).toHaveLength(2);
    });

    it("puts 90° in the last folded bin", () => {
        const h = buildHistogram([90], 5, FOLDED_DOMAIN);
        expect(h.counts[35]).toBe(1);
    });

    it("spans the unfolded domain", () => {
        const h = buildHistogram([0, 359.9], 5, UNFOLDED_DOMAIN);

        expect(h.counts).toHaveLength(72);
        expect(h.counts[0]).toBe(1);
        expect(h.counts[71]).toBe(1);
    });

    it("ends with a narrower bin when the width does not divide the domain", () => {
        const h = buildHistogram([89], 7, FOLDED_DOMAIN);

        expect(h.counts).toHaveLength(26);
        expect(h.edges[25]).toBe(85);
        expect(h.edges[26]).toBe(90);
        expect(h.counts[25]).toBe(1);
    });

    it("conserves the sample count", () => {
        const rng = mulberry32(11);
        const folded = Array.from({ length: 500 }, () => foldAngle(rng() * 720 - 360, "folded"));
        const unfolded = Array.from({ length: 500 }, () => foldAngle(rng() * 720 - 360, "unfolded"));

        const sum = (counts: number[]) => counts.reduce((s, c) => s + c, 0);
        expect(sum(buildHistogram(folded, 5, FOLDED_DOMAIN).counts)).toBe(500);
        expect(sum(buildHistogram(unfolded, 3, UNFOLDED_DOMAIN).counts)).toBe(500);
    });
});

describe("histogramMode", () => {
    it("returns the left edge of the fullest bin", () => {
        expect(histogramMode(buildHistogram([12, 13, 14, 40], 5, UNFOLDED_DOMAIN))).toBe(10);
    });

    it("breaks ties toward the lower angle regardless of sample order", () => {
        expect(histogramMode(buildHistogram([10, 10, 50, 50], 5, UNFOLDED_DOMAIN))).toBe(10);
        expect(histogramMode(buildHistogram([50, 50, 10, 10], 5, UNFOLDED_DOMAIN))).toBe(10);
    });

    it("is null for an empty histogram", () => {
        expect(histogramMode(buildHistogram([], 5, FOLDED_DOMAIN))).toBeNull();
    });
});

describe("arithmeticMean and median", () => {
    it("averages the folded values directly", () => {
        expect(arithmeticMean([80, 75])).toBe(77.5);
        expect(arithmeticMean([])).toBeNull();
    });

    it("takes the middle value or the mean of the two middle values", () => {
        expect(median([30, 10, 20])).toBe(20);
        expect(median([80, 75])).toBe(77.5);
        expect(median([])).toBeNull();
    });
});

describe("vectorMean", () => {
    it("averages across the 0°/360° seam when unfolded", () => {
        expect(vectorMean([350, 20], "unfolded")).toBeCloseTo(5, 9);
        expect(arithmeticMean([350, 20])).toBe(185);
    });

    it("treats folded angles as axial", () => {
        expect(vectorMean([80, -70], "folded")).toBeCloseTo(-85, 9);
    });

    it("is null when the directions cancel", () => {
        expect(vectorMean([0, 180], "unfolded")).toBeNull();
    });
});

describe("strikeStatistic", () => {
    it("reports the worked two-station row", () => {
        const samples = [80, 75];
        const stat = strikeStatistic(samples, buildHistogram(samples, 5, FOLDED_DOMAIN), "folded");
        expect(stat).toEqual({ mean: 77.5, median: 77.5, mode: 75, sampleCount: 2 });
    });

    it("uses undefined sentinels for no samples", () => {
        const { statistic } = summarizeSamples([], { binWidthDegrees: 5, foldMode: "folded", meanMethod: "vector" });
        expect(statistic).toEqual({ mean: null, median: null, mode: null, sampleCount: 0 });
    });
});

describe("roseBars", () => {
    it("mirrors folded bins across 180°", () => {
        const bars = roseBars(buildHistogram([80, 75], 5, FOLDED_DOMAIN), "folded");
        const filled = bars.filter((b) => b.count > 0);

        expect(bars).toHaveLength(72);
        expect(filled.map((b) => (b.theta * 180) / Math.PI)).toEqual([
            expect.closeTo(77.5, 9),
            expect.closeTo(257.5, 9),
            expect.closeTo(82.5, 9),
            expect.closeTo(262.5, 9),
        ]);
        expect(filled[0]!.width).toBeCloseTo((5 * Math.PI) / 180, 12);
    });

    it("draws unfolded bins once", () => {
        const bars = roseBars(buildHistogram([10], 5, UNFOLDED_DOMAIN), "unfolded");
        expect(bars).toHaveLength(72);
        expect(bars[2]!.count).toBe(1);
        expect(bars[2]!.theta).toBeCloseTo((12.5 * Math.PI) / 180, 12);
    });
});
