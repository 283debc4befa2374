import { describe, expect, it } from "vitest";
import { oddsRatioWoolf } from "../src/analysis/oddsRatio";
import {
    averageRanks,
    chiSquared2x2,
    chiSquaredSurvival,
    fishersExact2x2,
    kaplanMeier,
    maximum,
    mean,
    median,
    medianSurvival,
    minimum,
    pairedTTest,
    pearson,
    spearman,
    studentTTwoSidedP,
    survivalAt,
    twoSampleTTest,
    variance,
} from "../src/analysis/stats";

describe("descriptives", () => {
    it("computes mean and sample variance", () => {
        const xs = [2, 4, 4, 4, 5, 5, 7, 9];
        expect(mean(xs)).toBe(5);
        expect(variance(xs)).toBeCloseTo(32 / 7, 10);
    });

    it("takes the middle value, or the mean of the two middle values", () => {
        expect(median([3, 1, 2])).toBe(2);
        expect(median([4, 1, 3, 2])).toBe(2.5);
        expect(median([])).toBeNaN();
    });

    it("finds the extremes of a series longer than the argument limit", () => {
        const xs = Array.from({ length: 300_000 }, (_, i) => (i % 1000) - 500);
        expect(minimum(xs)).toBe(-500);
        expect(maximum(xs)).toBe(499);
        expect(minimum([])).toBeNaN();
    });
});

describe("distribution tails", () => {
    it("matches the t critical value at df 10", () => {
        expect(studentTTwoSidedP(2.228139, 10)).toBeCloseTo(0.05, 4);
    });

    it("matches the chi-squared critical value at df 1", () => {
        expect(chiSquaredSurvival(3.841459, 1)).toBeCloseTo(0.05, 4);
    });
});

describe("odds ratio", () => {
    it("gives 6.0 with a Woolf interval for a=30 b=20 c=10 d=40", () => {
        const est = oddsRatioWoolf(30, 20, 10, 40);
        expect(est.oddsRatio).toBe(6);
        expect(est.corrected).toBe(false);
        expect(est.ciLower).toBeCloseTo(2.4526, 3);
        expect(est.ciUpper).toBeCloseTo(14.6781, 3);
    });

    it("applies the Haldane-Anscombe correction when a cell is zero", () => {
        const est = oddsRatioWoolf(0, 10, 10, 80);
        expect(est.corrected).toBe(true);
        expect(est.oddsRatio).toBeCloseTo((0.5 * 80.5) / (10.5 * 10.5), 10);
        expect(Number.isFinite(est.ciLower)).toBe(true);
        expect(Number.isFinite(est.ciUpper)).toBe(true);
    });
});

describe("2x2 tests", () => {
    it("Fisher's exact test matches the two-sided reference value", () => {
        expect(fishersExact2x2(1, 9, 11, 3)).toBeCloseTo(0.0027595, 6);
        expect(fishersExact2x2(4, 4, 2, 6)).toBeCloseTo(0.6083916, 6);
    });

    it("chi-squared with Yates correction", () => {
        const r = chiSquared2x2(30, 20, 10, 40);
        expect(r.statistic).toBeCloseTo(15.0416667, 6);
        expect(r.pValue).toBeCloseTo(0.00010516, 7);
    });

    it("is undefined when a margin is empty", () => {
        expect(chiSquared2x2(0, 0, 3, 4)).toEqual({ statistic: null, pValue: null });
    });
});

describe("t-tests", () => {
    it("paired t-test on varying differences", () => {
        const r = pairedTTest([7, 8, 9, 10, 11], [6, 7, 7, 9, 9]);
        expect(r.meanDifference).toBeCloseTo(-1.4, 10);
        expect(r.statistic).toBeCloseTo(-5.715476, 5);
        expect(r.pValue).toBeCloseTo(0.0046358, 5);
        expect(r.noVariance).toBe(false);
    });

    it("paired t-test with identical non-zero differences has no statistic", () => {
        const r = pairedTTest([1, 2, 3], [2, 3, 4]);
        expect(r.noVariance).toBe(true);
        expect(r.statistic).toBeNull();
        expect(r.pValue).toBeNull();
    });

    it("paired t-test with all-zero differences reports p = 1", () => {
        const r = pairedTTest([5, 6, 7], [5, 6, 7]);
        expect(r.noVariance).toBe(true);
        expect(r.pValue).toBe(1);
    });

    it("two-sample t-test with pooled variance", () => {
        const r = twoSampleTTest([10, 11, 12, 13, 14], [8, 9, 10, 11, 12]);
        expect(r.statistic).toBeCloseTo(2, 10);
        expect(r.pValue).toBeCloseTo(0.0805162, 5);
    });
});

describe("correlation", () => {
    it("r = 1 for y = 2x", () => {
        const xs = [1, 2, 3, 4, 5];
        expect(pearson(xs, xs.map((x) => 2 * x))).toEqual({ r: 1, pValue: 0 });
    });

    it("Spearman sees a monotone curve as perfect", () => {
        expect(spearman([1, 2, 3, 4], [1, 4, 9, 16]).r).toBe(1);
    });

    it("ties share their average rank", () => {
        expect(averageRanks([10, 20, 20, 30])).toEqual([1, 2.5, 2.5, 4]);
    });

    it("is undefined when one side is constant", () => {
        expect(pearson([1, 2, 3], [4, 4, 4])).toEqual({ r: null, pValue: null });
    });
});

describe("Kaplan-Meier", () => {
    const steps = kaplanMeier([
        { time: 2, event: true },
        { time: 3, event: false },
        { time: 4, event: true },
        { time: 5, event: true },
    ]);

    it("steps only at event times", () => {
        expect(steps.map((s) => [s.time, s.atRisk, s.events])).toEqual([
            [2, 4, 1],
            [4, 2, 1],
            [5, 1, 1],
        ]);
        expect(steps.map((s) => s.survival)).toEqual([0.75, 0.375, 0]);
    });

    it("reads the curve between steps", () => {
        expect(survivalAt(steps, 1)).toEqual({ survival: 1, ciLower: 1, ciUpper: 1 });
        const at3 = survivalAt(steps, 3);
        expect(at3.survival).toBe(0.75);
        expect(at3.ciLower).toBeLessThan(0.75);
        expect(at3.ciUpper).toBeGreaterThan(0.75);
        expect(at3.ciUpper).toBeLessThanOrEqual(1);
    });

    it("finds the median where survival first reaches 0.5", () => {
        expect(medianSurvival(steps)).toBe(4);
        const half = kaplanMeier([
            { time: 1, event: true },
            { time: 2, event: false },
        ]);
        expect(half[0].survival).toBe(0.5);
        expect(medianSurvival(half)).toBe(1);
    });

    it("has no median when the curve stays above 0.5", () => {
        expect(medianSurvival(kaplanMeier([{ time: 3, event: true }, { time: 9, event: false }, { time: 9, event: false }]))).toBeNull();
    });
});
