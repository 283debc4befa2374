import type { Cell, Measurement, MeasurementSeries } from "../types";
import { CorrelationParams, groupOf } from "./params";
import { defineProcedure, finalizeResult, requireSize, round } from "./procedure";
import { maximum, mean, median, minimum, pearson, spearman, stdDev } from "./stats";

function dailyMeans(values: readonly Measurement[]): Map<number, number> {
    const byDay = new Map<number, number[]>();
    for (const m of values) {
        const day = m.date.getTime();
        const list = byDay.get(day);
        if (list) list.push(m.value);
        else byDay.set(day, [m.value]);
    }
    return new Map([...byDay].map(([day, vs]) => [day, mean(vs)]));
}

/** Pairs of (a, b) values: one per shared date, or one per subject. */
export function pairSeries(a: MeasurementSeries, b: MeasurementSeries, sameDay: boolean): [number, number][] {
    const pairs: [number, number][] = [];
    for (const [pid, valuesA] of a) {
        const valuesB = b.get(pid);
        if (!valuesB?.length || !valuesA.length) continue;
        if (!sameDay) {
            pairs.push([mean(valuesA.map((m) => m.value)), mean(valuesB.map((m) => m.value))]);
            continue;
        }
        const daysA = dailyMeans(valuesA);
        const daysB = dailyMeans(valuesB);
        for (const day of [...daysA.keys()].sort((x, y) => x - y)) {
            const vb = daysB.get(day);
            const va = daysA.get(day);
            if (va !== undefined && vb !== undefined) pairs.push([va, vb]);
        }
    }
    return pairs;
}

export const correlation = defineProcedure({
    type: "correlation",
    params: CorrelationParams,
    async run(params, ctx) {
        const warnings: string[] = [];
        const groupA = groupOf(params.measurement_a_concept_ids, params.include_descendants);
        const groupB = groupOf(params.measurement_b_concept_ids, params.include_descendants);
        const labelA = params.measurement_a_label || (await ctx.labels.resolveLabel(groupA, "Measurement A"));
        const labelB = params.measurement_b_label || (await ctx.labels.resolveLabel(groupB, "Measurement B"));

        const seriesA = await ctx.cohorts.measurementSeries(groupA, undefined, params.population);
        const seriesB = await ctx.cohorts.measurementSeries(groupB, [...seriesA.keys()], params.population);

        const pairs = pairSeries(seriesA, seriesB, params.same_day);
        requireSize(
            "Paired measurements",
            pairs.length,
            ctx,
            params.same_day ? "Pairing on measurements taken the same day." : "Pairing on per-patient means.",
        );
        if (pairs.length < 20) warnings.push(`Small sample size (${pairs.length} pairs). Results may not be reliable.`);

        const xs = pairs.map((p) => p[0]);
        const ys = pairs.map((p) => p[1]);
        const p = pearson(xs, ys);
        const s = spearman(xs, ys);
        if (p.r === null) warnings.push("One of the measurements has no variance; correlation is undefined.");

        const stat = (label: string, f: (v: number[]) => number, digits = 2): Cell[] => [
            label,
            round(f(xs), digits),
            round(f(ys), digits),
        ];
        return finalizeResult("correlation", ctx, {
            summary: {
                n_pairs: pairs.length,
                pearson_r: round(p.r, 4),
                pearson_p: round(p.pValue, 6),
                spearman_r: round(s.r, 4),
                spearman_p: round(s.pValue, 6),
                mean_a: round(mean(xs), 2),
                mean_b: round(mean(ys), 2),
            },
            annotations: {
                measurement_a: labelA,
                measurement_b: labelB,
                pairing: params.same_day ? "same_day" : "patient_mean",
            },
            detailColumns: ["Statistic", labelA, labelB],
            detailRows: [
                ["N", pairs.length, pairs.length],
                stat("Mean", mean),
                stat("Std Dev", stdDev),
                stat("Min", minimum),
                stat("Median", median),
                stat("Max", maximum),
                ["Pearson r", round(p.r, 4), null],
                ["Pearson p-value", round(p.pValue, 6), null],
                ["Spearman r", round(s.r, 4), null],
                ["Spearman p-value", round(s.pValue, 6), null],
            ],
            warnings,
        });
    },
});
