import type { Cell, PersonId } from "../types";
import { daysBetween } from "./cohort";
import { PrePostParams, groupOf } from "./params";
import { defineProcedure, finalizeResult, requireSize, round } from "./procedure";
import { mean, pairedTTest } from "./stats";

const DETAIL_LIMIT = 50;

interface Nearest {
    offset: number;
    value: number;
}

/** Paired comparison of the measurement closest to drug start on either side of it. */
export const prePost = defineProcedure({
    type: "pre_post",
    params: PrePostParams,
    async run(params, ctx) {
        const window = params.window_days;
        const warnings: string[] = [];

        const drug = await ctx.cohorts.buildCohort(
            groupOf(params.drug_concept_ids, params.include_descendants),
            params.population,
            { domain: "drug" },
        );
        requireSize("Drug-exposed cohort", drug.entries.size, ctx);

        const series = await ctx.cohorts.measurementSeries(
            groupOf(params.measurement_concept_ids, params.include_descendants),
            [...drug.entries.keys()],
        );

        const pre = new Map<PersonId, Nearest>();
        const post = new Map<PersonId, Nearest>();
        for (const [pid, values] of series) {
            const entry = drug.entries.get(pid);
            if (!entry) continue;
            for (const m of values) {
                const offset = daysBetween(entry.firstDate, m.date);
                if (offset >= -window && offset < 0) {
                    const cur = pre.get(pid);
                    if (!cur || offset > cur.offset) pre.set(pid, { offset, value: m.value });
                } else if (offset >= 0 && offset <= window) {
                    const cur = post.get(pid);
                    if (!cur || offset < cur.offset) post.set(pid, { offset, value: m.value });
                }
            }
        }

        const paired = [...drug.entries.keys()].filter((pid) => pre.has(pid) && post.has(pid));
        const unpaired = drug.entries.size - paired.length;
        if (unpaired > 0) {
            warnings.push(`${unpaired} patient(s) excluded: no measurement on one or both sides within ${window} days.`);
        }
        requireSize(
            "Patients with pre and post measurements",
            paired.length,
            ctx,
            `Window: ${window} days around first exposure.`,
        );
        if (paired.length < 20) {
            warnings.push(`Small sample size (${paired.length} patients). Results may not be reliable.`);
        }

        const before = paired.map((pid) => pre.get(pid)?.value ?? NaN);
        const after = paired.map((pid) => post.get(pid)?.value ?? NaN);
        const test = pairedTTest(before, after);
        if (test.noVariance) {
            warnings.push("No variance in the paired differences; the t statistic is undefined.");
        }

        const detailRows: Cell[][] = paired.slice(0, DETAIL_LIMIT).map((pid, i) => [
            pid,
            round(before[i], 2),
            round(after[i], 2),
            round(after[i] - before[i], 2),
        ]);
        if (paired.length > DETAIL_LIMIT) {
            warnings.push(`Showing ${DETAIL_LIMIT} of ${paired.length} patients in detail table.`);
        }

        return finalizeResult("pre_post", ctx, {
            summary: {
                n_patients: paired.length,
                mean_pre: round(mean(before), 2),
                mean_post: round(mean(after), 2),
                mean_change: round(test.meanDifference, 2),
                std_change: round(test.sdDifference, 2),
                t_statistic: round(test.statistic, 3),
                p_value: round(test.pValue, 6),
                cohens_d: test.sdDifference > 0 ? round(test.meanDifference / test.sdDifference, 3) : null,
                window_days: window,
            },
            annotations: { test_used: "Paired t-test" },
            detailColumns: ["Patient ID", "Pre Value", "Post Value", "Change"],
            detailRows,
            warnings,
        });
    },
});
