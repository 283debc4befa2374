import type { Cell, CohortEntry, MeasurementSeries, PersonId } from "../types";
import { daysBetween } from "./cohort";
import { ComparativeParams, groupOf } from "./params";
import { defineProcedure, finalizeResult, requireSize, round, type AnalysisContext } from "./procedure";
import { chiSquared2x2, fishersExact2x2, mean, stdDev, twoSampleTTest, Z_95 } from "./stats";

type Arm = Map<PersonId, CohortEntry>;

interface ArmEvents {
    n: number;
    events: number;
}

function countEvents(arm: Arm, outcomes: Map<PersonId, CohortEntry>, followupDays: number): ArmEvents {
    let events = 0;
    for (const [pid, entry] of arm) {
        const outcome = outcomes.get(pid);
        if (!outcome) continue;
        // any occurrence in (index, index + followup]
        const hit = outcome.dates.some((d) => {
            const days = daysBetween(entry.firstDate, d);
            return days > 0 && days <= followupDays;
        });
        if (hit) events++;
    }
    return { n: arm.size, events };
}

function meanInWindow(arm: Arm, series: MeasurementSeries, followupDays: number): number[] {
    const out: number[] = [];
    for (const [pid, entry] of arm) {
        const inWindow = (series.get(pid) ?? [])
            .filter((m) => {
                const days = daysBetween(entry.firstDate, m.date);
                return days > 0 && days <= followupDays;
            })
            .map((m) => m.value);
        if (inWindow.length) out.push(mean(inWindow));
    }
    return out;
}

async function resolveOutcomeDomain(
    requested: "auto" | "condition" | "measurement",
    outcomeIds: number[],
    ctx: AnalysisContext,
): Promise<"condition" | "measurement"> {
    if (requested !== "auto") return requested;
    const domain = await ctx.cohorts.conceptDomain(outcomeIds);
    return domain === "Measurement" ? "measurement" : "condition";
}

/** Two exposure arms compared on a condition outcome (proportions) or a measurement outcome (means). */
export const comparative = defineProcedure({
    type: "comparative",
    params: ComparativeParams,
    async run(params, ctx) {
        const warnings: string[] = [];
        const labelA =
            params.drug_a_label ||
            (await ctx.labels.resolveLabel(groupOf(params.drug_a_concept_ids, params.include_descendants), "Drug A"));
        const labelB =
            params.drug_b_label ||
            (await ctx.labels.resolveLabel(groupOf(params.drug_b_concept_ids, params.include_descendants), "Drug B"));

        const cohortA = await ctx.cohorts.buildCohort(
            groupOf(params.drug_a_concept_ids, params.include_descendants),
            params.population,
            { domain: "drug" },
        );
        const cohortB = await ctx.cohorts.buildCohort(
            groupOf(params.drug_b_concept_ids, params.include_descendants),
            params.population,
            { domain: "drug" },
        );

        // arms must be disjoint: subjects exposed to both leave both
        const armA: Arm = new Map(cohortA.entries);
        const armB: Arm = new Map(cohortB.entries);
        let overlap = 0;
        for (const pid of cohortA.entries.keys()) {
            if (armB.has(pid)) {
                armA.delete(pid);
                armB.delete(pid);
                overlap++;
            }
        }
        if (overlap > 0) {
            warnings.push(`${overlap} patient(s) were exposed to both ${labelA} and ${labelB}; excluded from both groups.`);
        }
        requireSize(`${labelA} cohort`, armA.size, ctx);
        requireSize(`${labelB} cohort`, armB.size, ctx);

        const outcomeDomain = await resolveOutcomeDomain(params.outcome_domain, params.outcome_concept_ids, ctx);
        const outcomeGroup = groupOf(params.outcome_concept_ids, params.include_descendants);
        const followup = params.followup_days;
        const annotations: Record<string, string> = {
            group_a: labelA,
            group_b: labelB,
            outcome_domain: outcomeDomain,
        };

        if (outcomeDomain === "measurement") {
            const series = await ctx.cohorts.measurementSeries(outcomeGroup, [...armA.keys(), ...armB.keys()]);
            const valsA = meanInWindow(armA, series, followup);
            const valsB = meanInWindow(armB, series, followup);
            requireSize(`${labelA} patients with outcome measurements`, valsA.length, ctx, `Follow-up: ${followup} days.`);
            requireSize(`${labelB} patients with outcome measurements`, valsB.length, ctx, `Follow-up: ${followup} days.`);

            const meanA = mean(valsA);
            const meanB = mean(valsB);
            const test = twoSampleTTest(valsA, valsB);
            return finalizeResult("comparative", ctx, {
                summary: {
                    n_a: valsA.length,
                    n_b: valsB.length,
                    mean_a: round(meanA, 2),
                    mean_b: round(meanB, 2),
                    difference: round(meanA - meanB, 2),
                    t_statistic: round(test.statistic, 3),
                    p_value: round(test.pValue, 6),
                    followup_days: followup,
                },
                annotations: { ...annotations, test_used: "Independent t-test" },
                detailColumns: ["Group", "N Patients", "Mean Value", "Std Dev"],
                detailRows: [
                    [labelA, valsA.length, round(meanA, 2), round(stdDev(valsA), 2)],
                    [labelB, valsB.length, round(meanB, 2), round(stdDev(valsB), 2)],
                ],
                warnings,
            });
        }

        const outcomes = await ctx.cohorts.buildCohort(outcomeGroup, params.population, {
            domain: "condition",
            occurrences: "all",
        });
        const a = countEvents(armA, outcomes.entries, followup);
        const b = countEvents(armB, outcomes.entries, followup);
        const rateA = a.events / a.n;
        const rateB = b.events / b.n;
        const diff = rateA - rateB;
        const se = Math.sqrt((rateA * (1 - rateA)) / a.n + (rateB * (1 - rateB)) / b.n);
        const table = [a.events, a.n - a.events, b.events, b.n - b.events] as const;
        const useFisher = Math.min(...table) < 5;
        const test = useFisher
            ? { statistic: null, pValue: fishersExact2x2(...table) }
            : chiSquared2x2(...table);

        const detailRows: Cell[][] = [
            [labelA, a.n, a.events, round(rateA, 4)],
            [labelB, b.n, b.events, round(rateB, 4)],
        ];
        return finalizeResult("comparative", ctx, {
            summary: {
                n_a: a.n,
                n_b: b.n,
                events_a: a.events,
                events_b: b.events,
                rate_a: round(rateA, 4),
                rate_b: round(rateB, 4),
                rate_difference: round(diff, 4),
                rate_difference_ci_lower: round(diff - Z_95 * se, 4),
                rate_difference_ci_upper: round(diff + Z_95 * se, 4),
                relative_risk: rateB > 0 ? round(rateA / rateB, 3) : null,
                chi_squared: useFisher ? null : round(test.statistic, 3),
                p_value: round(test.pValue, 6),
                followup_days: followup,
            },
            annotations: { ...annotations, test_used: useFisher ? "Fisher's exact test" : "Chi-squared test (Yates)" },
            detailColumns: ["Group", "N Patients", "N Events", "Event Rate"],
            detailRows,
            warnings,
        });
    },
});
