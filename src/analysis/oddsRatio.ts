import { OddsRatioParams, groupOf } from "./params";
import { defineProcedure, finalizeResult, requireSize, round } from "./procedure";
import { chiSquared2x2, fishersExact2x2, Z_95 } from "./stats";

export interface OddsRatioEstimate {
    oddsRatio: number;
    ciLower: number;
    ciUpper: number;
    /** Haldane–Anscombe +0.5 applied */
    corrected: boolean;
}

/** Sample OR with a Woolf (log-scale) 95% interval. */
export function oddsRatioWoolf(a: number, b: number, c: number, d: number): OddsRatioEstimate {
    const corrected = a === 0 || b === 0 || c === 0 || d === 0;
    const [ac, bc, cc, dc] = corrected ? [a + 0.5, b + 0.5, c + 0.5, d + 0.5] : [a, b, c, d];
    const oddsRatio = (ac * dc) / (bc * cc);
    const se = Math.sqrt(1 / ac + 1 / bc + 1 / cc + 1 / dc);
    const logOr = Math.log(oddsRatio);
    return {
        oddsRatio,
        ciLower: Math.exp(logOr - Z_95 * se),
        ciUpper: Math.exp(logOr + Z_95 * se),
        corrected,
    };
}

export const oddsRatio = defineProcedure({
    type: "odds_ratio",
    params: OddsRatioParams,
    async run(params, ctx) {
        const warnings: string[] = [];
        const exposureGroup = groupOf(params.exposure_concept_ids, params.include_descendants);
        const outcomeGroup = groupOf(params.outcome_concept_ids, params.include_descendants);
        const exposureLabel = params.exposure_label || (await ctx.labels.resolveLabel(exposureGroup, "Exposure"));
        const outcomeLabel = params.outcome_label || (await ctx.labels.resolveLabel(outcomeGroup, "Outcome"));

        const exposed = await ctx.cohorts.buildCohort(exposureGroup, params.population, { domain: "condition" });
        const outcome = await ctx.cohorts.buildCohort(outcomeGroup, params.population, { domain: "condition" });
        const total = await ctx.cohorts.populationSize(params.population);

        let a = 0;
        for (const pid of exposed.entries.keys()) if (outcome.entries.has(pid)) a++;
        const b = exposed.entries.size - a;
        const c = outcome.entries.size - a;
        const d = total - a - b - c;

        requireSize(`${exposureLabel} (exposed)`, a + b, ctx);
        requireSize(`${outcomeLabel} (outcome)`, a + c, ctx);

        const est = oddsRatioWoolf(a, b, c, d);
        if (est.corrected) {
            warnings.push("Zero cell in the 2x2 table; Haldane-Anscombe correction (+0.5) applied to the OR and its CI.");
        }

        const useFisher = Math.min(a, b, c, d) < 5;
        const test = useFisher
            ? { statistic: null, pValue: fishersExact2x2(a, b, c, d) }
            : chiSquared2x2(a, b, c, d);

        return finalizeResult("odds_ratio", ctx, {
            summary: {
                odds_ratio: round(est.oddsRatio, 3),
                ci_lower: round(est.ciLower, 3),
                ci_upper: round(est.ciUpper, 3),
                p_value: round(test.pValue, 6),
                chi_squared: useFisher ? null : round(test.statistic, 3),
                a,
                b,
                c,
                d,
                n_total: total,
            },
            annotations: {
                exposure: exposureLabel,
                outcome: outcomeLabel,
                test_used: useFisher ? "Fisher's exact test" : "Chi-squared test (Yates)",
            },
            detailColumns: ["", `${outcomeLabel}: Yes`, `${outcomeLabel}: No`, "Total"],
            detailRows: [
                [`${exposureLabel}: Yes`, a, b, a + b],
                [`${exposureLabel}: No`, c, d, c + d],
                ["Total", a + c, b + d, total],
            ],
            warnings,
        });
    },
});
