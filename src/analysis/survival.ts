import type { Cell, Cohort, CohortEntry, PersonId } from "../types";
import { daysBetween } from "./cohort";
import { SurvivalParams, groupOf } from "./params";
import { defineProcedure, finalizeResult, requireSize, round } from "./procedure";
import { kaplanMeier, medianSurvival, survivalAt, type SurvivalObservation } from "./stats";

const DAYS_PER_YEAR = 365;

/** Kaplan–Meier survival from first occurrence to death, censored at observation end or the horizon. */
export const survival = defineProcedure({
    type: "survival",
    params: SurvivalParams,
    async run(params, ctx) {
        const group = groupOf(params.cohort_concept_ids, params.include_descendants);
        const horizonDays = params.time_horizon_years * DAYS_PER_YEAR;
        const warnings: string[] = [];

        let cohort: Cohort | null = null;
        if (params.basis !== "drug") {
            cohort = await ctx.cohorts.buildCohort(group, params.population, { domain: "condition" });
        }
        if (params.basis === "drug" || (params.basis === "auto" && cohort?.entries.size === 0)) {
            cohort = await ctx.cohorts.buildCohort(group, params.population, { domain: "drug" });
        }
        const entries = cohort?.entries ?? new Map<PersonId, CohortEntry>();
        requireSize(
            "Survival cohort",
            entries.size,
            ctx,
            `No usable ${params.basis === "auto" ? "condition or drug" : params.basis} records for concept ids ${params.cohort_concept_ids.join(", ")}.`,
        );

        const personIds = [...entries.keys()];
        const deaths = await ctx.cohorts.deathDates(personIds);
        const obsEnd = await ctx.cohorts.observationEnds(personIds);

        const observations: SurvivalObservation[] = [];
        let noFollowUp = 0;
        let nonPositive = 0;
        for (const [pid, entry] of entries) {
            const death = deaths.get(pid);
            const end = obsEnd.get(pid);
            let time: number;
            let event: boolean;
            if (death) {
                time = daysBetween(entry.firstDate, death);
                event = true;
            } else if (end) {
                time = daysBetween(entry.firstDate, end);
                event = false;
            } else {
                noFollowUp++;
                continue;
            }
            if (time > horizonDays) {
                time = horizonDays;
                event = false;
            }
            if (time <= 0) {
                nonPositive++;
                continue;
            }
            observations.push({ time, event });
        }

        if (noFollowUp) warnings.push(`${noFollowUp} patient(s) excluded: no death record and no observation period.`);
        if (nonPositive) warnings.push(`${nonPositive} patient(s) excluded: follow-up of zero days or less.`);
        requireSize("Patients with valid follow-up", observations.length, ctx);
        if (observations.length < 10) warnings.push(`Only ${observations.length} patients with valid follow-up data.`);

        const steps = kaplanMeier(observations);
        const summary: Record<string, number | null> = {
            n_patients: observations.length,
            n_events: observations.filter((o) => o.event).length,
            median_survival_days: medianSurvival(steps),
        };
        for (let yr = 1; yr <= params.time_horizon_years; yr++) {
            const p = survivalAt(steps, yr * DAYS_PER_YEAR);
            summary[`survival_at_${yr}yr`] = round(p.survival, 3);
            summary[`survival_at_${yr}yr_ci_lower`] = round(p.ciLower, 3);
            summary[`survival_at_${yr}yr_ci_upper`] = round(p.ciUpper, 3);
        }

        const timePoints = new Set<number>([0]);
        for (let yr = 0; yr < params.time_horizon_years; yr++) {
            timePoints.add(yr * DAYS_PER_YEAR + 182);
            timePoints.add((yr + 1) * DAYS_PER_YEAR);
        }
        const detailRows: Cell[][] = [...timePoints]
            .sort((a, b) => a - b)
            .map((t) => {
                const p = survivalAt(steps, t);
                return [t, round(p.survival, 4), round(p.ciLower, 4), round(p.ciUpper, 4)];
            });

        return finalizeResult("survival", ctx, {
            summary,
            annotations: {
                method: "Kaplan-Meier (Greenwood log-log 95% CI)",
                cohort_domain: cohort?.domain ?? "condition",
            },
            detailColumns: ["Day", "Survival Probability", "CI Lower (95%)", "CI Upper (95%)"],
            detailRows,
            warnings,
        });
    },
});
