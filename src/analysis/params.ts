import { z } from "zod";
import { conceptGroup, type ConceptGroup } from "../types";

// LLM replies sometimes carry ids as strings ("201826")
const conceptIds = z
    .array(z.coerce.number().int().positive())
    .min(1, "at least one concept id is required");

const population = z
    .object({
        gender: z.enum(["male", "female"]).optional(),
        min_age: z.coerce.number().int().min(0).optional(),
        max_age: z.coerce.number().int().min(0).optional(),
    })
    .refine((p) => p.min_age == null || p.max_age == null || p.min_age <= p.max_age, {
        message: "min_age must not exceed max_age",
    })
    .transform((p) => ({ gender: p.gender, minAge: p.min_age, maxAge: p.max_age }))
    .optional();

const common = {
    include_descendants: z.boolean().optional(),
    population,
};

export const SurvivalParams = z.object({
    ...common,
    cohort_concept_ids: conceptIds,
    basis: z.enum(["auto", "condition", "drug"]).default("auto"),
    time_horizon_years: z.coerce.number().int().min(1).max(30).default(5),
});

export const PrePostParams = z.object({
    ...common,
    drug_concept_ids: conceptIds,
    measurement_concept_ids: conceptIds,
    window_days: z.coerce.number().int().min(1).max(3650).default(30),
});

export const ComparativeParams = z.object({
    ...common,
    drug_a_concept_ids: conceptIds,
    drug_b_concept_ids: conceptIds,
    outcome_concept_ids: conceptIds,
    outcome_domain: z.enum(["auto", "condition", "measurement"]).default("auto"),
    followup_days: z.coerce.number().int().min(1).max(36500).default(365),
    drug_a_label: z.string().optional(),
    drug_b_label: z.string().optional(),
});

export const OddsRatioParams = z.object({
    ...common,
    exposure_concept_ids: conceptIds,
    outcome_concept_ids: conceptIds,
    exposure_label: z.string().optional(),
    outcome_label: z.string().optional(),
});

export const CorrelationParams = z.object({
    ...common,
    measurement_a_concept_ids: conceptIds,
    measurement_b_concept_ids: conceptIds,
    same_day: z.boolean().default(true),
    measurement_a_label: z.string().optional(),
    measurement_b_label: z.string().optional(),
});

export function groupOf(ids: number[], includeDescendants: boolean | undefined): ConceptGroup {
    return conceptGroup(ids, { includeDescendants });
}

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
}
