import type { z } from "zod";
import { InsufficientDataError } from "../errors";
import type { AnalysisResult, AnalysisType, Cell } from "../types";
import type { CohortBuilder } from "./cohort";
import type { LabelResolver } from "./label";

/** Everything a procedure may touch during one run. */
export interface AnalysisContext {
    cohorts: CohortBuilder;
    labels: LabelResolver;
    /** statements issued so far in this run, in order */
    queries: () => string[];
    minCohortSize: number;
}

export interface AnalysisProcedure<S extends z.ZodTypeAny = z.ZodTypeAny> {
    type: AnalysisType;
    params: S;
    run(params: z.output<S>, ctx: AnalysisContext): Promise<AnalysisResult>;
}

export function defineProcedure<S extends z.ZodTypeAny>(p: AnalysisProcedure<S>): AnalysisProcedure<S> {
    return p;
}

/** Rounds to `digits`; NaN and ±Infinity become null. */
export function round(x: number | null | undefined, digits = 3): number | null {
    if (x == null || !Number.isFinite(x)) return null;
    const f = 10 ** digits;
    return Math.round(x * f) / f;
}

export function requireSize(group: string, size: number, ctx: AnalysisContext, detail?: string) {
    if (size < ctx.minCohortSize) throw new InsufficientDataError(group, size, ctx.minCohortSize, detail);
}

/**
 * Builds the result and enforces its shape: summary values finite or null,
 * every detail row as wide as the header.
 */
export function finalizeResult(
    analysisType: AnalysisType,
    ctx: AnalysisContext,
    parts: {
        summary: Record<string, number | null>;
        annotations?: Record<string, string>;
        detailColumns: string[];
        detailRows: Cell[][];
        warnings: string[];
    },
): AnalysisResult {
    const summary: Record<string, number | null> = {};
    for (const [k, v] of Object.entries(parts.summary)) {
        summary[k] = v != null && Number.isFinite(v) ? v : null;
    }
    const width = parts.detailColumns.length;
    const detailRows = parts.detailRows.map((row) => {
        if (row.length !== width) {
            throw new Error(`${analysisType}: detail row has ${row.length} cells, expected ${width}`);
        }
        return row.map((cell) => (typeof cell === "number" && !Number.isFinite(cell) ? null : cell));
    });
    return {
        analysisType,
        summary,
        annotations: parts.annotations ?? {},
        detailColumns: parts.detailColumns,
        detailRows,
        queriesUsed: ctx.queries(),
        warnings: parts.warnings,
    };
}
