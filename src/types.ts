export type PersonId = number;

/** One clinical idea as a set of OMOP concept ids. */
export interface ConceptGroup {
    readonly conceptIds: readonly number[];
    /**
     * true when `conceptIds` is already the descendant closure computed upstream;
     * ids are then matched exactly instead of through concept_ancestor.
     */
    readonly includeDescendants?: boolean;
}

export function conceptGroup(ids: Iterable<number>, opts: { includeDescendants?: boolean } = {}): ConceptGroup {
    const conceptIds = Object.freeze([...new Set(ids)]);
    return Object.freeze({ conceptIds, includeDescendants: opts.includeDescendants ?? false });
}

export type Gender = "male" | "female";

export interface PopulationFilter {
    gender?: Gender;
    minAge?: number;
    maxAge?: number;
}

export type CohortDomain = "condition" | "drug" | "measurement";

export interface CohortEntry {
    firstDate: Date;
    /** ascending; only the first date unless every occurrence was requested */
    dates: Date[];
}

export interface Cohort {
    domain: CohortDomain;
    entries: Map<PersonId, CohortEntry>;
}

export interface Measurement {
    date: Date;
    value: number;
}

export type MeasurementSeries = Map<PersonId, Measurement[]>;

export const ANALYSIS_TYPES = ["survival", "pre_post", "comparative", "odds_ratio", "correlation"] as const;
export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

export type Cell = string | number | boolean | null;

export interface AnalysisResult {
    analysisType: AnalysisType;
    /** finite numbers or explicit null */
    summary: Record<string, number | null>;
    /** non-numeric facts: test used, group labels, pairing mode */
    annotations: Record<string, string>;
    detailColumns: string[];
    detailRows: Cell[][];
    queriesUsed: string[];
    warnings: string[];
}

export interface ConceptUsed {
    id: number;
    name: string;
}

export type OrchestratorState = "Received" | "Interpreting" | "SqlPath" | "AnalysisPath" | "Responding";

/** One response shape for both the SQL path and the analysis path. */
export interface QueryResponse {
    question: string;
    thinking: string;
    sql: string;
    explanation: string;
    columns: string[];
    rows: Cell[][];
    rowCount: number;
    conceptsUsed: ConceptUsed[];
    analysisResult: AnalysisResult | null;
    analysisQueries: string[];
    notes: string[];
    /** Planner's total cost estimate for the SQL answer, when EXPLAIN ran. */
    explainCost: number | null;
    error: string;
    elapsedS: number;
    model: string;
    trace: OrchestratorState[];
}

export interface SqlAnswer {
    columns: string[];
    rows: Cell[][];
    rowCount: number;
    error: string;
    elapsedS: number;
}
