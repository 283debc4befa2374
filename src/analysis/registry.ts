import { NotFoundError, ValidationError } from "../errors";
import { QueryLog, type DataStore } from "../db";
import { createLogger } from "../logger";
import type { QuickCompleter } from "../openaiClient";
import { ANALYSIS_TYPES, type AnalysisResult, type AnalysisType } from "../types";
import { SqlCohortBuilder } from "./cohort";
import { comparative } from "./comparative";
import { correlation } from "./correlation";
import { ConceptLabelResolver } from "./label";
import { oddsRatio } from "./oddsRatio";
import { formatIssues } from "./params";
import { prePost } from "./prePost";
import type { AnalysisContext, AnalysisProcedure } from "./procedure";
import { survival } from "./survival";

const log = createLogger("analysis");

export const PROCEDURES: Readonly<Record<AnalysisType, AnalysisProcedure>> = Object.freeze({
    survival,
    pre_post: prePost,
    comparative,
    odds_ratio: oddsRatio,
    correlation,
});

function isAnalysisType(name: string): name is AnalysisType {
    return (ANALYSIS_TYPES as readonly string[]).includes(name);
}

export interface DispatcherOptions {
    minCohortSize: number;
    labelTimeoutMs: number;
}

/** Routes an analysis request to its procedure, one query log per call. */
export class AnalysisDispatcher {
    constructor(
        private readonly store: DataStore,
        private readonly llm: QuickCompleter,
        private readonly options: DispatcherOptions,
    ) {}

    async dispatch(name: string, params: unknown): Promise<AnalysisResult> {
        if (!isAnalysisType(name)) throw new NotFoundError(name, ANALYSIS_TYPES);
        const procedure = PROCEDURES[name];

        const parsed = procedure.params.safeParse(params ?? {});
        if (!parsed.success) {
            const issues = formatIssues(parsed.error);
            throw new ValidationError(`Invalid parameters for ${name}: ${issues.join("; ")}`, issues);
        }

        const queryLog = new QueryLog(this.store);
        const cohorts = new SqlCohortBuilder(queryLog);
        const ctx: AnalysisContext = {
            cohorts,
            labels: new ConceptLabelResolver(cohorts, this.llm, this.options.labelTimeoutMs),
            queries: () => queryLog.queries,
            minCohortSize: this.options.minCohortSize,
        };

        const started = Date.now();
        const result = await procedure.run(parsed.data, ctx);
        log.info(`${name} finished in ${((Date.now() - started) / 1000).toFixed(2)}s (${result.queriesUsed.length} queries)`);
        return result;
    }
}
