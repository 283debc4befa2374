import { z } from "zod";
import type { AnalysisDispatcher } from "./analysis/registry";
import { searchConcepts, type ConceptCatalog } from "./conceptCache";
import type { DataStore } from "./db";
import {
    DataAccessError,
    EngineError,
    InsufficientDataError,
    NotFoundError,
    TruncatedResponseError,
    errorMessage,
} from "./errors";
import { explainQuery } from "./explain";
import { toCell } from "./io";
import { createLogger } from "./logger";
import type { ReasoningService } from "./openaiClient";
import { buildSystemPrompt, conceptSearchMessage, conciseRetryMessage, sqlFallbackMessage } from "./prompts";
import { needsRetry, recover, type JsonObject } from "./recovery";
import { validateSql } from "./sqlGuard";
import type { ConceptUsed, OrchestratorState, QueryResponse, SqlAnswer } from "./types";

const log = createLogger("orchestrator");

const ConceptUsedSchema = z.object({ id: z.coerce.number().int(), name: z.string() });

const ReplySchema = z.object({
    thinking: z.string().catch(""),
    explanation: z.string().catch(""),
    sql: z.string().catch(""),
    concept_search: z.string().optional().catch(undefined),
    analysis: z
        .object({ type: z.string().catch(""), params: z.unknown() })
        .optional()
        .catch(undefined),
    concept_ids_used: z.array(z.unknown()).catch([]),
});

type Reply = z.output<typeof ReplySchema>;

function readReply(data: JsonObject): Reply {
    return ReplySchema.parse(data);
}

function conceptsOf(reply: Reply): ConceptUsed[] {
    const out: ConceptUsed[] = [];
    for (const c of reply.concept_ids_used) {
        const parsed = ConceptUsedSchema.safeParse(c);
        if (parsed.success) out.push(parsed.data);
    }
    return out;
}

function roundSeconds(ms: number): number {
    return Math.round(ms / 10) / 100;
}

export interface OrchestratorDeps {
    llm: ReasoningService;
    store: DataStore;
    dispatcher: Pick<AnalysisDispatcher, "dispatch">;
    catalog: ConceptCatalog;
    schema: string;
}

/** Turns one question into a SQL answer or an analysis result. */
export class Orchestrator {
    constructor(private readonly deps: OrchestratorDeps) {}

    async answer(question: string): Promise<QueryResponse> {
        const started = Date.now();
        const res: QueryResponse = {
            question,
            thinking: "",
            sql: "",
            explanation: "",
            columns: [],
            rows: [],
            rowCount: 0,
            conceptsUsed: [],
            analysisResult: null,
            analysisQueries: [],
            notes: [],
            explainCost: null,
            error: "",
            elapsedS: 0,
            model: this.deps.llm.model,
            trace: ["Received"],
        };
        const enter = (state: OrchestratorState) => res.trace.push(state);
        const respond = (error?: string): QueryResponse => {
            if (error) {
                res.error = error;
                log.warn(error);
            }
            enter("Responding");
            res.elapsedS = roundSeconds(Date.now() - started);
            return res;
        };
        const apply = (reply: Reply) => {
            res.thinking = reply.thinking || res.thinking;
            res.explanation = reply.explanation || res.explanation;
            const concepts = conceptsOf(reply);
            if (concepts.length) res.conceptsUsed = concepts;
        };

        enter("Interpreting");
        const systemPrompt = await buildSystemPrompt(this.deps.catalog, this.deps.schema);
        const ask = async (message: string) => (await this.deps.llm.complete(systemPrompt, message)).text;

        let raw: string;
        try {
            raw = await ask(question);
        } catch (err) {
            log.error("LLM call failed", err);
            return respond(`LLM error: ${errorMessage(err)}`);
        }

        // one concise retry for a truncated or hollow reply
        let reply: Reply;
        try {
            const first = tryRecover(raw);
            if (!first || needsRetry(first)) {
                log.warn("Response incomplete (no sql/analysis), retrying with concise prompt");
                reply = readReply(recover(await ask(conciseRetryMessage(question))).data);
            } else {
                reply = readReply(first.data);
            }
        } catch (err) {
            return respond(`Response was truncated and retry failed: ${errorMessage(err)}`);
        }
        apply(reply);

        // one concept-search re-prompt
        if (reply.concept_search && !reply.sql && !reply.analysis) {
            const term = reply.concept_search;
            log.info(`Concept search fallback for: ${term}`);
            try {
                const found = await searchConcepts(this.deps.store, term);
                if (!found.length) return respond(`No concepts found matching '${term}'`);
                const lines = found
                    .map(
                        (c) =>
                            `- ${c.conceptId}: ${c.conceptName} (domain=${c.domainId}, vocab=${c.vocabularyId}, class=${c.conceptClassId ?? ""})`,
                    )
                    .join("\n");
                reply = readReply(recover(await ask(conceptSearchMessage(term, lines, question))).data);
            } catch (err) {
                return respond(`Concept search failed: ${errorMessage(err)}`);
            }
            apply(reply);
        }

        if (reply.analysis) {
            enter("AnalysisPath");
            const { type, params } = reply.analysis;
            try {
                const result = await this.deps.dispatcher.dispatch(type, params);
                res.analysisResult = result;
                res.analysisQueries = result.queriesUsed;
                return respond();
            } catch (err) {
                if (!(err instanceof InsufficientDataError || err instanceof NotFoundError)) {
                    if (!(err instanceof EngineError)) log.error(`Analysis ${type} failed`, err);
                    return respond(errorMessage(err));
                }
                // one fallback to SQL
                log.warn(`Analysis failed (${type}), falling back to SQL: ${err.message}`);
                res.notes.push(`The ${type || "requested"} analysis could not run: ${err.message} Answered with SQL instead.`);
                enter("Interpreting");
                try {
                    reply = readReply(recover(await ask(sqlFallbackMessage(err.message, question))).data);
                } catch (err2) {
                    return respond(`Analysis failed and SQL fallback also failed: ${errorMessage(err2)}`);
                }
                apply(reply);
            }
        }

        enter("SqlPath");
        if (!reply.sql) return respond("LLM did not return SQL");
        res.sql = reply.sql;
        const invalid = validateSql(reply.sql);
        if (invalid) return respond(`SQL validation failed: ${invalid}`);

        // plan review never blocks execution
        try {
            const review = await explainQuery(this.deps.store, reply.sql);
            res.notes.push(...review.warnings);
            if (review.indexSuggestions.length) res.notes.push(`Suggested indexes: ${review.indexSuggestions.join(" ")}`);
            res.explainCost = review.estimatedCost || null;
        } catch (err) {
            log.debug(`EXPLAIN pre-flight failed: ${errorMessage(err)}`);
        }

        const answer = await this.executeSql(reply.sql);
        res.columns = answer.columns;
        res.rows = answer.rows;
        res.rowCount = answer.rowCount;
        return respond(answer.error || undefined);
    }

    /** Runs a validated SELECT; failures come back in `error`, never thrown. */
    async executeSql(sql: string): Promise<SqlAnswer> {
        const invalid = validateSql(sql);
        if (invalid) return { columns: [], rows: [], rowCount: 0, error: `Blocked: ${invalid}`, elapsedS: 0 };

        const started = Date.now();
        try {
            const { columns, rows } = await this.deps.store.query(sql);
            return {
                columns,
                rows: rows.map((r) => columns.map((c) => toCell(r[c]))),
                rowCount: rows.length,
                error: "",
                elapsedS: roundSeconds(Date.now() - started),
            };
        } catch (err) {
            if (!(err instanceof DataAccessError)) throw err;
            return { columns: [], rows: [], rowCount: 0, error: err.message, elapsedS: roundSeconds(Date.now() - started) };
        }
    }
}

function tryRecover(raw: string) {
    try {
        return recover(raw);
    } catch (err) {
        if (err instanceof TruncatedResponseError) return null;
        throw err;
    }
}
