import { z } from "zod";
import { asString, type DataStore } from "./db";
import { createLogger } from "./logger";

const log = createLogger("explain");

// tables big enough that a sequential scan is worth a note
const LARGE_TABLES = new Set(["measurement", "observation", "cost", "concept_relationship", "concept_ancestor"]);

const INDEX_SUGGESTIONS: Record<string, { column: string; sql: string }> = {
    measurement: {
        column: "measurement_concept_id",
        sql: "CREATE INDEX IF NOT EXISTS idx_measurement_concept ON measurement(measurement_concept_id);",
    },
    observation: {
        column: "observation_concept_id",
        sql: "CREATE INDEX IF NOT EXISTS idx_observation_concept ON observation(observation_concept_id);",
    },
    condition_occurrence: {
        column: "condition_concept_id",
        sql: "CREATE INDEX IF NOT EXISTS idx_condition_concept ON condition_occurrence(condition_concept_id);",
    },
    drug_exposure: {
        column: "drug_concept_id",
        sql: "CREATE INDEX IF NOT EXISTS idx_drug_exposure_concept ON drug_exposure(drug_concept_id);",
    },
    procedure_occurrence: {
        column: "procedure_concept_id",
        sql: "CREATE INDEX IF NOT EXISTS idx_procedure_concept ON procedure_occurrence(procedure_concept_id);",
    },
};

const SEQ_SCAN_ROW_THRESHOLD = 100_000;
// roughly where queries start to approach the default 30 s statement timeout
const HIGH_COST_THRESHOLD = 25_000_000;

const SCAN_NODE_TYPES = new Set(["Seq Scan", "Index Scan", "Index Only Scan", "Bitmap Heap Scan"]);

export interface PlanNode {
    "Node Type"?: string;
    "Relation Name"?: string;
    "Plan Rows"?: number;
    "Total Cost"?: number;
    Plans?: PlanNode[];
}

const PlanNodeSchema: z.ZodType<PlanNode> = z.lazy(() =>
    z.object({
        "Node Type": z.string().optional(),
        "Relation Name": z.string().optional(),
        "Plan Rows": z.number().optional(),
        "Total Cost": z.number().optional(),
        Plans: z.array(PlanNodeSchema).optional(),
    }),
);

const ExplainOutput = z.array(z.object({ Plan: PlanNodeSchema }));

export type ExplainPlan = z.output<typeof ExplainOutput>;

export interface TableScan {
    table: string;
    type: string;
    rows: number;
    cost: number;
}

export interface PlanReview {
    warnings: string[];
    estimatedCost: number;
    estimatedRows: number;
    seqScans: TableScan[];
    indexSuggestions: string[];
}

const fmt = (n: number) => Math.round(n).toLocaleString("en-US");

function visit(node: PlanNode, fn: (node: PlanNode) => void) {
    fn(node);
    for (const child of node.Plans ?? []) visit(child, fn);
}

function scanOf(node: PlanNode): TableScan {
    return {
        table: node["Relation Name"] ?? "",
        type: (node["Node Type"] ?? "").replace(" Scan", ""),
        rows: node["Plan Rows"] ?? 0,
        cost: node["Total Cost"] ?? 0,
    };
}

/** Sequential scans over large tables, or over any table with many estimated rows. */
export function largeSeqScans(root: PlanNode): TableScan[] {
    const out: TableScan[] = [];
    visit(root, (node) => {
        if (node["Node Type"] !== "Seq Scan") return;
        const scan = scanOf(node);
        if (LARGE_TABLES.has(scan.table) || scan.rows >= SEQ_SCAN_ROW_THRESHOLD) out.push(scan);
    });
    return out;
}

function hasColumnIndex(table: string, column: string, indexes: ReadonlyMap<string, readonly string[]>): boolean {
    return (indexes.get(table) ?? []).some((def) => def.includes(column));
}

/**
 * Warnings for an `EXPLAIN (FORMAT JSON)` plan. Seq scans on a table that
 * already has the suggested index are left alone: the planner chose them.
 */
export function reviewPlan(plan: ExplainPlan, indexes: ReadonlyMap<string, readonly string[]> = new Map()): PlanReview {
    const top = plan[0]?.Plan;
    if (!top) return { warnings: [], estimatedCost: 0, estimatedRows: 0, seqScans: [], indexSuggestions: [] };

    const totalCost = top["Total Cost"] ?? 0;
    const seqScans = largeSeqScans(top);
    const warnings: string[] = [];
    const indexSuggestions: string[] = [];
    const seen = new Set<string>();

    for (const scan of seqScans) {
        if (seen.has(scan.table)) continue;
        seen.add(scan.table);
        const suggestion = INDEX_SUGGESTIONS[scan.table];
        if (!suggestion) {
            warnings.push(`Sequential scan on ${scan.table} (~${fmt(scan.rows)} estimated rows). This may be slow.`);
        } else if (!hasColumnIndex(scan.table, suggestion.column, indexes)) {
            warnings.push(
                `Sequential scan on ${scan.table} (~${fmt(scan.rows)} estimated rows). No index on ${suggestion.column}.`,
            );
            indexSuggestions.push(suggestion.sql);
        }
    }

    if (totalCost > HIGH_COST_THRESHOLD) {
        const byTable = new Map<string, TableScan>();
        visit(top, (node) => {
            if (!node["Relation Name"] || !SCAN_NODE_TYPES.has(node["Node Type"] ?? "")) return;
            const scan = scanOf(node);
            const prev = byTable.get(scan.table);
            if (!prev || scan.cost > prev.cost) byTable.set(scan.table, scan);
        });
        const expensive = [...byTable.values()].sort((a, b) => b.cost - a.cost).slice(0, 3);
        if (expensive.length) {
            const list = expensive.map((s) => `${s.table} (~${fmt(s.rows)} rows via ${s.type})`).join(", ");
            warnings.push(
                `High estimated query cost (${fmt(totalCost)}). Most expensive table scans: ${list}. ` +
                    "Try adding a date range (e.g. WHERE ... > '2020-01-01') or narrowing the patient cohort to reduce data scanned.",
            );
        } else {
            warnings.push(
                `High estimated query cost (${fmt(totalCost)}). Try adding a date range or narrowing filters to reduce data scanned.`,
            );
        }
    }

    return { warnings, estimatedCost: totalCost, estimatedRows: top["Plan Rows"] ?? 0, seqScans, indexSuggestions };
}

/** Index definitions per table, from pg_indexes. */
async function tableIndexes(store: DataStore, tables: string[]): Promise<Map<string, string[]>> {
    const rows = await store.execute(
        `SELECT tablename, indexdef
FROM pg_indexes
WHERE tablename = ANY($1::text[])`,
        [tables],
    );
    const out = new Map<string, string[]>();
    for (const r of rows) {
        const table = asString(r.tablename);
        out.set(table, [...(out.get(table) ?? []), asString(r.indexdef)]);
    }
    return out;
}

/** Plans `sql` without running it and reviews the plan. */
export async function explainQuery(store: DataStore, sql: string): Promise<PlanReview> {
    const rows = await store.execute(`EXPLAIN (FORMAT JSON) ${sql}`);
    const plan = ExplainOutput.parse(rows[0]?.["QUERY PLAN"]);

    const top = plan[0]?.Plan;
    const tables = [...new Set((top ? largeSeqScans(top) : []).map((s) => s.table))];
    let indexes = new Map<string, string[]>();
    if (tables.length) {
        try {
            indexes = await tableIndexes(store, tables);
        } catch (err) {
            log.debug("Index lookup failed, reviewing the plan without it", err);
        }
    }
    return reviewPlan(plan, indexes);
}
