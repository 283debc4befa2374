import { asDate, asNumber, asString, type DataStore, type QueryParam, type Row } from "../db";
import type {
    Cohort,
    CohortDomain,
    CohortEntry,
    ConceptGroup,
    MeasurementSeries,
    PersonId,
    PopulationFilter,
} from "../types";

interface DomainTable {
    table: string;
    conceptColumn: string;
    dateColumn: string;
}

const DOMAIN_TABLES: Record<CohortDomain, DomainTable> = {
    condition: { table: "condition_occurrence", conceptColumn: "condition_concept_id", dateColumn: "condition_start_date" },
    drug: { table: "drug_era", conceptColumn: "drug_concept_id", dateColumn: "drug_era_start_date" },
    measurement: { table: "measurement", conceptColumn: "measurement_concept_id", dateColumn: "measurement_date" },
};

const GENDER_CONCEPTS = { male: 8507, female: 8532 } as const;

export interface BuildOptions {
    domain: CohortDomain;
    /** "all" keeps every event date per subject; default "first" */
    occurrences?: "first" | "all";
}

/** Resolves concept groups against the clinical store. */
export interface CohortBuilder {
    buildCohort(group: ConceptGroup, filter: PopulationFilter | undefined, options: BuildOptions): Promise<Cohort>;
    measurementSeries(group: ConceptGroup, personIds?: readonly PersonId[], filter?: PopulationFilter): Promise<MeasurementSeries>;
    deathDates(personIds: readonly PersonId[]): Promise<Map<PersonId, Date>>;
    observationEnds(personIds: readonly PersonId[]): Promise<Map<PersonId, Date>>;
    populationSize(filter?: PopulationFilter): Promise<number>;
    conceptDomain(conceptIds: readonly number[]): Promise<string | null>;
    conceptNames(conceptIds: readonly number[]): Promise<string[]>;
}

/** Positional parameter collector: `add` returns the `$n` placeholder. */
class Params {
    readonly values: QueryParam[] = [];

    add(v: QueryParam): string {
        this.values.push(v);
        return `$${this.values.length}`;
    }
}

function conceptPredicate(column: string, group: ConceptGroup, params: Params): string {
    const ids = params.add(group.conceptIds);
    if (group.includeDescendants) return `${column} = ANY(${ids}::int[])`;
    // every concept is its own ancestor at distance 0
    return `${column} IN (
        SELECT ca.descendant_concept_id
        FROM concept_ancestor ca
        WHERE ca.ancestor_concept_id = ANY(${ids}::int[])
    )`;
}

function populationPredicates(filter: PopulationFilter | undefined, params: Params): string[] {
    if (!filter) return [];
    const out: string[] = [];
    if (filter.gender) out.push(`p.gender_concept_id = ${params.add(GENDER_CONCEPTS[filter.gender])}`);
    if (filter.minAge != null) out.push(`EXTRACT(YEAR FROM CURRENT_DATE) - p.year_of_birth >= ${params.add(filter.minAge)}`);
    if (filter.maxAge != null) out.push(`EXTRACT(YEAR FROM CURRENT_DATE) - p.year_of_birth <= ${params.add(filter.maxAge)}`);
    return out;
}

function hasFilter(filter: PopulationFilter | undefined): filter is PopulationFilter {
    return !!filter && (filter.gender != null || filter.minAge != null || filter.maxAge != null);
}

/** Collapses the template indentation so logged queries read cleanly. */
function tidy(sql: string): string {
    return sql
        .split("\n")
        .map((l) => l.trimEnd())
        .filter((l) => l.trim() !== "")
        .map((l) => l.replace(/^ {8}/, ""))
        .join("\n")
        .trim();
}

function groupDates(rows: Row[], dateColumn: string): Map<PersonId, Date[]> {
    const out = new Map<PersonId, Date[]>();
    for (const r of rows) {
        const pid = asNumber(r.person_id, "person_id");
        const list = out.get(pid);
        const d = asDate(r[dateColumn], dateColumn);
        if (list) list.push(d);
        else out.set(pid, [d]);
    }
    return out;
}

export class SqlCohortBuilder implements CohortBuilder {
    constructor(private readonly store: DataStore) {}

    async buildCohort(group: ConceptGroup, filter: PopulationFilter | undefined, options: BuildOptions): Promise<Cohort> {
        const { domain, occurrences = "first" } = options;
        const entries = new Map<PersonId, CohortEntry>();
        if (!group.conceptIds.length) return { domain, entries };

        const t = DOMAIN_TABLES[domain];
        const params = new Params();
        const where = [conceptPredicate(`t.${t.conceptColumn}`, group, params), ...populationPredicates(filter, params)];
        const join = hasFilter(filter) ? "JOIN person p ON p.person_id = t.person_id" : "";

        const sql =
            occurrences === "first"
                ? tidy(`
        SELECT t.person_id, MIN(t.${t.dateColumn}) AS event_date
        FROM ${t.table} t
        ${join}
        WHERE ${where.join("\n          AND ")}
        GROUP BY t.person_id
        `)
                : tidy(`
        SELECT DISTINCT t.person_id, t.${t.dateColumn} AS event_date
        FROM ${t.table} t
        ${join}
        WHERE ${where.join("\n          AND ")}
        ORDER BY t.person_id, event_date
        `);

        const rows = await this.store.execute(sql, params.values);
        for (const [pid, dates] of groupDates(rows, "event_date")) {
            const sorted = [...new Map(dates.map((d) => [d.getTime(), d])).values()].sort(
                (a, b) => a.getTime() - b.getTime(),
            );
            entries.set(pid, { firstDate: sorted[0], dates: sorted });
        }
        return { domain, entries };
    }

    async measurementSeries(
        group: ConceptGroup,
        personIds?: readonly PersonId[],
        filter?: PopulationFilter,
    ): Promise<MeasurementSeries> {
        const series: MeasurementSeries = new Map();
        if (!group.conceptIds.length || (personIds && !personIds.length)) return series;

        const t = DOMAIN_TABLES.measurement;
        const params = new Params();
        const where = [conceptPredicate(`t.${t.conceptColumn}`, group, params)];
        if (personIds) where.push(`t.person_id = ANY(${params.add(personIds)}::bigint[])`);
        where.push("t.value_as_number IS NOT NULL", ...populationPredicates(filter, params));
        const join = hasFilter(filter) ? "JOIN person p ON p.person_id = t.person_id" : "";

        const sql = tidy(`
        SELECT t.person_id, t.${t.dateColumn} AS event_date, t.value_as_number AS value
        FROM ${t.table} t
        ${join}
        WHERE ${where.join("\n          AND ")}
        ORDER BY t.person_id, event_date
        `);
        const rows = await this.store.execute(sql, params.values);
        for (const r of rows) {
            const pid = asNumber(r.person_id, "person_id");
            const m = { date: asDate(r.event_date, "event_date"), value: asNumber(r.value, "value") };
            const list = series.get(pid);
            if (list) list.push(m);
            else series.set(pid, [m]);
        }
        return series;
    }

    async deathDates(personIds: readonly PersonId[]): Promise<Map<PersonId, Date>> {
        if (!personIds.length) return new Map();
        const rows = await this.store.execute(
            tidy(`
        SELECT person_id, MIN(death_date) AS event_date
        FROM death
        WHERE person_id = ANY($1::bigint[])
        GROUP BY person_id
        `),
            [personIds],
        );
        return firstDates(rows);
    }

    async observationEnds(personIds: readonly PersonId[]): Promise<Map<PersonId, Date>> {
        if (!personIds.length) return new Map();
        const rows = await this.store.execute(
            tidy(`
        SELECT person_id, MAX(observation_period_end_date) AS event_date
        FROM observation_period
        WHERE person_id = ANY($1::bigint[])
        GROUP BY person_id
        `),
            [personIds],
        );
        return firstDates(rows);
    }

    async populationSize(filter?: PopulationFilter): Promise<number> {
        const params = new Params();
        const where = populationPredicates(filter, params);
        const sql = tidy(`
        SELECT COUNT(*) AS n
        FROM person p
        ${where.length ? `WHERE ${where.join("\n  AND ")}` : ""}
        `);
        const rows = await this.store.execute(sql, params.values);
        return rows.length ? asNumber(rows[0].n, "n") : 0;
    }

    async conceptDomain(conceptIds: readonly number[]): Promise<string | null> {
        if (!conceptIds.length) return null;
        const rows = await this.store.execute(
            tidy(`
        SELECT domain_id
        FROM concept
        WHERE concept_id = ANY($1::int[])
        ORDER BY concept_id
        LIMIT 1
        `),
            [conceptIds],
        );
        return rows.length ? asString(rows[0].domain_id) : null;
    }

    async conceptNames(conceptIds: readonly number[]): Promise<string[]> {
        if (!conceptIds.length) return [];
        const rows = await this.store.execute(
            tidy(`
        SELECT concept_id, concept_name
        FROM concept
        WHERE concept_id = ANY($1::int[])
        ORDER BY concept_id
        LIMIT 10
        `),
            [conceptIds],
        );
        return rows.map((r) => asString(r.concept_name)).filter((n) => n !== "");
    }
}

function firstDates(rows: Row[]): Map<PersonId, Date> {
    const out = new Map<PersonId, Date>();
    for (const [pid, dates] of groupDates(rows, "event_date")) out.set(pid, dates[0]);
    return out;
}

export const MS_PER_DAY = 86_400_000;

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: Date, to: Date): number {
    return Math.round((to.getTime() - from.getTime()) / MS_PER_DAY);
}
