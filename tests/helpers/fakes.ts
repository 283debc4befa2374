import type { AnalysisContext } from "../../src/analysis/procedure";
import type { BuildOptions, CohortBuilder } from "../../src/analysis/cohort";
import type { LabelResolver } from "../../src/analysis/label";
import type { DataStore, QueryParam, QueryResult, Row } from "../../src/db";
import type { Completion, ReasoningService } from "../../src/openaiClient";
import type {
    Cohort,
    CohortDomain,
    CohortEntry,
    ConceptGroup,
    Gender,
    MeasurementSeries,
    PersonId,
    PopulationFilter,
} from "../../src/types";

export const day = (iso: string) => new Date(`${iso}T00:00:00Z`);

/** `iso` shifted by `days`, as a Date. */
export function offset(iso: string, days: number): Date {
    return new Date(day(iso).getTime() + days * 86_400_000);
}

// ─── Data store ─────────────────────────────────────────────────────────────

export interface IssuedQuery {
    sql: string;
    params: readonly QueryParam[];
}

type Answer = Row[] | QueryResult;

/**
 * Records every statement and answers through `respond`. A plain row list
 * takes its columns from the first row.
 */
export class RecordingStore implements DataStore {
    readonly calls: IssuedQuery[] = [];

    constructor(private readonly respond: (sql: string, params: readonly QueryParam[]) => Answer | Promise<Answer> = () => []) {}

    async execute(sql: string, params: readonly QueryParam[] = []): Promise<Row[]> {
        return (await this.query(sql, params)).rows;
    }

    async query(sql: string, params: readonly QueryParam[] = []): Promise<QueryResult> {
        this.calls.push({ sql, params });
        const answer = await this.respond(sql, params);
        if (!Array.isArray(answer)) return answer;
        return { columns: answer.length ? Object.keys(answer[0]) : [], rows: answer };
    }
}

// ─── In-memory OMOP ─────────────────────────────────────────────────────────

export interface MemoryPerson {
    id: PersonId;
    gender?: Gender;
    age?: number;
}

export interface MemoryEvent {
    personId: PersonId;
    domain: CohortDomain;
    conceptId: number;
    date: Date;
}

export interface MemoryMeasurement {
    personId: PersonId;
    conceptId: number;
    date: Date;
    value: number;
}

export interface MemoryOmop {
    persons?: MemoryPerson[];
    events?: MemoryEvent[];
    measurements?: MemoryMeasurement[];
    deaths?: Map<PersonId, Date>;
    observationEnds?: Map<PersonId, Date>;
    concepts?: { id: number; name: string; domain: string }[];
}

/** CohortBuilder over plain arrays; concept ids match exactly. */
export class MemoryCohorts implements CohortBuilder {
    readonly calls: string[] = [];

    constructor(private readonly omop: MemoryOmop) {}

    private matches(personId: PersonId, filter?: PopulationFilter): boolean {
        if (!filter) return true;
        const p = (this.omop.persons ?? []).find((x) => x.id === personId);
        if (!p) return false;
        if (filter.gender && p.gender !== filter.gender) return false;
        if (filter.minAge != null && (p.age ?? -1) < filter.minAge) return false;
        if (filter.maxAge != null && (p.age ?? Infinity) > filter.maxAge) return false;
        return true;
    }

    async buildCohort(group: ConceptGroup, filter: PopulationFilter | undefined, options: BuildOptions): Promise<Cohort> {
        this.calls.push(`buildCohort ${options.domain} ${group.conceptIds.join(",")}`);
        const entries = new Map<PersonId, CohortEntry>();
        const hits = (this.omop.events ?? [])
            .filter((e) => e.domain === options.domain && group.conceptIds.includes(e.conceptId))
            .filter((e) => this.matches(e.personId, filter))
            .sort((a, b) => a.date.getTime() - b.date.getTime());
        for (const e of hits) {
            const cur = entries.get(e.personId);
            if (!cur) entries.set(e.personId, { firstDate: e.date, dates: [e.date] });
            else if (options.occurrences === "all") cur.dates.push(e.date);
        }
        return { domain: options.domain, entries };
    }

    async measurementSeries(
        group: ConceptGroup,
        personIds?: readonly PersonId[],
        filter?: PopulationFilter,
    ): Promise<MeasurementSeries> {
        this.calls.push(`measurementSeries ${group.conceptIds.join(",")}`);
        const series: MeasurementSeries = new Map();
        const wanted = personIds && new Set(personIds);
        const rows = (this.omop.measurements ?? [])
            .filter((m) => group.conceptIds.includes(m.conceptId))
            .filter((m) => !wanted || wanted.has(m.personId))
            .filter((m) => this.matches(m.personId, filter))
            .sort((a, b) => a.date.getTime() - b.date.getTime());
        for (const m of rows) {
            const list = series.get(m.personId);
            const point = { date: m.date, value: m.value };
            if (list) list.push(point);
            else series.set(m.personId, [point]);
        }
        return series;
    }

    async deathDates(personIds: readonly PersonId[]): Promise<Map<PersonId, Date>> {
        this.calls.push("deathDates");
        return pick(this.omop.deaths, personIds);
    }

    async observationEnds(personIds: readonly PersonId[]): Promise<Map<PersonId, Date>> {
        this.calls.push("observationEnds");
        return pick(this.omop.observationEnds, personIds);
    }

    async populationSize(filter?: PopulationFilter): Promise<number> {
        this.calls.push("populationSize");
        return (this.omop.persons ?? []).filter((p) => this.matches(p.id, filter)).length;
    }

    async conceptDomain(conceptIds: readonly number[]): Promise<string | null> {
        this.calls.push("conceptDomain");
        return (this.omop.concepts ?? []).find((c) => conceptIds.includes(c.id))?.domain ?? null;
    }

    async conceptNames(conceptIds: readonly number[]): Promise<string[]> {
        this.calls.push("conceptNames");
        return (this.omop.concepts ?? []).filter((c) => conceptIds.includes(c.id)).map((c) => c.name);
    }
}

function pick(source: Map<PersonId, Date> | undefined, ids: readonly PersonId[]): Map<PersonId, Date> {
    const out = new Map<PersonId, Date>();
    for (const id of ids) {
        const d = source?.get(id);
        if (d) out.set(id, d);
    }
    return out;
}

/** Returns the fallback, so tests read fixed labels. */
export class FallbackLabels implements LabelResolver {
    async resolveLabel(_group: ConceptGroup, fallback = "Unknown"): Promise<string> {
        return fallback;
    }
}

export function persons(ids: number[], extra: Omit<MemoryPerson, "id"> = {}): MemoryPerson[] {
    return ids.map((id) => ({ id, ...extra }));
}

export function range(from: number, to: number): number[] {
    const out: number[] = [];
    for (let i = from; i <= to; i++) out.push(i);
    return out;
}

export function memoryContext(omop: MemoryOmop, minCohortSize = 5): AnalysisContext & { cohorts: MemoryCohorts } {
    const cohorts = new MemoryCohorts(omop);
    return {
        cohorts,
        labels: new FallbackLabels(),
        queries: () => [...cohorts.calls],
        minCohortSize,
    };
}

// ─── Reasoning service ──────────────────────────────────────────────────────

/** Replays canned replies in order; a reply that is an Error is thrown. */
export class ScriptedLLM implements ReasoningService {
    readonly model = "test-model";
    readonly calls: { system: string; user: string }[] = [];
    readonly quickCalls: string[] = [];

    constructor(
        private readonly replies: (string | Error)[] = [],
        private readonly quick: () => Promise<string> = async () => "",
    ) {}

    async complete(systemPrompt: string, userMessage: string): Promise<Completion> {
        this.calls.push({ system: systemPrompt, user: userMessage });
        const next = this.replies.shift();
        if (next === undefined) throw new Error("no scripted reply left");
        if (next instanceof Error) throw next;
        return { text: next, finishReason: "stop" };
    }

    quickComplete(prompt: string): Promise<string> {
        this.quickCalls.push(prompt);
        return this.quick();
    }
}
