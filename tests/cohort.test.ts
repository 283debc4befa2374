import { describe, expect, it } from "vitest";
import { SqlCohortBuilder, daysBetween } from "../src/analysis/cohort";
import type { QueryParam, Row } from "../src/db";
import { DataAccessError } from "../src/errors";
import { conceptGroup } from "../src/types";
import { RecordingStore, day } from "./helpers/fakes";

function idsOf(p: QueryParam | undefined): number[] {
    return Array.isArray(p) ? p.filter((v): v is number => typeof v === "number") : [];
}

describe("SqlCohortBuilder.buildCohort", () => {
    it("expands through concept_ancestor and dedupes the id list", async () => {
        const store = new RecordingStore();
        await new SqlCohortBuilder(store).buildCohort(conceptGroup([201826, 201826, 201254]), undefined, {
            domain: "condition",
        });

        expect(store.calls).toHaveLength(1);
        const { sql, params } = store.calls[0];
        expect(sql).toContain("MIN(t.condition_start_date) AS event_date");
        expect(sql).toContain("FROM condition_occurrence t");
        expect(sql).toContain("WHERE ca.ancestor_concept_id = ANY($1::int[])");
        expect(sql).toContain("GROUP BY t.person_id");
        expect(params).toEqual([[201826, 201254]]);
    });

    it("matches an upstream-expanded group exactly", async () => {
        const store = new RecordingStore();
        await new SqlCohortBuilder(store).buildCohort(conceptGroup([201826], { includeDescendants: true }), undefined, {
            domain: "condition",
        });
        expect(store.calls[0].sql).toContain("WHERE t.condition_concept_id = ANY($1::int[])");
        expect(store.calls[0].sql).not.toContain("concept_ancestor");
    });

    it("binds population filters after the concept ids", async () => {
        const store = new RecordingStore();
        await new SqlCohortBuilder(store).buildCohort(
            conceptGroup([1310149]),
            { gender: "female", minAge: 40, maxAge: 65 },
            { domain: "drug" },
        );
        const { sql, params } = store.calls[0];
        expect(sql).toContain("FROM drug_era t");
        expect(sql).toContain("JOIN person p ON p.person_id = t.person_id");
        expect(sql).toContain("p.gender_concept_id = $2");
        expect(sql).toContain("EXTRACT(YEAR FROM CURRENT_DATE) - p.year_of_birth >= $3");
        expect(sql).toContain("EXTRACT(YEAR FROM CURRENT_DATE) - p.year_of_birth <= $4");
        expect(params).toEqual([[1310149], 8532, 40, 65]);
    });

    it("keeps one entry per subject with sorted distinct dates", async () => {
        const rows: Row[] = [
            { person_id: "1", event_date: "2020-01-05" },
            { person_id: 1, event_date: "2020-01-05" },
            { person_id: 1, event_date: "2020-01-01" },
            { person_id: 2, event_date: day("2021-06-30") },
        ];
        const store = new RecordingStore(() => rows);
        const cohort = await new SqlCohortBuilder(store).buildCohort(conceptGroup([1]), undefined, {
            domain: "condition",
            occurrences: "all",
        });

        expect(store.calls[0].sql).toContain("SELECT DISTINCT t.person_id, t.condition_start_date AS event_date");
        expect([...cohort.entries.keys()]).toEqual([1, 2]);
        expect(cohort.entries.get(1)).toEqual({
            firstDate: day("2020-01-01"),
            dates: [day("2020-01-01"), day("2020-01-05")],
        });
        expect(cohort.entries.get(2)?.firstDate).toEqual(day("2021-06-30"));
    });

    it("returns an empty cohort for an empty group without querying", async () => {
        const store = new RecordingStore();
        const cohort = await new SqlCohortBuilder(store).buildCohort(conceptGroup([]), undefined, { domain: "condition" });
        expect(cohort.entries.size).toBe(0);
        expect(store.calls).toHaveLength(0);
    });

    it("surfaces store failures unchanged", async () => {
        const failure = new DataAccessError("Query timed out (exceeded 30s).", { timedOut: true });
        const store = new RecordingStore(() => {
            throw failure;
        });
        await expect(
            new SqlCohortBuilder(store).buildCohort(conceptGroup([1]), undefined, { domain: "condition" }),
        ).rejects.toBe(failure);
    });

    it("a child concept's cohort is a subset of its ancestor's", async () => {
        const descendants = new Map<number, number[]>([
            [100, [100, 101, 102]],
            [101, [101]],
            [102, [102]],
        ]);
        const events = [
            { person_id: 1, concept: 101 },
            { person_id: 2, concept: 102 },
            { person_id: 3, concept: 100 },
            { person_id: 4, concept: 999 },
        ];
        const store = new RecordingStore((sql, params) => {
            const ids = idsOf(params[0]);
            const matched = sql.includes("concept_ancestor") ? ids.flatMap((id) => descendants.get(id) ?? [id]) : ids;
            return events
                .filter((e) => matched.includes(e.concept))
                .map((e) => ({ person_id: e.person_id, event_date: "2020-01-01" }));
        });
        const builder = new SqlCohortBuilder(store);
        const parent = await builder.buildCohort(conceptGroup([100]), undefined, { domain: "condition" });
        const child = await builder.buildCohort(conceptGroup([101]), undefined, { domain: "condition" });

        expect([...parent.entries.keys()].sort()).toEqual([1, 2, 3]);
        expect([...child.entries.keys()]).toEqual([1]);
        for (const pid of child.entries.keys()) expect(parent.entries.has(pid)).toBe(true);
    });
});

describe("SqlCohortBuilder auxiliary reads", () => {
    it("restricts measurements to the given subjects and drops null values in SQL", async () => {
        const store = new RecordingStore(() => [
            { person_id: 1, event_date: "2020-02-01", value: "7.1" },
            { person_id: 1, event_date: "2020-03-01", value: 6.4 },
        ]);
        const series = await new SqlCohortBuilder(store).measurementSeries(conceptGroup([3004410]), [1, 2]);

        const { sql, params } = store.calls[0];
        expect(sql).toContain("t.person_id = ANY($2::bigint[])");
        expect(sql).toContain("t.value_as_number IS NOT NULL");
        expect(params).toEqual([[3004410], [1, 2]]);
        expect(series.get(1)).toEqual([
            { date: day("2020-02-01"), value: 7.1 },
            { date: day("2020-03-01"), value: 6.4 },
        ]);
    });

    it("skips the query for an empty subject list", async () => {
        const store = new RecordingStore();
        const builder = new SqlCohortBuilder(store);
        expect((await builder.measurementSeries(conceptGroup([3004410]), [])).size).toBe(0);
        expect((await builder.deathDates([])).size).toBe(0);
        expect((await builder.observationEnds([])).size).toBe(0);
        expect(store.calls).toHaveLength(0);
    });

    it("counts the population with and without a filter", async () => {
        const store = new RecordingStore(() => [{ n: "42" }]);
        const builder = new SqlCohortBuilder(store);

        expect(await builder.populationSize()).toBe(42);
        expect(store.calls[0]).toEqual({ sql: "SELECT COUNT(*) AS n\nFROM person p", params: [] });

        await builder.populationSize({ gender: "male" });
        expect(store.calls[1]).toEqual({
            sql: "SELECT COUNT(*) AS n\nFROM person p\nWHERE p.gender_concept_id = $1",
            params: [8507],
        });
    });

    it("reads the domain of the first concept", async () => {
        const store = new RecordingStore(() => [{ domain_id: "Measurement" }]);
        expect(await new SqlCohortBuilder(store).conceptDomain([3004410])).toBe("Measurement");
        expect(store.calls[0].params).toEqual([[3004410]]);
    });
});

describe("daysBetween", () => {
    it("counts whole days, negative when going back", () => {
        expect(daysBetween(day("2020-01-01"), day("2020-03-01"))).toBe(60);
        expect(daysBetween(day("2020-03-01"), day("2020-01-01"))).toBe(-60);
    });
});
