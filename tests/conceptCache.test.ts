import { describe, expect, it } from "vitest";
import { ConceptCatalog, buildCatalogText, searchConcepts, type CatalogConcept } from "../src/conceptCache";
import { RecordingStore } from "./helpers/fakes";

const concept = (conceptId: number, conceptName: string, domainId: string, vocabularyId = "SNOMED"): CatalogConcept => ({
    conceptId,
    conceptName,
    domainId,
    vocabularyId,
});

describe("buildCatalogText", () => {
    it("groups by domain, sorts by name and keeps the first copy of an id", () => {
        const text = buildCatalogText([
            concept(201826, "Type 2 diabetes mellitus", "Condition"),
            concept(1503297, "Metformin", "Drug", "RxNorm"),
            concept(320128, "Essential hypertension", "Condition"),
            concept(201826, "Duplicate name", "Condition"),
        ]);
        expect(text).toBe(
            [
                "# Concept Catalog (concepts actually present in clinical data)",
                "",
                "## Condition (2 concepts)",
                "- 320128: Essential hypertension [SNOMED]",
                "- 201826: Type 2 diabetes mellitus [SNOMED]",
                "",
                "## Drug (1 concepts)",
                "- 1503297: Metformin [RxNorm]",
            ].join("\n"),
        );
    });
});

describe("ConceptCatalog.load", () => {
    it("reads each clinical table once and merges the results", async () => {
        const store = new RecordingStore((sql) =>
            sql.includes("FROM condition_occurrence")
                ? [{ concept_id: "201826", concept_name: "Type 2 diabetes mellitus", domain_id: "Condition", vocabulary_id: "SNOMED" }]
                : [],
        );
        const catalog = await ConceptCatalog.load(store);

        expect(store.calls).toHaveLength(7);
        expect(catalog.concepts).toEqual([
            {
                conceptId: 201826,
                conceptName: "Type 2 diabetes mellitus",
                domainId: "Condition",
                vocabularyId: "SNOMED",
                conceptClassId: undefined,
            },
        ]);
        expect(catalog.text).toContain("- 201826: Type 2 diabetes mellitus [SNOMED]");
    });
});

describe("searchConcepts", () => {
    it("matches LIKE wildcards in the term literally", async () => {
        const store = new RecordingStore();
        await searchConcepts(store, "100%_pure\\");

        expect(store.calls[0].sql).toContain("WHERE concept_name ILIKE $1 ESCAPE '\\'");
        expect(store.calls[0].params).toEqual(["%100\\%\\_pure\\\\%", 20]);
    });
});
