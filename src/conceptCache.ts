import { asNumber, asString, type DataStore, type Row } from "./db";
import { createLogger } from "./logger";

const log = createLogger("concepts");

export interface CatalogConcept {
    conceptId: number;
    conceptName: string;
    domainId: string;
    vocabularyId: string;
    conceptClassId?: string;
}

// clinical tables whose concepts the catalog lists
const CATALOG_SOURCES: { label: string; table: string; column: string }[] = [
    { label: "Condition", table: "condition_occurrence", column: "condition_concept_id" },
    { label: "Drug (ingredient)", table: "drug_era", column: "drug_concept_id" },
    { label: "Drug (clinical drug)", table: "drug_exposure", column: "drug_concept_id" },
    { label: "Measurement", table: "measurement", column: "measurement_concept_id" },
    { label: "Observation", table: "observation", column: "observation_concept_id" },
    { label: "Procedure", table: "procedure_occurrence", column: "procedure_concept_id" },
    { label: "Device", table: "device_exposure", column: "device_concept_id" },
];

function toConcept(r: Row): CatalogConcept {
    return {
        conceptId: asNumber(r.concept_id, "concept_id"),
        conceptName: asString(r.concept_name),
        domainId: asString(r.domain_id) || "Other",
        vocabularyId: asString(r.vocabulary_id),
        conceptClassId: r.concept_class_id == null ? undefined : asString(r.concept_class_id),
    };
}

/** Prompt block of concepts grouped by domain, deduplicated by id (first wins). */
export function buildCatalogText(concepts: readonly CatalogConcept[]): string {
    const seen = new Map<number, CatalogConcept>();
    for (const c of concepts) {
        if (c.conceptId && !seen.has(c.conceptId)) seen.set(c.conceptId, c);
    }
    const byDomain = new Map<string, CatalogConcept[]>();
    for (const c of seen.values()) {
        const list = byDomain.get(c.domainId);
        if (list) list.push(c);
        else byDomain.set(c.domainId, [c]);
    }

    const lines = ["# Concept Catalog (concepts actually present in clinical data)"];
    for (const domain of [...byDomain.keys()].sort()) {
        const items = (byDomain.get(domain) ?? []).sort((a, b) => a.conceptName.localeCompare(b.conceptName));
        lines.push("", `## ${domain} (${items.length} concepts)`);
        for (const c of items) lines.push(`- ${c.conceptId}: ${c.conceptName} [${c.vocabularyId}]`);
    }
    const text = lines.join("\n");
    log.info(`Concept catalog: ${seen.size} unique concepts, ${text.length} chars`);
    return text;
}

/**
 * Concepts present in the clinical data, loaded once per data source and
 * read-only afterwards. Load a new instance to switch sources.
 */
export class ConceptCatalog {
    private constructor(
        readonly concepts: readonly CatalogConcept[],
        readonly text: string,
    ) {}

    static empty(): ConceptCatalog {
        return new ConceptCatalog([], "");
    }

    static fromConcepts(concepts: readonly CatalogConcept[]): ConceptCatalog {
        return new ConceptCatalog(Object.freeze([...concepts]), buildCatalogText(concepts));
    }

    static async load(store: DataStore): Promise<ConceptCatalog> {
        const all: CatalogConcept[] = [];
        for (const src of CATALOG_SOURCES) {
            log.debug(`Loading concepts: ${src.label}`);
            const rows = await store.execute(
                `SELECT DISTINCT t.${src.column} AS concept_id, c.concept_name, c.domain_id, c.vocabulary_id
FROM ${src.table} t
JOIN concept c ON t.${src.column} = c.concept_id
WHERE c.standard_concept = 'S'`,
            );
            for (const r of rows) all.push(toConcept(r));
            log.debug(`  → ${rows.length} concepts`);
        }
        return ConceptCatalog.fromConcepts(all);
    }
}

// LIKE wildcards in a model-supplied term match literally
export function likePattern(term: string): string {
    return `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

/** Standard concepts whose name contains `term`, for the concept-search re-prompt. */
export async function searchConcepts(store: DataStore, term: string, limit = 20): Promise<CatalogConcept[]> {
    const rows = await store.execute(
        `SELECT concept_id, concept_name, domain_id, vocabulary_id, concept_class_id
FROM concept
WHERE concept_name ILIKE $1 ESCAPE '\\'
  AND standard_concept = 'S'
ORDER BY concept_name
LIMIT $2`,
        [likePattern(term), limit],
    );
    return rows.map(toConcept);
}
