import { errorMessage } from "../errors";
import { createLogger } from "../logger";
import type { QuickCompleter } from "../openaiClient";
import type { ConceptGroup } from "../types";
import type { CohortBuilder } from "./cohort";

const log = createLogger("label");

export interface LabelResolver {
    resolveLabel(group: ConceptGroup, fallback?: string): Promise<string>;
}

function labelPrompt(names: string[]): string {
    return (
        "Given these medical concept names, produce a SHORT group label (1-4 words). " +
        "Return ONLY the label, nothing else.\n\n" +
        names.map((n) => `- ${n}`).join("\n")
    );
}

function withTimeout<T>(p: Promise<T>, ms: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => reject(new Error(`label call timed out after ${ms}ms`)), ms);
        p.then(
            (v) => {
                clearTimeout(timer);
                resolve(v);
            },
            (err: unknown) => {
                clearTimeout(timer);
                reject(err);
            },
        );
    });
}

/**
 * Names a concept group for display. A slow or failing label call only costs
 * presentation: it falls back to the joined concept names.
 */
export class ConceptLabelResolver implements LabelResolver {
    constructor(
        private readonly cohorts: CohortBuilder,
        private readonly llm: QuickCompleter,
        private readonly timeoutMs: number,
    ) {}

    async resolveLabel(group: ConceptGroup, fallback = "Unknown"): Promise<string> {
        const names = await this.cohorts.conceptNames(group.conceptIds);
        if (!names.length) return fallback;
        if (names.length === 1) return names[0];

        const joined = names.join(" / ");
        try {
            const reply = await withTimeout(this.llm.quickComplete(labelPrompt(names)), this.timeoutMs);
            const label = reply.trim().replace(/^["']+|["']+$/g, "").trim();
            return label || joined;
        } catch (err) {
            log.warn(`Label generation failed, using joined names: ${errorMessage(err)}`);
            return joined;
        }
    }
}
