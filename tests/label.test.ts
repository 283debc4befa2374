import { describe, expect, it } from "vitest";
import { ConceptLabelResolver } from "../src/analysis/label";
import { conceptGroup } from "../src/types";
import { MemoryCohorts, ScriptedLLM } from "./helpers/fakes";

const cohorts = new MemoryCohorts({
    concepts: [
        { id: 1308216, name: "Lisinopril", domain: "Drug" },
        { id: 1341927, name: "Enalapril", domain: "Drug" },
    ],
});

describe("ConceptLabelResolver", () => {
    it("uses the fallback when no concept is known", async () => {
        const llm = new ScriptedLLM();
        const labels = new ConceptLabelResolver(cohorts, llm, 1000);
        expect(await labels.resolveLabel(conceptGroup([42]), "Drug A")).toBe("Drug A");
        expect(llm.quickCalls).toHaveLength(0);
    });

    it("uses a single concept's name without asking the model", async () => {
        const llm = new ScriptedLLM();
        const labels = new ConceptLabelResolver(cohorts, llm, 1000);
        expect(await labels.resolveLabel(conceptGroup([1308216]))).toBe("Lisinopril");
        expect(llm.quickCalls).toHaveLength(0);
    });

    it("asks the model to name several concepts and strips quotes", async () => {
        const llm = new ScriptedLLM([], async () => '"ACE inhibitors"');
        const labels = new ConceptLabelResolver(cohorts, llm, 1000);
        expect(await labels.resolveLabel(conceptGroup([1308216, 1341927]))).toBe("ACE inhibitors");
        expect(llm.quickCalls[0]).toContain("- Lisinopril\n- Enalapril");
    });

    it("joins the names when the model fails", async () => {
        const llm = new ScriptedLLM([], async () => {
            throw new Error("rate limited");
        });
        const labels = new ConceptLabelResolver(cohorts, llm, 1000);
        expect(await labels.resolveLabel(conceptGroup([1308216, 1341927]))).toBe("Lisinopril / Enalapril");
    });

    it("joins the names when the model replies with nothing", async () => {
        const labels = new ConceptLabelResolver(cohorts, new ScriptedLLM([], async () => "  "), 1000);
        expect(await labels.resolveLabel(conceptGroup([1308216, 1341927]))).toBe("Lisinopril / Enalapril");
    });

    it("joins the names when the model is slower than the timeout", async () => {
        const slow = () => new Promise<string>((resolve) => setTimeout(() => resolve("too late"), 200));
        const labels = new ConceptLabelResolver(cohorts, new ScriptedLLM([], slow), 20);
        expect(await labels.resolveLabel(conceptGroup([1308216, 1341927]))).toBe("Lisinopril / Enalapril");
    });
});
