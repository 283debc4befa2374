import type { ConceptCatalog } from "./conceptCache";
import { fillTemplate, readPublicText } from "./io";

const TEMPLATE_PATH = "templates/system-prompt.md";

export async function buildSystemPrompt(catalog: ConceptCatalog, schema: string): Promise<string> {
    const instructions = fillTemplate(await readPublicText(TEMPLATE_PATH), { schema });
    return catalog.text ? `${instructions}\n---\n${catalog.text}` : instructions;
}

export function conciseRetryMessage(question: string): string {
    return (
        "IMPORTANT: Keep your response SHORT. Use 1 sentence for thinking.\n" +
        "Return ONLY compact JSON with no extra text. The question is:\n" +
        question
    );
}

export function conceptSearchMessage(term: string, conceptLines: string, question: string): string {
    return (
        `The system searched for '${term}' and found these concepts:\n${conceptLines}\n\n` +
        `Now answer the original question using the appropriate concept(s):\n${question}`
    );
}

export function sqlFallbackMessage(reason: string, question: string): string {
    return (
        `The statistical analysis approach failed for this question (${reason}). ` +
        "Answer it with a regular SQL query instead. Do NOT use the analysis key. Return only sql.\n\n" +
        question
    );
}
