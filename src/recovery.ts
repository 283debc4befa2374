import { TruncatedResponseError } from "./errors";

export type JsonObject = Record<string, unknown>;

export interface RecoveredReply {
    data: JsonObject;
    /** true when the text had to be patched before it parsed */
    repaired: boolean;
}

function isJsonObject(v: unknown): v is JsonObject {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

function tryParseObject(text: string): JsonObject | null {
    try {
        const v: unknown = JSON.parse(text);
        return isJsonObject(v) ? v : null;
    } catch {
        return null;
    }
}

/** Strips a ```json ... ``` wrapper and surrounding whitespace. */
export function stripCodeFences(text: string): string {
    return text
        .replace(/^\s*```[\w-]*\s*/i, "")
        .replace(/\s*```+\s*$/i, "")
        .trim();
}

/** First balanced `{...}` block, string- and escape-aware. */
export function extractFirstJson(text: string): string | null {
    const s = stripCodeFences(text);
    const start = s.indexOf("{");
    if (start === -1) return null;

    let depth = 0;
    let inStr = false;
    let esc = false;
    for (let i = start; i < s.length; i++) {
        const ch = s[i];
        if (inStr) {
            if (esc) esc = false;
            else if (ch === "\\") esc = true;
            else if (ch === '"') inStr = false;
            continue;
        }
        if (ch === '"') inStr = true;
        else if (ch === "{" || ch === "[") depth++;
        else if (ch === "}" || ch === "]") {
            depth--;
            if (depth === 0) return ch === "}" ? s.slice(start, i + 1) : null;
        }
    }
    return null;
}

const CONTROL_ESCAPES: Record<string, string> = { "\n": "\\n", "\r": "\\r", "\t": "\\t" };

/**
 * Patches text cut off mid-object: escapes raw control characters inside
 * strings, closes an open string, drops a trailing comma and appends the
 * missing closers in nesting order.
 */
export function repairTruncatedJson(text: string): string {
    let out = "";
    const closers: string[] = [];
    let inStr = false;
    let esc = false;

    for (const ch of text) {
        if (inStr) {
            if (esc) {
                esc = false;
                out += ch;
            } else if (ch === "\\") {
                esc = true;
                out += ch;
            } else if (ch === '"') {
                inStr = false;
                out += ch;
            } else {
                out += CONTROL_ESCAPES[ch] ?? ch;
            }
            continue;
        }
        if (ch === '"') inStr = true;
        else if (ch === "{") closers.push("}");
        else if (ch === "[") closers.push("]");
        else if ((ch === "}" || ch === "]") && closers[closers.length - 1] === ch) closers.pop();
        out += ch;
    }

    if (inStr) {
        // a lone backslash would escape the closing quote
        if (esc) out = out.slice(0, -1);
        out += '"';
    }
    out = out.trimEnd();
    if (out.endsWith(",")) out = out.slice(0, -1);
    else if (out.endsWith(":")) out += " null";
    return out + closers.reverse().join("");
}

/**
 * Turns raw model output into an object. Tries, in order: the text as-is
 * (fences stripped), a fenced block anywhere, the first balanced object, and
 * finally a repair of everything from the first `{`.
 */
export function recover(rawText: string): RecoveredReply {
    const text = rawText.trim();

    const direct = tryParseObject(stripCodeFences(text));
    if (direct) return { data: direct, repaired: false };

    const fenced = /```(?:json)?\s*\n?([\s\S]*?)\n?```/.exec(text);
    const fromFence = fenced ? tryParseObject(fenced[1].trim()) : null;
    if (fromFence) return { data: fromFence, repaired: false };

    const block = extractFirstJson(text);
    const fromBlock = block ? tryParseObject(block) : null;
    if (fromBlock) return { data: fromBlock, repaired: false };

    const brace = text.indexOf("{");
    if (brace !== -1) {
        const patched = tryParseObject(repairTruncatedJson(stripCodeFences(text.slice(brace))));
        if (patched) return { data: patched, repaired: true };
    }
    throw new TruncatedResponseError(rawText);
}

/** A repaired reply that lost every actionable key is worth one concise retry. */
export function needsRetry(reply: RecoveredReply): boolean {
    const { data } = reply;
    return reply.repaired && !("sql" in data) && !("analysis" in data) && !("concept_search" in data);
}
