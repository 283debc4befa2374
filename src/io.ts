import fs from "node:fs/promises";
import path from "node:path";
import type { Cell } from "./types";

export async function readPublicText(relPath: string): Promise<string> {
    const abs = path.resolve(process.cwd(), "public", relPath.replace(/^\/+/, ""));
    return fs.readFile(abs, "utf8");
}

/** Replaces `{{key}}` placeholders; unknown keys are left in place. */
export function fillTemplate(template: string, values: Record<string, string>): string {
    return template.replace(/\{\{(\w+)\}\}/g, (m, key: string) => values[key] ?? m);
}

/** Row value as a JSON-safe cell: dates as ISO strings, anything else exotic stringified. */
export function toCell(v: unknown): Cell {
    if (v == null) return null;
    if (typeof v === "number" || typeof v === "string" || typeof v === "boolean") return v;
    if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : v.toISOString();
    if (typeof v === "bigint") return v.toString();
    return typeof v === "object" ? JSON.stringify(v) : String(v);
}
