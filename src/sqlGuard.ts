const BLOCKED = /\b(INSERT|UPDATE|DELETE|DROP|ALTER|CREATE|TRUNCATE|GRANT|REVOKE)\b/i;

/** Error message when `sql` is not a single read-only SELECT, else null. */
export function validateSql(sql: string): string | null {
    const stripped = sql.trim().replace(/;+\s*$/, "").trim();
    if (!stripped) return "Empty SQL";
    const firstWord = stripped.split(/\s+/)[0].toUpperCase();
    if (firstWord !== "SELECT" && firstWord !== "WITH") {
        return `Only SELECT queries allowed, got: ${firstWord}`;
    }
    const blocked = BLOCKED.exec(stripped);
    if (blocked) return `Blocked SQL keyword: ${blocked[0].toUpperCase()}`;
    return null;
}
