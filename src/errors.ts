export type ErrorCode =
    | "VALIDATION"
    | "INSUFFICIENT_DATA"
    | "DATA_ACCESS"
    | "TRUNCATED_RESPONSE"
    | "NOT_FOUND";

export class EngineError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.code = code;
        this.name = new.target.name;
    }
}

/** Bad or missing request parameters. Raised before any query runs. */
export class ValidationError extends EngineError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super("VALIDATION", message);
        this.issues = issues;
    }
}

/** A required group is below the minimum cohort size. */
export class InsufficientDataError extends EngineError {
    readonly group: string;
    readonly size: number;

    constructor(group: string, size: number, minimum: number, detail?: string) {
        super(
            "INSUFFICIENT_DATA",
            `${group}: ${size} subject(s), below the minimum of ${minimum}.${detail ? ` ${detail}` : ""}`,
        );
        this.group = group;
        this.size = size;
    }
}

export class DataAccessError extends EngineError {
    readonly timedOut: boolean;

    constructor(message: string, opts: { timedOut?: boolean; cause?: unknown } = {}) {
        super("DATA_ACCESS", message, { cause: opts.cause });
        this.timedOut = opts.timedOut ?? false;
    }
}

/** Upstream text that could not be repaired into a structured object. */
export class TruncatedResponseError extends EngineError {
    readonly excerpt: string;

    constructor(rawText: string) {
        const excerpt = rawText.slice(0, 200);
        super("TRUNCATED_RESPONSE", `Could not parse a structured reply: ${excerpt}`);
        this.excerpt = excerpt;
    }
}

export class NotFoundError extends EngineError {
    constructor(analysisType: string, available: readonly string[]) {
        super(
            "NOT_FOUND",
            `Unknown analysis type: ${analysisType}. Available: ${[...available].sort().join(", ")}`,
        );
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
