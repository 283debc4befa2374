import { z } from "zod";
import type { LogLevel } from "./logger";

const intFrom = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
    OPENAI_API_KEY: z.string().min(1, "Missing OPENAI_API_KEY in .env"),
    OPENAI_BASE_URL: z.string().url().optional(),
    OPENAI_MODEL: z.string().default("gpt-4o-mini"),
    OPENAI_UTILITY_MODEL: z.string().default("gpt-4.1-mini"),
    LLM_MAX_TOKENS: intFrom(4096),
    LABEL_TIMEOUT_MS: intFrom(5000),

    DATABASE_URL: z.string().optional(),
    PGHOST: z.string().default("localhost"),
    PGPORT: intFrom(5432),
    PGDATABASE: z.string().default("synthea10"),
    PGUSER: z.string().optional(),
    PGPASSWORD: z.string().optional(),
    DB_SCHEMA: z
        .string()
        .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "DB_SCHEMA must be a plain identifier")
        .default("cdm_synthea"),
    QUERY_TIMEOUT_S: intFrom(30),
    MIN_COHORT_SIZE: intFrom(5),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface Settings {
    llm: {
        apiKey: string;
        baseURL?: string;
        model: string;
        utilityModel: string;
        maxTokens: number;
        labelTimeoutMs: number;
    };
    db: {
        connectionString?: string;
        host: string;
        port: number;
        database: string;
        user?: string;
        password?: string;
        schema: string;
        queryTimeoutS: number;
    };
    minCohortSize: number;
    logLevel: LogLevel;
}

/** Reads settings from the environment (after dotenv has populated it). */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
        throw new Error(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    }
    const e = parsed.data;
    return {
        llm: {
            apiKey: e.OPENAI_API_KEY,
            baseURL: e.OPENAI_BASE_URL,
            model: e.OPENAI_MODEL,
            utilityModel: e.OPENAI_UTILITY_MODEL,
            maxTokens: e.LLM_MAX_TOKENS,
            labelTimeoutMs: e.LABEL_TIMEOUT_MS,
        },
        db: {
            connectionString: e.DATABASE_URL,
            host: e.PGHOST,
            port: e.PGPORT,
            database: e.PGDATABASE,
            user: e.PGUSER,
            password: e.PGPASSWORD,
            schema: e.DB_SCHEMA,
            queryTimeoutS: e.QUERY_TIMEOUT_S,
        },
        minCohortSize: e.MIN_COHORT_SIZE,
        logLevel: e.LOG_LEVEL,
    };
}
